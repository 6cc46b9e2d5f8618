import type { EntryValidationFailure } from '../entry/validate';
import type { DateRange, NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';

export type IssueLevel = 'INFO' | 'WARNING' | 'ERROR';

export type ReconciliationIssue = {
  level: IssueLevel;
  code: string; // e.g. 'ENTRY_INVALID' | 'DUPLICATE_IN_FETCH' | 'OUTSIDE_WINDOW' | 'CONFLICT_DUPLICATE_ACCEPTED'
  message: string; // 人类可读
  employeeId: string;
  naturalKey?: NaturalKey;
  date?: string;
  meta?: Record<string, unknown>;
};

export type InsertDecision = {
  naturalKey: NaturalKey;
  entry: WorkEntry;
};

export type UpdatableField = 'endTime' | 'endDate' | 'durationMinutes' | 'sourceId';

export type UpdateDecision = {
  naturalKey: NaturalKey;
  id: string;
  before: PersistedEntry;
  entry: WorkEntry; // 来源端的新值（source wins）
  changedFields: UpdatableField[];
};

export type DeleteReason =
  | 'MISSING_FROM_SOURCE' // 来源这次没再报告
  | 'STALE_STATUS' // 存储里残留的 rejected/duplicate
  | 'CONFLICT'; // 同一 natural key 多条 accepted

export type DeleteDecision = {
  naturalKey: NaturalKey;
  entry: PersistedEntry;
  reason: DeleteReason;
};

export type DuplicateRecord = {
  naturalKey: NaturalKey;
  entry: WorkEntry;
  keptSourceId: string;
};

export type AuditAction = 'insert' | 'update' | 'delete' | 'duplicate' | 'invalid';

export type AuditRecord = {
  action: AuditAction;
  naturalKey?: NaturalKey;
  sourceId?: string;
  detail: string;
};

export type ReconcileDecisions = {
  employeeId: string;
  toInsert: InsertDecision[];
  toUpdate: UpdateDecision[];
  toDelete: DeleteDecision[];
  duplicates: DuplicateRecord[];
  validationErrors: EntryValidationFailure[];
  issues: ReconciliationIssue[];
  audit: AuditRecord[];
};

export type ReconcileOptions = {
  /** Fetch window. Entries on either side dated outside it are neither compared nor written. */
  window?: DateRange;
};
