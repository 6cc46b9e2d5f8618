import type { ReconcileDecisions } from '../reconcile/types';
import type { SyncResult } from '../sync/types';
import type { DateRange } from '../types/entry';
import type { PeriodSummary } from '../types/summary';

export type RunStatus = 'success' | 'partial-failure' | 'failure';

export type EmployeeCounts = {
  inserted: number;
  updated: number;
  deleted: number;
  rejectedValidation: number;
  duplicates: number;
  calendarFailures: number;
};

export type EmployeeRunResult = {
  employeeId: string;
  status: RunStatus;
  counts: EmployeeCounts;
  summaries: PeriodSummary[];
  /** Always present once reconciliation ran; in a dry run these are the intended writes. */
  decisions?: ReconcileDecisions;
  sync?: SyncResult;
  notified: boolean;
  errors: string[];
};

export type RunResult = {
  status: RunStatus;
  dryRun: boolean;
  dateRange: DateRange;
  startedAt: string;
  finishedAt: string;
  employees: EmployeeRunResult[];
};
