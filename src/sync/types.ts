import type { DeleteReason } from '../reconcile/types';
import type { EntryStore, MappingStore } from '../store/types';
import type { NaturalKey, WorkEntry } from '../types/entry';
import type { Logger } from '../logger';
import { KeyedMutex } from './keyed-mutex';
import type { RetryPolicy, SleepFn } from './retry';

export interface CalendarClient {
  /** Serialized owner settings that shape every event; a change rewrites all events. */
  readonly profile?: string;
  create(entry: WorkEntry): Promise<string>; // → externalEventId
  update(externalEventId: string, entry: WorkEntry): Promise<void>;
  delete(externalEventId: string): Promise<void>;
}

type EntryOp = { naturalKey: NaturalKey; entry: WorkEntry };

/** What the synchronizer needs from a decision set; a ReconcileDecisions fits as is. */
export type SyncDecisions = {
  toInsert: EntryOp[];
  toUpdate: EntryOp[];
  toDelete: Array<{ naturalKey: NaturalKey; reason?: DeleteReason }>;
};

export type CalendarOp =
  | { kind: 'upsert'; naturalKey: NaturalKey; entry: WorkEntry }
  | { kind: 'remove'; naturalKey: NaturalKey };

export type SyncDeps = {
  mappings: MappingStore;
  calendar: CalendarClient;
  /** When given, successful writes stamp `lastSyncedAt` on the stored entry. */
  entries?: Pick<EntryStore, 'markSynced'>;
};

export type SyncOptions = {
  retry?: RetryPolicy;
  timeoutMs?: number;
  concurrency?: number;
  sleepFn?: SleepFn;
  signal?: AbortSignal;
  mutex?: KeyedMutex;
  now?: () => Date;
  logger?: Logger;
};

export type SyncAction = 'created' | 'updated' | 'deleted' | 'unchanged' | 'absent';

export type SyncOutcome = {
  naturalKey: NaturalKey;
  action: SyncAction;
  externalEventId?: string;
};

export type SyncFailure = {
  naturalKey: NaturalKey;
  operation: CalendarOp['kind'];
  message: string;
  error: unknown;
};

export type SyncResult = {
  outcomes: SyncOutcome[];
  failures: SyncFailure[];
  counts: Record<SyncAction | 'failed', number>;
};
