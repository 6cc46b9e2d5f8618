import type { ReconcileDecisions } from '../reconcile/types';
import type { CalendarMapping } from '../types/calendar';
import type { DateRange, NaturalKey, PersistedEntry } from '../types/entry';

export type StoreApplyResult = {
  inserted: number;
  updated: number;
  deleted: number;
};

export interface EntryStore {
  /** All rows for the employee, optionally limited to entries dated inside `range`. */
  listEntries(employeeId: string, range?: DateRange): Promise<PersistedEntry[]>;
  getEntry(naturalKey: NaturalKey): Promise<PersistedEntry | undefined>;
  /** Applies one employee's decision set atomically. */
  applyDecisions(decisions: ReconcileDecisions, at: string): Promise<StoreApplyResult>;
  markSynced(naturalKey: NaturalKey, at: string): Promise<void>;
}

export interface MappingStore {
  getMapping(naturalKey: NaturalKey): Promise<CalendarMapping | undefined>;
  putMapping(mapping: CalendarMapping): Promise<void>;
  deleteMapping(naturalKey: NaturalKey): Promise<void>;
  listMappings(employeeId: string): Promise<CalendarMapping[]>;
}
