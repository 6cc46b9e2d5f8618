import { produce } from 'immer';
import { applyDecisions } from '../orchestrator/apply-decisions';
import { inWindow } from '../reconcile/helpers';
import type { ReconcileDecisions } from '../reconcile/types';
import type { CalendarMapping } from '../types/calendar';
import type { DateRange, NaturalKey, PersistedEntry } from '../types/entry';
import type { EntryStore, MappingStore, StoreApplyResult } from './types';

/** In-process store for tests and dry runs. State is replaced, never mutated in place. */
export class MemoryEntryStore implements EntryStore {
  private rows: readonly PersistedEntry[];
  private seq: number;

  constructor(seed: readonly PersistedEntry[] = []) {
    this.rows = [...seed];
    this.seq = seed.reduce((max, r) => Math.max(max, Number(r.id) || 0), 0);
  }

  async listEntries(employeeId: string, range?: DateRange): Promise<PersistedEntry[]> {
    return this.rows.filter((r) => r.employeeId === employeeId && inWindow(r.date, range));
  }

  async getEntry(naturalKey: NaturalKey): Promise<PersistedEntry | undefined> {
    return this.rows.find((r) => r.naturalKey === naturalKey && r.status === 'accepted');
  }

  async applyDecisions(decisions: ReconcileDecisions, at: string): Promise<StoreApplyResult> {
    this.rows = applyDecisions(this.rows, decisions, {
      now: at,
      nextId: () => String(++this.seq),
    });
    return {
      inserted: decisions.toInsert.length,
      updated: decisions.toUpdate.length,
      deleted: decisions.toDelete.length,
    };
  }

  async markSynced(naturalKey: NaturalKey, at: string): Promise<void> {
    this.rows = produce(this.rows, (draft) => {
      const row = draft.find((r) => r.naturalKey === naturalKey && r.status === 'accepted');
      if (row) row.lastSyncedAt = at;
    });
  }

  snapshot(): readonly PersistedEntry[] {
    return this.rows;
  }
}

export class MemoryMappingStore implements MappingStore {
  private readonly byKey = new Map<NaturalKey, CalendarMapping>();

  constructor(seed: readonly CalendarMapping[] = []) {
    for (const m of seed) this.byKey.set(m.naturalKey, m);
  }

  async getMapping(naturalKey: NaturalKey): Promise<CalendarMapping | undefined> {
    return this.byKey.get(naturalKey);
  }

  async putMapping(mapping: CalendarMapping): Promise<void> {
    this.byKey.set(mapping.naturalKey, mapping);
  }

  async deleteMapping(naturalKey: NaturalKey): Promise<void> {
    this.byKey.delete(naturalKey);
  }

  async listMappings(employeeId: string): Promise<CalendarMapping[]> {
    return [...this.byKey.values()].filter((m) => m.employeeId === employeeId);
  }

  size(): number {
    return this.byKey.size;
  }
}
