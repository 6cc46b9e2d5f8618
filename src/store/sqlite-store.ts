import Database from 'better-sqlite3';
import { ConflictDecisionError } from '../errors';
import { isServiceCode } from '../entry/validate';
import type { ReconcileDecisions } from '../reconcile/types';
import type { CalendarMapping } from '../types/calendar';
import type { DateRange, EntryStatus, NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';
import { MIGRATIONS } from './migrations';
import type { EntryStore, MappingStore, StoreApplyResult } from './types';

type EntryRow = {
  id: number;
  natural_key: string;
  employee_id: string;
  date: string;
  start_time: string;
  end_time: string;
  end_date: string | null;
  service_code: number;
  duration_minutes: number;
  source_id: string;
  status: string;
  last_synced_at: string | null;
  updated_at: string;
};

type MappingRow = {
  natural_key: string;
  employee_id: string;
  external_event_id: string;
  fingerprint: string;
  synced_at: string;
};

type EntryParams = {
  natural_key: string;
  employee_id: string;
  date: string;
  start_time: string;
  end_time: string;
  end_date: string | null;
  service_code: number;
  duration_minutes: number;
  source_id: string;
  updated_at: string;
};

type UpdateParams = Pick<
  EntryParams,
  'natural_key' | 'end_time' | 'end_date' | 'duration_minutes' | 'source_id' | 'updated_at'
> & { id: number };

const STATUSES: EntryStatus[] = ['accepted', 'rejected', 'duplicate'];

export type SqliteStoreOptions = {
  /** How long a write waits on a locked database before failing, in ms. */
  busyTimeoutMs?: number;
};

/**
 * Entry and mapping store on a single SQLite file.
 * Each employee's decision set is written in one IMMEDIATE transaction, so two
 * reconciliation passes for the same data can never interleave.
 */
export class SqliteStore implements EntryStore, MappingStore {
  constructor(private readonly db: Database.Database) {
    migrate(db);
  }

  static open(path: string, opts: SqliteStoreOptions = {}): SqliteStore {
    const db = new Database(path, { timeout: opts.busyTimeoutMs ?? 5000 });
    if (path !== ':memory:') db.pragma('journal_mode = WAL');
    return new SqliteStore(db);
  }

  close(): void {
    this.db.close();
  }

  // ---------- entries ----------

  async listEntries(employeeId: string, range?: DateRange): Promise<PersistedEntry[]> {
    const rows = range
      ? this.db
          .prepare<[string, string, string], EntryRow>(
            `SELECT * FROM work_entries WHERE employee_id = ? AND date BETWEEN ? AND ? ORDER BY natural_key, id`,
          )
          .all(employeeId, range.start, range.end)
      : this.db
          .prepare<[string], EntryRow>(
            `SELECT * FROM work_entries WHERE employee_id = ? ORDER BY natural_key, id`,
          )
          .all(employeeId);
    return rows.map(fromEntryRow);
  }

  async getEntry(naturalKey: NaturalKey): Promise<PersistedEntry | undefined> {
    const row = this.db
      .prepare<[string], EntryRow>(
        `SELECT * FROM work_entries WHERE natural_key = ? AND status = 'accepted'`,
      )
      .get(naturalKey);
    return row ? fromEntryRow(row) : undefined;
  }

  async applyDecisions(decisions: ReconcileDecisions, at: string): Promise<StoreApplyResult> {
    const del = this.db.prepare<[number]>(`DELETE FROM work_entries WHERE id = ?`);
    const upd = this.db.prepare<[UpdateParams]>(
      `UPDATE work_entries
          SET end_time = @end_time, end_date = @end_date, duration_minutes = @duration_minutes,
              source_id = @source_id, updated_at = @updated_at
        WHERE id = @id AND natural_key = @natural_key AND status = 'accepted'`,
    );
    const ins = this.db.prepare<[EntryParams]>(
      `INSERT INTO work_entries
         (natural_key, employee_id, date, start_time, end_time, end_date, service_code,
          duration_minutes, source_id, status, last_synced_at, updated_at)
       VALUES
         (@natural_key, @employee_id, @date, @start_time, @end_time, @end_date, @service_code,
          @duration_minutes, @source_id, 'accepted', NULL, @updated_at)`,
    );
    const audit = this.db.prepare<[string, string, string, string | null, string | null, string]>(
      `INSERT INTO reconcile_audit (employee_id, recorded_at, action, natural_key, source_id, detail)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );

    const tx = this.db.transaction((d: ReconcileDecisions): StoreApplyResult => {
      let deleted = 0;
      for (const x of d.toDelete) deleted += del.run(Number(x.entry.id)).changes;

      for (const u of d.toUpdate) {
        const { changes } = upd.run({
          id: Number(u.id),
          natural_key: u.naturalKey,
          end_time: u.entry.endTime,
          end_date: u.entry.endDate ?? null,
          duration_minutes: u.entry.durationMinutes,
          source_id: u.entry.sourceId,
          updated_at: at,
        });
        if (changes !== 1) {
          throw new ConflictDecisionError(`[sqlite] update of ${u.naturalKey} matched ${changes} rows`);
        }
      }

      for (const i of d.toInsert) {
        try {
          ins.run(toEntryParams(i.naturalKey, i.entry, at));
        } catch (err) {
          throw new ConflictDecisionError(`[sqlite] insert of ${i.naturalKey} rejected`, {
            cause: err,
          });
        }
      }

      for (const a of d.audit) {
        audit.run(d.employeeId, at, a.action, a.naturalKey ?? null, a.sourceId ?? null, a.detail);
      }

      return { inserted: d.toInsert.length, updated: d.toUpdate.length, deleted };
    });

    return tx.immediate(decisions);
  }

  async markSynced(naturalKey: NaturalKey, at: string): Promise<void> {
    this.db
      .prepare<[string, string]>(
        `UPDATE work_entries SET last_synced_at = ? WHERE natural_key = ? AND status = 'accepted'`,
      )
      .run(at, naturalKey);
  }

  // ---------- mappings ----------

  async getMapping(naturalKey: NaturalKey): Promise<CalendarMapping | undefined> {
    const row = this.db
      .prepare<[string], MappingRow>(`SELECT * FROM calendar_mappings WHERE natural_key = ?`)
      .get(naturalKey);
    return row ? fromMappingRow(row) : undefined;
  }

  async putMapping(m: CalendarMapping): Promise<void> {
    this.db
      .prepare<[MappingRow]>(
        `INSERT INTO calendar_mappings (natural_key, employee_id, external_event_id, fingerprint, synced_at)
         VALUES (@natural_key, @employee_id, @external_event_id, @fingerprint, @synced_at)
         ON CONFLICT (natural_key) DO UPDATE SET
           employee_id = excluded.employee_id,
           external_event_id = excluded.external_event_id,
           fingerprint = excluded.fingerprint,
           synced_at = excluded.synced_at`,
      )
      .run({
        natural_key: m.naturalKey,
        employee_id: m.employeeId,
        external_event_id: m.externalEventId,
        fingerprint: m.fingerprint,
        synced_at: m.syncedAt,
      });
  }

  async deleteMapping(naturalKey: NaturalKey): Promise<void> {
    this.db.prepare<[string]>(`DELETE FROM calendar_mappings WHERE natural_key = ?`).run(naturalKey);
  }

  async listMappings(employeeId: string): Promise<CalendarMapping[]> {
    return this.db
      .prepare<[string], MappingRow>(
        `SELECT * FROM calendar_mappings WHERE employee_id = ? ORDER BY natural_key`,
      )
      .all(employeeId)
      .map(fromMappingRow);
  }

  // ---------- audit ----------

  auditTrail(employeeId: string): Array<{ action: string; naturalKey: string | null; detail: string }> {
    return this.db
      .prepare<[string], { action: string; natural_key: string | null; detail: string }>(
        `SELECT action, natural_key, detail FROM reconcile_audit WHERE employee_id = ? ORDER BY id`,
      )
      .all(employeeId)
      .map((r) => ({ action: r.action, naturalKey: r.natural_key, detail: r.detail }));
  }
}

function migrate(db: Database.Database) {
  const version = db.pragma('user_version', { simple: true });
  const current = typeof version === 'number' ? version : 0;
  for (let v = current; v < MIGRATIONS.length; v++) {
    db.transaction(() => {
      db.exec(MIGRATIONS[v]);
      db.pragma(`user_version = ${v + 1}`);
    })();
  }
}

function toEntryParams(
  naturalKey: NaturalKey,
  e: WorkEntry,
  at: string,
): EntryParams {
  return {
    natural_key: naturalKey,
    employee_id: e.employeeId,
    date: e.date,
    start_time: e.startTime,
    end_time: e.endTime,
    end_date: e.endDate ?? null,
    service_code: e.serviceCode,
    duration_minutes: e.durationMinutes,
    source_id: e.sourceId,
    updated_at: at,
  };
}

function fromEntryRow(row: EntryRow): PersistedEntry {
  const serviceCode = row.service_code;
  const status = STATUSES.find((s) => s === row.status);
  if (!isServiceCode(serviceCode) || !status) {
    throw new ConflictDecisionError(
      `[sqlite] row ${row.id} has service_code=${row.service_code} status=${row.status}`,
    );
  }
  const entry: PersistedEntry = {
    id: String(row.id),
    naturalKey: row.natural_key,
    employeeId: row.employee_id,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    serviceCode,
    durationMinutes: row.duration_minutes,
    sourceId: row.source_id,
    status,
    lastSyncedAt: row.last_synced_at,
    updatedAt: row.updated_at,
  };
  if (row.end_date !== null) entry.endDate = row.end_date;
  return entry;
}

function fromMappingRow(row: MappingRow): CalendarMapping {
  return {
    naturalKey: row.natural_key,
    employeeId: row.employee_id,
    externalEventId: row.external_event_id,
    fingerprint: row.fingerprint,
    syncedAt: row.synced_at,
  };
}
