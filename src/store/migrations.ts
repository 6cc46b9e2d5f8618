export const MIGRATION_0001_INITIAL_SCHEMA = `
CREATE TABLE IF NOT EXISTS work_entries (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  natural_key      TEXT NOT NULL,
  employee_id      TEXT NOT NULL,
  date             TEXT NOT NULL,
  start_time       TEXT NOT NULL,
  end_time         TEXT NOT NULL,
  end_date         TEXT,
  service_code     INTEGER NOT NULL CHECK (service_code IN (310, 320, 331)),
  duration_minutes INTEGER NOT NULL CHECK (duration_minutes >= 0),
  source_id        TEXT NOT NULL,
  status           TEXT NOT NULL DEFAULT 'accepted'
                     CHECK (status IN ('accepted', 'rejected', 'duplicate')),
  last_synced_at   TEXT,
  updated_at       TEXT NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS ux_work_entries_accepted_key
  ON work_entries (natural_key) WHERE status = 'accepted';

CREATE INDEX IF NOT EXISTS ix_work_entries_employee_date
  ON work_entries (employee_id, date);

CREATE TABLE IF NOT EXISTS calendar_mappings (
  natural_key       TEXT PRIMARY KEY,
  employee_id       TEXT NOT NULL,
  external_event_id TEXT NOT NULL,
  fingerprint       TEXT NOT NULL,
  synced_at         TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS reconcile_audit (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  employee_id TEXT NOT NULL,
  recorded_at TEXT NOT NULL,
  action      TEXT NOT NULL,
  natural_key TEXT,
  source_id   TEXT,
  detail      TEXT NOT NULL
);
`;

export const MIGRATIONS: readonly string[] = [MIGRATION_0001_INITIAL_SCHEMA];
