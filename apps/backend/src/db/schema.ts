import type { SqliteConnection } from './sqlite';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS devices (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    type TEXT NOT NULL,
    location TEXT,
    firmware TEXT,
    status TEXT NOT NULL DEFAULT 'active'
      CHECK (status IN ('active', 'inactive', 'decommissioned')),
    created_at INTEGER NOT NULL,
    last_seen_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS configurations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    device_id TEXT NOT NULL REFERENCES devices(id) ON DELETE RESTRICT,
    version INTEGER NOT NULL CHECK (version >= 1),
    payload TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 0 CHECK (active IN (0, 1)),
    created_at INTEGER NOT NULL,
    UNIQUE (device_id, version)
  );

  CREATE TABLE IF NOT EXISTS sensors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    device_id TEXT NOT NULL REFERENCES devices(id) ON DELETE CASCADE,
    code TEXT NOT NULL,
    name TEXT NOT NULL,
    unit TEXT NOT NULL,
    scale_factor REAL NOT NULL DEFAULT 1.0,
    value_offset REAL NOT NULL DEFAULT 0.0,
    range_min REAL,
    range_max REAL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    UNIQUE (device_id, code),
    CHECK (range_min IS NULL OR range_max IS NULL OR range_min <= range_max)
  );

  CREATE INDEX IF NOT EXISTS idx_devices_created ON devices(created_at);
  CREATE INDEX IF NOT EXISTS idx_devices_status ON devices(status, created_at);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_configurations_active
    ON configurations(device_id) WHERE active = 1;
`;

export function migrate(db: SqliteConnection): void {
  db.transaction(() => {
    db.exec(SCHEMA);
  }).immediate();
}
