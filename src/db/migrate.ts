import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * Create tables directly with CREATE TABLE IF NOT EXISTS.
 * Safe to run on every boot.
 */
export function runMigrations(sqlite: DatabaseType): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS alert_records (
      identity TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      active INTEGER NOT NULL DEFAULT 0,
      first_triggered_at INTEGER,
      last_notified_at INTEGER,
      reminder_count INTEGER NOT NULL DEFAULT 0,
      last_value TEXT,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_alert_records_active ON alert_records(active);
    CREATE INDEX IF NOT EXISTS idx_alert_records_type ON alert_records(type);

    CREATE TABLE IF NOT EXISTS preferences (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  console.log('[DB] Migrations applied');
}
