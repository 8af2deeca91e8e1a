import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: AppDatabase;
}

/**
 * Open (or create) the SQLite database and wrap it in a typed Drizzle instance.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    // Ensure the data directory exists before opening the database file
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite: DatabaseType = new Database(path);

  sqlite.pragma('journal_mode = WAL');
  // synchronous = NORMAL in WAL mode: a crash can lose the last commit, never corrupt others
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('temp_store = MEMORY');

  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
}
