import { eq, sql } from 'drizzle-orm';
import type { AppDatabase } from './index.js';
import { preferences } from './schema.js';

/**
 * Small key-value store for watcher bookkeeping (auth log offset, last uptime).
 */
export interface PreferenceStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

export class SqlitePreferenceStore implements PreferenceStore {
  constructor(private readonly db: AppDatabase) {}

  get(key: string): string | null {
    return this.db.select().from(preferences).where(eq(preferences.key, key)).get()?.value ?? null;
  }

  set(key: string, value: string): void {
    this.db.insert(preferences)
      .values({ key, value })
      .onConflictDoUpdate({
        target: preferences.key,
        set: {
          value,
          updatedAt: sql`datetime('now')`,
        },
      })
      .run();
  }
}

export class MemoryPreferenceStore implements PreferenceStore {
  private values = new Map<string, string>();

  get(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }
}
