/**
 * AlertStore -- durable identity -> AlertRecord mapping.
 *
 * The evaluator only sees the interface, so the lifecycle logic runs the same
 * against SQLite in production and a Map in tests (or when the database
 * could not be opened at boot).
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from './index.js';
import { alertRecords } from './schema.js';
import type { AlertIdentity, AlertRecord } from '../alerts/types.js';
import { PersistenceError, errorMessage } from '../alerts/errors.js';

export interface AlertStore {
  load(identity: AlertIdentity): Promise<AlertRecord | null>;
  /** Persist one record atomically. Rejects with PersistenceError. */
  save(record: AlertRecord): Promise<void>;
  loadAll(): Promise<AlertRecord[]>;
}

function cloneRecord(record: AlertRecord): AlertRecord {
  return { ...record, lastValue: record.lastValue ? { ...record.lastValue } : null };
}

// ---------------------------------------------------------------------------
// SQLite (drizzle) implementation
// ---------------------------------------------------------------------------

export class SqliteAlertStore implements AlertStore {
  constructor(private readonly db: AppDatabase) {}

  async load(identity: AlertIdentity): Promise<AlertRecord | null> {
    const row = this.db.select().from(alertRecords).where(eq(alertRecords.identity, identity)).get();
    return row ?? null;
  }

  async save(record: AlertRecord): Promise<void> {
    const values = {
      type: record.type,
      active: record.active,
      firstTriggeredAt: record.firstTriggeredAt,
      lastNotifiedAt: record.lastNotifiedAt,
      reminderCount: record.reminderCount,
      lastValue: record.lastValue,
      updatedAt: record.updatedAt,
    };

    try {
      // Single-row upsert: one statement, one implicit transaction
      this.db.insert(alertRecords)
        .values({ identity: record.identity, ...values })
        .onConflictDoUpdate({ target: alertRecords.identity, set: values })
        .run();
    } catch (err) {
      throw new PersistenceError(record.identity, errorMessage(err), { cause: err });
    }
  }

  async loadAll(): Promise<AlertRecord[]> {
    return this.db.select().from(alertRecords).orderBy(alertRecords.identity).all();
  }
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

export class MemoryAlertStore implements AlertStore {
  private records = new Map<AlertIdentity, AlertRecord>();

  constructor(initial: AlertRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.identity, cloneRecord(record));
    }
  }

  async load(identity: AlertIdentity): Promise<AlertRecord | null> {
    const record = this.records.get(identity);
    return record ? cloneRecord(record) : null;
  }

  async save(record: AlertRecord): Promise<void> {
    this.records.set(record.identity, cloneRecord(record));
  }

  async loadAll(): Promise<AlertRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => a.identity.localeCompare(b.identity))
      .map(cloneRecord);
  }
}
