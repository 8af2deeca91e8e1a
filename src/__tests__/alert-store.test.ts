/**
 * AlertStore implementations: SQLite through drizzle (in-memory and on-disk
 * databases) and the Map-backed fallback.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase, type DatabaseHandle } from '../db/index.js';
import { runMigrations } from '../db/migrate.js';
import { MemoryAlertStore, SqliteAlertStore } from '../db/alert-store.js';
import { MemoryPreferenceStore, SqlitePreferenceStore } from '../db/preferences.js';
import { AlertEvaluator } from '../alerts/evaluator.js';
import { PersistenceError } from '../alerts/errors.js';
import type { AlertRecord } from '../alerts/types.js';

const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);

function activeRecord(identity: string, overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    identity,
    type: 'disk',
    active: true,
    firstTriggeredAt: T0,
    lastNotifiedAt: T0,
    reminderCount: 0,
    lastValue: { label: 'Disk /data', value: 95, threshold: 90, unit: '%' },
    updatedAt: T0,
    ...overrides,
  };
}

describe('SqliteAlertStore', () => {
  let handle: DatabaseHandle;
  let store: SqliteAlertStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    handle = openDatabase(':memory:');
    runMigrations(handle.sqlite);
    store = new SqliteAlertStore(handle.db);
  });

  afterEach(() => {
    if (handle.sqlite.open) handle.sqlite.close();
  });

  it('returns null for an identity never saved', async () => {
    expect(await store.load('cpu:host')).toBeNull();
  });

  it('round-trips every field', async () => {
    const record = activeRecord('disk:/data', { reminderCount: 2 });

    await store.save(record);

    expect(await store.load('disk:/data')).toEqual(record);
  });

  it('stores a missing last value as null', async () => {
    const record = activeRecord('cpu:host', { type: 'cpu', lastValue: null, active: false, firstTriggeredAt: null });

    await store.save(record);

    expect(await store.load('cpu:host')).toEqual(record);
  });

  it('overwrites the single row for an identity', async () => {
    await store.save(activeRecord('disk:/data'));
    await store.save(activeRecord('disk:/data', { active: false, firstTriggeredAt: null, updatedAt: T0 + 1000 }));

    const all = await store.loadAll();
    expect(all).toHaveLength(1);
    expect(all[0]).toMatchObject({ active: false, firstTriggeredAt: null, updatedAt: T0 + 1000 });
  });

  it('loads all records ordered by identity', async () => {
    await store.save(activeRecord('ram:host', { type: 'ram' }));
    await store.save(activeRecord('cpu:host', { type: 'cpu' }));
    await store.save(activeRecord('disk:/', { type: 'disk' }));

    const identities = (await store.loadAll()).map((r) => r.identity);
    expect(identities).toEqual(['cpu:host', 'disk:/', 'ram:host']);
  });

  it('returns equal values on repeated loads without writes', async () => {
    await store.save(activeRecord('disk:/data'));

    const first = await store.load('disk:/data');
    const second = await store.load('disk:/data');

    expect(second).toEqual(first);
    expect(await store.loadAll()).toEqual(await store.loadAll());
  });

  it('wraps write failures in PersistenceError', async () => {
    handle.sqlite.close();

    await expect(store.save(activeRecord('disk:/data'))).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('restart safety', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'hostwatch-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('suppresses after reopening the database and reminds on schedule', async () => {
    const path = join(dir, 'nested', 'alerts.db');
    const settings = { enabled: true, reminderInterval: 3600, notifyRecovery: true };
    const input = {
      identity: 'disk:/data',
      type: 'disk' as const,
      isProblem: true,
      settings,
    };

    const before = openDatabase(path);
    runMigrations(before.sqlite);
    const initial = await new AlertEvaluator(new SqliteAlertStore(before.db)).evaluate({ ...input, now: T0 });
    before.sqlite.close();

    const after = openDatabase(path);
    runMigrations(after.sqlite);
    const evaluator = new AlertEvaluator(new SqliteAlertStore(after.db));
    const halfway = await evaluator.evaluate({ ...input, now: T0 + 1800 * 1000 });
    const due = await evaluator.evaluate({ ...input, now: T0 + 3600 * 1000 });
    after.sqlite.close();

    expect(initial.action.kind).toBe('initial');
    expect(halfway.action).toEqual({ kind: 'none', reason: 'suppressed' });
    expect(due.action).toEqual({ kind: 'reminder', reminderCount: 1 });
  });
});

describe('MemoryAlertStore', () => {
  it('hands out copies, not the stored objects', async () => {
    const store = new MemoryAlertStore([activeRecord('disk:/data')]);

    const loaded = await store.load('disk:/data');
    if (!loaded?.lastValue) throw new Error('expected a stored record');
    loaded.active = false;
    loaded.lastValue.value = 0;

    expect(await store.load('disk:/data')).toEqual(activeRecord('disk:/data'));
  });
});

describe('PreferenceStore', () => {
  it('upserts values in SQLite', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const handle = openDatabase(':memory:');
    runMigrations(handle.sqlite);
    const prefs = new SqlitePreferenceStore(handle.db);

    expect(prefs.get('authlog.position')).toBeNull();
    prefs.set('authlog.position', '120');
    prefs.set('authlog.position', '240');
    expect(prefs.get('authlog.position')).toBe('240');
    handle.sqlite.close();
  });

  it('keeps values in memory', () => {
    const prefs = new MemoryPreferenceStore();
    prefs.set('host.lastUptime', '42');
    expect(prefs.get('host.lastUptime')).toBe('42');
    expect(prefs.get('missing')).toBeNull();
  });
});
