/**
 * Alert evaluator -- the lifecycle state machine.
 *
 * `decide()` is a pure function of (record, signal, now, settings) and
 * returns the action plus the record to write back. `AlertEvaluator` wraps it
 * with the single read-modify-write against the store, serialized per
 * identity.
 *
 * Order of checks:
 *  1. Type disabled            -> nothing, record untouched
 *  2. No problem, was active   -> recovery (once), record goes inactive
 *     No problem, not active   -> nothing
 *  3. Problem, not active      -> initial notification, new occurrence
 *     Problem, active          -> reminder if the interval elapsed, else suppressed
 */

import type {
  AlertAction,
  AlertIdentity,
  AlertRecord,
  Decision,
  EvaluationInput,
} from './types.js';
import type { AlertStore } from '../db/alert-store.js';
import { KeyedLock } from './keyed-lock.js';
import { PersistenceError, errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Pure decision
// ---------------------------------------------------------------------------

export function decide(input: EvaluationInput, record: AlertRecord | null): Decision {
  const { identity, type, isProblem, now, settings, snapshot } = input;

  if (!settings.enabled) {
    return { action: { kind: 'none', reason: 'disabled' }, next: null };
  }

  if (!isProblem) {
    if (!record?.active) {
      return { action: { kind: 'none', reason: 'idle' }, next: null };
    }

    const durationMs = Math.max(0, now - (record.firstTriggeredAt ?? now));
    const next: AlertRecord = {
      ...record,
      active: false,
      firstTriggeredAt: null,
      lastValue: snapshot ?? record.lastValue,
      updatedAt: now,
    };
    const action: AlertAction = settings.notifyRecovery
      ? { kind: 'recovery', durationMs }
      : { kind: 'none', reason: 'recovery-muted' };
    return { action, next };
  }

  if (!record?.active) {
    return {
      action: { kind: 'initial' },
      next: {
        identity,
        type,
        active: true,
        firstTriggeredAt: now,
        lastNotifiedAt: now,
        reminderCount: 0,
        lastValue: snapshot ?? null,
        updatedAt: now,
      },
    };
  }

  // Continuing occurrence
  const refreshed: AlertRecord = {
    ...record,
    lastValue: snapshot ?? record.lastValue,
    updatedAt: now,
  };

  if (settings.reminderInterval <= 0) {
    return { action: { kind: 'none', reason: 'reminders-off' }, next: refreshed };
  }

  // Negative elapsed (clock stepped back) reads as "not yet due"
  const elapsedMs = now - (record.lastNotifiedAt ?? record.firstTriggeredAt ?? now);
  if (elapsedMs < settings.reminderInterval * 1000) {
    return { action: { kind: 'none', reason: 'suppressed' }, next: refreshed };
  }

  const reminderCount = record.reminderCount + 1;
  return {
    action: { kind: 'reminder', reminderCount },
    next: { ...refreshed, lastNotifiedAt: now, reminderCount },
  };
}

// ---------------------------------------------------------------------------
// Stateful evaluator
// ---------------------------------------------------------------------------

export interface EvaluationResult {
  action: AlertAction;
  /** Record after this evaluation (the stored one when untouched, null if none exists) */
  record: AlertRecord | null;
  /** Set when the decided state could not be persisted; the action still stands */
  persistError: PersistenceError | null;
}

export type ResetResult = 'reset' | 'not-active' | 'unknown';

export class AlertEvaluator {
  private readonly lock = new KeyedLock();
  /** Decided state the store rejected; preferred over the stored row until a write succeeds */
  private readonly unsaved = new Map<AlertIdentity, AlertRecord>();

  constructor(private readonly store: AlertStore) {}

  async evaluate(input: EvaluationInput): Promise<EvaluationResult> {
    return this.lock.run(input.identity, async () => {
      const current = await this.current(input.identity);
      const { action, next } = decide(input, current);

      if (!next) {
        return { action, record: current, persistError: null };
      }

      const persistError = await this.persist(next);
      return { action, record: next, persistError };
    });
  }

  /**
   * Administrative reset: mark the condition inactive without a recovery
   * notice. The next problem reading starts a fresh occurrence.
   */
  async reset(identity: AlertIdentity, now = Date.now()): Promise<ResetResult> {
    return this.lock.run(identity, async () => {
      const current = await this.current(identity);
      if (!current) return 'unknown';
      if (!current.active) return 'not-active';

      // A failed write still resets in memory; the next evaluation retries it
      await this.persist({
        ...current,
        active: false,
        firstTriggeredAt: null,
        updatedAt: now,
      });
      return 'reset';
    });
  }

  /**
   * All known records, including state not yet persisted.
   */
  async listRecords(): Promise<AlertRecord[]> {
    const stored = await this.store.loadAll();
    const merged = new Map(stored.map((record) => [record.identity, record]));
    for (const [identity, record] of this.unsaved) {
      merged.set(identity, { ...record });
    }
    return [...merged.values()].sort((a, b) => a.identity.localeCompare(b.identity));
  }

  private async current(identity: AlertIdentity): Promise<AlertRecord | null> {
    const unsaved = this.unsaved.get(identity);
    return unsaved ? { ...unsaved } : this.store.load(identity);
  }

  private async persist(record: AlertRecord): Promise<PersistenceError | null> {
    try {
      await this.store.save(record);
      this.unsaved.delete(record.identity);
      return null;
    } catch (err) {
      this.unsaved.set(record.identity, record);
      const persistError = err instanceof PersistenceError
        ? err
        : new PersistenceError(record.identity, errorMessage(err), { cause: err });
      console.error(`[Evaluator] ${persistError.message}`);
      return persistError;
    }
  }
}
