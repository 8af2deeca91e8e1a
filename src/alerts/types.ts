// ---------------------------------------------------------------------------
// Alert lifecycle domain types
// ---------------------------------------------------------------------------

/**
 * Alert types with a lifecycle (problem -> reminders -> recovery).
 */
export const CONDITION_TYPES = ['cpu', 'ram', 'disk', 'temperature', 'internet'] as const;

/**
 * Alert types that are announced once and never tracked as records.
 */
export const EVENT_TYPES = ['ssh', 'reboot'] as const;

export type ConditionType = (typeof CONDITION_TYPES)[number];
export type EventType = (typeof EVENT_TYPES)[number];
export type AlertType = ConditionType | EventType;

/**
 * Stable key for one monitored condition: `${type}:${instance}`,
 * e.g. `disk:/data` or `cpu:host`.
 */
export type AlertIdentity = string;

export function alertIdentity(type: ConditionType, instance: string): AlertIdentity {
  return `${type}:${instance}`;
}

/** Last observed measurement, carried into notification text. */
export interface MetricSnapshot {
  label: string;
  value: number;
  threshold: number;
  unit: string;
  /** Replaces the default "<label>: <value> (threshold ...)" line when set */
  summary?: string;
}

/**
 * Persisted lifecycle state for one identity.
 * Timestamps are epoch milliseconds.
 */
export interface AlertRecord {
  identity: AlertIdentity;
  type: ConditionType;
  active: boolean;
  /** Start of the current occurrence; null while inactive */
  firstTriggeredAt: number | null;
  lastNotifiedAt: number | null;
  /** Reminders sent for the current occurrence */
  reminderCount: number;
  lastValue: MetricSnapshot | null;
  updatedAt: number;
}

/**
 * Per-type notification policy. `reminderInterval` is in seconds, 0 = never remind.
 */
export interface AlertSettings {
  enabled: boolean;
  reminderInterval: number;
  notifyRecovery: boolean;
}

export type NoActionReason =
  | 'disabled'
  | 'idle'
  | 'suppressed'
  | 'reminders-off'
  | 'recovery-muted';

/**
 * What the evaluator decided for one evaluation. Delivery is a separate step.
 */
export type AlertAction =
  | { kind: 'none'; reason: NoActionReason }
  | { kind: 'initial' }
  | { kind: 'reminder'; reminderCount: number }
  | { kind: 'recovery'; durationMs: number };

export interface EvaluationInput {
  identity: AlertIdentity;
  type: ConditionType;
  isProblem: boolean;
  now: number;
  settings: AlertSettings;
  snapshot?: MetricSnapshot;
}

export interface Decision {
  action: AlertAction;
  /** Record to persist; null leaves the stored record untouched */
  next: AlertRecord | null;
}

/**
 * A decided notification handed to the dispatcher.
 */
export interface AlertNotification {
  action: Exclude<AlertAction, { kind: 'none' }>;
  record: AlertRecord;
}
