// ---------------------------------------------------------------------------
// Monitoring domain types
// ---------------------------------------------------------------------------

import type { AlertIdentity, ConditionType } from '../alerts/types.js';

/**
 * Which side of the threshold is a problem.
 *  - above: reading > threshold (usage, temperature)
 *  - below: reading < threshold (connectivity)
 */
export type ThresholdDirection = 'above' | 'below';

/**
 * One monitored condition: where to read it and what counts as a problem.
 */
export interface MonitoredResource {
  identity: AlertIdentity;
  type: ConditionType;
  label: string;
  unit: string;
  threshold: number;
  direction: ThresholdDirection;
  /** Current reading. Rejects with TransientReadError when unavailable. */
  sample(): Promise<number>;
  /** Human text for a problem reading, overriding the default rendering */
  describe?(value: number): string;
}

/**
 * Outcome of one resource in a cycle.
 */
export type ResourceOutcome =
  | { identity: AlertIdentity; status: 'evaluated'; value: number; isProblem: boolean; action: string }
  | { identity: AlertIdentity; status: 'skipped'; error: string };

export interface CycleReport {
  startedAt: number;
  outcomes: ResourceOutcome[];
  notificationsSent: number;
}
