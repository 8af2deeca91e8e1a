/**
 * Error taxonomy for the monitor. None of these is fatal to the process:
 *  - TransientReadError: a collector could not produce a reading (skip the identity this cycle)
 *  - PersistenceError:   the alert store rejected a write (keep in-memory decision, next cycle rewrites)
 *  - DeliveryError:      the transport failed (state stays committed, nothing is rolled back)
 */

export type MonitorErrorCode = 'TRANSIENT_READ' | 'PERSISTENCE' | 'DELIVERY';

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientReadError extends MonitorError {
  readonly resource: string;

  constructor(resource: string, message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_READ', `${resource}: ${message}`, options);
    this.resource = resource;
  }
}

export class PersistenceError extends MonitorError {
  readonly identity: string;

  constructor(identity: string, message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', `Failed to persist ${identity}: ${message}`, options);
    this.identity = identity;
  }
}

export class DeliveryError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DELIVERY', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
