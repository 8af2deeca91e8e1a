/**
 * Monitor lifecycle management.
 *
 * Starts two polling loops after a short startup delay:
 *  - Resources: threshold conditions (alert lifecycle)
 *  - Events:    SSH logins and reboots
 *
 * Each loop has an overlap guard: a tick that arrives while the previous
 * poll is still running is skipped, so no two cycles ever evaluate the same
 * identity at once.
 */

import { pollEvents, pollResources, type EventPollDeps, type ResourcePollDeps } from './poller.js';
import { errorMessage } from '../alerts/errors.js';

export interface MonitorOptions {
  resources: ResourcePollDeps;
  events: EventPollDeps;
  resourceIntervalMs: number;
  eventIntervalMs: number;
  startupDelayMs: number;
}

const timers: ReturnType<typeof setTimeout>[] = [];
let running = false;

/**
 * Wrap a poll so overlapping invocations are dropped.
 */
function guarded(name: string, poll: () => Promise<unknown>): () => void {
  let isPolling = false;
  return () => {
    if (isPolling) {
      console.warn(`[Monitor] ${name} poll still running, skipping tick`);
      return;
    }
    isPolling = true;
    poll()
      .catch((err) => console.error(`[Monitor] ${name} poll error:`, errorMessage(err)))
      .finally(() => {
        isPolling = false;
      });
  };
}

/**
 * Start the monitoring service.
 */
export function startMonitor(options: MonitorOptions): void {
  if (running) {
    console.warn('[Monitor] Already running, skipping start');
    return;
  }

  const resourceTick = guarded('Resource', () => pollResources(options.resources));
  const eventTick = guarded('Event', () => pollEvents(options.events));

  const startupTimer = setTimeout(() => {
    resourceTick();
    eventTick();
    timers.push(setInterval(resourceTick, options.resourceIntervalMs));
    timers.push(setInterval(eventTick, options.eventIntervalMs));
  }, options.startupDelayMs);
  timers.push(startupTimer);

  running = true;
  console.log('[Monitor] Monitoring service started');
  console.log(`[Monitor]   Resources: every ${options.resourceIntervalMs / 1000}s`);
  console.log(`[Monitor]   Events:    every ${options.eventIntervalMs / 1000}s`);
}

/**
 * Stop the monitoring service. Clears all timers; a poll already in flight
 * finishes on its own.
 */
export function stopMonitor(): void {
  if (!running) return;
  for (const timer of timers) {
    clearTimeout(timer);
    clearInterval(timer);
  }
  timers.length = 0;
  running = false;
  console.log('[Monitor] Monitoring service stopped');
}

export function isMonitorRunning(): boolean {
  return running;
}
