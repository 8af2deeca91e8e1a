/**
 * Reboot detection: host uptime going backwards means the machine restarted
 * since the previous check. The last uptime is stored so a reboot that also
 * restarted this agent is still noticed.
 */

import os from 'node:os';
import type { PreferenceStore } from '../db/preferences.js';
import { formatDuration } from '../alerts/format.js';

export const LAST_UPTIME_KEY = 'host.lastUptime';

/** Uptimes at or below this are too close to boot to compare against */
const MIN_PREVIOUS_UPTIME_S = 10;

export function isReboot(previousUptime: number | null, currentUptime: number): boolean {
  return previousUptime !== null
    && previousUptime > MIN_PREVIOUS_UPTIME_S
    && currentUptime < previousUptime;
}

export class RebootDetector {
  constructor(
    private readonly prefs: PreferenceStore,
    private readonly readUptime: () => number = os.uptime,
  ) {}

  /**
   * Compare the current uptime with the stored one and store the new value.
   * Returns the current uptime in seconds when a reboot is detected.
   */
  check(): number | null {
    const stored = this.prefs.get(LAST_UPTIME_KEY);
    const parsed = stored === null ? NaN : parseFloat(stored);
    const previous = isNaN(parsed) ? null : parsed;
    const current = this.readUptime();

    this.prefs.set(LAST_UPTIME_KEY, String(current));
    return isReboot(previous, current) ? current : null;
  }
}

export function formatReboot(host: string, uptimeSeconds: number): string {
  return `🔄 Server rebooted: ${host} (up ${formatDuration(uptimeSeconds * 1000)})`;
}
