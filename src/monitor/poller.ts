/**
 * Polling functions for the monitor.
 *
 * Each poll is independently try/catch-wrapped so errors never propagate or
 * crash the agent. Within a cycle, resources are sampled concurrently and a
 * failed reading only skips its own identity.
 *
 * Tiers:
 *  - Resources: CPU, RAM, disk, temperature, connectivity -> alert lifecycle
 *  - Events: SSH logins, reboots -> one-shot announcements
 */

import type { AlertEvaluator } from '../alerts/evaluator.js';
import type { NotificationDispatcher } from '../alerts/dispatcher.js';
import { resolveAlertSettings, type SettingsProvider } from '../alerts/settings.js';
import type { MetricSnapshot } from '../alerts/types.js';
import { errorMessage } from '../alerts/errors.js';
import { buildResources, isProblem, type ResourceOptions } from './thresholds.js';
import type { CycleReport, MonitoredResource, ResourceOutcome } from './types.js';
import { formatSshLogin, type AuthLogWatcher } from './auth-log.js';
import { formatReboot, type RebootDetector } from './reboot.js';
import { primaryIpv4 } from './network.js';

export interface ResourcePollDeps {
  settings: SettingsProvider;
  evaluator: AlertEvaluator;
  dispatcher: NotificationDispatcher;
  resourceOptions: ResourceOptions;
  /** Clock, epoch ms */
  now?: () => number;
}

export interface EventPollDeps {
  settings: SettingsProvider;
  dispatcher: NotificationDispatcher;
  /** Null when no auth log is available to watch */
  authLog: AuthLogWatcher | null;
  reboot: RebootDetector;
  hostLabel: string;
  /** Address of this host shown in SSH announcements */
  localIp?: () => string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function snapshotFor(resource: MonitoredResource, value: number, problem: boolean): MetricSnapshot {
  const snapshot: MetricSnapshot = {
    label: resource.label,
    value,
    threshold: resource.threshold,
    unit: resource.unit,
  };
  if (problem && resource.describe) {
    snapshot.summary = resource.describe(value);
  }
  return snapshot;
}

// ---------------------------------------------------------------------------
// Poll: Resources -- threshold conditions through the alert lifecycle
// ---------------------------------------------------------------------------

/**
 * One evaluation cycle: read settings, sample every resource, evaluate each
 * reading and dispatch whatever the evaluator decided.
 */
export async function pollResources(deps: ResourcePollDeps): Promise<CycleReport> {
  const clock = deps.now ?? Date.now;
  const startedAt = clock();
  const outcomes: ResourceOutcome[] = [];
  let notificationsSent = 0;

  try {
    const settings = await deps.settings.load();
    const resources = buildResources(settings, deps.resourceOptions);

    const results = await Promise.allSettled(resources.map(async (resource) => {
      const value = await resource.sample();
      const problem = isProblem(resource, value);

      const result = await deps.evaluator.evaluate({
        identity: resource.identity,
        type: resource.type,
        isProblem: problem,
        now: clock(),
        settings: resolveAlertSettings(settings, resource.type),
        snapshot: snapshotFor(resource, value, problem),
      });

      const { action, record } = result;
      if (action.kind !== 'none' && record) {
        console.log(`[Monitor] ${resource.identity}: ${action.kind} (${value.toFixed(1)}${resource.unit})`);
        const dispatched = await deps.dispatcher.dispatch({ action, record });
        if (dispatched.delivered) notificationsSent++;
      }

      return { value, problem, action: action.kind === 'none' ? action.reason : action.kind };
    }));

    results.forEach((settled, i) => {
      const { identity } = resources[i];
      if (settled.status === 'fulfilled') {
        const { value, problem, action } = settled.value;
        outcomes.push({ identity, status: 'evaluated', value, isProblem: problem, action });
      } else {
        const error = errorMessage(settled.reason);
        console.warn(`[Monitor] Skipping ${identity} this cycle: ${error}`);
        outcomes.push({ identity, status: 'skipped', error });
      }
    });
  } catch (err) {
    console.error('[Monitor] Resource poll error:', errorMessage(err));
  }

  return { startedAt, outcomes, notificationsSent };
}

// ---------------------------------------------------------------------------
// Poll: Events -- SSH logins and reboots
// ---------------------------------------------------------------------------

/**
 * Announce new SSH logins and a detected reboot. Returns the number of
 * announcements delivered.
 */
export async function pollEvents(deps: EventPollDeps): Promise<number> {
  let delivered = 0;

  try {
    const settings = await deps.settings.load();

    const rebootUptime = deps.reboot.check();
    if (rebootUptime !== null) {
      console.log(`[Monitor] Reboot detected (uptime ${Math.round(rebootUptime)}s)`);
      const result = await deps.dispatcher.announce(
        'reboot',
        formatReboot(deps.hostLabel, rebootUptime),
        resolveAlertSettings(settings, 'reboot'),
      );
      if (result?.delivered) delivered++;
    }

    if (deps.authLog) {
      const logins = await deps.authLog.poll(settings.excludedIps);
      const sshSettings = resolveAlertSettings(settings, 'ssh');
      const localIp = (deps.localIp ?? primaryIpv4)();
      for (const login of logins) {
        console.log(`[Monitor] SSH login: ${login.user} from ${login.ip}`);
        const result = await deps.dispatcher.announce('ssh', formatSshLogin(login, localIp), sshSettings);
        if (result?.delivered) delivered++;
      }
    }
  } catch (err) {
    console.error('[Monitor] Event poll error:', errorMessage(err));
  }

  return delivered;
}
