import type { AlertNotification, MetricSnapshot } from './types.js';

/**
 * "1h 2m 3s" style duration. Hours only when non-zero, minutes when
 * non-zero or hours are shown, seconds always.
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0 || hours > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return parts.join(' ');
}

/** Host uptime as "2d 3h 4m 5s"; every unit is always shown. */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${days}d ${hours}h ${minutes}m ${total % 60}s`;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function describeSnapshot(snapshot: MetricSnapshot): string {
  if (snapshot.summary) return snapshot.summary;
  const { label, value, threshold, unit } = snapshot;
  return `${label}: ${round1(value)}${unit} (threshold ${round1(threshold)}${unit})`;
}

/**
 * Message text for a decided notification.
 */
export function renderNotification({ action, record }: AlertNotification): string {
  const snapshot = record.lastValue;
  const problem = `⚠️ ${snapshot ? describeSnapshot(snapshot) : record.identity}`;

  switch (action.kind) {
    case 'initial':
      return problem;
    case 'reminder':
      return `🔄 REMINDER (${action.reminderCount}) - ${problem}`;
    case 'recovery':
      return `✅ RESOLVED - ${snapshot?.label ?? record.identity} (duration: ${formatDuration(action.durationMs)})`;
  }
}
