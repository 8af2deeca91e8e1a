/**
 * Monitor settings -- thresholds, mount points, excluded IPs and the
 * per-type alert policy. Read from a JSON file at the start of every cycle,
 * so edits apply on the next cycle without a restart.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { AlertSettings, AlertType } from './types.js';
import { errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const partialAlertSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  reminderInterval: z.number().int().min(0).optional(),
  notifyRecovery: z.boolean().optional(),
}).strict();

export const monitorSettingsSchema = z.object({
  thresholds: z.object({
    cpu: z.number().min(1).max(100).default(90),
    ram: z.number().min(1).max(100).default(90),
    temperature: z.number().positive().default(80),
  }).default({}),
  mountPoints: z.array(z.object({
    path: z.string().min(1),
    threshold: z.number().min(1).max(100).default(90),
  })).default([{ path: '/', threshold: 90 }]),
  excludedIps: z.array(z.string().min(1))
    .default(['127.0.0.1', '192.168.0.0/16', '10.0.0.0/8', '172.16.0.0/12']),
  alertSettings: z.object({
    cpu: partialAlertSettingsSchema.optional(),
    ram: partialAlertSettingsSchema.optional(),
    disk: partialAlertSettingsSchema.optional(),
    temperature: partialAlertSettingsSchema.optional(),
    internet: partialAlertSettingsSchema.optional(),
    ssh: partialAlertSettingsSchema.optional(),
    reboot: partialAlertSettingsSchema.optional(),
  }).default({}),
});

export type MonitorSettings = z.infer<typeof monitorSettingsSchema>;

export const DEFAULT_SETTINGS: MonitorSettings = monitorSettingsSchema.parse({});

// ---------------------------------------------------------------------------
// Per-type policy
// ---------------------------------------------------------------------------

const GENERIC_DEFAULTS: AlertSettings = { enabled: true, reminderInterval: 3600, notifyRecovery: true };

/** Types whose defaults differ from the generic hourly-reminder policy */
const TYPE_DEFAULTS: Partial<Record<AlertType, AlertSettings>> = {
  // Logins are one-shot events
  ssh: { enabled: true, reminderInterval: 0, notifyRecovery: false },
  // A reminder cannot be delivered while the link is down
  internet: { enabled: true, reminderInterval: 0, notifyRecovery: true },
  reboot: { enabled: true, reminderInterval: 0, notifyRecovery: false },
};

export function resolveAlertSettings(settings: MonitorSettings, type: AlertType): AlertSettings {
  const base = TYPE_DEFAULTS[type] ?? GENERIC_DEFAULTS;
  const override = settings.alertSettings[type];
  return {
    enabled: override?.enabled ?? base.enabled,
    reminderInterval: override?.reminderInterval ?? base.reminderInterval,
    notifyRecovery: override?.notifyRecovery ?? base.notifyRecovery,
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type ParseResult =
  | { ok: true; settings: MonitorSettings }
  | { ok: false; error: string };

export function parseMonitorSettings(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }

  const result = monitorSettingsSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: issues };
  }
  return { ok: true, settings: result.data };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export interface SettingsProvider {
  /** Settings for a new cycle (re-read from disk where applicable) */
  load(): Promise<MonitorSettings>;
  current(): MonitorSettings;
}

export class SettingsSource implements SettingsProvider {
  private lastGood: MonitorSettings = DEFAULT_SETTINGS;

  constructor(private readonly path: string) {}

  /**
   * Re-read the settings file. A missing file is created with defaults;
   * an unreadable or invalid one keeps the last good settings.
   */
  async load(): Promise<MonitorSettings> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        await this.writeDefaults();
      } else {
        console.error(`[Settings] Failed to read ${this.path}: ${errorMessage(err)}`);
      }
      return this.lastGood;
    }

    const parsed = parseMonitorSettings(raw);
    if (!parsed.ok) {
      console.error(`[Settings] Ignoring invalid ${this.path} (${parsed.error}), keeping previous settings`);
      return this.lastGood;
    }

    this.lastGood = parsed.settings;
    return this.lastGood;
  }

  /** Settings from the most recent successful load */
  current(): MonitorSettings {
    return this.lastGood;
  }

  private async writeDefaults(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(DEFAULT_SETTINGS, null, 2) + '\n', 'utf-8');
      console.log(`[Settings] Created default settings file: ${this.path}`);
    } catch (err) {
      console.warn(`[Settings] Could not create ${this.path}: ${errorMessage(err)}`);
    }
  }
}
