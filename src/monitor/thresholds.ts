/**
 * Threshold catalogue -- turns the current settings into the list of
 * monitored resources and decides whether a reading is a problem.
 * Comparisons are strict: a reading equal to the threshold is healthy.
 */

import type { MonitorSettings } from '../alerts/settings.js';
import { alertIdentity } from '../alerts/types.js';
import type { MonitoredResource } from './types.js';
import {
  readConnectivity,
  readCpuPercent,
  readDiskPercent,
  readRamPercent,
  readTemperature,
} from './collectors.js';

export interface ResourceOptions {
  cpuSampleWindowMs: number;
  thermalPath: string;
  /** Replaces the default connectivity probe (tests) */
  connectivity?: () => Promise<number>;
}

export function isProblem(resource: Pick<MonitoredResource, 'threshold' | 'direction'>, value: number): boolean {
  return resource.direction === 'above' ? value > resource.threshold : value < resource.threshold;
}

/**
 * Build the monitored resources for one cycle. Called with freshly loaded
 * settings, so threshold and mount point edits apply on the next cycle.
 */
export function buildResources(settings: MonitorSettings, options: ResourceOptions): MonitoredResource[] {
  const { thresholds, mountPoints } = settings;

  const resources: MonitoredResource[] = [
    {
      identity: alertIdentity('cpu', 'host'),
      type: 'cpu',
      label: 'CPU usage',
      unit: '%',
      threshold: thresholds.cpu,
      direction: 'above',
      sample: () => readCpuPercent(options.cpuSampleWindowMs),
    },
    {
      identity: alertIdentity('ram', 'host'),
      type: 'ram',
      label: 'RAM usage',
      unit: '%',
      threshold: thresholds.ram,
      direction: 'above',
      sample: readRamPercent,
    },
    {
      identity: alertIdentity('temperature', 'host'),
      type: 'temperature',
      label: 'Temperature',
      unit: '°C',
      threshold: thresholds.temperature,
      direction: 'above',
      sample: () => readTemperature(options.thermalPath),
    },
    {
      identity: alertIdentity('internet', 'host'),
      type: 'internet',
      label: 'Internet connection',
      unit: '',
      threshold: 1,
      direction: 'below',
      sample: options.connectivity ?? (() => readConnectivity()),
      describe: () => 'Internet connection lost',
    },
  ];

  // Duplicate paths would share one identity; first entry wins
  const seen = new Set<string>();
  for (const mount of mountPoints) {
    if (seen.has(mount.path)) continue;
    seen.add(mount.path);
    resources.push({
      identity: alertIdentity('disk', mount.path),
      type: 'disk',
      label: `Disk ${mount.path}`,
      unit: '%',
      threshold: mount.threshold,
      direction: 'above',
      sample: () => readDiskPercent(mount.path),
    });
  }

  return resources;
}
