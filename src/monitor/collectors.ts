/**
 * Local resource collectors.
 *
 * Each collector returns one numeric reading or rejects with
 * TransientReadError. Uses only Node.js built-ins (node:os, node:fs,
 * node:net); the arithmetic lives in small pure helpers so it can be tested
 * without touching the host.
 */

import os from 'node:os';
import fs from 'node:fs/promises';
import net from 'node:net';
import path from 'node:path';
import { TransientReadError, errorMessage } from '../alerts/errors.js';

// ---------------------------------------------------------------------------
// CPU
// ---------------------------------------------------------------------------

export interface CpuTimes {
  idle: number;
  total: number;
}

export function cpuTimes(cpus: os.CpuInfo[] = os.cpus()): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

/** Busy percentage between two cumulative samples; 0 when no time elapsed. */
export function cpuPercentBetween(start: CpuTimes, end: CpuTimes): number {
  const total = end.total - start.total;
  if (total <= 0) return 0;
  const idle = end.idle - start.idle;
  return Math.min(100, Math.max(0, (1 - idle / total) * 100));
}

export async function readCpuPercent(windowMs: number): Promise<number> {
  const start = cpuTimes();
  if (start.total === 0) {
    throw new TransientReadError('cpu', 'no CPU information available');
  }
  await new Promise((resolve) => setTimeout(resolve, windowMs));
  return cpuPercentBetween(start, cpuTimes());
}

// ---------------------------------------------------------------------------
// RAM
// ---------------------------------------------------------------------------

export function memoryPercent(total: number, free: number): number {
  if (total <= 0) return 0;
  return ((total - free) / total) * 100;
}

export async function readRamPercent(): Promise<number> {
  const total = os.totalmem();
  if (total <= 0) {
    throw new TransientReadError('ram', 'total memory reported as 0');
  }
  return memoryPercent(total, os.freemem());
}

// ---------------------------------------------------------------------------
// Disk
// ---------------------------------------------------------------------------

export interface BlockCounts {
  blocks: number;
  bfree: number;
  bavail: number;
}

/**
 * Used percentage as `df` reports it: blocks reserved for root count as
 * neither used nor available.
 */
export function diskUsedPercent({ blocks, bfree, bavail }: BlockCounts): number {
  const used = blocks - bfree;
  const denominator = used + bavail;
  if (denominator <= 0) return 0;
  return (used / denominator) * 100;
}

export async function readDiskPercent(mountPath: string): Promise<number> {
  try {
    const stats = await fs.statfs(mountPath);
    return diskUsedPercent(stats);
  } catch (err) {
    throw new TransientReadError(`disk:${mountPath}`, errorMessage(err), { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Temperature
// ---------------------------------------------------------------------------

/** Highest zone temperature in °C from raw millidegree strings; null if none parse. */
export function maxZoneTemperature(rawValues: string[]): number | null {
  let max: number | null = null;
  for (const raw of rawValues) {
    const milli = parseInt(raw.trim(), 10);
    if (isNaN(milli)) continue;
    const celsius = milli / 1000;
    if (max === null || celsius > max) max = celsius;
  }
  return max;
}

export async function readTemperature(thermalPath: string): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(thermalPath);
  } catch (err) {
    throw new TransientReadError('temperature', errorMessage(err), { cause: err });
  }

  const zones = entries.filter((name) => name.startsWith('thermal_zone'));
  const results = await Promise.allSettled(
    zones.map((zone) => fs.readFile(path.join(thermalPath, zone, 'temp'), 'utf-8')),
  );
  const values = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));

  const max = maxZoneTemperature(values);
  if (max === null) {
    throw new TransientReadError('temperature', `no readable thermal zones under ${thermalPath}`);
  }
  return max;
}

// ---------------------------------------------------------------------------
// Internet connectivity
// ---------------------------------------------------------------------------

export interface ProbeTarget {
  host: string;
  port: number;
}

export const CONNECTIVITY_TARGETS: ProbeTarget[] = [
  { host: '8.8.8.8', port: 53 },
  { host: '1.1.1.1', port: 53 },
  { host: '208.67.222.222', port: 53 },
];

export function probeTcp({ host, port }: ProbeTarget, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const finish = (ok: boolean) => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

/**
 * 1 when any target accepts a TCP connection, otherwise 0. Targets are tried
 * in order and the first success wins.
 */
export async function readConnectivity(
  targets: ProbeTarget[] = CONNECTIVITY_TARGETS,
  timeoutMs = 3_000,
  probe: (target: ProbeTarget, timeoutMs: number) => Promise<boolean> = probeTcp,
): Promise<number> {
  for (const target of targets) {
    if (await probe(target, timeoutMs)) return 1;
  }
  return 0;
}
