/**
 * Network overview for the /resources command: traffic counters from
 * /proc/net/dev, transfer rate since the previous read, TCP socket states
 * and the IPv4 address of each interface.
 */

import os, { type NetworkInterfaceInfo } from 'node:os';
import fs from 'node:fs/promises';
import path from 'node:path';
import { TransientReadError, errorMessage } from '../alerts/errors.js';

export interface NetCounters {
  receivedBytes: number;
  sentBytes: number;
}

export interface SocketCounts {
  established: number;
  listening: number;
}

export interface NetworkReading extends NetCounters, SocketCounts {
  /** Bytes per second since the previous read; null on the first read */
  downloadRate: number | null;
  uploadRate: number | null;
  /** "name: address", first IPv4 address per interface */
  interfaces: string[];
}

export interface NetworkSource {
  read(): Promise<NetworkReading>;
}

const MAX_INTERFACES = 5;

// TCP states as hex in /proc/net/tcp
const TCP_ESTABLISHED = '01';
const TCP_LISTEN = '0A';

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

/** Sum receive/transmit bytes over every interface except loopback. */
export function parseNetDev(text: string): NetCounters {
  let receivedBytes = 0;
  let sentBytes = 0;
  for (const line of text.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const name = line.slice(0, colon).trim();
    if (!name || name === 'lo' || name.includes('|')) continue;

    const fields = line.slice(colon + 1).trim().split(/\s+/);
    const rx = parseInt(fields[0] ?? '', 10);
    const tx = parseInt(fields[8] ?? '', 10);
    if (isNaN(rx) || isNaN(tx)) continue;
    receivedBytes += rx;
    sentBytes += tx;
  }
  return { receivedBytes, sentBytes };
}

/** Count established and listening sockets in /proc/net/tcp{,6} tables. */
export function countSockets(tables: string[]): SocketCounts {
  let established = 0;
  let listening = 0;
  for (const table of tables) {
    // First line is the column header
    for (const line of table.split('\n').slice(1)) {
      const state = line.trim().split(/\s+/)[3];
      if (state === TCP_ESTABLISHED) established++;
      else if (state === TCP_LISTEN) listening++;
    }
  }
  return { established, listening };
}

export function ipv4Interfaces(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string[] {
  const result: string[] = [];
  for (const [name, addresses] of Object.entries(interfaces)) {
    const ipv4 = addresses?.find((address) => address.family === 'IPv4');
    if (ipv4) result.push(`${name}: ${ipv4.address}`);
  }
  return result.slice(0, MAX_INTERFACES);
}

/** First non-loopback IPv4 address, or "unknown". */
export function primaryIpv4(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string {
  for (const addresses of Object.values(interfaces)) {
    const ipv4 = addresses?.find((address) => address.family === 'IPv4' && !address.internal);
    if (ipv4) return ipv4.address;
  }
  return 'unknown';
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

/**
 * Keeps the previous counters between reads so each read can report the
 * transfer rate over the interval since the last one.
 */
export class NetworkMonitor implements NetworkSource {
  private previous: { counters: NetCounters; at: number } | null = null;

  constructor(
    private readonly procPath = '/proc',
    private readonly clock: () => number = Date.now,
    private readonly listInterfaces: () => NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces,
  ) {}

  async read(): Promise<NetworkReading> {
    let devText: string;
    try {
      devText = await fs.readFile(path.join(this.procPath, 'net', 'dev'), 'utf-8');
    } catch (err) {
      throw new TransientReadError('network', errorMessage(err), { cause: err });
    }

    const counters = parseNetDev(devText);
    const at = this.clock();

    const tables = await Promise.allSettled(
      ['tcp', 'tcp6'].map((name) => fs.readFile(path.join(this.procPath, 'net', name), 'utf-8')),
    );
    const sockets = countSockets(tables.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : [])));

    let downloadRate: number | null = null;
    let uploadRate: number | null = null;
    if (this.previous && at > this.previous.at) {
      const seconds = (at - this.previous.at) / 1000;
      // Counters reset when an interface goes away; report 0 rather than a negative rate
      downloadRate = Math.max(0, counters.receivedBytes - this.previous.counters.receivedBytes) / seconds;
      uploadRate = Math.max(0, counters.sentBytes - this.previous.counters.sentBytes) / seconds;
    }
    this.previous = { counters, at };

    return {
      ...counters,
      ...sockets,
      downloadRate,
      uploadRate,
      interfaces: ipv4Interfaces(this.listInterfaces()),
    };
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatRate(bytesPerSecond: number): string {
  const kb = bytesPerSecond / 1024;
  return kb > 1024 ? `${(kb / 1024).toFixed(2)} MB/s` : `${kb.toFixed(2)} KB/s`;
}

function megabytes(bytes: number): string {
  return `${(bytes / 1024 ** 2).toFixed(2)} MB`;
}

export function formatNetwork(reading: NetworkReading): string {
  const lines = [
    '🌐 Network',
    `Sent: ${megabytes(reading.sentBytes)}`,
    `Received: ${megabytes(reading.receivedBytes)}`,
  ];
  if (reading.downloadRate !== null && reading.uploadRate !== null) {
    lines.push(`Download: ${formatRate(reading.downloadRate)}`, `Upload: ${formatRate(reading.uploadRate)}`);
  }
  lines.push(
    `Established connections: ${reading.established}`,
    `Listening ports: ${reading.listening}`,
  );
  if (reading.interfaces.length > 0) {
    lines.push('Interfaces:', ...reading.interfaces);
  }
  return lines.join('\n');
}
