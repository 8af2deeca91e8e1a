/**
 * SSH login watcher -- tails the auth log from the last stored byte offset and
 * reports accepted logins from addresses outside the excluded ranges.
 */

import fs from 'node:fs/promises';
import net from 'node:net';
import type { PreferenceStore } from '../db/preferences.js';
import { TransientReadError, errorMessage } from '../alerts/errors.js';

export const AUTH_LOG_POSITION_KEY = 'authlog.position';
export const AUTH_LOG_INODE_KEY = 'authlog.inode';

const ACCEPTED_LOGIN = /(\w+\s+\d+\s+\d+:\d+:\d+)\s+(\S+)\s+sshd\[\d+\]:\s+Accepted\s+\S+\s+for\s+(\S+)\s+from\s+(\S+)/;

export interface SshLogin {
  /** Syslog timestamp as written, e.g. "Mar  3 14:02:11" */
  timestamp: string;
  host: string;
  user: string;
  ip: string;
}

export function parseAuthLine(line: string): SshLogin | null {
  const match = ACCEPTED_LOGIN.exec(line);
  if (!match) return null;
  const [, timestamp, host, user, ip] = match;
  return { timestamp, host, user, ip };
}

// ---------------------------------------------------------------------------
// Excluded addresses
// ---------------------------------------------------------------------------

function familyOf(address: string): 'ipv4' | 'ipv6' | null {
  const version = net.isIP(address);
  if (version === 4) return 'ipv4';
  if (version === 6) return 'ipv6';
  return null;
}

/**
 * Matches addresses against a list of single IPs and CIDR ranges.
 * Entries that are neither are logged and ignored.
 */
export class IpExclusions {
  private readonly blockList = new net.BlockList();

  constructor(entries: string[]) {
    for (const entry of entries) {
      const [address, prefixText] = entry.split('/');
      const family = familyOf(address);
      if (!family) {
        console.warn(`[AuthLog] Ignoring invalid excluded IP entry: ${entry}`);
        continue;
      }

      if (prefixText === undefined) {
        this.blockList.addAddress(address, family);
        continue;
      }

      const prefix = parseInt(prefixText, 10);
      const maxPrefix = family === 'ipv4' ? 32 : 128;
      if (isNaN(prefix) || prefix < 0 || prefix > maxPrefix) {
        console.warn(`[AuthLog] Ignoring invalid excluded IP entry: ${entry}`);
        continue;
      }
      this.blockList.addSubnet(address, prefix, family);
    }
  }

  has(ip: string): boolean {
    const family = familyOf(ip);
    return family !== null && this.blockList.check(ip, family);
  }
}

// ---------------------------------------------------------------------------
// Incremental reader
// ---------------------------------------------------------------------------

/** Largest slice of the log read at once */
export const READ_CHUNK_BYTES = 1024 * 1024;

export interface ReadChunk {
  lines: string[];
  /** Offset to resume from: the byte after the last complete line */
  position: number;
  /** Inode of the file that was read */
  inode: number;
  /** More unread bytes remain past `position` */
  more: boolean;
}

export interface ReadOptions {
  /** Inode the stored position belongs to; a different file is read from the start */
  inode?: number;
  maxBytes?: number;
}

/**
 * Read complete lines appended since `position`, at most `maxBytes` at a
 * time. A file smaller than the stored position, or one with a different
 * inode, was rotated or truncated and is read from the start. A trailing
 * line without a newline is left for the next read; a single line longer
 * than `maxBytes` is skipped.
 */
export async function readNewLines(path: string, position: number, options: ReadOptions = {}): Promise<ReadChunk> {
  const maxBytes = options.maxBytes ?? READ_CHUNK_BYTES;
  const handle = await fs.open(path, 'r');
  try {
    const { size, ino } = await handle.stat();
    const replaced = options.inode !== undefined && options.inode !== ino;
    const start = replaced || size < position ? 0 : position;
    if (size === start) {
      return { lines: [], position: start, inode: ino, more: false };
    }

    const buffer = Buffer.alloc(Math.min(size - start, maxBytes));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
    const lastNewline = buffer.subarray(0, bytesRead).lastIndexOf(0x0a);
    if (lastNewline === -1) {
      if (bytesRead < maxBytes) {
        return { lines: [], position: start, inode: ino, more: false };
      }
      console.warn(`[AuthLog] Skipping ${bytesRead} bytes without a line break at offset ${start}`);
      const skipped = start + bytesRead;
      return { lines: [], position: skipped, inode: ino, more: skipped < size };
    }

    const text = buffer.subarray(0, lastNewline).toString('utf-8');
    const next = start + lastNewline + 1;
    return {
      lines: text.split('\n').filter((line) => line.length > 0),
      position: next,
      inode: ino,
      more: next < size,
    };
  } finally {
    await handle.close();
  }
}

// ---------------------------------------------------------------------------
// Watcher
// ---------------------------------------------------------------------------

function storedInt(prefs: PreferenceStore, key: string): number | undefined {
  const value = prefs.get(key);
  if (value === null) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

export class AuthLogWatcher {
  constructor(
    private readonly logPath: string,
    private readonly prefs: PreferenceStore,
    private readonly maxBytes = READ_CHUNK_BYTES,
  ) {}

  /**
   * New accepted logins since the previous call, excluded addresses removed.
   * The offset is stored after every chunk, so a login is reported once.
   */
  async poll(excludedIps: string[]): Promise<SshLogin[]> {
    let position = storedInt(this.prefs, AUTH_LOG_POSITION_KEY) ?? 0;
    let inode = storedInt(this.prefs, AUTH_LOG_INODE_KEY);

    const exclusions = new IpExclusions(excludedIps);
    const logins: SshLogin[] = [];

    for (;;) {
      let chunk: ReadChunk;
      try {
        chunk = await readNewLines(this.logPath, position, { inode, maxBytes: this.maxBytes });
      } catch (err) {
        throw new TransientReadError('ssh', `cannot read ${this.logPath}: ${errorMessage(err)}`, { cause: err });
      }

      if (chunk.position !== position) {
        this.prefs.set(AUTH_LOG_POSITION_KEY, String(chunk.position));
      }
      if (chunk.inode !== inode) {
        this.prefs.set(AUTH_LOG_INODE_KEY, String(chunk.inode));
      }

      for (const line of chunk.lines) {
        const login = parseAuthLine(line);
        if (!login) continue;
        if (exclusions.has(login.ip)) {
          console.log(`[AuthLog] SSH login from excluded address ${login.ip}, not notifying`);
          continue;
        }
        logins.push(login);
      }

      const advanced = chunk.position !== position || chunk.inode !== inode;
      position = chunk.position;
      inode = chunk.inode;
      if (!chunk.more || !advanced) break;
    }
    return logins;
  }
}

/**
 * Announcement text. `localIp` is the address of this host, shown beside the
 * syslog host name.
 */
export function formatSshLogin(login: SshLogin, localIp: string): string {
  return [
    `🔐 SSH login: ${login.user} from ${login.ip} on ${login.host} (${localIp})`,
    `Date: ${login.timestamp}`,
    `More information: https://ipinfo.io/${login.ip}`,
  ].join('\n');
}
