import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { appendFileSync, mkdtempSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AUTH_LOG_INODE_KEY,
  AUTH_LOG_POSITION_KEY,
  AuthLogWatcher,
  IpExclusions,
  formatSshLogin,
  parseAuthLine,
  readNewLines,
} from '../monitor/auth-log.js';
import { MemoryPreferenceStore } from '../db/preferences.js';
import { TransientReadError } from '../alerts/errors.js';

const DEFAULT_EXCLUDED = ['127.0.0.1', '192.168.0.0/16', '10.0.0.0/8', '172.16.0.0/12'];

const ALICE = 'Mar  3 14:02:11 web-1 sshd[1234]: Accepted publickey for alice from 203.0.113.7 port 52311 ssh2';
const BOB_LAN = 'Mar  3 14:05:00 web-1 sshd[1240]: Accepted password for bob from 192.168.1.20 port 40000 ssh2';
const CAROL = 'Mar  3 15:00:00 web-1 sshd[1300]: Accepted publickey for carol from 198.51.100.20 port 40001 ssh2';
const DAVE = 'Mar  3 15:01:00 web-1 sshd[1301]: Accepted publickey for dave from 198.51.100.21 port 40002 ssh2';
const FAILED = 'Mar  3 14:06:00 web-1 sshd[1241]: Failed password for root from 198.51.100.9 port 2200 ssh2';

describe('parseAuthLine', () => {
  it('extracts an accepted login', () => {
    expect(parseAuthLine(ALICE)).toEqual({
      timestamp: 'Mar  3 14:02:11',
      host: 'web-1',
      user: 'alice',
      ip: '203.0.113.7',
    });
  });

  it('ignores failed logins and other lines', () => {
    expect(parseAuthLine(FAILED)).toBeNull();
    expect(parseAuthLine('Mar  3 14:07:00 web-1 CRON[99]: pam_unix(cron:session): session opened')).toBeNull();
  });

  it('formats the announcement', () => {
    const login = parseAuthLine(ALICE);
    if (!login) throw new Error('expected a login');

    expect(formatSshLogin(login, '192.0.2.10')).toBe([
      '🔐 SSH login: alice from 203.0.113.7 on web-1 (192.0.2.10)',
      'Date: Mar  3 14:02:11',
      'More information: https://ipinfo.io/203.0.113.7',
    ].join('\n'));
  });
});

describe('IpExclusions', () => {
  it('matches single addresses and private ranges', () => {
    const exclusions = new IpExclusions(DEFAULT_EXCLUDED);

    expect(exclusions.has('127.0.0.1')).toBe(true);
    expect(exclusions.has('192.168.4.5')).toBe(true);
    expect(exclusions.has('10.1.2.3')).toBe(true);
    expect(exclusions.has('172.20.0.1')).toBe(true);
    expect(exclusions.has('172.32.0.1')).toBe(false);
    expect(exclusions.has('203.0.113.7')).toBe(false);
  });

  it('never matches a non-address', () => {
    expect(new IpExclusions(DEFAULT_EXCLUDED).has('attacker.example')).toBe(false);
  });

  it('skips invalid entries', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const exclusions = new IpExclusions(['garbage', '10.0.0.0/40', '203.0.113.7']);

    expect(warn).toHaveBeenCalledTimes(2);
    expect(exclusions.has('203.0.113.7')).toBe(true);
    expect(exclusions.has('10.0.0.1')).toBe(false);
  });
});

describe('auth log reading', () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostwatch-authlog-'));
    logPath = join(dir, 'auth.log');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads complete lines and leaves a partial one for later', async () => {
    writeFileSync(logPath, 'one\ntwo\nthr');

    const first = await readNewLines(logPath, 0);
    expect(first).toMatchObject({ lines: ['one', 'two'], position: 8 });

    appendFileSync(logPath, 'ee\n');
    const second = await readNewLines(logPath, first.position);
    expect(second).toMatchObject({ lines: ['three'], position: 14, more: false });
  });

  it('starts over when the file shrank', async () => {
    writeFileSync(logPath, 'x\n');

    expect(await readNewLines(logPath, 14)).toMatchObject({ lines: ['x'], position: 2 });
  });

  it('starts over when the inode changed', async () => {
    writeFileSync(logPath, 'a\nb\n');
    const inode = statSync(logPath).ino;

    expect(await readNewLines(logPath, 2, { inode })).toEqual({ lines: ['b'], position: 4, inode, more: false });
    expect(await readNewLines(logPath, 2, { inode: inode + 1 })).toEqual({ lines: ['a', 'b'], position: 4, inode, more: false });
  });

  it('reads at most maxBytes per call', async () => {
    writeFileSync(logPath, 'one\ntwo\nthree\n');

    expect(await readNewLines(logPath, 0, { maxBytes: 10 })).toMatchObject({ lines: ['one', 'two'], position: 8, more: true });
  });

  it('skips a line longer than maxBytes', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(logPath, `${'a'.repeat(20)}\nok\n`);

    expect(await readNewLines(logPath, 0, { maxBytes: 8 })).toMatchObject({ lines: [], position: 8, more: true });
    expect(warn).toHaveBeenCalledWith('[AuthLog] Skipping 8 bytes without a line break at offset 0');
  });

  it('reports each login once and stores the offset', async () => {
    writeFileSync(logPath, [ALICE, BOB_LAN, FAILED, ''].join('\n'));
    const prefs = new MemoryPreferenceStore();
    const watcher = new AuthLogWatcher(logPath, prefs);

    const first = await watcher.poll(DEFAULT_EXCLUDED);
    const second = await watcher.poll(DEFAULT_EXCLUDED);

    expect(first.map((login) => login.user)).toEqual(['alice']);
    expect(second).toEqual([]);
    expect(prefs.get(AUTH_LOG_POSITION_KEY)).toBe(String([ALICE, BOB_LAN, FAILED, ''].join('\n').length));
    expect(prefs.get(AUTH_LOG_INODE_KEY)).toBe(String(statSync(logPath).ino));
  });

  it('reads a rotated log from the start even when it outgrew the old offset', async () => {
    writeFileSync(logPath, `${ALICE}\n`);
    const prefs = new MemoryPreferenceStore();
    const watcher = new AuthLogWatcher(logPath, prefs);
    expect((await watcher.poll(DEFAULT_EXCLUDED)).map((login) => login.user)).toEqual(['alice']);

    const rotated = join(dir, 'auth.log.new');
    writeFileSync(rotated, `${CAROL}\n${DAVE}\n`);
    renameSync(rotated, logPath);

    expect((await watcher.poll(DEFAULT_EXCLUDED)).map((login) => login.user)).toEqual(['carol', 'dave']);
  });

  it('walks a large backlog in bounded chunks', async () => {
    const content = [ALICE, CAROL, DAVE, ''].join('\n');
    writeFileSync(logPath, content);
    const prefs = new MemoryPreferenceStore();
    const watcher = new AuthLogWatcher(logPath, prefs, 150);

    const logins = await watcher.poll(DEFAULT_EXCLUDED);

    expect(logins.map((login) => login.user)).toEqual(['alice', 'carol', 'dave']);
    expect(prefs.get(AUTH_LOG_POSITION_KEY)).toBe(String(content.length));
  });

  it('fails with TransientReadError when the log is missing', async () => {
    const watcher = new AuthLogWatcher(join(dir, 'missing.log'), new MemoryPreferenceStore());

    await expect(watcher.poll(DEFAULT_EXCLUDED)).rejects.toBeInstanceOf(TransientReadError);
  });
});
