/**
 * Process table - enumerate OS processes and read their parent, CPU and memory
 *
 * Two sources: /proc on Linux, ps everywhere else. Both expose the same
 * per-pid contract so the correlator never sees platform details.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { ProcessStat } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { CorrelationGap, InspectionError, SampleReadFailure } from '../utils/errors.js';
import { CommandRunner } from '../utils/command-runner.js';

export interface ProcessTableSource {
  /** Enumerate the pids currently in the table */
  listPids(): Promise<number[]>;
  /**
   * Read one process. Rejects with CorrelationGap when it no longer exists,
   * SampleReadFailure when it exists but cannot be read.
   */
  readStat(pid: number): Promise<ProcessStat>;
}

export interface ProcessTableSnapshot {
  /** Wall clock (ms) when the table was read */
  takenAt: number;
  processes: Map<number, ProcessStat>;
  unreadable: Map<number, SampleReadFailure>;
  /** Pids that vanished between enumeration and read */
  gaps: number;
}

/** Reads in flight at once; each procfs read holds up to three open files */
export const MAX_CONCURRENT_READS = 64;

export async function readProcessTable(
  source: ProcessTableSource,
  now: () => number = Date.now,
  concurrency: number = MAX_CONCURRENT_READS
): Promise<ProcessTableSnapshot> {
  const pids = await source.listPids();
  const processes = new Map<number, ProcessStat>();
  const unreadable = new Map<number, SampleReadFailure>();
  let gaps = 0;
  let next = 0;

  const readOne = async (pid: number): Promise<void> => {
    try {
      processes.set(pid, await source.readStat(pid));
    } catch (error) {
      if (error instanceof CorrelationGap) {
        gaps++;
      } else if (error instanceof SampleReadFailure) {
        unreadable.set(pid, error);
      } else {
        unreadable.set(pid, new SampleReadFailure(pid, { cause: error }));
      }
    }
  };

  // A fixed pool of workers drains the pid list
  const worker = async (): Promise<void> => {
    while (next < pids.length) {
      const pid = pids[next++];
      if (pid !== undefined) await readOne(pid);
    }
  };

  const workers = Math.max(1, Math.min(concurrency, pids.length));
  await Promise.all(Array.from({ length: workers }, worker));

  return { takenAt: now(), processes, unreadable, gaps };
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface ProcfsOptions {
  /** Mount point of procfs (default: /proc) */
  procRoot?: string;
  /** USER_HZ, the unit of utime/stime (default: 100) */
  clockTicks?: number;
  /** Page size, the unit of rss (default: 4096) */
  pageSize?: number;
  /** Account database for uid to user name (default: /etc/passwd) */
  passwdPath?: string;
}

/** Real uid from the Uid: line of /proc/<pid>/status */
export function parseStatusUid(content: string): number | null {
  const uid = content.match(/^Uid:\s+(\d+)/m)?.[1];
  return uid === undefined ? null : Number.parseInt(uid, 10);
}

/** Boot time (epoch seconds) from the btime line of /proc/stat */
export function parseBootTime(content: string): number | null {
  const seconds = content.match(/^btime\s+(\d+)/m)?.[1];
  return seconds === undefined ? null : Number.parseInt(seconds, 10);
}

export function parsePasswd(content: string): Map<number, string> {
  const users = new Map<number, string>();
  for (const line of content.split('\n')) {
    if (line.startsWith('#')) continue;
    const [name, , field] = line.split(':');
    if (!name || field === undefined || !/^\d+$/.test(field)) continue;
    const uid = Number.parseInt(field, 10);
    // First entry wins, as with getpwuid
    if (!users.has(uid)) users.set(uid, name);
  }
  return users;
}

/**
 * Parse the contents of /proc/<pid>/stat.
 * comm may contain spaces and parentheses, so fields are counted from the last ')'.
 */
export function parseProcStat(
  content: string,
  options: { clockTicks: number; pageSize: number }
): Omit<ProcessStat, 'command'> | null {
  const open = content.indexOf('(');
  const close = content.lastIndexOf(')');
  if (open < 0 || close < open) return null;

  const pid = Number.parseInt(content.slice(0, open).trim(), 10);
  const name = content.slice(open + 1, close);
  // rest[0] is field 3 (state), so field n lives at rest[n - 3]
  const rest = content.slice(close + 1).trim().split(/\s+/);

  const ppid = Number.parseInt(rest[1] ?? '', 10);
  const utime = Number.parseInt(rest[11] ?? '', 10);
  const stime = Number.parseInt(rest[12] ?? '', 10);
  const startTime = Number.parseInt(rest[19] ?? '', 10);
  const rssPages = Number.parseInt(rest[21] ?? '', 10);

  if ([pid, ppid, utime, stime, startTime, rssPages].some(Number.isNaN)) {
    return null;
  }

  return {
    pid,
    ppid,
    name,
    cpuTimeMs: ((utime + stime) * 1000) / options.clockTicks,
    rssBytes: Math.max(0, rssPages) * options.pageSize,
    startTime,
  };
}

export class ProcfsProcessSource implements ProcessTableSource {
  private readonly procRoot: string;
  private readonly clockTicks: number;
  private readonly pageSize: number;
  private readonly passwdPath: string;
  // Both are read once per source
  private bootTime: Promise<number | null> | null = null;
  private users: Promise<Map<number, string>> | null = null;

  constructor(options: ProcfsOptions = {}) {
    this.procRoot = options.procRoot ?? '/proc';
    this.clockTicks = options.clockTicks ?? 100;
    this.pageSize = options.pageSize ?? 4096;
    this.passwdPath = options.passwdPath ?? '/etc/passwd';
  }

  async listPids(): Promise<number[]> {
    try {
      const entries = await readdir(this.procRoot);
      return entries
        .filter(entry => /^\d+$/.test(entry))
        .map(entry => Number.parseInt(entry, 10));
    } catch (error) {
      throw new InspectionError(`cannot enumerate ${this.procRoot}`, { cause: error });
    }
  }

  async readStat(pid: number): Promise<ProcessStat> {
    let content: string;
    try {
      content = await readFile(join(this.procRoot, String(pid), 'stat'), 'utf8');
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ESRCH') {
        throw new CorrelationGap(pid);
      }
      throw new SampleReadFailure(pid, { cause: error });
    }

    const stat = parseProcStat(content, { clockTicks: this.clockTicks, pageSize: this.pageSize });
    if (!stat) {
      throw new SampleReadFailure(pid, { cause: new Error('unparseable stat line') });
    }

    const [command, user, bootTime] = await Promise.all([
      this.readCommandLine(pid),
      this.readUser(pid),
      this.loadBootTime(),
    ]);

    return {
      ...stat,
      command: command || stat.name,
      ...(user !== undefined ? { user } : {}),
      ...(bootTime !== null && stat.startTime !== undefined
        ? { startedAt: new Date((bootTime + stat.startTime / this.clockTicks) * 1000).toISOString() }
        : {}),
    };
  }

  private async readUser(pid: number): Promise<string | undefined> {
    let content: string;
    try {
      content = await readFile(join(this.procRoot, String(pid), 'status'), 'utf8');
    } catch {
      // Gone or hidden; the stat line already made it into the table
      return undefined;
    }

    const uid = parseStatusUid(content);
    if (uid === null) return undefined;
    const users = await this.loadUsers();
    return users.get(uid) ?? String(uid);
  }

  private loadUsers(): Promise<Map<number, string>> {
    if (!this.users) {
      // Without an account database, users show as numeric uids
      this.users = readFile(this.passwdPath, 'utf8').then(parsePasswd, () => new Map<number, string>());
    }
    return this.users;
  }

  private loadBootTime(): Promise<number | null> {
    if (!this.bootTime) {
      this.bootTime = readFile(join(this.procRoot, 'stat'), 'utf8').then(parseBootTime, () => null);
    }
    return this.bootTime;
  }

  private async readCommandLine(pid: number): Promise<string> {
    try {
      const raw = await readFile(join(this.procRoot, String(pid), 'cmdline'), 'utf8');
      return raw.split('\0').filter(part => part.length > 0).join(' ');
    } catch {
      // cmdline is optional; the stat line already gave us the name
      return '';
    }
  }
}

/**
 * Parse ps cputime: "MM:SS", "HH:MM:SS", "D-HH:MM:SS", seconds may be fractional
 */
export function parseCpuTime(value: string): number | null {
  const trimmed = value.trim();
  const match = trimmed.match(/^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+(?:\.\d+)?)$/);
  if (!match) return null;

  const days = Number.parseInt(match[1] ?? '0', 10);
  const hours = Number.parseInt(match[2] ?? '0', 10);
  const minutes = Number.parseInt(match[3] ?? '0', 10);
  const seconds = Number.parseFloat(match[4] ?? '0');

  return Math.round(((days * 24 + hours) * 3600 + minutes * 60 + seconds) * 1000);
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Parse ps lstart in the C locale: "Fri Jan  2 03:04:05 2026", local time
 */
export function parseLstart(value: string): Date | null {
  const match = value.trim().match(/^\w{3}\s+(\w{3})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})$/);
  if (!match) return null;

  const [, month = '', day = '0', hours = '0', minutes = '0', seconds = '0', year = '0'] = match;
  const monthIndex = MONTHS.indexOf(month);
  if (monthIndex < 0) return null;

  return new Date(
    Number.parseInt(year, 10),
    monthIndex,
    Number.parseInt(day, 10),
    Number.parseInt(hours, 10),
    Number.parseInt(minutes, 10),
    Number.parseInt(seconds, 10)
  );
}

export const PS_FORMAT = 'pid=,ppid=,rss=,time=,user=,lstart=,args=';

/**
 * Parse one line of `ps -A -o pid=,ppid=,rss=,time=,user=,lstart=,args=`
 */
export function parsePsLine(line: string): ProcessStat | null {
  const match = line.trim().match(
    /^(\d+)\s+(\d+)\s+(\d+)\s+(\S+)\s+(\S+)\s+(\w{3}\s+\w{3}\s+\d{1,2}\s+\d{2}:\d{2}:\d{2}\s+\d{4})\s+(.*)$/
  );
  if (!match) return null;

  const [, pid, ppid, rss, time, user, lstart, args] = match;
  const cpuTimeMs = parseCpuTime(time ?? '');
  const started = parseLstart(lstart ?? '');
  if (pid === undefined || ppid === undefined || rss === undefined || cpuTimeMs === null) {
    return null;
  }

  const command = (args ?? '').trim();
  const executable = command.split(/\s+/)[0] ?? '';
  const name = executable.split('/').pop() || executable || 'unknown';

  return {
    pid: Number.parseInt(pid, 10),
    ppid: Number.parseInt(ppid, 10),
    name,
    command: command || name,
    cpuTimeMs,
    rssBytes: Number.parseInt(rss, 10) * 1024,
    ...(user ? { user } : {}),
    ...(started ? { startTime: started.getTime(), startedAt: started.toISOString() } : {}),
  };
}

export interface PsOptions {
  timeoutMs?: number;
  binary?: string;
}

/**
 * ps-backed source. One ps call per listPids(); readStat() answers from that
 * listing, so a pid missing from it is a gap.
 */
export class PsProcessSource implements ProcessTableSource {
  private readonly runner: CommandRunner;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private rows = new Map<number, ProcessStat>();

  constructor(
    private logger: Logger,
    options: PsOptions = {}
  ) {
    this.binary = options.binary ?? 'ps';
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.runner = new CommandRunner(logger, {
      logCommands: false, // Reduce noise for monitoring commands
      defaultTimeout: this.timeoutMs,
    });
  }

  async listPids(): Promise<number[]> {
    // lstart is only parseable in the C locale
    const result = await this.runner.execute(this.binary, ['-A', '-o', PS_FORMAT], { env: { LC_ALL: 'C' } });
    if (result.timedOut) {
      throw new InspectionError(`${this.binary} did not finish within ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      throw new InspectionError(`${this.binary} failed: ${result.stderr.trim()}`);
    }

    const rows = new Map<number, ProcessStat>();
    let skipped = 0;
    for (const line of result.stdout.split('\n')) {
      if (!line.trim()) continue;
      const stat = parsePsLine(line);
      if (stat) {
        rows.set(stat.pid, stat);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger.debug(`Skipped ${skipped} unparseable ps lines`);
    }

    this.rows = rows;
    return Array.from(rows.keys());
  }

  async readStat(pid: number): Promise<ProcessStat> {
    const stat = this.rows.get(pid);
    if (!stat) {
      throw new CorrelationGap(pid);
    }
    return stat;
  }
}

export type ProcessSourceKind = 'auto' | 'procfs' | 'ps';

export function createProcessSource(
  kind: ProcessSourceKind,
  logger: Logger,
  options: { timeoutMs?: number } = {}
): ProcessTableSource {
  const resolved = kind === 'auto' ? (process.platform === 'linux' ? 'procfs' : 'ps') : kind;
  logger.debug(`Using ${resolved} process source`);

  return resolved === 'procfs'
    ? new ProcfsProcessSource()
    : new PsProcessSource(logger, { timeoutMs: options.timeoutMs });
}
