/**
 * Process Correlator - maps a pane's root pid to its live descendant set
 */

import type { ProcessStat } from '../types/index.js';
import type { ProcessTableSnapshot } from './process-table.js';

const NO_CHILDREN: readonly number[] = [];

/**
 * Parent -> children arena over one process table snapshot.
 * Built once per sampling cycle and shared by every pane.
 */
export class ProcessIndex {
  private constructor(
    private readonly snapshot: ProcessTableSnapshot,
    private readonly children: Map<number, number[]>
  ) {}

  static build(snapshot: ProcessTableSnapshot): ProcessIndex {
    const children = new Map<number, number[]>();

    for (const stat of snapshot.processes.values()) {
      const siblings = children.get(stat.ppid);
      if (siblings) {
        siblings.push(stat.pid);
      } else {
        children.set(stat.ppid, [stat.pid]);
      }
    }

    for (const siblings of children.values()) {
      siblings.sort((a, b) => a - b);
    }

    return new ProcessIndex(snapshot, children);
  }

  get(pid: number): ProcessStat | undefined {
    return this.snapshot.processes.get(pid);
  }

  isUnreadable(pid: number): boolean {
    return this.snapshot.unreadable.has(pid);
  }

  childrenOf(pid: number): readonly number[] {
    return this.children.get(pid) ?? NO_CHILDREN;
  }

  get size(): number {
    return this.snapshot.processes.size;
  }
}

export interface ResolvedProcessSet {
  /** Root first, then descendants in breadth-first order */
  processes: ProcessStat[];
  /** Members of the set whose stat could not be read */
  unreadable: number[];
}

export class ProcessCorrelator {
  constructor(private readonly index: ProcessIndex) {}

  /**
   * Breadth-first walk from rootPid over parent links.
   * Vanished pids are dropped; the seen set bounds the walk even when a
   * process reports itself (or a descendant) as its parent.
   */
  resolve(rootPid: number): ResolvedProcessSet {
    const processes: ProcessStat[] = [];
    const unreadable: number[] = [];
    const seen = new Set<number>();
    const queue: number[] = [rootPid];

    for (let head = 0; head < queue.length; head++) {
      const pid = queue[head];
      if (pid === undefined || seen.has(pid)) continue;
      seen.add(pid);

      const stat = this.index.get(pid);
      if (stat) {
        processes.push(stat);
      } else if (this.index.isUnreadable(pid)) {
        unreadable.push(pid);
      }

      for (const child of this.index.childrenOf(pid)) {
        if (!seen.has(child)) {
          queue.push(child);
        }
      }
    }

    return { processes, unreadable };
  }

  /**
   * Best guess at what the pane is running: the most recently started
   * direct child of the root, else the root itself.
   */
  foregroundProcess(rootPid: number): ProcessStat | null {
    let latest: ProcessStat | null = null;

    for (const childPid of this.index.childrenOf(rootPid)) {
      const child = this.index.get(childPid);
      if (!child || child.pid === rootPid) continue;
      if (!latest || isStartedAfter(child, latest)) {
        latest = child;
      }
    }

    return latest ?? this.index.get(rootPid) ?? null;
  }
}

function isStartedAfter(a: ProcessStat, b: ProcessStat): boolean {
  if (a.startTime !== undefined && b.startTime !== undefined && a.startTime !== b.startTime) {
    return a.startTime > b.startTime;
  }
  return a.pid > b.pid;
}
