/**
 * Metrics Aggregator - per-pane CPU/memory rolled up to windows and sessions
 */

import { totalmem } from 'os';
import type {
  MetricsSample,
  PaneMetrics,
  PaneMetricsView,
  ProcessRecord,
  ProcessStat,
  ResourceUsage,
  SessionMetricsView,
  SessionTree,
  WindowMetricsView,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { ProcessTableSnapshot } from './process-table.js';
import { ProcessCorrelator, ProcessIndex } from './process-correlator.js';

export interface CpuSample {
  cpuTimeMs: number;
  takenAt: number;
  startTime?: number;
}

export type CpuHistory = ReadonlyMap<number, CpuSample>;

export interface CpuUsageResult {
  /** null when there is no usable prior sample */
  usage: Map<number, number | null>;
  /** History to carry into the next cycle; only pids present now */
  history: Map<number, CpuSample>;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * CPU percent per process as the delta of cumulative CPU time over the
 * wall-clock interval between two snapshots.
 */
export function computeCpuUsage(previous: CpuHistory, snapshot: ProcessTableSnapshot): CpuUsageResult {
  const usage = new Map<number, number | null>();
  const history = new Map<number, CpuSample>();

  for (const stat of snapshot.processes.values()) {
    const current: CpuSample = {
      cpuTimeMs: stat.cpuTimeMs,
      takenAt: snapshot.takenAt,
      startTime: stat.startTime,
    };
    history.set(stat.pid, current);

    const prior = previous.get(stat.pid);
    usage.set(stat.pid, prior ? cpuPercentBetween(prior, current) : null);
  }

  return { usage, history };
}

function cpuPercentBetween(prior: CpuSample, current: CpuSample): number | null {
  // Same pid, different process
  if (prior.startTime !== undefined && current.startTime !== undefined && prior.startTime !== current.startTime) {
    return null;
  }

  const elapsedMs = current.takenAt - prior.takenAt;
  const cpuMs = current.cpuTimeMs - prior.cpuTimeMs;
  if (elapsedMs <= 0 || cpuMs < 0) return null;

  return round1((cpuMs / elapsedMs) * 100);
}

export function emptyUsage(): ResourceUsage {
  return { cpuPercent: 0, memoryBytes: 0, memoryPercent: 0, processCount: 0, unreadableCount: 0 };
}

export function sumUsage(parts: ResourceUsage[]): ResourceUsage {
  const total = emptyUsage();
  for (const part of parts) {
    total.cpuPercent += part.cpuPercent;
    total.memoryBytes += part.memoryBytes;
    total.memoryPercent += part.memoryPercent;
    total.processCount += part.processCount;
    total.unreadableCount += part.unreadableCount;
  }
  total.cpuPercent = round1(total.cpuPercent);
  total.memoryPercent = round1(total.memoryPercent);
  return total;
}

export interface MetricsAggregatorOptions {
  /** Denominator for memory percent (default: os.totalmem()) */
  totalMemoryBytes?: number;
}

export class MetricsAggregator {
  private history: CpuHistory = new Map();
  private readonly totalMemoryBytes: number;

  constructor(
    private logger: Logger,
    options: MetricsAggregatorOptions = {}
  ) {
    this.totalMemoryBytes = options.totalMemoryBytes ?? totalmem();
  }

  /**
   * Resolve and sum every pane in the tree against one process table snapshot.
   * Advances the CPU history, so call it once per cycle.
   */
  sample(tree: SessionTree, snapshot: ProcessTableSnapshot): MetricsSample {
    const { usage, history } = computeCpuUsage(this.history, snapshot);
    this.history = history;

    const correlator = new ProcessCorrelator(ProcessIndex.build(snapshot));
    const panes = new Map<string, PaneMetrics>();

    const sessions: SessionMetricsView[] = tree.sessions.map(session => {
      const windows: WindowMetricsView[] = session.windows.map(window => {
        const paneViews: PaneMetricsView[] = window.panes.map(pane => {
          const resolved = correlator.resolve(pane.pid);
          const processes = resolved.processes.map(stat => this.toRecord(stat, usage.get(stat.pid) ?? null));
          const metrics = this.sumProcesses(processes, resolved.unreadable.length);
          panes.set(pane.key, metrics);

          return {
            key: pane.key,
            index: pane.index,
            pid: pane.pid,
            cwd: pane.cwd,
            command: pane.command,
            metrics,
            processes,
          };
        });

        return {
          index: window.index,
          name: window.name,
          layout: window.layout,
          metrics: sumUsage(paneViews.map(view => view.metrics)),
          panes: paneViews,
        };
      });

      return {
        name: session.name,
        metrics: sumUsage(windows.map(view => view.metrics)),
        windows,
      };
    });

    const totals = sumUsage(sessions.map(view => view.metrics));
    this.logger.debug(
      `Sampled ${panes.size} panes: cpu ${totals.cpuPercent}%, ${totals.processCount} processes, ${snapshot.gaps} gaps`
    );

    return { sampledAt: new Date(snapshot.takenAt), panes, sessions, totals };
  }

  /** Pids with a CPU baseline carried into the next cycle */
  trackedPids(): number[] {
    return Array.from(this.history.keys()).sort((a, b) => a - b);
  }

  reset(): void {
    this.history = new Map();
  }

  private toRecord(stat: ProcessStat, cpuPercent: number | null): ProcessRecord {
    return {
      pid: stat.pid,
      ppid: stat.ppid,
      name: stat.name,
      command: stat.command,
      cpuPercent,
      memoryBytes: stat.rssBytes,
      memoryPercent: this.totalMemoryBytes > 0 ? round1((stat.rssBytes / this.totalMemoryBytes) * 100) : 0,
      user: stat.user ?? null,
      startedAt: stat.startedAt ?? null,
    };
  }

  private sumProcesses(processes: ProcessRecord[], unreadableCount: number): PaneMetrics {
    return sumUsage([
      ...processes.map(record => ({
        cpuPercent: record.cpuPercent ?? 0,
        memoryBytes: record.memoryBytes,
        memoryPercent: record.memoryPercent,
        processCount: 1,
        unreadableCount: 0,
      })),
      { ...emptyUsage(), unreadableCount },
    ]);
  }
}
