/**
 * TypeScript definitions for panetop
 */

import type { Logger } from '../utils/logger.js';
import type { ErrorHandler } from '../utils/errors.js';
import type { TmuxInspector } from '../core/tmux-inspector.js';
import type { PaneMonitor } from '../core/pane-monitor.js';
import type { TopologySnapshotter } from '../core/topology-snapshotter.js';
import type { Restorer } from '../core/restorer.js';
import type { ProcessTableSource } from '../core/process-table.js';
import type { ArtifactStore } from '../storage/artifact-store.js';

export interface TmuxSession {
  name: string;
  id: string; // Tmux native ID (e.g., "$1")
  created: Date;
  attached: boolean;
  windows: TmuxWindow[];
}

export interface TmuxWindow {
  id: string; // Tmux native ID (e.g., "@3")
  index: number;
  name: string;
  /** Packed split geometry, kept opaque (e.g. "b25f,80x24,0,0,2") */
  layout: string;
  active: boolean;
  panes: TmuxPane[];
}

export interface TmuxPane {
  id: string; // Tmux native ID (e.g., "%7")
  key: string; // Structured key (e.g., "dev:0.1")
  sessionName: string;
  windowIndex: number;
  index: number;
  /** Root process of the pane, normally its shell */
  pid: number;
  cwd: string;
  /** tmux's name for the foreground process, e.g. "vim" */
  command: string;
  active: boolean;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface SessionTree {
  inspectedAt: Date;
  sessions: TmuxSession[];
}

/** One row of the OS process table */
export interface ProcessStat {
  pid: number;
  ppid: number;
  name: string;
  /** Full argument vector joined with spaces; falls back to name */
  command: string;
  /** Cumulative user+system CPU time */
  cpuTimeMs: number;
  rssBytes: number;
  /**
   * Start marker, only compared within one source: clock ticks since boot
   * from procfs, epoch ms from ps
   */
  startTime?: number;
  /** Owning user name, or the numeric uid when it has no passwd entry */
  user?: string;
  /** ISO start time */
  startedAt?: string;
}

export interface ProcessRecord {
  pid: number;
  ppid: number;
  name: string;
  command: string;
  /** null until the process has been seen in two consecutive cycles */
  cpuPercent: number | null;
  memoryBytes: number;
  memoryPercent: number;
  user: string | null;
  startedAt: string | null;
}

export interface ResourceUsage {
  cpuPercent: number;
  memoryBytes: number;
  memoryPercent: number;
  processCount: number;
  /** Processes that belonged to the set but could not be read */
  unreadableCount: number;
}

export type PaneMetrics = ResourceUsage;

export interface PaneMetricsView {
  key: string;
  index: number;
  pid: number;
  cwd: string;
  command: string;
  metrics: PaneMetrics;
  processes: ProcessRecord[];
}

export interface WindowMetricsView {
  index: number;
  name: string;
  layout: string;
  metrics: ResourceUsage;
  panes: PaneMetricsView[];
}

export interface SessionMetricsView {
  name: string;
  metrics: ResourceUsage;
  windows: WindowMetricsView[];
}

export interface MetricsSample {
  sampledAt: Date;
  /** Keyed by pane key ("session:window.pane") */
  panes: Map<string, PaneMetrics>;
  sessions: SessionMetricsView[];
  totals: ResourceUsage;
}

/** Read-only projection handed to export and display layers */
export interface MonitorSnapshot {
  sampledAt: string;
  totals: ResourceUsage;
  sessions: SessionMetricsView[];
}

export interface ToolContext {
  logger: Logger;
  errorHandler: ErrorHandler;
  inspector: TmuxInspector;
  monitor: PaneMonitor;
  processSource: ProcessTableSource;
  snapshotter: TopologySnapshotter;
  restorer: Restorer;
  artifactStore: ArtifactStore;
}
