/**
 * Core components export
 */

export { TmuxClient, TmuxError, TmuxNoServerError, TmuxNotFoundError, CommandTimeoutError } from './tmux-client.js';
export type { Multiplexer } from './tmux-client.js';
export { TmuxInspector, parsePaneRows } from './tmux-inspector.js';
export { ProcfsProcessSource, PsProcessSource, createProcessSource, readProcessTable } from './process-table.js';
export type { ProcessTableSource, ProcessTableSnapshot } from './process-table.js';
export { ProcessCorrelator, ProcessIndex } from './process-correlator.js';
export { MetricsAggregator, computeCpuUsage } from './metrics-aggregator.js';
export { PaneMonitor } from './pane-monitor.js';
export { TopologySnapshotter } from './topology-snapshotter.js';
export { parseArtifact, serializeArtifact } from './restore-artifact.js';
export type { RestoreArtifact } from './restore-artifact.js';
export { planRestore, renderRestoreScript } from './restore-plan.js';
export type { RestorePlan, RestoreStep } from './restore-plan.js';
export { Restorer } from './restorer.js';
export type { RestoreOutcome, SessionRestoreResult } from './restorer.js';
