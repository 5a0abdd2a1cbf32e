/**
 * Pane Monitor - the sampling loop
 *
 * One cycle: inspect tmux, read the process table, correlate and aggregate.
 * The next cycle is scheduled only after the current one settles, so two
 * cycles never run at once.
 */

import { EventEmitter } from 'events';
import type { MetricsSample, MonitorSnapshot } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { TmuxInspector } from './tmux-inspector.js';
import { readProcessTable, type ProcessTableSource } from './process-table.js';
import type { MetricsAggregator } from './metrics-aggregator.js';

export interface PaneMonitorEvents {
  cycle: (sample: MetricsSample) => void;
  'cycle-error': (error: unknown) => void;
}

export declare interface PaneMonitor {
  on<U extends keyof PaneMonitorEvents>(
    event: U, listener: PaneMonitorEvents[U]
  ): this;
  once<U extends keyof PaneMonitorEvents>(
    event: U, listener: PaneMonitorEvents[U]
  ): this;
  emit<U extends keyof PaneMonitorEvents>(
    event: U, ...args: Parameters<PaneMonitorEvents[U]>
  ): boolean;
}

export interface PaneMonitorOptions {
  intervalMs?: number;
}

export function toSnapshot(sample: MetricsSample): MonitorSnapshot {
  return {
    sampledAt: sample.sampledAt.toISOString(),
    totals: sample.totals,
    sessions: sample.sessions,
  };
}

export class PaneMonitor extends EventEmitter {
  private readonly intervalMs: number;
  private latest: MetricsSample | null = null;
  private inFlight: Promise<MetricsSample> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // Bumped by start and stop so a loop from before a restart winds down
  private generation = 0;

  constructor(
    private logger: Logger,
    private inspector: TmuxInspector,
    private source: ProcessTableSource,
    private aggregator: MetricsAggregator,
    options: PaneMonitorOptions = {}
  ) {
    super();
    this.intervalMs = options.intervalMs ?? 2000;
  }

  /**
   * Run one cycle now. A call made while a cycle is in flight joins it.
   */
  runCycle(): Promise<MetricsSample> {
    if (!this.inFlight) {
      this.inFlight = this.sampleOnce().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    this.logger.info(`Sampling every ${this.intervalMs}ms`);
    this.tick(this.generation);
  }

  stop(): void {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get interval(): number {
    return this.intervalMs;
  }

  getSample(): MetricsSample | null {
    return this.latest;
  }

  getSnapshot(): MonitorSnapshot | null {
    return this.latest ? toSnapshot(this.latest) : null;
  }

  private tick(generation: number): void {
    const current = (): boolean => this.running && generation === this.generation;

    this.runCycle()
      .then(sample => {
        if (current()) this.emit('cycle', sample);
      })
      .catch((error: unknown) => {
        if (!current()) {
          this.logger.debug('Sampling cycle of a stopped loop failed:', error);
          return;
        }
        this.logger.error('Sampling cycle failed:', error);
        this.emit('cycle-error', error);
      })
      .finally(() => {
        if (!current()) return;
        this.timer = setTimeout(() => this.tick(generation), this.intervalMs);
        this.timer.unref();
      });
  }

  private async sampleOnce(): Promise<MetricsSample> {
    const tree = await this.inspector.inspect();
    const table = await readProcessTable(this.source);
    const sample = this.aggregator.sample(tree, table);
    this.latest = sample;
    return sample;
  }
}
