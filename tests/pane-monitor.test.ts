/**
 * Tests for PaneMonitor
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PaneMonitor } from '../src/core/pane-monitor.js';
import { TmuxInspector } from '../src/core/tmux-inspector.js';
import { MetricsAggregator } from '../src/core/metrics-aggregator.js';
import type { MetricsSample } from '../src/types/index.js';
import { InspectionError } from '../src/utils/errors.js';
import { FakeTmux } from './helpers/fake-tmux.js';
import { silentLogger } from './helpers/logger.js';

// The fake tmux never touches I/O, so one macrotask turn settles a cycle
function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('PaneMonitor', () => {
  let tmux: FakeTmux;
  let monitor: PaneMonitor;

  beforeEach(() => {
    tmux = new FakeTmux();
    tmux.seed({
      name: 'dev',
      windows: [
        { name: 'editor', panes: [{ cwd: '/src', run: 'vim main.ts' }] },
        { name: 'server', panes: [{ cwd: '/srv', run: 'npm run dev' }] },
      ],
    });
    monitor = new PaneMonitor(
      silentLogger(),
      new TmuxInspector(silentLogger(), tmux),
      tmux.processSource(),
      new MetricsAggregator(silentLogger(), { totalMemoryBytes: 1024 }),
      { intervalMs: 10 }
    );
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  it('should have no snapshot before the first cycle', () => {
    expect(monitor.getSnapshot()).toBeNull();
  });

  it('should sample every pane in one cycle', async () => {
    const sample = await monitor.runCycle();

    expect(Array.from(sample.panes.keys())).toEqual(['dev:0.0', 'dev:1.0']);
    expect(sample.panes.get('dev:0.0')?.processCount).toBe(2);
    expect(monitor.getSnapshot()).toEqual({
      sampledAt: sample.sampledAt.toISOString(),
      totals: sample.totals,
      sessions: sample.sessions,
    });
  });

  it('should join a cycle that is already running', async () => {
    const [first, second] = await Promise.all([monitor.runCycle(), monitor.runCycle()]);

    expect(first).toBe(second);
    expect(tmux.commands.filter(args => args[0] === 'list-panes')).toHaveLength(1);
  });

  it('should emit each completed cycle once started', async () => {
    const sample = await new Promise<MetricsSample>(resolve => {
      monitor.once('cycle', resolve);
      monitor.start();
    });

    expect(monitor.isRunning).toBe(true);
    expect(sample.sessions[0]?.name).toBe('dev');
  });

  it('should keep sampling after a failed cycle', async () => {
    tmux.failWhen(args => args[0] === 'list-panes', 'server exited unexpectedly');
    const errors: unknown[] = [];

    await new Promise<void>(resolve => {
      monitor.on('cycle-error', error => {
        errors.push(error);
        if (errors.length === 2) resolve();
      });
      monitor.start();
    });
    monitor.stop();

    expect(errors[0]).toBeInstanceOf(InspectionError);
    expect(monitor.isRunning).toBe(false);
    expect(monitor.getSnapshot()).toBeNull();
  });

  it('should keep a single sampling loop across a quick stop and restart', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const cycles: MetricsSample[] = [];
    monitor.on('cycle', sample => {
      cycles.push(sample);
    });

    monitor.start();
    monitor.stop();
    monitor.start();
    await settle();

    expect(cycles).toHaveLength(1);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(10);
    await settle();

    expect(cycles).toHaveLength(2);
    expect(vi.getTimerCount()).toBe(1);
    expect(tmux.commands.filter(args => args[0] === 'list-panes')).toHaveLength(2);
  });
});
