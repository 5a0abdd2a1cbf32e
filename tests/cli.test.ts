/**
 * Tests for the one-shot command line modes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CliUsageError,
  DEFAULT_EXPORT_FILE,
  USAGE,
  parseCliArgs,
  runCommand,
  type CliContext,
} from '../src/cli.js';
import { TmuxInspector } from '../src/core/tmux-inspector.js';
import { MetricsAggregator } from '../src/core/metrics-aggregator.js';
import { PaneMonitor } from '../src/core/pane-monitor.js';
import { TopologySnapshotter } from '../src/core/topology-snapshotter.js';
import { Restorer } from '../src/core/restorer.js';
import { ArtifactStore } from '../src/storage/artifact-store.js';
import { FakeTmux } from './helpers/fake-tmux.js';
import { silentLogger } from './helpers/logger.js';

describe('parseCliArgs', () => {
  it('should serve without a mode', () => {
    expect(parseCliArgs([])).toEqual({ mode: 'serve' });
  });

  it('should read each mode and its positionals', () => {
    expect(parseCliArgs(['--backup', 'dev', 'ops'])).toEqual({ mode: 'backup', sessions: ['dev', 'ops'] });
    expect(parseCliArgs(['--restore'])).toEqual({ mode: 'restore', file: undefined });
    expect(parseCliArgs(['--plan', 'backup.json'])).toEqual({ mode: 'plan', file: 'backup.json' });
    expect(parseCliArgs(['--export'])).toEqual({ mode: 'export', file: DEFAULT_EXPORT_FILE });
    expect(parseCliArgs(['-h'])).toEqual({ mode: 'help' });
  });

  it('should reject two modes at once', () => {
    expect(() => parseCliArgs(['--backup', '--restore'])).toThrow('Choose one mode, got --backup --restore');
  });

  it('should reject stray arguments and unknown flags', () => {
    expect(() => parseCliArgs(['dev'])).toThrow('Unexpected arguments: dev');
    expect(() => parseCliArgs(['--restore', 'a.json', 'b.json'])).toThrow('Unexpected arguments: b.json');
    expect(() => parseCliArgs(['--verbose'])).toThrow(CliUsageError);
  });
});

describe('runCommand', () => {
  let directory: string;
  let tmux: FakeTmux;
  let output: string[];

  function contextFor(source: FakeTmux, target: FakeTmux = source): CliContext {
    const logger = silentLogger();
    const inspector = new TmuxInspector(logger, source);
    const processSource = source.processSource();

    return {
      logger,
      inspector,
      processSource,
      monitor: new PaneMonitor(logger, inspector, processSource, new MetricsAggregator(logger, { totalMemoryBytes: 1024 }), {
        intervalMs: 5,
      }),
      snapshotter: new TopologySnapshotter(logger),
      restorer: new Restorer(logger, target, new TmuxInspector(logger, target)),
      artifactStore: new ArtifactStore(logger, { directory: join(directory, 'backups') }),
      write: text => {
        output.push(text);
      },
      wait: async () => undefined,
    };
  }

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'panetop-cli-'));
    output = [];
    tmux = new FakeTmux();
    tmux.seed({ name: 'dev', windows: [{ name: 'main', panes: [{ cwd: '/src', run: 'make watch' }] }] });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should print usage for help', async () => {
    expect(await runCommand({ mode: 'help' }, contextFor(tmux))).toBe(0);
    expect(output).toEqual([`${USAGE}\n`]);
  });

  it('should print the path of a new backup', async () => {
    const context = contextFor(tmux);

    expect(await runCommand({ mode: 'backup', sessions: [] }, context)).toBe(0);

    const [stored] = await context.artifactStore.list();
    expect(output).toEqual([`${stored?.path}\n`]);
  });

  it('should fail a backup of sessions that do not exist', async () => {
    expect(await runCommand({ mode: 'backup', sessions: ['missing'] }, contextFor(tmux))).toBe(1);
    expect(output).toEqual([]);
  });

  it('should print the restore script for the latest backup', async () => {
    const context = contextFor(tmux);
    await runCommand({ mode: 'backup', sessions: [] }, context);
    output = [];

    expect(await runCommand({ mode: 'plan' }, context)).toBe(0);
    expect(output[0]?.startsWith('#!/bin/sh\n')).toBe(true);
    expect(output[0]).toContain("  tmux send-keys -t \"$w0p0\" -l -- 'make watch'\n");
  });

  it('should report each restored session and exit 0', async () => {
    await runCommand({ mode: 'backup', sessions: [] }, contextFor(tmux));
    output = [];
    const target = new FakeTmux();

    expect(await runCommand({ mode: 'restore' }, contextFor(tmux, target))).toBe(0);
    expect(output).toEqual(['dev: restored\n']);
    expect(target.commandsIn('dev')).toEqual([[['make watch']]]);
  });

  it('should exit 1 when a session fails to restore', async () => {
    await runCommand({ mode: 'backup', sessions: [] }, contextFor(tmux));
    output = [];
    const target = new FakeTmux();
    target.failWhen(args => args[0] === 'new-session', 'no space for new pane');

    expect(await runCommand({ mode: 'restore' }, contextFor(tmux, target))).toBe(1);
    expect(output).toEqual([
      "dev: failed (restore step new-session failed for session 'dev': tmux error: no space for new pane)\n",
    ]);
  });

  it('should fail when there is nothing to restore', async () => {
    expect(await runCommand({ mode: 'restore' }, contextFor(tmux))).toBe(1);
  });

  it('should sample twice and write the snapshot as JSON', async () => {
    const file = join(directory, 'metrics.json');

    expect(await runCommand({ mode: 'export', file }, contextFor(tmux))).toBe(0);

    const written: unknown = JSON.parse(await readFile(file, 'utf8'));
    expect(written).toMatchObject({
      totals: { processCount: 2 },
      sessions: [{ name: 'dev', windows: [{ name: 'main' }] }],
    });
    expect(output).toEqual([`${file}\n`]);
  });
});
