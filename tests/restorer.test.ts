/**
 * Tests for Restorer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Restorer } from '../src/core/restorer.js';
import { TmuxInspector } from '../src/core/tmux-inspector.js';
import { TopologySnapshotter } from '../src/core/topology-snapshotter.js';
import { readProcessTable } from '../src/core/process-table.js';
import {
  freezeArtifact,
  parseArtifact,
  serializeArtifact,
  type RestoreArtifact,
} from '../src/core/restore-artifact.js';
import type { Multiplexer } from '../src/core/tmux-client.js';
import { ConflictError, OperationCancelledError, RestoreStepFailure } from '../src/utils/errors.js';
import { FakeTmux } from './helpers/fake-tmux.js';
import { silentLogger } from './helpers/logger.js';

const EDITOR_LAYOUT = 'b25f,160x48,0,0{80x48,0,0,0,79x48,81,0,1}';

function restorerFor(tmux: Multiplexer): Restorer {
  return new Restorer(silentLogger(), tmux, new TmuxInspector(silentLogger(), tmux));
}

async function captureFrom(tmux: FakeTmux): Promise<RestoreArtifact> {
  const tree = await new TmuxInspector(silentLogger(), tmux).inspect();
  const table = await readProcessTable(tmux.processSource());
  return new TopologySnapshotter(silentLogger()).capture(tree, table, { now: new Date('2026-01-02T03:04:05.000Z') });
}

function artifactWith(...sessions: Array<{ name: string; windows: string[]; command?: string }>): RestoreArtifact {
  return freezeArtifact({
    version: 1,
    createdAt: '2026-01-02T03:04:05.000Z',
    sessions: sessions.map(session => ({
      name: session.name,
      windows: session.windows.map((name, index) => ({
        index,
        name,
        layout: `aaaa,80x24,0,0,${index}`,
        panes: [{ index: 0, cwd: `/work/${name}`, command: session.command ?? '' }],
      })),
    })),
  });
}

describe('Restorer', () => {
  let source: FakeTmux;

  beforeEach(() => {
    source = new FakeTmux();
    source.seed(
      {
        name: 'dev',
        windows: [
          { name: 'editor', layout: EDITOR_LAYOUT, panes: [{ cwd: '/src', run: 'vim main.ts' }, { cwd: '/tmp' }] },
          { name: 'server', panes: [{ cwd: '/srv', run: 'npm run dev' }] },
        ],
      },
      { name: 'ops', windows: [{ name: 'logs', panes: [{ cwd: '/var/log', run: 'tail -f syslog' }] }] }
    );
  });

  it('should round-trip capture, serialize, parse and restore', async () => {
    const captured = await captureFrom(source);
    const target = new FakeTmux();

    const outcome = await restorerFor(target).restore(parseArtifact(serializeArtifact(captured)));
    const restored = await captureFrom(target);

    expect(outcome.succeeded).toEqual(['dev', 'ops']);
    expect(outcome.failed).toEqual([]);
    expect(restored.sessions).toEqual(captured.sessions);
    expect(target.commandsIn('dev')).toEqual([[['vim main.ts'], []], [['npm run dev']]]);
  });

  it('should finish every layout before typing any command', async () => {
    const target = new FakeTmux();

    await restorerFor(target).restore(await captureFrom(source));

    const verbs = target.commands.map(args => args[0]);
    expect(verbs.lastIndexOf('select-layout')).toBeLessThan(verbs.indexOf('send-keys'));
    expect(target.commands.filter(args => args[0] === 'send-keys')[0]).toEqual(['send-keys', '-t', '%0', '-l', '--', 'vim main.ts']);
  });

  it('should rebuild a window with more panes than repeated halving leaves room for', async () => {
    const wide = new FakeTmux();
    wide.seed({
      name: 'grid',
      windows: [{
        name: 'watch',
        layout: 'a1b2,204x50,0,0{33x50,0,0,0,33x50,34,0,1,33x50,68,0,2,33x50,102,0,3,33x50,136,0,4,33x50,170,0,5}',
        panes: ['/a', '/b', '/c', '/d', '/e', '/f'].map(cwd => ({ cwd })),
      }],
    });
    const captured = await captureFrom(wide);
    const target = new FakeTmux();

    const outcome = await restorerFor(target).restore(captured);

    expect(outcome.results[0]?.status).toBe('restored');
    expect((await captureFrom(target)).sessions).toEqual(captured.sessions);
    expect(target.commands.filter(args => args[0] === 'select-layout').map(args => args[3])).toEqual([
      'tiled',
      'tiled',
      'tiled',
      'tiled',
      captured.sessions[0]?.windows[0]?.layout,
    ]);
  });

  it('should type commands that start with a dash as text', async () => {
    const target = new FakeTmux();

    const outcome = await restorerFor(target).restore(artifactWith({ name: 'svc', windows: ['a'], command: '-n 5 cat' }));

    expect(outcome.results[0]?.status).toBe('restored');
    expect(target.commandsIn('svc')).toEqual([[['-n 5 cat']]]);
  });

  it('should match session names exactly when checking for conflicts', async () => {
    const target = new FakeTmux();
    target.seed({ name: ' pad ', windows: [{ name: 'mine', panes: [{ cwd: '/' }] }] });

    const outcome = await restorerFor(target).restore(artifactWith({ name: ' pad ', windows: ['main'] }, { name: 'pad', windows: ['main'] }));

    expect(outcome.results.map(result => [result.session, result.status])).toEqual([
      [' pad ', 'conflict'],
      ['pad', 'restored'],
    ]);
  });

  it('should report a conflict for every session on a second restore', async () => {
    const artifact = await captureFrom(source);
    const target = new FakeTmux();
    const restorer = restorerFor(target);
    await restorer.restore(artifact);
    const issued = target.commands.length;

    const outcome = await restorer.restore(artifact);

    expect(outcome.results.map(result => result.status)).toEqual(['conflict', 'conflict']);
    expect(outcome.results[0]?.error).toBeInstanceOf(ConflictError);
    expect(outcome.results[0]?.error?.message).toBe("session 'dev' already exists");
    expect(outcome.succeeded).toEqual([]);
    expect(outcome.failed).toEqual([]);
    expect(target.sessionNames()).toEqual(['dev', 'ops']);
    expect(target.commands.slice(issued)).toEqual([['list-sessions', '-F', '#{session_name}']]);
  });

  it('should restore the other sessions when one name is taken', async () => {
    const target = new FakeTmux();
    target.seed({ name: 'ops', windows: [{ name: 'mine', panes: [{ cwd: '/' }] }] });

    const outcome = await restorerFor(target).restore(await captureFrom(source));

    expect(outcome.results.map(result => [result.session, result.status])).toEqual([
      ['dev', 'restored'],
      ['ops', 'conflict'],
    ]);
    expect(target.commandsIn('ops')).toEqual([[[]]]);
  });

  it('should keep earlier windows and fail the rest when a window cannot be created', async () => {
    const target = new FakeTmux();
    target.failWhen(args => args[0] === 'new-window' && args.includes('test'));
    const artifact = artifactWith({ name: 'build', windows: ['compile', 'test', 'deploy'], command: 'make' }, { name: 'docs', windows: ['site'] });

    const outcome = await restorerFor(target).restore(artifact);
    const [build, docs] = outcome.results;

    expect(build?.status).toBe('failed');
    expect(build?.windows).toEqual([
      { index: 0, status: 'created' },
      { index: 1, status: 'failed' },
      { index: 2, status: 'failed' },
    ]);
    expect(build?.stepsCompleted).toBe(2);
    expect(build?.error).toBeInstanceOf(RestoreStepFailure);
    expect(build?.error?.message).toBe("restore step new-window failed for session 'build': tmux error: injected failure");
    expect(docs?.status).toBe('restored');
    expect(outcome.succeeded).toEqual(['docs']);
    expect(outcome.failed).toEqual(['build']);
    expect(target.commandsIn('build')).toEqual([[[]]]);
    expect(target.commands.some(args => args[0] === 'send-keys')).toBe(false);
  });

  it('should fail the session when a command cannot be typed', async () => {
    const target = new FakeTmux();
    target.failWhen(args => args[0] === 'send-keys');

    const outcome = await restorerFor(target).restore(artifactWith({ name: 'svc', windows: ['a', 'b'], command: 'top' }));

    expect(outcome.results[0]?.status).toBe('failed');
    expect(outcome.results[0]?.windows.map(window => window.status)).toEqual(['created', 'created']);
  });

  it('should stop between commands when cancelled', async () => {
    const target = new FakeTmux();
    const controller = new AbortController();
    const aborting: Multiplexer = {
      run: async (args: string[]) => {
        const output = await target.run(args);
        if (args[0] === 'select-layout') controller.abort();
        return output;
      },
    };

    const outcome = await restorerFor(aborting).restore(
      artifactWith({ name: 'one', windows: ['main'], command: 'htop' }, { name: 'two', windows: ['main'] }),
      { signal: controller.signal }
    );

    expect(outcome.results.map(result => [result.session, result.status])).toEqual([
      ['one', 'cancelled'],
      ['two', 'cancelled'],
    ]);
    expect(outcome.results[0]?.windows).toEqual([{ index: 0, status: 'created' }]);
    expect(outcome.results[1]?.windows).toEqual([{ index: 0, status: 'skipped' }]);
    expect(outcome.results[1]?.error).toBeInstanceOf(OperationCancelledError);
    expect(target.sessionNames()).toEqual(['one']);
    expect(target.commands.some(args => args[0] === 'send-keys')).toBe(false);
  });
});
