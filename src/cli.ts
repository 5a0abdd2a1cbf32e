/**
 * One-shot command line modes: backup, restore, plan and export
 */

import { writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { parseArgs } from 'util';
import type { Logger } from './utils/logger.js';
import { describeCause } from './utils/errors.js';
import type { TmuxInspector } from './core/tmux-inspector.js';
import { readProcessTable, type ProcessTableSource } from './core/process-table.js';
import type { PaneMonitor } from './core/pane-monitor.js';
import type { TopologySnapshotter } from './core/topology-snapshotter.js';
import type { Restorer } from './core/restorer.js';
import { planRestore, renderRestoreScript } from './core/restore-plan.js';
import type { RestoreArtifact } from './core/restore-artifact.js';
import type { ArtifactStore } from './storage/artifact-store.js';

export const DEFAULT_EXPORT_FILE = 'panetop-export.json';

export type CliCommand =
  | { mode: 'serve' }
  | { mode: 'help' }
  | { mode: 'backup'; sessions: string[] }
  | { mode: 'restore'; file?: string }
  | { mode: 'plan'; file?: string }
  | { mode: 'export'; file: string };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: panetop [mode]

  (no mode)               run the MCP server on stdio
  --backup [session...]   capture sessions (all by default) into the backup directory
  --restore [file]        recreate sessions from a backup (latest by default)
  --plan [file]           print the restore commands as a shell script
  --export [file]         sample twice and write metrics JSON (default ${DEFAULT_EXPORT_FILE})
  --help                  show this message`;

const MODES = ['backup', 'restore', 'plan', 'export', 'help'] as const;

export function parseCliArgs(argv: string[]): CliCommand {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        backup: { type: 'boolean' },
        restore: { type: 'boolean' },
        plan: { type: 'boolean' },
        export: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new CliUsageError(describeCause(error));
  }

  const { values, positionals } = parsed;
  const selected = MODES.filter(mode => values[mode] === true);

  if (selected.length > 1) {
    throw new CliUsageError(`Choose one mode, got ${selected.map(mode => `--${mode}`).join(' ')}`);
  }

  const [mode] = selected;
  if (mode !== 'backup' && positionals.length > 1) {
    throw new CliUsageError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  switch (mode) {
    case undefined:
      if (positionals.length > 0) {
        throw new CliUsageError(`Unexpected arguments: ${positionals.join(' ')}`);
      }
      return { mode: 'serve' };
    case 'help':
      return { mode: 'help' };
    case 'backup':
      return { mode: 'backup', sessions: positionals };
    case 'restore':
      return { mode: 'restore', file: positionals[0] };
    case 'plan':
      return { mode: 'plan', file: positionals[0] };
    case 'export':
      return { mode: 'export', file: positionals[0] ?? DEFAULT_EXPORT_FILE };
  }
}

export interface CliContext {
  logger: Logger;
  inspector: TmuxInspector;
  processSource: ProcessTableSource;
  monitor: PaneMonitor;
  snapshotter: TopologySnapshotter;
  restorer: Restorer;
  artifactStore: ArtifactStore;
  /** Where results go (stdout in production) */
  write: (text: string) => void;
  /** Pause between the two export cycles */
  wait?: (ms: number) => Promise<unknown>;
  signal?: AbortSignal;
}

async function loadArtifact(
  context: CliContext,
  file: string | undefined
): Promise<{ path: string; artifact: RestoreArtifact } | null> {
  if (file) {
    return { path: file, artifact: await context.artifactStore.load(file) };
  }
  return context.artifactStore.loadLatest();
}

/**
 * Run a one-shot mode and return the process exit code
 */
export async function runCommand(
  command: Exclude<CliCommand, { mode: 'serve' }>,
  context: CliContext
): Promise<number> {
  const { logger, write } = context;

  switch (command.mode) {
    case 'help':
      write(`${USAGE}\n`);
      return 0;

    case 'backup': {
      const tree = await context.inspector.inspect();
      let table;
      try {
        table = await readProcessTable(context.processSource);
      } catch (error) {
        logger.warn(`Process table unavailable, capturing tmux command names only: ${describeCause(error)}`);
      }

      const artifact = context.snapshotter.capture(tree, table, {
        sessions: command.sessions,
        selfPid: process.pid,
        signal: context.signal,
      });
      if (artifact.sessions.length === 0) {
        logger.error('Nothing to back up: no matching tmux sessions');
        return 1;
      }

      const path = await context.artifactStore.save(artifact);
      write(`${path}\n`);
      return 0;
    }

    case 'restore': {
      const source = await loadArtifact(context, command.file);
      if (!source) {
        logger.error(`No backups found in ${context.artifactStore.location}`);
        return 1;
      }

      const outcome = await context.restorer.restore(source.artifact, { signal: context.signal });
      for (const result of outcome.results) {
        const detail = result.error ? ` (${result.error.message})` : '';
        write(`${result.session}: ${result.status}${detail}\n`);
      }
      return outcome.failed.length > 0 ? 1 : 0;
    }

    case 'plan': {
      const source = await loadArtifact(context, command.file);
      if (!source) {
        logger.error(`No backups found in ${context.artifactStore.location}`);
        return 1;
      }
      write(renderRestoreScript(planRestore(source.artifact)));
      return 0;
    }

    case 'export': {
      const wait = context.wait ?? sleep;
      // The first cycle only seeds CPU baselines
      await context.monitor.runCycle();
      await wait(context.monitor.interval);
      await context.monitor.runCycle();

      const snapshot = context.monitor.getSnapshot();
      await writeFile(command.file, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
      write(`${command.file}\n`);
      return 0;
    }
  }
}
