/**
 * TopologySnapshotter - capture sessions, windows, layouts and pane commands
 * into a restore artifact
 */

import { hostname } from 'os';
import type { SessionTree, TmuxPane } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/errors.js';
import type { ProcessTableSnapshot } from './process-table.js';
import { ProcessCorrelator, ProcessIndex } from './process-correlator.js';
import {
  ARTIFACT_VERSION,
  countPanes,
  freezeArtifact,
  type RestoreArtifact,
} from './restore-artifact.js';

/** Re-typing an interactive shell into a pane would only nest another shell */
const INTERACTIVE_SHELLS = new Set([
  'sh', 'bash', 'zsh', 'fish', 'dash', 'ksh', 'mksh', 'tcsh', 'csh', 'ash', 'nu', 'xonsh', 'elvish',
]);

/**
 * A shell binary with nothing but flags ("-bash", "zsh -l"). "bash build.sh" is a real command.
 */
export function isInteractiveShell(command: string): boolean {
  const [executable = '', ...args] = command.trim().split(/\s+/);
  const base = (executable.split('/').pop() ?? '').replace(/^-/, '');
  return INTERACTIVE_SHELLS.has(base) && args.every(arg => arg.startsWith('-'));
}

export interface CaptureOptions {
  /** Restrict the capture to these session names */
  sessions?: string[];
  /** Our own pid; a pane running panetop is captured without a command */
  selfPid?: number;
  signal?: AbortSignal;
  now?: Date;
}

export class TopologySnapshotter {
  constructor(private logger: Logger) {}

  /**
   * Walk sessions in tree order, windows and panes by index. The restorer
   * replays in the same order, which is what reproduces the split structure.
   */
  capture(tree: SessionTree, processes?: ProcessTableSnapshot, options: CaptureOptions = {}): RestoreArtifact {
    const correlator = processes ? new ProcessCorrelator(ProcessIndex.build(processes)) : null;
    const wanted = options.sessions && options.sessions.length > 0 ? new Set(options.sessions) : null;

    const sessions = tree.sessions
      .filter(session => !wanted || wanted.has(session.name))
      .map(session => {
        throwIfAborted(options.signal, 'backup');

        return {
          name: session.name,
          windows: [...session.windows]
            .sort((a, b) => a.index - b.index)
            .map(window => ({
              index: window.index,
              name: window.name,
              layout: window.layout,
              panes: [...window.panes]
                .sort((a, b) => a.index - b.index)
                .map(pane => ({
                  index: pane.index,
                  cwd: pane.cwd,
                  command: this.lastCommand(pane, correlator, options.selfPid),
                })),
            })),
        };
      });

    if (wanted) {
      const missing = [...wanted].filter(name => !sessions.some(session => session.name === name));
      if (missing.length > 0) {
        this.logger.warn(`Sessions not found for backup: ${missing.join(', ')}`);
      }
    }

    const artifact = freezeArtifact({
      version: ARTIFACT_VERSION,
      createdAt: (options.now ?? new Date()).toISOString(),
      hostname: hostname(),
      sessions,
    });

    const counts = countPanes(artifact);
    this.logger.info(`Captured ${counts.sessions} sessions, ${counts.windows} windows, ${counts.panes} panes`);
    return artifact;
  }

  /**
   * Best-effort foreground command. Processes can exec into something else
   * and shells hide aliases, so this is metadata, not a guarantee.
   */
  private lastCommand(pane: TmuxPane, correlator: ProcessCorrelator | null, selfPid?: number): string {
    const foreground = correlator?.foregroundProcess(pane.pid);
    if (foreground) {
      if (selfPid !== undefined && foreground.pid === selfPid) return '';
      return isInteractiveShell(foreground.command) ? '' : foreground.command;
    }

    return isInteractiveShell(pane.command) ? '' : pane.command;
  }
}
