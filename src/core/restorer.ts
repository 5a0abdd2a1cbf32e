/**
 * Restorer - replays a restore plan against tmux
 *
 * Sessions are restored in artifact order. Existing sessions are never
 * touched: a name clash is reported as a conflict and the session skipped.
 * There is no rollback; whatever was created before a failure stays.
 */

import type { Logger } from '../utils/logger.js';
import {
  ConflictError,
  OperationCancelledError,
  RestoreStepFailure,
  throwIfAborted,
} from '../utils/errors.js';
import type { Multiplexer } from './tmux-client.js';
import type { TmuxInspector } from './tmux-inspector.js';
import type { RestoreArtifact } from './restore-artifact.js';
import {
  paneRef,
  planRestore,
  windowRef,
  REBALANCE_LAYOUT,
  type RestoreStep,
  type SessionPlan,
} from './restore-plan.js';

export type SessionRestoreStatus = 'restored' | 'failed' | 'conflict' | 'cancelled';
export type WindowRestoreStatus = 'created' | 'failed' | 'skipped';

export interface WindowRestoreResult {
  /** Position of the window in the artifact session */
  index: number;
  status: WindowRestoreStatus;
}

export interface SessionRestoreResult {
  session: string;
  status: SessionRestoreStatus;
  windows: WindowRestoreResult[];
  stepsCompleted: number;
  error?: ConflictError | RestoreStepFailure | OperationCancelledError;
}

export interface RestoreOutcome {
  results: SessionRestoreResult[];
  succeeded: string[];
  failed: string[];
}

export interface RestoreOptions {
  signal?: AbortSignal;
}

const CREATED_IDS_FORMAT = '#{window_id}\t#{pane_id}';

/** Per-session run state; refs bind artifact positions to the ids tmux printed */
interface SessionRun {
  plan: SessionPlan;
  result: SessionRestoreResult;
  refs: Map<string, string>;
  /** Windows whose structure steps all completed */
  completedWindows: number;
}

export class Restorer {
  constructor(
    private logger: Logger,
    private tmux: Multiplexer,
    private inspector: TmuxInspector
  ) {}

  async restore(artifact: RestoreArtifact, options: RestoreOptions = {}): Promise<RestoreOutcome> {
    const { signal } = options;
    const plan = planRestore(artifact);
    const existing = new Set(await this.inspector.listSessionNames());
    const runs: SessionRun[] = [];

    for (const sessionPlan of plan.sessions) {
      const run: SessionRun = {
        plan: sessionPlan,
        result: {
          session: sessionPlan.session,
          status: 'restored',
          windows: [],
          stepsCompleted: 0,
        },
        refs: new Map(),
        completedWindows: 0,
      };
      runs.push(run);

      if (existing.has(sessionPlan.session)) {
        const conflict = new ConflictError(sessionPlan.session);
        this.logger.warn(`Skipping restore: ${conflict.message}`);
        this.settle(run, 'conflict', conflict);
        continue;
      }

      if (this.isCancelled(signal, run)) continue;

      try {
        await this.execute(run, sessionPlan.structure, signal);
      } catch (error) {
        this.recordFailure(run, error);
      } finally {
        if (run.result.stepsCompleted > 0) existing.add(sessionPlan.session);
      }
    }

    // Commands go in only after every layout exists
    for (const run of runs) {
      if (run.result.status !== 'restored' || run.plan.input.length === 0) continue;
      if (this.isCancelled(signal, run)) continue;

      try {
        await this.execute(run, run.plan.input, signal);
      } catch (error) {
        this.recordFailure(run, error);
      }
    }

    for (const run of runs) {
      if (run.result.status === 'restored') {
        this.settle(run, 'restored');
      }
    }

    const results = runs.map(run => run.result);
    const outcome: RestoreOutcome = {
      results,
      succeeded: results.filter(result => result.status === 'restored').map(result => result.session),
      failed: results.filter(result => result.status === 'failed').map(result => result.session),
    };

    this.logger.info(
      `Restore finished: ${outcome.succeeded.length} restored, ${outcome.failed.length} failed, ` +
      `${results.length - outcome.succeeded.length - outcome.failed.length} skipped`
    );
    return outcome;
  }

  private isCancelled(signal: AbortSignal | undefined, run: SessionRun): boolean {
    try {
      throwIfAborted(signal, `restore of session '${run.plan.session}'`);
      return false;
    } catch (error) {
      if (!(error instanceof OperationCancelledError)) throw error;
      this.settle(run, 'cancelled', error);
      return true;
    }
  }

  private async execute(run: SessionRun, steps: readonly RestoreStep[], signal?: AbortSignal): Promise<void> {
    for (const step of steps) {
      throwIfAborted(signal, `restore of session '${step.session}'`);

      try {
        await this.runStep(step, run.refs);
      } catch (error) {
        throw new RestoreStepFailure(step, { cause: error });
      }

      run.result.stepsCompleted++;
      if (step.kind === 'select-layout') {
        run.completedWindows = step.window + 1;
      }
    }
  }

  private async runStep(step: RestoreStep, refs: Map<string, string>): Promise<void> {
    switch (step.kind) {
      case 'new-session': {
        const size = step.size ? ['-x', String(step.size.width), '-y', String(step.size.height)] : [];
        const output = await this.tmux.run([
          'new-session', '-d', '-s', step.session, '-n', step.windowName, '-c', step.cwd,
          ...size, '-P', '-F', CREATED_IDS_FORMAT,
        ]);
        this.bindCreated(output, refs, step.window);
        return;
      }

      case 'new-window': {
        const output = await this.tmux.run([
          'new-window', '-d', '-t', `=${step.session}:`, '-n', step.windowName, '-c', step.cwd,
          '-P', '-F', CREATED_IDS_FORMAT,
        ]);
        this.bindCreated(output, refs, step.window);
        return;
      }

      case 'split-pane': {
        const output = await this.tmux.run([
          'split-window', '-d', '-t', resolveRef(refs, paneRef(step.window, step.from)), '-c', step.cwd,
          '-P', '-F', '#{pane_id}',
        ]);
        refs.set(paneRef(step.window, step.pane), parseId(output.trim(), '%'));
        return;
      }

      case 'rebalance':
        await this.tmux.run(['select-layout', '-t', resolveRef(refs, windowRef(step.window)), REBALANCE_LAYOUT]);
        return;

      case 'select-layout':
        await this.tmux.run(['select-layout', '-t', resolveRef(refs, windowRef(step.window)), step.layout]);
        return;

      case 'send-keys': {
        const target = resolveRef(refs, paneRef(step.window, step.pane));
        await this.tmux.run(step.literal
          ? ['send-keys', '-t', target, '-l', '--', step.keys]
          : ['send-keys', '-t', target, step.keys]);
        return;
      }
    }
  }

  private bindCreated(output: string, refs: Map<string, string>, window: number): void {
    const [windowId = '', paneId = ''] = output.trim().split('\t');
    refs.set(windowRef(window), parseId(windowId, '@'));
    refs.set(paneRef(window, 0), parseId(paneId, '%'));
  }

  private recordFailure(run: SessionRun, error: unknown): void {
    if (error instanceof OperationCancelledError) {
      this.settle(run, 'cancelled', error);
      return;
    }
    if (error instanceof RestoreStepFailure) {
      this.logger.error(`Restore of session '${run.plan.session}' aborted:`, error.message);
      this.settle(run, 'failed', error);
      return;
    }
    throw error;
  }

  /**
   * Fix the session status and derive window statuses from how far the
   * structure phase got. A failure fails the window it happened in and every
   * window after it; cancellation leaves unbuilt windows skipped.
   */
  private settle(
    run: SessionRun,
    status: SessionRestoreStatus,
    error?: ConflictError | RestoreStepFailure | OperationCancelledError
  ): void {
    const unbuilt: WindowRestoreStatus = status === 'failed' ? 'failed' : 'skipped';
    run.result.status = status;
    run.result.error = error;
    run.result.windows = Array.from({ length: run.plan.windowCount }, (_, index) => ({
      index,
      status: index < run.completedWindows ? 'created' : unbuilt,
    }));
  }
}

function resolveRef(refs: Map<string, string>, ref: string): string {
  const id = refs.get(ref);
  if (id === undefined) {
    throw new Error(`no tmux id bound for ${ref}`);
  }
  return id;
}

const ID_PATTERNS = { '@': /^@\d+$/, '%': /^%\d+$/ } as const;

function parseId(value: string, sigil: keyof typeof ID_PATTERNS): string {
  if (!ID_PATTERNS[sigil].test(value)) {
    throw new Error(`unexpected id from tmux: '${value}'`);
  }
  return value;
}
