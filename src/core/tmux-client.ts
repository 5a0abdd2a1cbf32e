/**
 * Tmux client - executes tmux commands and classifies failures
 */

import type { Logger } from '../utils/logger.js';
import { CommandRunner, SPAWN_FAILURE_EXIT_CODE } from '../utils/command-runner.js';

/** Anything that can answer tmux commands: the real binary or an in-process stand-in */
export interface Multiplexer {
  run(args: string[]): Promise<string>;
}

/** Error thrown when a tmux command fails */
export class TmuxError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(`tmux error: ${message}`);
    this.name = 'TmuxError';
  }
}

/** Error thrown when tmux is not available */
export class TmuxNotFoundError extends Error {
  constructor() {
    super('tmux is not installed or not in PATH');
    this.name = 'TmuxNotFoundError';
  }
}

/** Error thrown when no tmux server is running */
export class TmuxNoServerError extends Error {
  constructor() {
    super('no tmux server running');
    this.name = 'TmuxNoServerError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number
  ) {
    super(`${command} did not finish within ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

export interface TmuxClientOptions {
  /** tmux executable (default: "tmux") */
  binary?: string;
  /** Custom socket name (uses -L flag) */
  socketName?: string;
  /** Bound on every tmux invocation */
  timeoutMs?: number;
}

const NO_SERVER_PATTERNS = ['no server running', 'error connecting to', 'no sessions'];

export class TmuxClient implements Multiplexer {
  private readonly runner: CommandRunner;
  private readonly binary: string;
  private readonly socketArgs: string[];
  private readonly timeoutMs: number;

  constructor(
    private logger: Logger,
    options: TmuxClientOptions = {}
  ) {
    this.binary = options.binary ?? 'tmux';
    this.socketArgs = options.socketName ? ['-L', options.socketName] : [];
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.runner = new CommandRunner(logger, {
      logCommands: true,
      defaultTimeout: this.timeoutMs,
    });
  }

  async run(args: string[]): Promise<string> {
    const fullArgs = [...this.socketArgs, ...args];
    const display = this.runner.formatCommandForDisplay(this.binary, fullArgs);
    const result = await this.runner.execute(this.binary, fullArgs);

    if (result.timedOut) {
      throw new CommandTimeoutError(display, this.timeoutMs);
    }

    if (result.exitCode !== 0) {
      const stderrLower = result.stderr.toLowerCase();

      if (NO_SERVER_PATTERNS.some(pattern => stderrLower.includes(pattern))) {
        throw new TmuxNoServerError();
      }
      if (result.exitCode === SPAWN_FAILURE_EXIT_CODE || stderrLower.includes('command not found')) {
        throw new TmuxNotFoundError();
      }

      throw new TmuxError(
        result.stderr.trim() || `command failed with exit code ${result.exitCode}`,
        display,
        result.exitCode,
        result.stderr
      );
    }

    return result.stdout;
  }

  async version(): Promise<string> {
    const output = await this.run(['-V']);
    this.logger.debug(`Using ${output.trim()}`);
    return output.trim();
  }
}
