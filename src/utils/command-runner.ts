/**
 * CommandRunner - bounded execution of external binaries
 *
 * Arguments go straight to execFile, never through a shell, so callers
 * pass them unescaped. Every invocation has a timeout.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { Logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** The timeout elapsed and the child was killed */
  timedOut: boolean;
}

export interface CommandOptions {
  /** Working directory for command execution */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
}

export interface CommandRunnerOptions {
  /** Whether to log all executed commands (default: true) */
  logCommands?: boolean;
  /** Default timeout for commands (default: 5s) */
  defaultTimeout?: number;
  /** Largest stdout/stderr accepted, in bytes */
  maxBuffer?: number;
}

/** Exit code reported when the binary could not be spawned at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export class CommandRunner {
  private options: Required<CommandRunnerOptions>;

  constructor(
    private logger: Logger,
    options: CommandRunnerOptions = {}
  ) {
    this.options = {
      logCommands: true,
      defaultTimeout: 5000,
      maxBuffer: 16 * 1024 * 1024,
      ...options,
    };
  }

  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {}
  ): Promise<CommandResult> {
    if (this.options.logCommands) {
      this.logger.debug(`Executing command: ${this.formatCommandForDisplay(command, args)}`);
    }

    try {
      const result = await execFileAsync(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        timeout: options.timeout ?? this.options.defaultTimeout,
        maxBuffer: this.options.maxBuffer,
        encoding: 'utf8',
      });

      return {
        stdout: result.stdout,
        stderr: result.stderr,
        exitCode: 0,
        timedOut: false,
      };
    } catch (error: unknown) {
      return this.toFailedResult(error);
    }
  }

  /**
   * Quote arguments containing shell metacharacters, for logs and messages only
   */
  formatCommandForDisplay(command: string, args: string[] = []): string {
    const safeArgs = args.map(arg => {
      if (arg === '' || /[\s"'`$;&|<>(){}[\]\\*?]/.test(arg)) {
        return `"${arg.replace(/(["\\$`])/g, '\\$1')}"`;
      }
      return arg;
    });

    return [command, ...safeArgs].join(' ');
  }

  private toFailedResult(error: unknown): CommandResult {
    if (!(error instanceof Error)) {
      return { stdout: '', stderr: String(error), exitCode: 1, timedOut: false };
    }

    const code = 'code' in error ? error.code : undefined;
    const killed = 'killed' in error && error.killed === true;
    const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
    const stderr = 'stderr' in error && typeof error.stderr === 'string' && error.stderr
      ? error.stderr
      : error.message;

    if (code === 'ENOENT') {
      return { stdout, stderr, exitCode: SPAWN_FAILURE_EXIT_CODE, timedOut: false };
    }

    return {
      stdout,
      stderr,
      exitCode: typeof code === 'number' ? code : 1,
      timedOut: killed && code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
    };
  }
}
