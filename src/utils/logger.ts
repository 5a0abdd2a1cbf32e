/**
 * Logger - leveled logging to stderr
 *
 * stdout belongs to the MCP stdio transport, so nothing here may write to it.
 */

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

export type LogSink = (line: string, ...args: unknown[]) => void;

export class Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.INFO,
    private scope?: string,
    private sink: LogSink = (line, ...args) => console.error(line, ...args)
  ) {}

  /**
   * Create a logger that shares level and sink but prefixes a component name
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, nested, this.sink);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    this.sink(`${timestamp} ${level.toUpperCase()}${scope} ${message}`, ...args);
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = value?.toLowerCase();
  for (const level of Object.values(LogLevel)) {
    if (level === normalized) return level;
  }
  return fallback;
}
