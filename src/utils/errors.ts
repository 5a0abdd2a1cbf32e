/**
 * Error types and MCP error handling for panetop
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger.js';
import type { RestoreStep } from '../core/restore-plan.js';

/** tmux unreachable, timed out, or returned output we cannot parse */
export class InspectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InspectionError';
  }
}

/** A process left the table between enumeration and read. Never surfaced. */
export class CorrelationGap extends Error {
  constructor(readonly pid: number) {
    super(`process ${pid} disappeared during traversal`);
    this.name = 'CorrelationGap';
  }
}

/** Reading one process failed; it contributes zero to the cycle */
export class SampleReadFailure extends Error {
  constructor(
    readonly pid: number,
    options?: { cause?: unknown }
  ) {
    super(`could not read process ${pid}`, options);
    this.name = 'SampleReadFailure';
  }
}

export class ConflictError extends Error {
  constructor(readonly sessionName: string) {
    super(`session '${sessionName}' already exists`);
    this.name = 'ConflictError';
  }
}

export class RestoreStepFailure extends Error {
  constructor(
    readonly step: RestoreStep,
    options?: { cause?: unknown }
  ) {
    super(`restore step ${step.kind} failed for session '${step.session}': ${describeCause(options?.cause)}`, options);
    this.name = 'RestoreStepFailure';
  }
}

export class OperationCancelledError extends Error {
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

export class ErrorHandler {
  constructor(private logger: Logger) {}

  handleToolError(error: unknown, toolName: string): CallToolResult {
    this.logger.error(`Tool ${toolName} error:`, error);

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return {
      content: [
        {
          type: 'text' as const,
          text: `Tool error: ${message}`,
        },
      ],
      isError: true,
    };
  }

  createValidationError(message: string): McpError {
    return new McpError(ErrorCode.InvalidParams, message);
  }
}
