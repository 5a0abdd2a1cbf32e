/**
 * Shared helpers for tool handlers
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { ErrorHandler } from '../utils/errors.js';

export function jsonResult(payload: Record<string, unknown>, isError = false): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

export function validateArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown,
  errorHandler: ErrorHandler
): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const message = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw errorHandler.createValidationError(message);
  }
  return result.data;
}
