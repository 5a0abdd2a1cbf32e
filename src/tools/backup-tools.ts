/**
 * Backup Tools - MCP tool handlers for capturing and restoring session topology
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolContext } from '../types/index.js';
import { readProcessTable, type ProcessTableSnapshot } from '../core/process-table.js';
import { countPanes, type RestoreArtifact } from '../core/restore-artifact.js';
import { planRestore, renderRestoreScript } from '../core/restore-plan.js';
import type { RestoreOutcome } from '../core/restorer.js';
import { describeCause } from '../utils/errors.js';
import { jsonResult, validateArgs } from './tool-result.js';

// Validation schemas
export const BackupCreateSchema = z.object({
  sessions: z.array(z.string().min(1)).optional(),
  withCommands: z.boolean().optional().default(true),
});

export const BackupListSchema = z.object({
  limit: z.number().int().min(1).max(500).optional().default(50),
});

export const BackupRestoreSchema = z.object({
  path: z.string().min(1).optional(),
  dryRun: z.boolean().optional().default(false),
});

/**
 * Read the process table for command capture. Without it the snapshot falls
 * back to tmux's own command names, so a failure here is not fatal.
 */
export async function readTableForCapture(context: ToolContext): Promise<ProcessTableSnapshot | undefined> {
  try {
    return await readProcessTable(context.processSource);
  } catch (error) {
    context.logger.warn(`Process table unavailable, capturing tmux command names only: ${describeCause(error)}`);
    return undefined;
  }
}

export function summarizeOutcome(outcome: RestoreOutcome) {
  return {
    succeeded: outcome.succeeded,
    failed: outcome.failed,
    results: outcome.results.map(result => ({
      session: result.session,
      status: result.status,
      windows: result.windows,
      stepsCompleted: result.stepsCompleted,
      ...(result.error ? { error: result.error.message, errorType: result.error.name } : {}),
    })),
  };
}

async function resolveArtifact(
  context: ToolContext,
  path: string | undefined
): Promise<{ path: string; artifact: RestoreArtifact } | null> {
  if (path) {
    return { path, artifact: await context.artifactStore.load(path) };
  }
  return context.artifactStore.loadLatest();
}

// Tool handlers
export async function handleBackupCreate(
  args: unknown,
  context: ToolContext,
  signal?: AbortSignal
): Promise<CallToolResult> {
  const validated = validateArgs(BackupCreateSchema, args, context.errorHandler);
  const { logger, inspector, snapshotter, artifactStore } = context;

  logger.info(`Creating backup${validated.sessions ? ` of ${validated.sessions.join(', ')}` : ''}`);

  const tree = await inspector.inspect();
  const table = validated.withCommands ? await readTableForCapture(context) : undefined;
  const artifact = snapshotter.capture(tree, table, {
    sessions: validated.sessions,
    selfPid: process.pid,
    signal,
  });

  if (artifact.sessions.length === 0) {
    return jsonResult({
      success: false,
      error: validated.sessions ? 'None of the requested sessions exist' : 'No tmux sessions to back up',
    });
  }

  const path = await artifactStore.save(artifact);

  return jsonResult({
    success: true,
    path,
    createdAt: artifact.createdAt,
    ...countPanes(artifact),
    sessionNames: artifact.sessions.map(session => session.name),
  });
}

export async function handleBackupList(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = validateArgs(BackupListSchema, args, context.errorHandler);
  const entries = await context.artifactStore.list();

  return jsonResult({
    success: true,
    directory: context.artifactStore.location,
    total: entries.length,
    backups: entries.slice(0, validated.limit).map(entry => ({
      name: entry.name,
      path: entry.path,
      sizeBytes: entry.sizeBytes,
      modifiedAt: entry.modifiedAt.toISOString(),
    })),
  });
}

export async function handleBackupRestore(
  args: unknown,
  context: ToolContext,
  signal?: AbortSignal
): Promise<CallToolResult> {
  const validated = validateArgs(BackupRestoreSchema, args, context.errorHandler);
  const { logger, restorer } = context;

  const source = await resolveArtifact(context, validated.path);
  if (!source) {
    return jsonResult({
      success: false,
      error: `No backups found in ${context.artifactStore.location}`,
    });
  }

  if (validated.dryRun) {
    const plan = planRestore(source.artifact);
    return jsonResult({
      success: true,
      dryRun: true,
      path: source.path,
      plan,
      script: renderRestoreScript(plan),
    });
  }

  logger.info(`Restoring from ${source.path}`);
  const outcome = await restorer.restore(source.artifact, { signal });

  return jsonResult({
    success: outcome.failed.length === 0,
    path: source.path,
    ...summarizeOutcome(outcome),
  });
}
