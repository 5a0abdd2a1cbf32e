/**
 * Monitoring Tools - MCP tool handlers for inspection and pane metrics
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { MetricsSample, SessionMetricsView, ToolContext } from '../types/index.js';
import { toSnapshot } from '../core/pane-monitor.js';
import { jsonResult, validateArgs } from './tool-result.js';

// Validation schemas
export const InspectSchema = z.object({
  session: z.string().min(1).optional(),
});

export const MonitorSampleSchema = z.object({
  session: z.string().min(1).optional(),
  includeProcesses: z.boolean().optional().default(true),
});

export const MonitorSnapshotSchema = z.object({
  session: z.string().min(1).optional(),
  includeProcesses: z.boolean().optional().default(true),
});

export const MonitorPaneSchema = z.object({
  pane: z.string().min(1, 'Pane key is required (e.g. "dev:0.1")'),
  refresh: z.boolean().optional().default(false),
});

function project(
  sessions: SessionMetricsView[],
  options: { session?: string; includeProcesses: boolean }
): SessionMetricsView[] {
  return sessions
    .filter(session => !options.session || session.name === options.session)
    .map(session => options.includeProcesses ? session : {
      ...session,
      windows: session.windows.map(window => ({
        ...window,
        panes: window.panes.map(pane => ({ ...pane, processes: [] })),
      })),
    });
}

function findPane(sample: MetricsSample, key: string) {
  for (const session of sample.sessions) {
    for (const window of session.windows) {
      const pane = window.panes.find(candidate => candidate.key === key);
      if (pane) return pane;
    }
  }
  return undefined;
}

// Tool handlers
export async function handleInspect(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = validateArgs(InspectSchema, args, context.errorHandler);
  const { logger, inspector } = context;

  logger.debug('Inspecting tmux sessions');
  const tree = await inspector.inspect();
  const sessions = tree.sessions.filter(session => !validated.session || session.name === validated.session);

  return jsonResult({
    success: true,
    inspectedAt: tree.inspectedAt.toISOString(),
    sessionCount: sessions.length,
    sessions,
  });
}

export async function handleMonitorSample(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = validateArgs(MonitorSampleSchema, args, context.errorHandler);
  const { logger, monitor } = context;

  logger.debug('Running sampling cycle on request');
  const snapshot = toSnapshot(await monitor.runCycle());

  return jsonResult({
    success: true,
    sampledAt: snapshot.sampledAt,
    totals: snapshot.totals,
    sessions: project(snapshot.sessions, validated),
  });
}

export async function handleMonitorSnapshot(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = validateArgs(MonitorSnapshotSchema, args, context.errorHandler);
  const snapshot = context.monitor.getSnapshot();

  if (!snapshot) {
    return jsonResult({
      success: false,
      error: 'No sample taken yet; call monitor_sample first',
    });
  }

  return jsonResult({
    success: true,
    sampledAt: snapshot.sampledAt,
    totals: snapshot.totals,
    sessions: project(snapshot.sessions, validated),
  });
}

export async function handleMonitorPane(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = validateArgs(MonitorPaneSchema, args, context.errorHandler);
  const { monitor } = context;

  const cached = validated.refresh ? null : monitor.getSample();
  const sample = cached ?? await monitor.runCycle();
  const pane = findPane(sample, validated.pane);

  if (!pane) {
    return jsonResult({
      success: false,
      error: `Pane ${validated.pane} not found`,
    });
  }

  return jsonResult({
    success: true,
    sampledAt: sample.sampledAt.toISOString(),
    pane,
  });
}
