/**
 * MCP Tools Registration - tool dispatch and JSON Schema conversion
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolContext } from '../types/index.js';

import {
  handleInspect,
  handleMonitorPane,
  handleMonitorSample,
  handleMonitorSnapshot,
  InspectSchema,
  MonitorPaneSchema,
  MonitorSampleSchema,
  MonitorSnapshotSchema,
} from './monitor-tools.js';

import {
  handleBackupCreate,
  handleBackupList,
  handleBackupRestore,
  BackupCreateSchema,
  BackupListSchema,
  BackupRestoreSchema,
} from './backup-tools.js';

type ToolHandler = (args: unknown, context: ToolContext, signal?: AbortSignal) => Promise<CallToolResult>;

interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  handler: ToolHandler;
}

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'tmux_inspect',
    description: 'List tmux sessions, windows and panes with layouts, pids and working directories',
    schema: InspectSchema,
    handler: handleInspect,
  },
  {
    name: 'monitor_sample',
    description: 'Run a sampling cycle now and return CPU and memory per pane, window and session',
    schema: MonitorSampleSchema,
    handler: handleMonitorSample,
  },
  {
    name: 'monitor_snapshot',
    description: 'Return the most recent sample without sampling again',
    schema: MonitorSnapshotSchema,
    handler: handleMonitorSnapshot,
  },
  {
    name: 'monitor_pane',
    description: 'Show the processes and resource usage of one pane by key (session:window.pane)',
    schema: MonitorPaneSchema,
    handler: handleMonitorPane,
  },
  {
    name: 'backup_create',
    description: 'Capture session layouts and pane commands into a backup file',
    schema: BackupCreateSchema,
    handler: handleBackupCreate,
  },
  {
    name: 'backup_list',
    description: 'List stored backups, newest first',
    schema: BackupListSchema,
    handler: handleBackupList,
  },
  {
    name: 'backup_restore',
    description: 'Recreate sessions from a backup (latest by default); dryRun returns the plan and a shell script',
    schema: BackupRestoreSchema,
    handler: handleBackupRestore,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a zod object schema into the inputSchema shape tools/list expects
 */
export function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const converted: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = isRecord(converted) && isRecord(converted.properties) ? converted.properties : {};
  const required = isRecord(converted) && Array.isArray(converted.required)
    ? converted.required.filter((entry): entry is string => typeof entry === 'string')
    : [];

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

export async function registerTools(server: Server, context: ToolContext): Promise<void> {
  const { logger, errorHandler } = context;
  const handlers = new Map(TOOL_DEFINITIONS.map(tool => [tool.name, tool.handler]));

  logger.info(`Registering ${TOOL_DEFINITIONS.length} MCP tools...`);

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const handler = handlers.get(name);

    if (!handler) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    try {
      return await handler(args, context, extra.signal);
    } catch (error) {
      if (error instanceof McpError) throw error;
      return errorHandler.handleToolError(error, name);
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOL_DEFINITIONS.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: toInputSchema(tool.schema),
      })),
    };
  });

  logger.info(`Registered ${TOOL_DEFINITIONS.length} MCP tools`);
}
