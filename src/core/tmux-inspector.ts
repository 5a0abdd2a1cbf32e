/**
 * Tmux Inspector - read-only view of the sessions/windows/panes tree
 */

import type { SessionTree, TmuxPane, TmuxSession, TmuxWindow } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { InspectionError, describeCause } from '../utils/errors.js';
import { TmuxNoServerError, type Multiplexer } from './tmux-client.js';

export const FIELD_SEPARATOR = '\t';

// One list-panes -a row carries everything, so the tree comes from a single query
export const PANE_FIELDS = [
  'session_id',
  'session_name',
  'session_created',
  'session_attached',
  'window_id',
  'window_index',
  'window_name',
  'window_layout',
  'window_active',
  'pane_id',
  'pane_index',
  'pane_pid',
  'pane_active',
  'pane_left',
  'pane_top',
  'pane_width',
  'pane_height',
  'pane_current_command',
  'pane_current_path',
] as const;

export type PaneField = (typeof PANE_FIELDS)[number];

// pane_current_path is last and takes any overflow; the other free-text fields have tabs replaced
const TAB_FREE_FIELDS: ReadonlySet<PaneField> = new Set<PaneField>(['session_name', 'window_name', 'pane_current_command']);

export const PANE_FORMAT = PANE_FIELDS
  .map(field => (TAB_FREE_FIELDS.has(field) ? `#{s/${FIELD_SEPARATOR}/ /:${field}}` : `#{${field}}`))
  .join(FIELD_SEPARATOR);

export function paneKey(sessionName: string, windowIndex: number, paneIndex: number): string {
  return `${sessionName}:${windowIndex}.${paneIndex}`;
}

function toInt(value: string, field: string, line: number): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InspectionError(`malformed tmux output at line ${line}: ${field} is '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse list-panes -a output into a session tree.
 * Sessions keep output order; windows and panes are ordered by index.
 */
export function parsePaneRows(output: string, inspectedAt: Date = new Date()): SessionTree {
  const sessions = new Map<string, TmuxSession>();
  const windows = new Map<string, TmuxWindow>();

  const lines = output.split('\n');
  lines.forEach((line, offset) => {
    if (line.trim() === '') return;
    const lineNumber = offset + 1;

    const split = line.split(FIELD_SEPARATOR);
    if (split.length < PANE_FIELDS.length) {
      throw new InspectionError(
        `malformed tmux output at line ${lineNumber}: expected ${PANE_FIELDS.length} fields, got ${split.length}`
      );
    }
    const last = PANE_FIELDS.length - 1;
    const parts = [...split.slice(0, last), split.slice(last).join(FIELD_SEPARATOR)];

    const field = (name: PaneField): string => parts[PANE_FIELDS.indexOf(name)] ?? '';
    const row = {
      session_id: field('session_id'),
      session_name: field('session_name'),
      session_created: field('session_created'),
      session_attached: field('session_attached'),
      window_id: field('window_id'),
      window_index: field('window_index'),
      window_name: field('window_name'),
      window_layout: field('window_layout'),
      window_active: field('window_active'),
      pane_id: field('pane_id'),
      pane_index: field('pane_index'),
      pane_pid: field('pane_pid'),
      pane_active: field('pane_active'),
      pane_left: field('pane_left'),
      pane_top: field('pane_top'),
      pane_width: field('pane_width'),
      pane_height: field('pane_height'),
      pane_current_command: field('pane_current_command'),
      pane_current_path: field('pane_current_path'),
    } satisfies Record<PaneField, string>;

    if (!row.session_name || !row.window_id || !row.pane_id) {
      throw new InspectionError(`malformed tmux output at line ${lineNumber}: missing identifiers`);
    }

    let session = sessions.get(row.session_name);
    if (!session) {
      session = {
        name: row.session_name,
        id: row.session_id,
        created: new Date(toInt(row.session_created, 'session_created', lineNumber) * 1000),
        attached: row.session_attached !== '0' && row.session_attached !== '',
        windows: [],
      };
      sessions.set(session.name, session);
    }

    const windowIndex = toInt(row.window_index, 'window_index', lineNumber);
    const windowKey = `${session.name}:${row.window_id}`;
    let window = windows.get(windowKey);
    if (!window) {
      window = {
        id: row.window_id,
        index: windowIndex,
        name: row.window_name,
        layout: row.window_layout,
        active: row.window_active === '1',
        panes: [],
      };
      windows.set(windowKey, window);
      session.windows.push(window);
    }

    const paneIndex = toInt(row.pane_index, 'pane_index', lineNumber);
    const pane: TmuxPane = {
      id: row.pane_id,
      key: paneKey(session.name, windowIndex, paneIndex),
      sessionName: session.name,
      windowIndex,
      index: paneIndex,
      pid: toInt(row.pane_pid, 'pane_pid', lineNumber),
      cwd: row.pane_current_path,
      command: row.pane_current_command,
      active: row.pane_active === '1',
      left: toInt(row.pane_left, 'pane_left', lineNumber),
      top: toInt(row.pane_top, 'pane_top', lineNumber),
      width: toInt(row.pane_width, 'pane_width', lineNumber),
      height: toInt(row.pane_height, 'pane_height', lineNumber),
    };
    window.panes.push(pane);
  });

  for (const session of sessions.values()) {
    session.windows.sort((a, b) => a.index - b.index);
    for (const window of session.windows) {
      window.panes.sort((a, b) => a.index - b.index);
    }
  }

  return { inspectedAt, sessions: Array.from(sessions.values()) };
}

export class TmuxInspector {
  constructor(
    private logger: Logger,
    private tmux: Multiplexer
  ) {}

  async inspect(): Promise<SessionTree> {
    const output = await this.query(['list-panes', '-a', '-F', PANE_FORMAT]);
    if (output === null) {
      this.logger.debug('No tmux server running, returning empty tree');
      return { inspectedAt: new Date(), sessions: [] };
    }

    const tree = parsePaneRows(output);
    this.logger.debug(`Inspected ${tree.sessions.length} sessions`);
    return tree;
  }

  async listSessionNames(): Promise<string[]> {
    const output = await this.query(['list-sessions', '-F', '#{session_name}']);
    if (output === null) return [];

    // Names are taken verbatim; tmux allows leading and trailing spaces
    return output.split('\n').filter(line => line.length > 0);
  }

  /**
   * Run a read-only query. null means no server, which is an empty result.
   */
  private async query(args: string[]): Promise<string | null> {
    try {
      return await this.tmux.run(args);
    } catch (error) {
      if (error instanceof TmuxNoServerError) {
        return null;
      }
      throw new InspectionError(`tmux ${args[0]} failed: ${describeCause(error)}`, { cause: error });
    }
  }
}
