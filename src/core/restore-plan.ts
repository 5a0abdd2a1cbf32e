/**
 * Restore plan - the strictly ordered command queue that rebuilds an artifact
 *
 * Each split is relative to the pane it splits from, so steps are a flat
 * list replayed front to back, never a tree walked in arbitrary order.
 * Targets are positional (window/pane position in the artifact) and are
 * bound to the ids tmux prints when the objects are created.
 */

import type { ArtifactSession, RestoreArtifact } from './restore-artifact.js';

interface StepBase {
  session: string;
  /** Position of the window within the artifact session */
  window: number;
}

export interface NewSessionStep extends StepBase {
  kind: 'new-session';
  windowName: string;
  cwd: string;
  size?: { width: number; height: number };
}

export interface NewWindowStep extends StepBase {
  kind: 'new-window';
  windowName: string;
  cwd: string;
}

export interface SplitPaneStep extends StepBase {
  kind: 'split-pane';
  /** Position of the new pane */
  pane: number;
  /** Position of the pane being split */
  from: number;
  cwd: string;
}

export interface SelectLayoutStep extends StepBase {
  kind: 'select-layout';
  layout: string;
}

/**
 * Evens out pane sizes between splits. Each split halves one pane, so
 * without it the next split runs out of rows after a handful of panes.
 */
export interface RebalanceStep extends StepBase {
  kind: 'rebalance';
}

export const REBALANCE_LAYOUT = 'tiled';

export interface SendKeysStep extends StepBase {
  kind: 'send-keys';
  pane: number;
  keys: string;
  /** Literal text (send-keys -l) as opposed to a key name such as Enter */
  literal: boolean;
}

export type StructureStep = NewSessionStep | NewWindowStep | SplitPaneStep | RebalanceStep | SelectLayoutStep;
export type RestoreStep = StructureStep | SendKeysStep;

export interface SessionPlan {
  session: string;
  windowCount: number;
  /** Creates the session, its windows and splits, then applies layouts */
  structure: StructureStep[];
  /** Re-injects pane commands once the structure exists */
  input: SendKeysStep[];
}

export interface RestorePlan {
  sessions: SessionPlan[];
}

/** Read "WxH" from a layout such as "b25f,204x50,0,0{...}" */
export function layoutSize(layout: string): { width: number; height: number } | undefined {
  const match = layout.match(/^[0-9a-f]{4},(\d+)x(\d+),/);
  if (!match) return undefined;
  return { width: Number.parseInt(match[1] ?? '0', 10), height: Number.parseInt(match[2] ?? '0', 10) };
}

export function planSession(entry: ArtifactSession): SessionPlan {
  const structure: StructureStep[] = [];
  const input: SendKeysStep[] = [];
  const session = entry.name;

  entry.windows.forEach((window, w) => {
    const firstPane = window.panes[0];
    const cwd = firstPane?.cwd ?? '';

    if (w === 0) {
      structure.push({ kind: 'new-session', session, window: w, windowName: window.name, cwd, size: layoutSize(window.layout) });
    } else {
      structure.push({ kind: 'new-window', session, window: w, windowName: window.name, cwd });
    }

    for (let p = 1; p < window.panes.length; p++) {
      if (p > 1) structure.push({ kind: 'rebalance', session, window: w });
      structure.push({ kind: 'split-pane', session, window: w, pane: p, from: p - 1, cwd: window.panes[p]?.cwd ?? cwd });
    }

    structure.push({ kind: 'select-layout', session, window: w, layout: window.layout });

    window.panes.forEach((pane, p) => {
      if (pane.command.trim() === '') return;
      input.push({ kind: 'send-keys', session, window: w, pane: p, keys: pane.command, literal: true });
      input.push({ kind: 'send-keys', session, window: w, pane: p, keys: 'Enter', literal: false });
    });
  });

  return { session, windowCount: entry.windows.length, structure, input };
}

export function planRestore(artifact: RestoreArtifact): RestorePlan {
  return { sessions: artifact.sessions.map(planSession) };
}

export function windowRef(window: number): string {
  return `w${window}`;
}

export function paneRef(window: number, pane: number): string {
  return `w${window}p${pane}`;
}

export function shellQuote(value: string): string {
  if (value !== '' && /^[A-Za-z0-9_\-./:=@%+,]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

const CREATED_IDS_FORMAT = "'#{window_id} #{pane_id}'";

/**
 * Render a plan as a POSIX shell script. Created ids are captured into
 * shell variables, the same way the restorer binds them at run time.
 */
export function renderRestoreScript(plan: RestorePlan, tmuxCommand = 'tmux'): string {
  const lines: string[] = ['#!/bin/sh', '# Generated by panetop: recreates tmux sessions', 'set -e', ''];
  const tmux = tmuxCommand;

  for (const sessionPlan of plan.sessions) {
    const name = shellQuote(sessionPlan.session);
    lines.push(`# session ${sessionPlan.session}`);
    lines.push(`if ${tmux} has-session -t ${shellQuote(`=${sessionPlan.session}`)} 2>/dev/null; then`);
    lines.push(`  echo ${shellQuote(`session '${sessionPlan.session}' already exists, skipping`)} >&2`);
    lines.push('else');

    for (const step of sessionPlan.structure) {
      switch (step.kind) {
        case 'new-session': {
          const size = step.size ? ` -x ${step.size.width} -y ${step.size.height}` : '';
          lines.push(`  set -- $(${tmux} new-session -d -s ${name} -n ${shellQuote(step.windowName)} -c ${shellQuote(step.cwd)}${size} -P -F ${CREATED_IDS_FORMAT})`);
          lines.push(`  ${windowRef(step.window)}=$1; ${paneRef(step.window, 0)}=$2`);
          break;
        }
        case 'new-window':
          lines.push(`  set -- $(${tmux} new-window -d -t ${shellQuote(`=${sessionPlan.session}:`)} -n ${shellQuote(step.windowName)} -c ${shellQuote(step.cwd)} -P -F ${CREATED_IDS_FORMAT})`);
          lines.push(`  ${windowRef(step.window)}=$1; ${paneRef(step.window, 0)}=$2`);
          break;
        case 'split-pane':
          lines.push(`  ${paneRef(step.window, step.pane)}=$(${tmux} split-window -d -t "$${paneRef(step.window, step.from)}" -c ${shellQuote(step.cwd)} -P -F '#{pane_id}')`);
          break;
        case 'rebalance':
          lines.push(`  ${tmux} select-layout -t "$${windowRef(step.window)}" ${REBALANCE_LAYOUT}`);
          break;
        case 'select-layout':
          lines.push(`  ${tmux} select-layout -t "$${windowRef(step.window)}" ${shellQuote(step.layout)}`);
          break;
      }
    }

    for (const step of sessionPlan.input) {
      const target = `"$${paneRef(step.window, step.pane)}"`;
      lines.push(step.literal
        ? `  ${tmux} send-keys -t ${target} -l -- ${shellQuote(step.keys)}`
        : `  ${tmux} send-keys -t ${target} ${step.keys}`);
    }

    lines.push('fi', '');
  }

  return lines.join('\n');
}
