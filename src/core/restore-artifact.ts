/**
 * Restore artifact - portable description of session topology and pane commands
 */

import { z } from 'zod';

export const ARTIFACT_VERSION = 1;

export const ArtifactPaneSchema = z.object({
  index: z.number().int().min(0),
  cwd: z.string(),
  command: z.string(),
});

export const ArtifactWindowSchema = z.object({
  index: z.number().int().min(0),
  name: z.string(),
  layout: z.string().min(1, 'Layout descriptor is required'),
  panes: z.array(ArtifactPaneSchema).min(1, 'A window has at least one pane'),
});

export const ArtifactSessionSchema = z.object({
  name: z.string().min(1, 'Session name is required'),
  windows: z.array(ArtifactWindowSchema).min(1, 'A session has at least one window'),
});

export const RestoreArtifactSchema = z.object({
  version: z.literal(ARTIFACT_VERSION),
  createdAt: z.string().datetime(),
  hostname: z.string().optional(),
  sessions: z.array(ArtifactSessionSchema),
});

export type ArtifactPane = Readonly<z.infer<typeof ArtifactPaneSchema>>;
export type ArtifactWindow = Readonly<Omit<z.infer<typeof ArtifactWindowSchema>, 'panes'> & { panes: readonly ArtifactPane[] }>;
export type ArtifactSession = Readonly<Omit<z.infer<typeof ArtifactSessionSchema>, 'windows'> & { windows: readonly ArtifactWindow[] }>;
export type RestoreArtifact = Readonly<Omit<z.infer<typeof RestoreArtifactSchema>, 'sessions'> & { sessions: readonly ArtifactSession[] }>;

export class ArtifactFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArtifactFormatError';
  }
}

/**
 * Freeze an artifact and everything under it
 */
export function freezeArtifact(artifact: z.infer<typeof RestoreArtifactSchema>): RestoreArtifact {
  for (const session of artifact.sessions) {
    for (const window of session.windows) {
      window.panes.forEach(pane => Object.freeze(pane));
      Object.freeze(window.panes);
      Object.freeze(window);
    }
    Object.freeze(session.windows);
    Object.freeze(session);
  }
  Object.freeze(artifact.sessions);
  return Object.freeze(artifact);
}

export function serializeArtifact(artifact: RestoreArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

export function parseArtifact(content: string): RestoreArtifact {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ArtifactFormatError('restore artifact is not valid JSON', { cause: error });
  }

  const result = RestoreArtifactSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ArtifactFormatError(`invalid restore artifact${where}: ${issue?.message ?? 'unknown issue'}`, {
      cause: result.error,
    });
  }

  return freezeArtifact(result.data);
}

export function countPanes(artifact: RestoreArtifact): { sessions: number; windows: number; panes: number } {
  let windows = 0;
  let panes = 0;
  for (const session of artifact.sessions) {
    windows += session.windows.length;
    for (const window of session.windows) {
      panes += window.panes.length;
    }
  }
  return { sessions: artifact.sessions.length, windows, panes };
}
