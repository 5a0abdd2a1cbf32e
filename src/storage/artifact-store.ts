/**
 * Artifact Store - restore artifacts as JSON files in a backup directory
 */

import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { basename, isAbsolute, join } from 'path';
import type { Logger } from '../utils/logger.js';
import { parseArtifact, serializeArtifact, type RestoreArtifact } from '../core/restore-artifact.js';

export interface ArtifactStoreConfig {
  directory: string;
}

export interface StoredArtifact {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

const ARTIFACT_PATTERN = /^backup-.+\.json$/;
const MAX_NAME_ATTEMPTS = 100;

export function artifactFileName(createdAt: string, attempt = 0): string {
  const stamp = createdAt.replace(/[:.]/g, '-');
  return attempt === 0 ? `backup-${stamp}.json` : `backup-${stamp}-${attempt}.json`;
}

const NAME_PARTS = /^backup-(.+Z)(?:-(\d+))?\.json$/;

/** Capture stamp and collision counter; unrecognised names sort by the whole name */
function nameOrder(name: string): { stamp: string; attempt: number } {
  const match = name.match(NAME_PARTS);
  if (!match) return { stamp: name, attempt: 0 };
  return { stamp: match[1] ?? name, attempt: Number.parseInt(match[2] ?? '0', 10) };
}

function newestFirst(a: { name: string }, b: { name: string }): number {
  const left = nameOrder(a.name);
  const right = nameOrder(b.name);
  if (left.stamp !== right.stamp) return left.stamp < right.stamp ? 1 : -1;
  return right.attempt - left.attempt;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class ArtifactStore {
  private readonly directory: string;

  constructor(
    private logger: Logger,
    config: ArtifactStoreConfig = { directory: './backups' }
  ) {
    this.directory = config.directory;
  }

  get location(): string {
    return this.directory;
  }

  async initialize(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    this.logger.debug(`Artifact store ready at ${this.directory}`);
  }

  /**
   * Write a new artifact file. Existing files are never overwritten.
   */
  async save(artifact: RestoreArtifact): Promise<string> {
    await this.initialize();
    const content = serializeArtifact(artifact);

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const path = join(this.directory, artifactFileName(artifact.createdAt, attempt));
      try {
        await writeFile(path, content, { encoding: 'utf8', flag: 'wx' });
        this.logger.info(`Saved backup to ${path}`);
        return path;
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }

    throw new Error(`could not find a free backup file name in ${this.directory}`);
  }

  /** Newest first */
  async list(): Promise<StoredArtifact[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const entries = await Promise.all(
      names
        .filter(name => ARTIFACT_PATTERN.test(name))
        .map(async name => {
          const path = join(this.directory, name);
          const info = await stat(path);
          return { name, path, sizeBytes: info.size, modifiedAt: info.mtime };
        })
    );

    // Stamps are ISO capture times, so string order is chronological; ties go to the later save
    return entries.sort(newestFirst);
  }

  /**
   * Load by path, or by bare file name inside the backup directory
   */
  async load(pathOrName: string): Promise<RestoreArtifact> {
    const path = isAbsolute(pathOrName) || basename(pathOrName) !== pathOrName
      ? pathOrName
      : join(this.directory, pathOrName);

    const content = await readFile(path, 'utf8');
    const artifact = parseArtifact(content);
    this.logger.debug(`Loaded backup ${path}`);
    return artifact;
  }

  async loadLatest(): Promise<{ path: string; artifact: RestoreArtifact } | null> {
    const [latest] = await this.list();
    if (!latest) return null;
    return { path: latest.path, artifact: await this.load(latest.path) };
  }
}
