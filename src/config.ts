/**
 * Configuration - environment variables and overrides, validated with zod
 */

import { z } from 'zod';
import { LogLevel } from './utils/logger.js';

const integerFromEnv = (minimum: number, fallback: number) =>
  z.coerce.number().int().min(minimum).default(fallback);

export const ConfigSchema = z.object({
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  tmuxBinary: z.string().min(1).default('tmux'),
  tmuxSocket: z.string().min(1).optional(),
  commandTimeoutMs: integerFromEnv(100, 5000),
  sampleIntervalMs: integerFromEnv(250, 2000),
  backupDirectory: z.string().min(1).default('./backups'),
  processSource: z.enum(['auto', 'procfs', 'ps']).default('auto'),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<z.input<typeof ConfigSchema>>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const ENV_KEYS = {
  logLevel: 'LOG_LEVEL',
  tmuxBinary: 'PANETOP_TMUX_BINARY',
  tmuxSocket: 'PANETOP_TMUX_SOCKET',
  commandTimeoutMs: 'PANETOP_COMMAND_TIMEOUT_MS',
  sampleIntervalMs: 'PANETOP_SAMPLE_INTERVAL_MS',
  backupDirectory: 'PANETOP_BACKUP_DIRECTORY',
  processSource: 'PANETOP_PROCESS_SOURCE',
} as const satisfies Record<keyof ServerConfig, string>;

/**
 * Build the configuration from the environment, with explicit overrides on top.
 * Empty variables count as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ServerConfig {
  const fromEnv: Record<string, string | undefined> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    fromEnv[key] = value === '' ? undefined : value;
  }
  if (fromEnv.logLevel !== undefined) {
    fromEnv.logLevel = fromEnv.logLevel.toLowerCase();
  }

  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const result = ConfigSchema.safeParse({ ...fromEnv, ...defined });

  if (!result.success) {
    const details = result.error.issues
      .map(issue => {
        const key = issue.path[0];
        const variable = typeof key === 'string' ? envName(key) : String(key);
        return `${variable}: ${issue.message}`;
      })
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }

  return result.data;
}

function envName(key: string): string {
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    if (field === key) return variable;
  }
  return key;
}
