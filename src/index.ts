#!/usr/bin/env node

/**
 * panetop - entry point
 *
 * Without a mode flag this runs the MCP server on stdio:
 * - Pane to process correlation with CPU and memory per pane, window and session
 * - Session layout backup to JSON and ordered restore
 *
 * With --backup, --restore, --plan or --export it runs once and exits.
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { PaneTopServer, createComponents } from './server.js';
import { CliUsageError, USAGE, parseCliArgs, runCommand } from './cli.js';
import { loadConfig } from './config.js';
import { Logger, parseLogLevel } from './utils/logger.js';

async function main(argv: string[]): Promise<number | null> {
  const command = parseCliArgs(argv);
  const config = loadConfig();

  if (command.mode === 'serve') {
    const server = new PaneTopServer(config);
    await server.initialize();
    await server.start();
    return null;
  }

  const logger = new Logger(config.logLevel);
  const components = createComponents(config, logger);
  const abort = new AbortController();
  process.once('SIGINT', () => abort.abort());

  return runCommand(command, {
    logger,
    ...components,
    write: text => process.stdout.write(text),
    signal: abort.signal,
  });
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then(code => {
      if (code !== null) process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof CliUsageError) {
        console.error(`${error.message}\n\n${USAGE}`);
        process.exitCode = 2;
        return;
      }
      new Logger(parseLogLevel(process.env.LOG_LEVEL)).error('panetop failed:', error);
      process.exitCode = 1;
    });
}

export { PaneTopServer };
export * from './types/index.js';
export * from './core/index.js';
export * from './utils/index.js';
