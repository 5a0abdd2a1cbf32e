/**
 * PaneTopServer - wires the monitor and backup engine behind an MCP stdio server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Logger } from './utils/logger.js';
import { ErrorHandler } from './utils/errors.js';
import { loadConfig, type ServerConfig } from './config.js';
import { TmuxClient } from './core/tmux-client.js';
import { TmuxInspector } from './core/tmux-inspector.js';
import { createProcessSource, type ProcessTableSource } from './core/process-table.js';
import { MetricsAggregator } from './core/metrics-aggregator.js';
import { PaneMonitor } from './core/pane-monitor.js';
import { TopologySnapshotter } from './core/topology-snapshotter.js';
import { Restorer } from './core/restorer.js';
import { ArtifactStore } from './storage/artifact-store.js';
import { registerTools } from './tools/index.js';
import type { ToolContext } from './types/index.js';

export const SERVER_NAME = 'panetop';
export const SERVER_VERSION = '0.1.0';

/** Every component, built from one configuration */
export interface Components {
  tmux: TmuxClient;
  inspector: TmuxInspector;
  processSource: ProcessTableSource;
  aggregator: MetricsAggregator;
  monitor: PaneMonitor;
  snapshotter: TopologySnapshotter;
  restorer: Restorer;
  artifactStore: ArtifactStore;
}

export function createComponents(config: ServerConfig, logger: Logger): Components {
  const tmux = new TmuxClient(logger.child('tmux'), {
    binary: config.tmuxBinary,
    socketName: config.tmuxSocket,
    timeoutMs: config.commandTimeoutMs,
  });
  const inspector = new TmuxInspector(logger.child('inspector'), tmux);
  const processSource = createProcessSource(config.processSource, logger.child('process'), {
    timeoutMs: config.commandTimeoutMs,
  });
  const aggregator = new MetricsAggregator(logger.child('metrics'));
  const monitor = new PaneMonitor(logger.child('monitor'), inspector, processSource, aggregator, {
    intervalMs: config.sampleIntervalMs,
  });

  return {
    tmux,
    inspector,
    processSource,
    aggregator,
    monitor,
    snapshotter: new TopologySnapshotter(logger.child('backup')),
    restorer: new Restorer(logger.child('restore'), tmux, inspector),
    artifactStore: new ArtifactStore(logger.child('store'), { directory: config.backupDirectory }),
  };
}

export class PaneTopServer {
  private server: Server;
  private logger: Logger;
  private errorHandler: ErrorHandler;
  private components: Components;
  private config: ServerConfig;

  constructor(config: ServerConfig = loadConfig()) {
    this.config = config;
    this.logger = new Logger(config.logLevel);
    this.errorHandler = new ErrorHandler(this.logger);
    this.components = createComponents(config, this.logger);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupErrorHandling();
  }

  async initialize(): Promise<void> {
    try {
      this.logger.info('Starting panetop initialization...');

      await this.components.artifactStore.initialize();

      try {
        await this.components.tmux.version();
      } catch (error) {
        this.logger.warn('tmux is not usable yet; inspection will fail until it is:', error);
      }

      this.components.monitor.on('cycle-error', () => {
        this.logger.debug('Sampling continues after a failed cycle');
      });

      const toolContext: ToolContext = {
        logger: this.logger,
        errorHandler: this.errorHandler,
        inspector: this.components.inspector,
        monitor: this.components.monitor,
        processSource: this.components.processSource,
        snapshotter: this.components.snapshotter,
        restorer: this.components.restorer,
        artifactStore: this.components.artifactStore,
      };

      await registerTools(this.server, toolContext);

      this.logger.info('panetop initialized successfully');
      this.logger.info('Server configuration:', {
        tmuxBinary: this.config.tmuxBinary,
        tmuxSocket: this.config.tmuxSocket ?? '(default)',
        sampleInterval: `${this.config.sampleIntervalMs}ms`,
        commandTimeout: `${this.config.commandTimeoutMs}ms`,
        processSource: this.config.processSource,
        backupDirectory: this.config.backupDirectory,
      });
    } catch (error) {
      this.logger.error('Failed to initialize server:', error);
      throw error;
    }
  }

  private setupErrorHandling(): void {
    process.on('uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      this.exitAfterShutdown(1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
      this.exitAfterShutdown(1);
    });

    process.on('SIGINT', () => {
      this.logger.info('Received SIGINT, shutting down gracefully...');
      this.exitAfterShutdown(0);
    });

    process.on('SIGTERM', () => {
      this.logger.info('Received SIGTERM, shutting down gracefully...');
      this.exitAfterShutdown(0);
    });
  }

  private exitAfterShutdown(code: number): void {
    void this.shutdown().finally(() => process.exit(code));
  }

  async start(): Promise<void> {
    try {
      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      this.components.monitor.start();
      this.logger.info('panetop MCP server listening on stdio');
    } catch (error) {
      this.logger.error('Failed to start server:', error);
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    try {
      this.logger.info('Shutting down panetop...');
      this.components.monitor.stop();
      await this.server.close();
      this.logger.info('panetop shutdown complete');
    } catch (error) {
      this.logger.error('Error during shutdown:', error);
    }
  }
}
