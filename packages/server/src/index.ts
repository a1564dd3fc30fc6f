/**
 * kuberoute Server
 *
 * HTTP trigger for reconciliation passes plus the Kubernetes, DNS and
 * status collaborators it drives.
 * @module @kuberoute/server
 */

import http from 'node:http';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';
import { createServiceLogger, errorMessage, type Logger, type ServerSettings } from '@kuberoute/shared';
import { createApiRouter, TriggerState, type CycleRunner } from './api/router.js';
import { loadConfig } from './config.js';
import { createRuntime, type Runtime } from './runtime.js';

/**
 * Server instance
 */
export interface ServerInstance {
  app: Express;
  httpServer: http.Server;
  state: TriggerState;
  settings: ServerSettings;
  /** Start listening */
  start: () => Promise<void>;
  /** Stop listening */
  stop: () => Promise<void>;
}

/**
 * Server creation options
 */
export interface CreateServerOptions {
  cycle: CycleRunner;
  settings: ServerSettings;
  /** Enable request logging (default: true) */
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Create and configure the trigger server
 */
export function createServer(options: CreateServerOptions): ServerInstance {
  const { cycle, settings, enableLogging = true } = options;
  const logger = options.logger ?? createServiceLogger({ level: 'info' }, { component: 'server' });
  const state = new TriggerState();

  const app = express();
  app.set('trust proxy', true);
  app.use(express.json({ limit: '1mb' }));
  app.use(createApiRouter({ cycle, state, enableLogging, logger: logger.child({ component: 'api-router' }) }));

  const httpServer = http.createServer(app);

  return {
    app,
    httpServer,
    state,
    settings,

    start: () =>
      new Promise<void>((resolveStart, rejectStart) => {
        httpServer.once('error', (error) => {
          logger.error('Server error', error);
          rejectStart(error);
        });
        httpServer.listen(settings.port, settings.host, () => {
          logger.info('HTTP server started', { url: `http://${settings.host}:${settings.port}` });
          resolveStart();
        });
      }),

    stop: () =>
      new Promise<void>((resolveStop, rejectStop) => {
        logger.info('Stopping server...');
        httpServer.close((error) => {
          if (error) {
            logger.error('Error closing HTTP server', error);
            rejectStop(error);
          } else {
            logger.info('Server stopped');
            resolveStop();
          }
        });
      }),
  };
}

/**
 * Create a server for a wired runtime
 */
export function createServerForRuntime(runtime: Runtime): ServerInstance {
  return createServer({
    cycle: runtime.cycle,
    settings: runtime.config.server,
    logger: runtime.logger.child({ component: 'server' }),
  });
}

/**
 * Load configuration, start the server and stop it on SIGTERM/SIGINT
 */
export async function runServer(configPath?: string): Promise<ServerInstance> {
  const config = await loadConfig({ path: configPath });
  const runtime = createRuntime(config);
  const server = createServerForRuntime(runtime);
  const logger = runtime.logger.child({ component: 'server' });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  await server.start();
  return server;
}

async function main(): Promise<void> {
  try {
    await runServer();
  } catch (error) {
    const logger = createServiceLogger({ level: 'info' }, { component: 'server' });
    logger.fatal('Failed to start server', error instanceof Error ? error : { error: errorMessage(error) });
    process.exit(1);
  }
}

// Run main if this is the entry point
const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  void main();
}

// ============================================================================
// Exports
// ============================================================================

export * from './api/router.js';
export * from './config.js';
export * from './runtime.js';
export * from './kubernetes/index.js';
export * from './dns/index.js';
export * from './status/index.js';
