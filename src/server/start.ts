#!/usr/bin/env node
/**
 * Service Entry Point
 * Start with: npm start (service and transport come from the environment)
 */

import { createService } from '../agents/index.js';
import { corsOrigins, getConfig, type Config, type ServiceName, type Transport } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { startServer } from './index.js';
import { serveStdio } from './stdio.js';

export interface RunOptions {
  service?: ServiceName;
  transport?: Transport;
  port?: number;
  host?: string;
}

/**
 * Run one agent service on the configured transport
 */
export async function runService(config: Config, options: RunOptions = {}): Promise<void> {
  const serviceName = options.service ?? config.service;
  const transport = options.transport ?? config.transport;
  const logger = createLogger({ transport });
  const service = createService(serviceName, config, { logger });

  if (transport === 'stdio') {
    await serveStdio(service, { input: process.stdin, output: process.stdout, logger });
    return;
  }

  const server = await startServer(service, {
    port: options.port ?? config.port,
    host: options.host ?? config.host,
    corsOrigin: corsOrigins(config),
    bodyLimit: config.bodyLimitBytes,
    logLevel: config.logLevel,
    logFormat: config.logFormat,
    toolLogger: logger,
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (process.argv[1]?.includes('server/start') || process.argv[1]?.includes('server\\start')) {
  runService(getConfig()).catch((err: unknown) => {
    console.error('Failed to start service:', err);
    process.exit(1);
  });
}
