/**
 * Fastify API Server
 * HTTP transport for one agent service
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type pino from 'pino';
import type { BoundService } from '../agents/types.js';
import type { ErrorResponse, HealthResponse } from '../api/types.js';
import { getLogger, loggerOptions } from '../utils/logger.js';
import { toolsRoutes } from './routes/tools.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string[] | false;
  /** Largest accepted request body, in bytes */
  bodyLimit: number;
  /** Fastify request logging */
  logger: boolean;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFormat: 'json' | 'pretty';
  /** Logger handed to tool handlers; defaults to the global logger */
  toolLogger?: pino.Logger;
}

/**
 * Default server configuration
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 8000,
  host: '0.0.0.0',
  corsOrigin: false,
  bodyLimit: 50 * 1024 * 1024,
  logger: true,
  logLevel: 'info',
  logFormat: 'pretty',
};

/**
 * Server state
 */
export interface ServerState {
  startTime: number;
  service: BoundService;
  logger: pino.Logger;
}

/**
 * Create and configure Fastify server
 */
export async function createServer(
  service: BoundService,
  config: Partial<ServerConfig> = {}
): Promise<FastifyInstance> {
  const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };

  const server = Fastify({
    logger: mergedConfig.logger ? loggerOptions(mergedConfig) : false,
    bodyLimit: mergedConfig.bodyLimit,
  });

  const state: ServerState = {
    startTime: Date.now(),
    service,
    logger: (mergedConfig.toolLogger ?? getLogger()).child({ service: service.name }),
  };

  if (mergedConfig.corsOrigin) {
    await server.register(cors, {
      origin: mergedConfig.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
    });
  }

  // Health endpoint
  server.get('/health', async (): Promise<HealthResponse> => ({
    status: 'healthy',
    service: service.name,
  }));

  server.setNotFoundHandler((_request, reply) => {
    const body: ErrorResponse = { success: false, error: 'Not found' };
    return reply.status(404).send(body);
  });

  // Malformed bodies and anything thrown outside a tool handler
  server.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    const body: ErrorResponse = {
      success: false,
      error: statusCode >= 500 ? 'Internal server error' : error.message,
    };
    return reply.status(statusCode).send(body);
  });

  // Decorate server with state access
  server.decorate('state', state);

  await server.register(toolsRoutes);

  return server;
}

/**
 * Start the server
 */
export async function startServer(
  service: BoundService,
  config: Partial<ServerConfig> = {}
): Promise<FastifyInstance> {
  const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
  const server = await createServer(service, config);

  try {
    await server.listen({
      port: mergedConfig.port,
      host: mergedConfig.host,
    });
    server.state.logger.info({ host: mergedConfig.host, port: mergedConfig.port }, `${service.name} listening`);
    return server;
  } catch (err) {
    server.log.error(err);
    throw err;
  }
}

/**
 * Stop the server
 */
export async function stopServer(server: FastifyInstance): Promise<void> {
  await server.close();
}

// Type augmentation for Fastify
declare module 'fastify' {
  interface FastifyInstance {
    state: ServerState;
  }
}
