/**
 * Logger utility using pino
 */

import pino from 'pino';
import { getConfig, type Config } from '../config/index.js';

let _logger: pino.Logger | null = null;

/**
 * Build pino options for the configured level and format
 */
export function loggerOptions(config: Pick<Config, 'logLevel' | 'logFormat'>): pino.LoggerOptions {
  const transport = config.logFormat === 'pretty'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          destination: 2,
        },
      }
    : undefined;

  return {
    level: config.logLevel,
    transport,
  };
}

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();
    // stdout is reserved for tool responses under the stdio transport
    _logger = config.logFormat === 'pretty'
      ? pino(loggerOptions(config))
      : pino(loggerOptions(config), pino.destination(2));
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Logger that discards everything
 */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
