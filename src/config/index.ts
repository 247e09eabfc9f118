/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Services this package can run
 */
export const ServiceNameSchema = z.enum(['coordinator', 'schedule', 'attendance']);
export type ServiceName = z.infer<typeof ServiceNameSchema>;

/**
 * How a service receives tool calls
 */
export const TransportSchema = z.enum(['http', 'stdio']);
export type Transport = z.infer<typeof TransportSchema>;

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Service Configuration
  service: ServiceNameSchema
    .default('coordinator')
    .describe('Which agent service to run'),
  host: z
    .string()
    .default('0.0.0.0')
    .describe('Host interface for the HTTP transport'),
  port: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(8000)
    .describe('Port for the HTTP transport'),
  transport: TransportSchema
    .default('http')
    .describe('Tool-call transport'),
  corsOrigin: z
    .string()
    .optional()
    .describe('Comma-separated origins allowed to call the HTTP transport'),
  bodyLimitBytes: z
    .coerce
    .number()
    .int()
    .min(1024)
    .default(50 * 1024 * 1024)
    .describe('Largest request body the HTTP transport accepts; uploads arrive base64-encoded'),

  // Sibling Services
  coordinatorServiceUrl: z
    .string()
    .url()
    .default('http://team-captain-agent:8000')
    .describe('Base URL of the coordinator service'),
  scheduleServiceUrl: z
    .string()
    .url()
    .default('http://schedule-agent:8000')
    .describe('Base URL of the schedule service'),
  attendanceServiceUrl: z
    .string()
    .url()
    .default('http://attendance-agent:8000')
    .describe('Base URL of the attendance service'),
  eventStoreUrl: z
    .string()
    .url()
    .default('http://event-store:8080/api/events')
    .describe('Endpoint that stores one calendar event per POST'),
  visionServiceUrl: z
    .string()
    .url()
    .default('http://vision-service:8000/analyze')
    .describe('Endpoint that extracts events from a schedule image'),
  delegationTimeoutMs: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(600000)
    .default(30000)
    .describe('Timeout for each call to another service'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    service: process.env.AGENT_SERVICE,
    host: process.env.AGENT_HOST,
    port: process.env.AGENT_PORT ?? process.env.PORT,
    transport: process.env.AGENT_TRANSPORT,
    corsOrigin: process.env.AGENT_CORS_ORIGIN,
    bodyLimitBytes: process.env.AGENT_BODY_LIMIT_BYTES,
    coordinatorServiceUrl: process.env.COORDINATOR_SERVICE_URL,
    scheduleServiceUrl: process.env.SCHEDULE_SERVICE_URL,
    attendanceServiceUrl: process.env.ATTENDANCE_SERVICE_URL,
    eventStoreUrl: process.env.EVENT_STORE_URL,
    visionServiceUrl: process.env.VISION_SERVICE_URL,
    delegationTimeoutMs: process.env.DELEGATION_TIMEOUT_MS,
    logLevel: process.env.AGENT_LOG_LEVEL,
    logFormat: process.env.AGENT_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const rawConfig = buildRawConfig();
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: unknown): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Resolve the base URL of a sibling service
 */
export function serviceUrl(config: Config, service: ServiceName): string {
  switch (service) {
    case 'schedule':
      return config.scheduleServiceUrl;
    case 'attendance':
      return config.attendanceServiceUrl;
    case 'coordinator':
      return config.coordinatorServiceUrl;
  }
}

/**
 * Parse the configured CORS origins
 */
export function corsOrigins(config: Config): string[] | false {
  if (!config.corsOrigin) return false;
  return config.corsOrigin
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
