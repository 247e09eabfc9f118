/**
 * Service CLI commands
 * serve
 */

import { Command } from 'commander';
import { z } from 'zod';
import {
  getConfig,
  ServiceNameSchema,
  TransportSchema,
  type ServiceName,
  type Transport,
} from '../../config/index.js';
import { describeError } from '../../utils/index.js';
import { runService } from '../../server/start.js';

/** Options for the serve command */
export interface ServeOptions {
  port?: string;
  host?: string;
  transport?: string;
}

/**
 * Resolved serve arguments
 */
export interface ServeArgs {
  service?: ServiceName;
  transport?: Transport;
  port?: number;
  host?: string;
}

const ServeArgsSchema = z.object({
  service: ServiceNameSchema.optional(),
  transport: TransportSchema.optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
});

/**
 * Validate serve arguments; throws with every problem listed
 */
export function parseServeArgs(service: string | undefined, options: ServeOptions): ServeArgs {
  const parsed = ServeArgsSchema.safeParse({ service, ...options });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid arguments: ${issues.join(', ')}`);
  }
  return parsed.data;
}

/**
 * Register service commands on the program
 */
export function registerServiceCommands(program: Command): void {
  program
    .command('serve [service]')
    .description('Run an agent service (coordinator, schedule, attendance)')
    .option('--port <port>', 'Port to listen on (http transport)')
    .option('--host <host>', 'Host to bind (http transport)')
    .option('--transport <transport>', 'Transport to serve on (http, stdio)')
    .action(async (service: string | undefined, options: ServeOptions) => {
      try {
        const args = parseServeArgs(service, options);
        await runService(getConfig(), args);
      } catch (err) {
        console.error(`Failed to start service: ${describeError(err)}`);
        process.exitCode = 1;
      }
    });
}
