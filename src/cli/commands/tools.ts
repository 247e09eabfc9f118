/**
 * Tool CLI commands
 * call, check
 */

import { Command } from 'commander';
import { HealthResponseSchema } from '../../api/schemas.js';
import {
  getConfig,
  serviceUrl,
  ServiceNameSchema,
  type Config,
  type ServiceName,
} from '../../config/index.js';
import { DelegationClient, type DelegationResult, type FetchLike } from '../../delegation/client.js';
import { describeError } from '../../utils/index.js';

/** Options for the call command */
export interface CallOptions {
  data: string;
}

/**
 * Health of one service
 */
export interface ServiceHealth {
  service: ServiceName;
  url: string;
  healthy: boolean;
  detail: string;
}

function clientFor(config: Config, fetch?: FetchLike): DelegationClient {
  return new DelegationClient({ timeoutMs: config.delegationTimeoutMs, fetch });
}

/**
 * Invoke a tool on a running service
 */
export async function callTool(
  config: Config,
  service: ServiceName,
  tool: string,
  data: string,
  fetch?: FetchLike
): Promise<DelegationResult> {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (err) {
    throw new Error(`--data is not valid JSON: ${describeError(err)}`);
  }

  // Tool rejections (400/404/500) still carry a body worth printing
  return clientFor(config, fetch).invokeTool(serviceUrl(config, service), tool, payload, {
    acceptStatuses: [200, 400, 404, 500],
  });
}

/**
 * Ping /health on every service
 */
export async function checkServices(config: Config, fetch?: FetchLike): Promise<ServiceHealth[]> {
  const client = clientFor(config, fetch);

  return Promise.all(
    ServiceNameSchema.options.map(async (service): Promise<ServiceHealth> => {
      const url = serviceUrl(config, service);
      const result = await client.getJson(`${url.replace(/\/+$/, '')}/health`, {
        schema: HealthResponseSchema,
      });
      if (!result.success) {
        return { service, url, healthy: false, detail: result.error };
      }
      return {
        service,
        url,
        healthy: result.data.status === 'healthy',
        detail: `${result.data.service} is ${result.data.status}`,
      };
    })
  );
}

/**
 * Register tool commands on the program
 */
export function registerToolCommands(program: Command): void {
  program
    .command('call <service> <tool>')
    .description('Invoke a tool on a running service and print the response')
    .option('--data <json>', 'Tool arguments as JSON', '{}')
    .action(async (service: string, tool: string, options: CallOptions) => {
      const name = ServiceNameSchema.safeParse(service);
      if (!name.success) {
        console.error(`Unknown service: ${service}. Use ${ServiceNameSchema.options.join(', ')}.`);
        process.exitCode = 1;
        return;
      }

      try {
        const result = await callTool(getConfig(), name.data, tool, options.data);
        if (!result.success) {
          console.error(`Call failed (${result.kind}): ${result.error}`);
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify(result.data, null, 2));
        if (result.status !== 200) process.exitCode = 1;
      } catch (err) {
        console.error(describeError(err));
        process.exitCode = 1;
      }
    });

  program
    .command('check')
    .description('Check that every service answers its health endpoint')
    .action(async () => {
      const results = await checkServices(getConfig());

      for (const result of results) {
        const mark = result.healthy ? '+' : '!';
        console.log(`  ${mark} ${result.service.padEnd(12)} ${result.url}  ${result.detail}`);
      }

      if (results.some((result) => !result.healthy)) {
        process.exitCode = 1;
      }
    });
}
