/**
 * Stdio transport
 * Newline-delimited JSON tool calls on stdin, one JSON response per line on stdout
 */

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import type pino from 'pino';
import { z } from 'zod';
import type { BoundService } from '../agents/types.js';
import type { ErrorResponse } from '../api/types.js';
import { generateRequestId } from '../utils/index.js';
import { toToolResponse } from './outcome.js';

/**
 * One tool call request line
 */
export const StdioRequestSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  tool: z.string().min(1),
  arguments: z.unknown().optional(),
});

/**
 * One response line
 */
export interface StdioResponse {
  id: string | number | null;
  status: number;
  result: unknown;
}

export interface StdioOptions {
  input: Readable;
  output: Writable;
  logger: pino.Logger;
}

/**
 * Handle a single request line
 */
export async function handleStdioLine(
  service: BoundService,
  line: string,
  logger: pino.Logger
): Promise<StdioResponse> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    const result: ErrorResponse = { success: false, error: 'Invalid JSON' };
    return { id: null, status: 400, result };
  }

  const request = StdioRequestSchema.safeParse(raw);
  if (!request.success) {
    const result: ErrorResponse = {
      success: false,
      error: 'Invalid request',
      message: request.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '),
    };
    return { id: null, status: 400, result };
  }

  const { id, tool, arguments: args } = request.data;
  const requestId = generateRequestId();
  const tools = service.createTools();
  const outcome = await tools.execute(tool, args, {
    requestId,
    logger: logger.child({ requestId, tool }),
  });
  const response = toToolResponse(outcome);

  return { id: id ?? null, status: response.statusCode, result: response.body };
}

/**
 * Serve tool calls until the input stream ends
 */
export async function serveStdio(service: BoundService, options: StdioOptions): Promise<void> {
  const logger = options.logger.child({ service: service.name, transport: 'stdio' });
  const rl = createInterface({ input: options.input, crlfDelay: Infinity });

  logger.info('Serving tool calls on stdio');

  for await (const line of rl) {
    if (line.trim().length === 0) continue;
    const response = await handleStdioLine(service, line, logger);
    options.output.write(`${JSON.stringify(response)}\n`);
  }

  logger.info('Input closed, stopping');
}
