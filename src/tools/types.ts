/**
 * Tool types
 * A tool is one named request/response capability a service exposes
 */

import type pino from 'pino';
import type { z } from 'zod';

/**
 * Per-call context handed to tool handlers
 */
export interface ToolContext {
  requestId: string;
  logger: pino.Logger;
}

/**
 * Tool definition with zod-validated input
 */
export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> {
  name: string;
  description: string;
  input: S;
  handler(input: z.infer<S>, context: ToolContext): Promise<R>;
}

/**
 * Outcome of dispatching one tool call
 */
export type ToolCallOutcome =
  | { status: 'ok'; result: unknown }
  | { status: 'not_found'; error: string }
  | { status: 'invalid_input'; error: string; issues: z.ZodIssue[] }
  | { status: 'failed'; error: string };

/**
 * Define a tool, inferring the handler's input type from its schema
 */
export function defineTool<S extends z.ZodTypeAny, R>(definition: ToolDefinition<S, R>): ToolDefinition<S, R> {
  return definition;
}
