/**
 * ToolRegistry implementation
 * Holds a service's tools, validates input and dispatches calls
 */

import type { ToolInfo } from '../api/types.js';
import { describeError } from '../utils/index.js';
import type { ToolCallOutcome, ToolContext, ToolDefinition } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolInfo[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
    }));
  }

  /**
   * Validate arguments and run the tool
   * Never throws: handler faults come back as a 'failed' outcome
   */
  async execute(name: string, args: unknown, context: ToolContext): Promise<ToolCallOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { status: 'not_found', error: `Unknown tool: ${name}` };
    }

    const parsed = tool.input.safeParse(args ?? {});
    if (!parsed.success) {
      return {
        status: 'invalid_input',
        error: parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', '),
        issues: parsed.error.issues,
      };
    }

    try {
      const result = await tool.handler(parsed.data, context);
      return { status: 'ok', result };
    } catch (error) {
      context.logger.error({ err: error, tool: name }, 'Tool handler failed');
      return { status: 'failed', error: describeError(error) };
    }
  }
}
