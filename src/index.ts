/**
 * team-agents
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './utils/index.js';
export * from './api/schemas.js';
export type * from './api/types.js';
export * from './agents/index.js';
export * from './delegation/client.js';
export { ToolRegistry } from './tools/registry.js';
export { defineTool } from './tools/types.js';
export type { ToolCallOutcome, ToolContext, ToolDefinition } from './tools/types.js';
export { createServer, startServer, stopServer, DEFAULT_SERVER_CONFIG } from './server/index.js';
export type { ServerConfig, ServerState } from './server/index.js';
export { serveStdio, handleStdioLine, StdioRequestSchema } from './server/stdio.js';
export type { StdioResponse, StdioOptions } from './server/stdio.js';
export { runService } from './server/start.js';
export type { RunOptions } from './server/start.js';
export { version } from './version.js';
