/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerServiceCommands } from './service.js';
export { registerToolCommands } from './tools.js';
