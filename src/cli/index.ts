#!/usr/bin/env node
/**
 * team-agents CLI - Main entry point
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { registerServiceCommands, registerToolCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('team-agents')
    .description('Team captain, schedule and attendance agent services')
    .version(version);

  // Register command groups
  registerServiceCommands(program);
  registerToolCommands(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
if (process.argv[1]?.includes('cli/index') || process.argv[1]?.includes('cli\\index')) {
  const program = createProgram();
  program.parseAsync().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
