#!/usr/bin/env node
/**
 * deadwood CLI
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { orphansCommand } from './commands/orphans.js';
import { todosCommand } from './commands/todos.js';

const program = new Command();

program
  .name('deadwood')
  .description('Find source files nothing imports, and other leftovers')
  .version('0.1.0');

// Register commands
program.addCommand(orphansCommand);
program.addCommand(todosCommand);
program.addCommand(initCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('deadwood failed:', error);
  process.exit(1);
});
