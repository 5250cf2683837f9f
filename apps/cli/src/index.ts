#!/usr/bin/env tsx
/**
 * Analyst Gateway CLI
 * Manage tool providers and chat with the analyst agent from the terminal.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { providersCommand } from './commands/providers.js';
import { chatCommand } from './commands/chat.js';
import { configCommand } from './commands/config.js';
import { describeError } from './lib/command.js';

const program = new Command();

program
  .name('agw')
  .description('Analyst Gateway CLI - Manage tool providers and chat with the agent')
  .version('0.1.0');

program.addCommand(providersCommand);
program.addCommand(chatCommand);
program.addCommand(configCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
