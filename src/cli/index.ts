/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { ConfigError } from '../core/errors.js';
import { createInitCommand } from './commands/init.js';
import { createReceiveCommand } from './commands/receive.js';
import { createStartCommand } from './commands/start.js';
import { createSendClipCommand, createSendSmsCommand } from './commands/send.js';
import { createStatusCommand } from './commands/status.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Relay new photos, SMS and clipboard text to a receiver on the local network, or be that receiver');

  program.addCommand(createInitCommand());
  program.addCommand(createStartCommand());
  program.addCommand(createReceiveCommand());
  program.addCommand(createSendSmsCommand());
  program.addCommand(createSendClipCommand());
  program.addCommand(createStatusCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n❌ ${message}\n`);
    if (!(error instanceof ConfigError) && error instanceof Error && process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
