#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter } from './utils/output.js';
import { createCheckCommand } from './commands/check.js';
import { describeError } from '../lib/errors/DriverErrors.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('nvidia-driver-check')
  .description('Check NVIDIA driver status and version, and install driver updates')
  .version('1.0.0')
  .option('-v, --verbose', 'Echo debug logs to the console')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
  });

// Error handling
program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// Running without a subcommand means "check"
program.addCommand(createCheckCommand(), { isDefault: true });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  output.error(describeError(error));
  process.exit(1);
}
