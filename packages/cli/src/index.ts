/**
 * @labkit/cli
 *
 * CLI entry point for workshop environment setup.
 */

import { Command } from 'commander';
import { initCommand, enableBillingCommand, projectIdCommand } from './commands';

const program = new Command();

program
  .name('labkit')
  .description('Prepare Google Cloud projects for workshop labs')
  .version('0.1.0');

// Setup
program.addCommand(initCommand);

// Helpers used by later stages
program.addCommand(enableBillingCommand);
program.addCommand(projectIdCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
