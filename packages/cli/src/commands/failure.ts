/**
 * Turn a thrown error into console output and an exit code
 */

import chalk from 'chalk';
import { errorMessage, isSetupError } from '../errors';
import { logError, logFullError } from '../logger';

const RULE = '*'.repeat(55);

export function reportFailure(error: unknown, commandName: string): number {
  if (isSetupError(error)) {
    logError(`[${commandName}] ${error.message}`, { exitCode: error.exitCode, hint: error.hint });
    console.log(chalk.red(`\n\n${RULE}`));
    console.log(chalk.red(`Error: ${error.message}`));
    if (error.hint) {
      console.log(error.hint);
    }
    console.log(chalk.red(RULE));
    return error.exitCode;
  }

  logFullError(commandName, error);
  console.log(chalk.red(`\n  Unexpected error: ${errorMessage(error)}\n`));
  console.log(chalk.gray('  See the labkit debug log for details.\n'));
  return 1;
}
