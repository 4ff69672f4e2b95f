/**
 * Install the billing client library the helper needs
 */

import chalk from 'chalk';
import { SetupError } from '../errors';
import { createCommandLogger } from '../logger';
import { packageRoot } from '../paths';
import type { InstallStep } from '../profiles';
import { runInteractive, type InteractiveResult } from './process.service';

const log = createCommandLogger('install');

export type InstallOutcome = 'installed' | 'skipped' | 'failed';

export type CommandRunner = (
  argv: string[],
  options: { cwd?: string }
) => Promise<InteractiveResult>;

/**
 * Run the install step. A fatal step throws on failure; a best-effort one
 * reports 'failed' and lets setup continue.
 */
export async function installDependencies(
  step: InstallStep,
  run: CommandRunner = runInteractive
): Promise<InstallOutcome> {
  if (step.command.length === 0) {
    return 'skipped';
  }

  const cwd = step.cwd ?? packageRoot();
  const { exitCode, error } = await run(step.command, { cwd });

  if (exitCode === 0) {
    return 'installed';
  }

  log.error('Dependency install failed', { command: step.command, exitCode, error });

  if (step.fatal) {
    throw new SetupError(step.failureMessage);
  }

  console.log(chalk.yellow(`  ${step.failureMessage} Continuing anyway.`));
  return 'failed';
}
