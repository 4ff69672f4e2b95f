/**
 * Hand billing off to the billing-enablement helper process
 */

import { SetupError } from '../errors';
import { createCommandLogger } from '../logger';
import type { BillingHelperStep } from '../profiles';
import { runInteractive, type InteractiveResult } from './process.service';
import { resolveProjectFilePath } from './project-file.service';

const log = createCommandLogger('billing-helper');

export const PROJECT_FILE_ENV = 'LABKIT_PROJECT_FILE';

/**
 * argv that re-enters this CLI's enable-billing command
 */
export function defaultHelperCommand(
  projectFile: string,
  entry: string | undefined = process.argv[1]
): string[] {
  if (!entry) {
    throw new SetupError('Cannot locate the labkit entry point to run enable-billing.');
  }
  return [process.execPath, entry, 'enable-billing', '--project-file', projectFile];
}

export type HelperRunner = (
  argv: string[],
  options: { env?: NodeJS.ProcessEnv }
) => Promise<InteractiveResult>;

/**
 * Run the helper; any non-zero exit fails setup
 */
export async function runBillingHelper(
  step: BillingHelperStep,
  projectFile: string,
  run: HelperRunner = runInteractive
): Promise<void> {
  const resolvedFile = resolveProjectFilePath(projectFile);
  const argv = step.command.length > 0 ? step.command : defaultHelperCommand(resolvedFile);

  const { exitCode, error } = await run(argv, {
    env: { ...process.env, [PROJECT_FILE_ENV]: resolvedFile },
  });

  if (exitCode !== 0) {
    log.error('Billing helper failed', { argv, exitCode, error });
    throw new SetupError(step.failureMessage, { hint: error });
  }
}
