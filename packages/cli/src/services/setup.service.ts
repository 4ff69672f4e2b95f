/**
 * Workshop setup sequence
 *
 * cleanup -> auth check -> find/create project -> persist ID
 *   -> install billing library -> billing helper
 *
 * Each gating step throws SetupError; the caller turns it into an exit code.
 */

import chalk from 'chalk';
import ora from 'ora';
import { SetupError } from '../errors';
import { createCommandLogger } from '../logger';
import type { GcpAuthInfo } from '../gcp/projects';
import type { RandomIndex } from '../gcp/project-id';
import type { InstallStep, BillingHelperStep, WorkshopProfile } from '../profiles';
import type { CleanupResult } from './cleanup.service';
import type { InstallOutcome } from './install.service';
import type { Prompter } from './prompt.service';
import { resolveProject, type ProjectGateway, type ResolvedProject } from './project-resolver.service';

const log = createCommandLogger('setup');

export interface SetupGcloud extends ProjectGateway {
  isGcloudInstalled(): Promise<boolean>;
  checkGcloudAuth(): Promise<GcpAuthInfo | null>;
}

export interface SetupDeps {
  gcloud: SetupGcloud;
  prompter: Prompter;
  cleanup(paths: string[], options: { clearUvCache: boolean }): Promise<CleanupResult>;
  install(step: InstallStep): Promise<InstallOutcome>;
  runBillingHelper(step: BillingHelperStep, projectFile: string): Promise<void>;
  randomIndex?: RandomIndex;
}

export interface SetupOptions {
  skipInstall?: boolean;
  skipBilling?: boolean;
}

async function cleanupStep(profile: WorkshopProfile, deps: SetupDeps): Promise<void> {
  if (profile.cleanupPaths.length === 0 && !profile.clearUvCache) {
    return;
  }

  const spinner = ora('Cleaning up lab environments...').start();
  const result = await deps.cleanup(profile.cleanupPaths, { clearUvCache: profile.clearUvCache });
  if (result.failed.length > 0) {
    spinner.warn(`Cleaned up lab environments (${result.failed.length} could not be removed)`);
  } else {
    spinner.succeed('Cleaned up lab environments');
  }
  if (result.uvCacheCleared) {
    console.log(chalk.gray('  Cleared uv cache'));
  }
}

async function authStep(deps: SetupDeps): Promise<void> {
  const spinner = ora('Checking Google Cloud authentication...').start();

  if (!(await deps.gcloud.isGcloudInstalled())) {
    spinner.fail('gcloud CLI not found');
    throw new SetupError('gcloud CLI is required.', {
      hint: 'Install: https://cloud.google.com/sdk/docs/install',
    });
  }

  const auth = await deps.gcloud.checkGcloudAuth();
  if (!auth) {
    spinner.fail('Not authenticated with Google Cloud');
    throw new SetupError('Not authenticated with Google Cloud.', {
      hint: 'Please run: gcloud auth login',
    });
  }

  spinner.succeed(auth.account ? `Authenticated as ${chalk.green(auth.account)}` : 'Authenticated');
}

export async function runSetup(
  profile: WorkshopProfile,
  deps: SetupDeps,
  options: SetupOptions = {}
): Promise<ResolvedProject> {
  log.info('Starting setup', { profile: profile.name, prefix: profile.projectPrefix });

  await cleanupStep(profile, deps);

  if (profile.banner) {
    console.log('');
    console.log(chalk.cyan(profile.banner));
    console.log('');
  }

  await authStep(deps);

  const project = await resolveProject(profile, {
    gcloud: deps.gcloud,
    prompter: deps.prompter,
    randomIndex: deps.randomIndex,
  });

  if (!options.skipInstall) {
    console.log(chalk.bold('\n--- Installing billing client library ---'));
    const outcome = await deps.install(profile.install);
    log.info('Install step finished', { outcome });
  }

  if (!options.skipBilling) {
    console.log(chalk.bold('\n--- Running the Billing Enablement Script ---'));
    await deps.runBillingHelper(profile.billingHelper, profile.projectFile);
  }

  console.log(chalk.green('\n✅ Setup complete! Ready to proceed with the codelab instructions.'));
  return project;
}
