/**
 * labkit init
 *
 * Prepare the environment for a workshop stage:
 * 1. Clean up earlier lab directories
 * 2. Verify gcloud authentication
 * 3. Reuse or create the workshop's GCP project
 * 4. Persist the project ID for later stages
 * 5. Install the billing client library and run the billing helper
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfigFile, resolveProfile } from '../config';
import { PROFILE_NAMES } from '../profiles';
import {
  isGcloudInstalled,
  checkGcloudAuth,
  findProjectByPrefix,
  describeProject,
  createProject,
  setActiveProject,
} from '../gcp';
import { cleanupLabEnvironments } from '../services/cleanup.service';
import { installDependencies } from '../services/install.service';
import { runBillingHelper } from '../services/billing-helper.service';
import { inquirerPrompter } from '../services/prompt.service';
import { runSetup, type SetupDeps } from '../services/setup.service';
import { reportFailure } from './failure';

interface InitOptions {
  profile?: string;
  prefix?: string;
  projectFile?: string;
  config?: string;
  maxAttempts?: number;
  install: boolean;
  billing: boolean;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number(value);
}

export function defaultSetupDeps(): SetupDeps {
  return {
    gcloud: {
      isGcloudInstalled,
      checkGcloudAuth,
      findProjectByPrefix,
      describeProject,
      createProject,
      setActiveProject,
    },
    prompter: inquirerPrompter,
    cleanup: cleanupLabEnvironments,
    install: (step) => installDependencies(step),
    runBillingHelper: (step, projectFile) => runBillingHelper(step, projectFile),
  };
}

export const initCommand = new Command('init')
  .description('Set up the Google Cloud project for a workshop stage')
  .option('-p, --profile <name>', `Workshop profile (${PROFILE_NAMES.join(', ')})`)
  .option('--prefix <prefix>', 'Project ID prefix')
  .option('--project-file <path>', 'Where to store the selected project ID')
  .option('-c, --config <path>', 'Path to labkit.config.json')
  .option('--max-attempts <count>', 'Give up after this many extra creation attempts', parsePositiveInt)
  .option('--no-install', 'Skip installing the billing client library')
  .option('--no-billing', 'Skip the billing enablement helper')
  .action(async (options: InitOptions) => {
    try {
      const config = loadConfigFile(options.config);
      const profile = resolveProfile(config, {
        profile: options.profile,
        prefix: options.prefix,
        projectFile: options.projectFile,
        maxAttempts: options.maxAttempts,
      });

      console.log(chalk.bold(`\n  labkit init ${chalk.gray(`(${profile.name})`)}\n`));

      await runSetup(profile, defaultSetupDeps(), {
        skipInstall: !options.install,
        skipBilling: !options.billing,
      });
    } catch (error) {
      process.exitCode = reportFailure(error, 'init');
    }
  });
