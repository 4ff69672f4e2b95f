/**
 * labkit enable-billing
 *
 * Link a billing account to the project recorded by labkit init.
 * labkit init runs this as a subprocess; its exit code gates setup.
 */

import { Command } from 'commander';
import { enableApi } from '../gcp';
import { enableBilling, sleep } from '../billing';
import { DEFAULT_PROJECT_FILE } from '../profiles';
import { PROJECT_FILE_ENV } from '../services/billing-helper.service';
import { readProjectId } from '../services/project-file.service';
import { inquirerPrompter } from '../services/prompt.service';
import { reportFailure } from './failure';

export const enableBillingCommand = new Command('enable-billing')
  .description('Link a billing account to the workshop project')
  .option('--project-file <path>', 'Project ID file (defaults to $LABKIT_PROJECT_FILE or ~/project_id.txt)')
  .action(async (options: { projectFile?: string }) => {
    try {
      const projectFile = options.projectFile ?? process.env[PROJECT_FILE_ENV] ?? DEFAULT_PROJECT_FILE;
      const projectId = await readProjectId(projectFile);

      // Loaded lazily so the other commands never pay for the gRPC stack
      const { createBillingGateway } = await import('../billing/gateway');

      process.exitCode = await enableBilling(projectId, {
        gateway: createBillingGateway(),
        enableApi,
        prompter: inquirerPrompter,
        sleep,
      });
    } catch (error) {
      process.exitCode = reportFailure(error, 'enable-billing');
    }
  });
