/**
 * labkit project-id
 *
 * Print the persisted project ID for scripts in later workshop stages
 */

import { Command } from 'commander';
import { DEFAULT_PROJECT_FILE } from '../profiles';
import { readProjectId } from '../services/project-file.service';
import { reportFailure } from './failure';

export const projectIdCommand = new Command('project-id')
  .description('Print the project ID chosen by labkit init')
  .option('--project-file <path>', 'Project ID file', DEFAULT_PROJECT_FILE)
  .action(async (options: { projectFile: string }) => {
    try {
      console.log(await readProjectId(options.projectFile));
    } catch (error) {
      process.exitCode = reportFailure(error, 'project-id');
    }
  });
