/**
 * Persisted project ID
 *
 * Later workshop stages read the selected project from a single-line file
 * in the user's home directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { SetupError, errorMessage } from '../errors';
import { expandHome } from '../paths';

export function resolveProjectFilePath(projectFile: string): string {
  return path.resolve(expandHome(projectFile));
}

export async function writeProjectId(projectFile: string, projectId: string): Promise<void> {
  const filePath = resolveProjectFilePath(projectFile);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${projectId}\n`, 'utf-8');
}

export async function readProjectId(projectFile: string): Promise<string> {
  const filePath = resolveProjectFilePath(projectFile);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      throw new SetupError(`Project ID file not found at ${filePath}`, {
        hint: "Run 'labkit init' first.",
      });
    }
    throw new SetupError(`Error reading project ID from file: ${errorMessage(error)}`);
  }

  const projectId = content.trim();
  if (!projectId) {
    throw new SetupError('Project ID file is empty.');
  }
  return projectId;
}

export async function removeProjectFile(projectFile: string): Promise<void> {
  await fs.rm(resolveProjectFilePath(projectFile), { force: true });
}
