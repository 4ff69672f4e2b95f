/**
 * Remove leftovers from earlier labs
 */

import * as fs from 'fs/promises';
import { commandErrorMessage, runCommand } from '../gcp/gcloud';
import { expandHome } from '../paths';
import { errorMessage } from '../errors';
import { createCommandLogger } from '../logger';

const log = createCommandLogger('cleanup');

export interface CleanupResult {
  removed: string[];
  failed: Array<{ path: string; error: string }>;
  uvCacheCleared: boolean;
}

async function isUvInstalled(): Promise<boolean> {
  try {
    await runCommand('which', ['uv']);
    return true;
  } catch {
    return false;
  }
}

export async function cleanupLabEnvironments(
  paths: string[],
  options: { clearUvCache: boolean }
): Promise<CleanupResult> {
  const result: CleanupResult = { removed: [], failed: [], uvCacheCleared: false };

  for (const entry of paths) {
    const target = expandHome(entry);
    try {
      await fs.rm(target, { recursive: true, force: true });
      result.removed.push(target);
    } catch (error) {
      log.warn(`Could not remove ${target}`, error);
      result.failed.push({ path: target, error: errorMessage(error) });
    }
  }

  // Output is captured: the caller shows a spinner while this runs
  if (options.clearUvCache && (await isUvInstalled())) {
    try {
      await runCommand('uv', ['cache', 'clean']);
      result.uvCacheCleared = true;
    } catch (error) {
      log.warn('uv cache clean failed', commandErrorMessage(error));
    }
  }

  return result;
}
