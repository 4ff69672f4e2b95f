/**
 * GCP API enablement utilities
 */

import { runGcloud, commandErrorMessage } from './gcloud';

export const CLOUD_BILLING_API = 'cloudbilling.googleapis.com';

const ENABLE_TIMEOUT_MS = 60_000;

/**
 * Enable a single API
 */
export async function enableApi(
  projectId: string,
  api: string
): Promise<{ success: boolean; error?: string }> {
  try {
    await runGcloud(['services', 'enable', api, '--project', projectId, '--quiet'], {
      timeoutMs: ENABLE_TIMEOUT_MS,
    });
    return { success: true };
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return { success: false, error: "'gcloud' command not found" };
    }
    if (error && typeof error === 'object' && 'killed' in error && error.killed) {
      return { success: false, error: `Timed out enabling ${api}` };
    }
    return { success: false, error: commandErrorMessage(error) };
  }
}

/**
 * API library page for a project, for manual enablement
 */
export function getApiLibraryUrl(projectId: string, api: string): string {
  return `https://console.cloud.google.com/apis/library/${api}?project=${projectId}`;
}
