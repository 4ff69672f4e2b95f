/**
 * GCP Project management utilities
 */

import { runCommand, runGcloud, commandErrorMessage } from './gcloud';

export interface GcpAuthInfo {
  account: string;
}

/**
 * Check if gcloud CLI is installed
 */
export async function isGcloudInstalled(): Promise<boolean> {
  try {
    await runCommand('which', ['gcloud']);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if gcloud CLI is authenticated.
 * An access token must be obtainable; the account is informational.
 */
export async function checkGcloudAuth(): Promise<GcpAuthInfo | null> {
  try {
    await runGcloud(['auth', 'print-access-token'], { sensitive: true });
  } catch {
    return null;
  }

  try {
    const { stdout } = await runGcloud(['config', 'get-value', 'account']);
    const account = stdout.trim();
    return { account: account && account !== '(unset)' ? account : '' };
  } catch {
    return { account: '' };
  }
}

/**
 * First accessible project whose ID starts with the prefix
 */
export async function findProjectByPrefix(prefix: string): Promise<string | null> {
  try {
    const { stdout } = await runGcloud([
      'projects',
      'list',
      `--filter=projectId:${prefix}*`,
      '--format=value(projectId)',
      '--limit=1',
    ]);
    const projectId = stdout.trim().split('\n')[0]?.trim();
    return projectId || null;
  } catch {
    return null;
  }
}

/**
 * Check whether a project exists and is accessible
 */
export async function describeProject(projectId: string): Promise<boolean> {
  try {
    await runGcloud(['projects', 'describe', projectId]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Set the active GCP project
 */
export async function setActiveProject(projectId: string): Promise<boolean> {
  try {
    await runGcloud(['config', 'set', 'project', projectId, '--quiet']);
    return true;
  } catch {
    return false;
  }
}

/**
 * Format labels for --labels=k=v,k2=v2
 */
export function formatLabels(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/**
 * Create a new GCP project
 */
export async function createProject(
  projectId: string,
  labels: Record<string, string> = {}
): Promise<{ success: boolean; error?: string }> {
  const args = ['projects', 'create', projectId];
  const labelArg = formatLabels(labels);
  if (labelArg) {
    args.push(`--labels=${labelArg}`);
  }
  args.push('--quiet');

  try {
    await runGcloud(args);
    return { success: true };
  } catch (error: unknown) {
    return { success: false, error: describeCreateError(commandErrorMessage(error)) };
  }
}

/**
 * Turn gcloud's project creation output into a one-line reason
 */
export function describeCreateError(errorMessage: string): string {
  if (errorMessage.includes('already exists') || errorMessage.includes('ALREADY_EXISTS')) {
    return 'Project ID already exists. Choose a different ID.';
  }
  if (errorMessage.includes('PERMISSION_DENIED')) {
    return 'Permission denied. You may need to be in an organization with project creation rights.';
  }
  if (errorMessage.includes('Request contains an invalid argument')) {
    const match = errorMessage.match(/details:\s*"([^"]+)"/);
    if (match) {
      return match[1];
    }
    return 'Invalid project configuration. Check the project ID format.';
  }
  if (errorMessage.includes('invalid') || errorMessage.includes('INVALID')) {
    return 'Invalid project ID. Must be 6-30 lowercase letters, digits, or hyphens.';
  }

  const cleanError = errorMessage
    .replace(/^ERROR:\s*/gm, '')
    .trim()
    .split('\n')[0];

  return cleanError || 'Failed to create project. Check gcloud configuration.';
}

/**
 * Get the GCP billing console URL
 */
export function getBillingConsoleUrl(projectId: string): string {
  return `https://console.cloud.google.com/billing/linkedaccount?project=${projectId}`;
}
