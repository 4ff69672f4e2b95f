/**
 * GCP project ID generation and validation
 */

import { randomInt } from 'crypto';

export const MAX_PROJECT_ID_LENGTH = 30;
export const MIN_PROJECT_ID_LENGTH = 6;

const SUFFIX_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';

/** Returns an index in [0, max) */
export type RandomIndex = (max: number) => number;

const cryptoIndex: RandomIndex = (max) => randomInt(max);

/**
 * Longest random suffix that still fits prefix + '-' + suffix into 30 chars
 */
export function maxSuffixLength(prefix: string): number {
  if (!/^[a-z][a-z0-9-]*$/.test(prefix)) {
    throw new Error(
      `Invalid project prefix '${prefix}'. Must start with a lowercase letter and contain only lowercase letters, digits, or hyphens.`
    );
  }
  const length = MAX_PROJECT_ID_LENGTH - prefix.length - 1;
  if (length < 1) {
    throw new Error(
      `Project prefix '${prefix}' is too long. At most ${MAX_PROJECT_ID_LENGTH - 2} characters are allowed.`
    );
  }
  return length;
}

/**
 * Random lowercase alphanumeric string
 */
export function randomSuffix(length: number, randomIndex: RandomIndex = cryptoIndex): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += SUFFIX_CHARS.charAt(randomIndex(SUFFIX_CHARS.length));
  }
  return suffix;
}

/**
 * Generate a project ID from a workshop prefix
 * Format: prefix-randomstring, always exactly 30 chars
 */
export function generateProjectId(prefix: string, randomIndex: RandomIndex = cryptoIndex): string {
  return `${prefix}-${randomSuffix(maxSuffixLength(prefix), randomIndex)}`;
}

/**
 * Validate a project ID
 */
export function isValidProjectId(projectId: string): { valid: boolean; error?: string } {
  if (!projectId) {
    return { valid: false, error: 'Project ID is required' };
  }

  if (projectId.length < MIN_PROJECT_ID_LENGTH || projectId.length > MAX_PROJECT_ID_LENGTH) {
    return { valid: false, error: 'Project ID must be 6-30 characters' };
  }

  if (!/^[a-z]/.test(projectId)) {
    return { valid: false, error: 'Project ID must start with a lowercase letter' };
  }

  if (!/[a-z0-9]$/.test(projectId)) {
    return { valid: false, error: 'Project ID must end with a letter or digit' };
  }

  if (!/^[a-z][a-z0-9-]*[a-z0-9]$/.test(projectId)) {
    return {
      valid: false,
      error: 'Project ID can only contain lowercase letters, digits, and hyphens',
    };
  }

  return { valid: true };
}
