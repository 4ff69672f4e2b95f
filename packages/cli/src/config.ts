/**
 * labkit configuration
 *
 * Resolution order, later wins:
 *   built-in profile -> labkit.config.json -> command-line flags
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SetupError, errorMessage } from './errors';
import { maxSuffixLength } from './gcp/project-id';
import { getProfile, PROFILE_NAMES, DAY_ONE, type WorkshopProfile } from './profiles';

export const CONFIG_FILENAME = 'labkit.config.json';

const argvSchema = z.array(z.string().min(1));

export const configSchema = z
  .object({
    profile: z.string().optional(),
    projectPrefix: z.string().min(1).optional(),
    projectFile: z.string().min(1).optional(),
    labels: z.record(z.string()).optional(),
    cleanupPaths: z.array(z.string().min(1)).optional(),
    clearUvCache: z.boolean().optional(),
    retry: z
      .object({
        mode: z.enum(['auto', 'interactive']).optional(),
        maxAttempts: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    install: z
      .object({
        command: argvSchema.optional(),
        cwd: z.string().min(1).optional(),
        fatal: z.boolean().optional(),
      })
      .strict()
      .optional(),
    billingHelper: z
      .object({
        command: argvSchema.optional(),
      })
      .strict()
      .optional(),
    banner: z.string().optional(),
  })
  .strict();

export type LabkitConfig = z.infer<typeof configSchema>;

export interface ConfigOverrides {
  profile?: string;
  prefix?: string;
  projectFile?: string;
  maxAttempts?: number;
}

/**
 * Validate raw config data
 */
export function parseLabkitConfig(raw: unknown, source: string): LabkitConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new SetupError(`Invalid config in ${source}`, { hint: issues.join('\n') });
  }
  return result.data;
}

/**
 * Load labkit.config.json from an explicit path or the working directory.
 * A missing file in the working directory is fine; a missing explicit path is not.
 */
export function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): LabkitConfig {
  const configPath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new SetupError(`Config file not found: ${configPath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new SetupError(`Invalid JSON in config file: ${errorMessage(err)}`);
  }

  return parseLabkitConfig(parsed, configPath);
}

/**
 * Merge profile, config file and flags into the effective profile
 */
export function resolveProfile(config: LabkitConfig, overrides: ConfigOverrides = {}): WorkshopProfile {
  const profileName = overrides.profile ?? config.profile ?? DAY_ONE.name;
  const base = getProfile(profileName);
  if (!base) {
    throw new SetupError(`Unknown profile '${profileName}'`, {
      hint: `Available profiles: ${PROFILE_NAMES.join(', ')}`,
    });
  }

  const profile: WorkshopProfile = {
    ...base,
    projectPrefix: overrides.prefix ?? config.projectPrefix ?? base.projectPrefix,
    projectFile: overrides.projectFile ?? config.projectFile ?? base.projectFile,
    labels: config.labels ?? base.labels,
    cleanupPaths: config.cleanupPaths ?? base.cleanupPaths,
    clearUvCache: config.clearUvCache ?? base.clearUvCache,
    retry: {
      mode: config.retry?.mode ?? base.retry.mode,
      maxAttempts: overrides.maxAttempts ?? config.retry?.maxAttempts ?? base.retry.maxAttempts,
    },
    install: {
      ...base.install,
      command: config.install?.command ?? base.install.command,
      cwd: config.install?.cwd ?? base.install.cwd,
      fatal: config.install?.fatal ?? base.install.fatal,
    },
    billingHelper: {
      ...base.billingHelper,
      command: config.billingHelper?.command ?? base.billingHelper.command,
    },
    banner: config.banner ?? base.banner,
  };

  try {
    maxSuffixLength(profile.projectPrefix);
  } catch (err) {
    throw new SetupError(errorMessage(err));
  }

  return profile;
}
