/**
 * Find or create the workshop's GCP project
 *
 * 1. Offer to reuse an existing project carrying the workshop prefix
 * 2. Otherwise create prefix-<random> and fall back per the retry policy
 * 3. Make it the active gcloud project and persist its ID
 */

import chalk from 'chalk';
import { SetupError } from '../errors';
import { createCommandLogger } from '../logger';
import { generateProjectId, isValidProjectId, type RandomIndex } from '../gcp/project-id';
import type { RetryPolicy, WorkshopProfile } from '../profiles';
import type { Prompter } from './prompt.service';
import { removeProjectFile, writeProjectId } from './project-file.service';

const log = createCommandLogger('project');

export interface ProjectGateway {
  findProjectByPrefix(prefix: string): Promise<string | null>;
  describeProject(projectId: string): Promise<boolean>;
  createProject(
    projectId: string,
    labels: Record<string, string>
  ): Promise<{ success: boolean; error?: string }>;
  setActiveProject(projectId: string): Promise<boolean>;
}

export interface ResolverDeps {
  gcloud: ProjectGateway;
  prompter: Prompter;
  randomIndex?: RandomIndex;
}

export type ProjectSource = 'reused' | 'created' | 'entered';

export interface ResolvedProject {
  projectId: string;
  source: ProjectSource;
}

type ResolverProfile = Pick<WorkshopProfile, 'projectPrefix' | 'projectFile' | 'labels' | 'retry'>;

function hasAttemptsLeft(policy: RetryPolicy, attempt: number): boolean {
  return policy.maxAttempts === undefined || attempt <= policy.maxAttempts;
}

function exhausted(policy: RetryPolicy): SetupError {
  const attempts = (policy.maxAttempts ?? 0) + 1;
  return new SetupError(`Could not create a project after ${attempts} attempts.`, {
    hint: 'Create a project in the Cloud Console, then run setup again and reuse it.',
  });
}

async function offerReuse(profile: ResolverProfile, deps: ResolverDeps): Promise<string | null> {
  console.log(`Searching for existing projects with prefix '${profile.projectPrefix}'...`);
  const existing = await deps.gcloud.findProjectByPrefix(profile.projectPrefix);
  if (!existing) {
    return null;
  }

  console.log(chalk.yellow(`Found an existing project: ${chalk.cyan(existing)}`));
  const reuse = await deps.prompter.confirm('Do you want to reuse this project?', false);
  if (!reuse) {
    return null;
  }

  console.log(chalk.green(`✓ Reusing project '${existing}'.`));
  return existing;
}

async function tryCreate(
  projectId: string,
  profile: ResolverProfile,
  deps: ResolverDeps
): Promise<boolean> {
  const result = await deps.gcloud.createProject(projectId, profile.labels);
  if (result.success) {
    console.log(chalk.green(`✓ Successfully created project '${projectId}'.`));
    return true;
  }
  log.warn(`Project creation failed for ${projectId}`, result.error);
  return false;
}

/**
 * Keep generating fresh IDs until one can be created
 */
async function retryWithRandomIds(profile: ResolverProfile, deps: ResolverDeps): Promise<ResolvedProject> {
  for (let attempt = 1; hasAttemptsLeft(profile.retry, attempt); attempt++) {
    const targetId = generateProjectId(profile.projectPrefix, deps.randomIndex);
    console.log(`Attempting to create project with ID: ${targetId}...`);

    if (await tryCreate(targetId, profile, deps)) {
      return { projectId: targetId, source: 'created' };
    }
    console.log(chalk.red(`Failed to create '${targetId}'. Retrying with a new ID...`));
  }
  throw exhausted(profile.retry);
}

/**
 * Let the user pick: accept a fresh suggestion or type an existing project ID
 */
async function retryInteractively(profile: ResolverProfile, deps: ResolverDeps): Promise<ResolvedProject> {
  for (let attempt = 1; hasAttemptsLeft(profile.retry, attempt); attempt++) {
    const suggestedId = generateProjectId(profile.projectPrefix, deps.randomIndex);

    console.log('');
    console.log('Select a Project ID:');
    console.log(`  1. Press Enter to CREATE a new project: ${suggestedId}`);
    console.log('  2. Or type an existing Project ID to use.');
    const answer = await deps.prompter.input('Project ID:', suggestedId);
    const targetId = answer.trim() || suggestedId;

    // Existing IDs may predate today's format rules (domain-scoped, legacy)
    console.log(`Checking status of '${targetId}'...`);
    if (await deps.gcloud.describeProject(targetId)) {
      console.log(chalk.green(`✓ Project '${targetId}' exists and is accessible.`));
      return { projectId: targetId, source: 'entered' };
    }

    const validation = isValidProjectId(targetId);
    if (!validation.valid) {
      console.log(chalk.red(`Project '${targetId}' not found, and it cannot be created: ${validation.error}.`));
      continue;
    }

    console.log(`Project '${targetId}' not found. Attempting to create...`);
    if (await tryCreate(targetId, profile, deps)) {
      return { projectId: targetId, source: 'created' };
    }
    console.log(chalk.red(`Failed to create '${targetId}'. Please try a different ID.`));
  }
  throw exhausted(profile.retry);
}

async function createNewProject(profile: ResolverProfile, deps: ResolverDeps): Promise<ResolvedProject> {
  // A stale file must not point later stages at the old project
  await removeProjectFile(profile.projectFile);

  console.log('');
  console.log(chalk.yellow("Let's set a new project."));

  const projectId = generateProjectId(profile.projectPrefix, deps.randomIndex);
  console.log(`Creating project: ${chalk.cyan(projectId)}`);

  if (await tryCreate(projectId, profile, deps)) {
    return { projectId, source: 'created' };
  }

  console.log(chalk.red('Auto-creation failed. Falling back to manual selection.'));
  return profile.retry.mode === 'interactive'
    ? retryInteractively(profile, deps)
    : retryWithRandomIds(profile, deps);
}

export async function resolveProject(
  profile: ResolverProfile,
  deps: ResolverDeps
): Promise<ResolvedProject> {
  const reused = await offerReuse(profile, deps);
  const resolved: ResolvedProject = reused
    ? { projectId: reused, source: 'reused' }
    : await createNewProject(profile, deps);

  if (!(await deps.gcloud.setActiveProject(resolved.projectId))) {
    throw new SetupError('Failed to set active project.');
  }

  await writeProjectId(profile.projectFile, resolved.projectId);
  log.info('Project selected', resolved);
  console.log(`Using project: ${chalk.cyan(resolved.projectId)}`);

  return resolved;
}
