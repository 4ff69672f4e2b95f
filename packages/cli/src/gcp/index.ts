/**
 * GCP utilities for the labkit CLI
 */

export {
  isGcloudInstalled,
  checkGcloudAuth,
  findProjectByPrefix,
  describeProject,
  setActiveProject,
  createProject,
  describeCreateError,
  formatLabels,
  getBillingConsoleUrl,
  type GcpAuthInfo,
} from './projects';

export { CLOUD_BILLING_API, enableApi, getApiLibraryUrl } from './apis';

export {
  MAX_PROJECT_ID_LENGTH,
  generateProjectId,
  isValidProjectId,
  maxSuffixLength,
  randomSuffix,
  type RandomIndex,
} from './project-id';

export { runCommand, runGcloud, commandErrorMessage, type CommandOutput } from './gcloud';
