/**
 * labkit CLI commands
 *
 * - init           - Workshop setup (project, project file, billing)
 * - enable-billing - Billing enablement helper run by init
 * - project-id     - Print the persisted project ID
 */

export { initCommand } from './init';
export { enableBillingCommand } from './enable-billing';
export { projectIdCommand } from './project-id';
