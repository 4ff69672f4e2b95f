/**
 * Link a billing account to the workshop project
 *
 * Handles the usual workshop hiccups: the Cloud Billing API still
 * propagating after being enabled, credits that were claimed a minute ago
 * and have not shown up yet, and a link that takes a few seconds to become
 * active.
 */

import chalk from 'chalk';
import { CLOUD_BILLING_API, getApiLibraryUrl } from '../gcp/apis';
import { getBillingConsoleUrl } from '../gcp/projects';
import { createCommandLogger } from '../logger';
import type { Prompter } from '../services/prompt.service';
import { grpcMessage, isPermissionDenied, looksLikeDisabledApi } from './errors';
import { findBestBillingAccount, formatTagSuffix, isTagged } from './selection';
import type { AccountsResult, BillingAccount, BillingGateway } from './types';

const log = createCommandLogger('billing');

export const API_PROPAGATION_RETRY = { attempts: 5, initialWaitSeconds: 15, backoff: 1.5 };
export const CREDIT_PROPAGATION_WAIT = { attempts: 6, waitSeconds: 20 };
export const LINK_VERIFICATION = { attempts: 6, waitSeconds: 10 };

export interface BillingDeps {
  gateway: BillingGateway;
  enableApi(projectId: string, api: string): Promise<{ success: boolean; error?: string }>;
  prompter: Prompter;
  sleep(ms: number): Promise<void>;
  now?: () => Date;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function listBillingAccounts(gateway: BillingGateway): Promise<AccountsResult> {
  try {
    return { kind: 'accounts', accounts: await gateway.listBillingAccounts() };
  } catch (error) {
    const message = grpcMessage(error);
    if (isPermissionDenied(error)) {
      if (looksLikeDisabledApi(message)) {
        return { kind: 'api-disabled', message };
      }
      console.log(chalk.red(`   ❌ Permission denied: ${message}`));
      return { kind: 'permission-denied', message };
    }
    console.log(chalk.red(`   ❌ Unexpected error: ${message}`));
    log.error('Listing billing accounts failed', error);
    return { kind: 'unexpected-error', message };
  }
}

/**
 * Whether billing is already on; lookup failures count as "not enabled"
 */
export async function isBillingEnabled(gateway: BillingGateway, projectId: string): Promise<boolean> {
  try {
    const info = await gateway.getProjectBillingInfo(projectId);
    return info.billingEnabled;
  } catch (error) {
    log.debug('Billing info lookup failed', error);
    return false;
  }
}

/**
 * Link the account and wait for the link to show up as active.
 * An unverified link still counts as success.
 */
export async function linkBillingAccount(
  projectId: string,
  account: BillingAccount,
  deps: BillingDeps
): Promise<boolean> {
  console.log(`   Linking '${account.displayName}' to project...`);

  try {
    await deps.gateway.updateProjectBillingInfo(projectId, account.name);
  } catch (error) {
    if (isPermissionDenied(error)) {
      console.log(chalk.red("   ❌ Permission denied. You may need 'Billing Account User' role."));
      console.log(chalk.red(`      ${grpcMessage(error)}`));
    } else {
      console.log(chalk.red(`   ❌ Failed to link: ${grpcMessage(error)}`));
    }
    log.error(`Linking ${account.name} failed`, error);
    return false;
  }

  console.log('   Verifying billing link...');
  for (let i = 0; i < LINK_VERIFICATION.attempts; i++) {
    try {
      const info = await deps.gateway.getProjectBillingInfo(projectId);
      if (info.billingAccountName === account.name && info.billingEnabled) {
        console.log(chalk.green('   ✓ Billing verified active'));
        return true;
      }
    } catch (error) {
      log.debug('Verification lookup failed', error);
    }

    if (i < LINK_VERIFICATION.attempts - 1) {
      await deps.sleep(LINK_VERIFICATION.waitSeconds * 1000);
    }
  }

  console.log(chalk.yellow('   ⚠️  Could not verify billing link (may still be propagating)'));
  return true;
}

/**
 * Append a date tag so later runs recognise the account. Never fatal.
 */
export async function tagBillingAccount(account: BillingAccount, deps: BillingDeps): Promise<void> {
  if (isTagged(account.displayName)) {
    return;
  }

  const newName = `${account.displayName}${formatTagSuffix((deps.now ?? (() => new Date()))())}`;
  try {
    await deps.gateway.renameBillingAccount(account.name, newName);
    console.log(chalk.green(`   ✓ Tagged account as: ${newName}`));
  } catch (error) {
    if (isPermissionDenied(error)) {
      console.log('   ℹ  Could not tag account (insufficient permissions, this is OK)');
    } else {
      console.log(`   ℹ  Could not tag account: ${grpcMessage(error)}`);
    }
  }
}

async function linkAndTag(projectId: string, account: BillingAccount, deps: BillingDeps): Promise<boolean> {
  if (!(await linkBillingAccount(projectId, account, deps))) {
    return false;
  }
  await tagBillingAccount(account, deps);
  console.log(chalk.green('✓ Billing configured successfully'));
  return true;
}

async function waitForApi(projectId: string, deps: BillingDeps): Promise<AccountsResult | null> {
  const enabled = await deps.enableApi(projectId, CLOUD_BILLING_API);
  if (!enabled.success) {
    console.log(chalk.red(`   ❌ Error enabling API: ${enabled.error ?? 'unknown error'}`));
    return null;
  }
  console.log(chalk.green('   ✓ Cloud Billing API enabled'));

  console.log('   Waiting for API to propagate...');
  let waitSeconds = API_PROPAGATION_RETRY.initialWaitSeconds;
  let result: AccountsResult = { kind: 'api-disabled', message: '' };

  for (let i = 0; i < API_PROPAGATION_RETRY.attempts; i++) {
    console.log(`   Retry ${i + 1}/${API_PROPAGATION_RETRY.attempts} in ${waitSeconds}s...`);
    await deps.sleep(waitSeconds * 1000);
    result = await listBillingAccounts(deps.gateway);
    if (result.kind !== 'api-disabled') {
      break;
    }
    waitSeconds = Math.floor(waitSeconds * API_PROPAGATION_RETRY.backoff);
  }
  return result;
}

async function waitForCredits(deps: BillingDeps): Promise<AccountsResult> {
  console.log('   No billing accounts found. Waiting for credit propagation...');
  console.log('   (This can take up to 2 minutes if you just claimed credits)');

  let result: AccountsResult = { kind: 'accounts', accounts: [] };
  for (let i = 0; i < CREDIT_PROPAGATION_WAIT.attempts; i++) {
    console.log(`   Waiting... (${i + 1}/${CREDIT_PROPAGATION_WAIT.attempts})`);
    await deps.sleep(CREDIT_PROPAGATION_WAIT.waitSeconds * 1000);
    result = await listBillingAccounts(deps.gateway);
    if (result.kind === 'accounts' && result.accounts.length > 0) {
      console.log(chalk.green('   ✓ Found billing accounts!'));
      break;
    }
  }
  return result;
}

/**
 * Ask for an account number until a valid one is given
 */
async function chooseAccountManually(accounts: BillingAccount[], prompter: Prompter): Promise<BillingAccount> {
  accounts.forEach((account, i) => console.log(`   ${i + 1}. ${account.displayName}`));
  console.log('');

  for (;;) {
    const choice = (await prompter.input(`Select account [1-${accounts.length}]:`)).trim();
    if (!choice) {
      continue;
    }
    if (!/^\d+$/.test(choice)) {
      console.log('   Please enter a number');
      continue;
    }
    const index = Number(choice) - 1;
    if (index >= 0 && index < accounts.length) {
      return accounts[index];
    }
    console.log(`   Please enter 1-${accounts.length}`);
  }
}

function printAccountRequired(): void {
  const lines = [
    '',
    '  ⚠️  BILLING ACCOUNT REQUIRED',
    '',
    '  No billing accounts found after waiting.',
    '',
    "  If you're at a workshop:",
    "  • Make sure you've CLAIMED YOUR CREDIT from the organizer",
    '  • Wait a minute for it to apply, then run labkit init again',
    '',
    "  If you're self-learning:",
    '  • Create a billing account (free tier available):',
    '    https://console.cloud.google.com/billing/create',
    '',
  ];
  console.log(chalk.yellow(lines.join('\n')));
}

async function configureFromAccounts(
  projectId: string,
  accounts: BillingAccount[],
  deps: BillingDeps
): Promise<number> {
  if (accounts.length === 0) {
    printAccountRequired();
    return 1;
  }

  const openAccounts = accounts.filter((account) => account.open);
  if (openAccounts.length === 0) {
    console.log(chalk.red('   ❌ Found billing accounts, but none are currently open/active.'));
    console.log(`   Link an account manually at: ${getBillingConsoleUrl(projectId)}`);
    return 1;
  }

  if (openAccounts.length === 1) {
    const [account] = openAccounts;
    console.log(`   Found: ${account.displayName}`);
    return (await linkAndTag(projectId, account, deps)) ? 0 : 1;
  }

  console.log(`   Found ${openAccounts.length} billing accounts`);
  const { account, reason } = await findBestBillingAccount(deps.gateway, openAccounts);
  log.info('Selected billing account', { name: account.name, reason });
  console.log(`   Auto-selecting: ${account.displayName}`);
  if (await linkAndTag(projectId, account, deps)) {
    return 0;
  }

  console.log(chalk.yellow(`\n   ⚠️  Failed to link '${account.displayName}'. Please select manually:`));
  const chosen = await chooseAccountManually(openAccounts, deps.prompter);
  if (await linkAndTag(projectId, chosen, deps)) {
    return 0;
  }
  console.log(`   Link an account manually at: ${getBillingConsoleUrl(projectId)}`);
  return 1;
}

/**
 * Run the whole flow; resolves to the process exit code
 */
export async function enableBilling(projectId: string, deps: BillingDeps): Promise<number> {
  console.log('💳 Checking billing configuration...');
  console.log(`   Project: ${projectId}`);

  if (await isBillingEnabled(deps.gateway, projectId)) {
    console.log(chalk.green('✓ Billing already enabled'));
    return 0;
  }

  console.log('   Billing not enabled. Searching for billing accounts...');
  let result = await listBillingAccounts(deps.gateway);

  if (result.kind === 'api-disabled') {
    console.log('   Enabling Cloud Billing API...');
    const afterApi = await waitForApi(projectId, deps);
    if (!afterApi) {
      return 1;
    }
    result = afterApi;
  }

  if (result.kind === 'accounts' && result.accounts.length === 0) {
    result = await waitForCredits(deps);
  }

  switch (result.kind) {
    case 'accounts':
      return configureFromAccounts(projectId, result.accounts, deps);
    case 'api-disabled':
      console.log(chalk.red('   ❌ Cloud Billing API did not become active.'));
      console.log('   Please try again in a few minutes, or manually enable at:');
      console.log(`   ${getApiLibraryUrl(projectId, CLOUD_BILLING_API)}`);
      return 1;
    case 'permission-denied':
      console.log(chalk.red("   ❌ You don't have permission to view billing accounts."));
      console.log("   Ask your organization admin for 'Billing Account User' role.");
      return 1;
    case 'unexpected-error':
      console.log(chalk.red('   ❌ An unexpected error occurred.'));
      return 1;
  }
}
