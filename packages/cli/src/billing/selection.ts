/**
 * Billing account selection
 *
 * Workshops hand out fresh credits each day, so when several open accounts
 * exist the preference is:
 *   1. an account with no linked projects, "Trial Billing Account" first
 *   2. an account we tagged earlier, newest tag first
 *   3. the first open account
 */

import type { BillingAccount, BillingGateway } from './types';

/** Date tag appended to a display name, e.g. "-202602181530" */
export const TAG_SUFFIX_PATTERN = /-\d{12}$/;

const TRIAL_ACCOUNT_MARKER = 'trial billing account';

export type SelectionReason = 'unlinked' | 'tagged' | 'first';

export interface AccountSelection {
  account: BillingAccount;
  reason: SelectionReason;
}

export function tagSuffixOf(displayName: string): string | null {
  const match = TAG_SUFFIX_PATTERN.exec(displayName);
  return match ? match[0] : null;
}

export function isTagged(displayName: string): boolean {
  return TAG_SUFFIX_PATTERN.test(displayName);
}

/**
 * "-YYYYMMDDHHmm" in local time
 */
export function formatTagSuffix(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `-${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

/**
 * Pick an account given how many projects each is linked to.
 * A count of -1 means unknown and never counts as unlinked.
 */
export function selectBillingAccount(
  accounts: BillingAccount[],
  linkedCounts: Map<string, number>
): AccountSelection {
  if (accounts.length === 0) {
    throw new Error('No billing accounts to choose from');
  }

  const unlinked = accounts.filter((account) => linkedCounts.get(account.name) === 0);
  if (unlinked.length > 0) {
    const isTrial = (account: BillingAccount) =>
      account.displayName.toLowerCase().includes(TRIAL_ACCOUNT_MARKER) ? 1 : 0;
    const [account] = [...unlinked].sort((a, b) => isTrial(b) - isTrial(a));
    return { account, reason: 'unlinked' };
  }

  const tagged = accounts
    .map((account) => ({ account, suffix: tagSuffixOf(account.displayName) }))
    .filter((entry): entry is { account: BillingAccount; suffix: string } => entry.suffix !== null)
    .sort((a, b) => b.suffix.localeCompare(a.suffix));
  if (tagged.length > 0) {
    return { account: tagged[0].account, reason: 'tagged' };
  }

  return { account: accounts[0], reason: 'first' };
}

/**
 * Count linked projects per account; failures become -1
 */
export async function countLinkedProjects(
  gateway: BillingGateway,
  accounts: BillingAccount[]
): Promise<Map<string, number>> {
  const counts = new Map<string, number>();
  for (const account of accounts) {
    try {
      counts.set(account.name, await gateway.countLinkedProjects(account.name));
    } catch {
      counts.set(account.name, -1);
    }
  }
  return counts;
}

export async function findBestBillingAccount(
  gateway: BillingGateway,
  accounts: BillingAccount[]
): Promise<AccountSelection> {
  return selectBillingAccount(accounts, await countLinkedProjects(gateway, accounts));
}
