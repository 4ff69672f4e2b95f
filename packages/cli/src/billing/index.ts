/**
 * Billing enablement for the workshop project
 */

export {
  enableBilling,
  isBillingEnabled,
  linkBillingAccount,
  listBillingAccounts,
  tagBillingAccount,
  sleep,
  API_PROPAGATION_RETRY,
  CREDIT_PROPAGATION_WAIT,
  LINK_VERIFICATION,
  type BillingDeps,
} from './enablement';

export {
  selectBillingAccount,
  findBestBillingAccount,
  countLinkedProjects,
  formatTagSuffix,
  isTagged,
  tagSuffixOf,
  TAG_SUFFIX_PATTERN,
  type AccountSelection,
  type SelectionReason,
} from './selection';

export type { AccountsResult, BillingAccount, BillingGateway, ProjectBillingInfo } from './types';
