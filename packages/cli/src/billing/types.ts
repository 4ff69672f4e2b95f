/**
 * Cloud Billing types used by the enablement flow
 */

export interface BillingAccount {
  /** Resource name, e.g. billingAccounts/000000-000000-000000 */
  name: string;
  displayName: string;
  open: boolean;
}

export interface ProjectBillingInfo {
  billingAccountName: string;
  billingEnabled: boolean;
}

/**
 * The slice of the Cloud Billing API the flow talks to
 */
export interface BillingGateway {
  getProjectBillingInfo(projectId: string): Promise<ProjectBillingInfo>;
  listBillingAccounts(): Promise<BillingAccount[]>;
  /** Number of linked projects, capped at one page of one item */
  countLinkedProjects(accountName: string): Promise<number>;
  updateProjectBillingInfo(projectId: string, accountName: string): Promise<void>;
  renameBillingAccount(accountName: string, displayName: string): Promise<void>;
}

export type AccountsResult =
  | { kind: 'accounts'; accounts: BillingAccount[] }
  | { kind: 'api-disabled'; message: string }
  | { kind: 'permission-denied'; message: string }
  | { kind: 'unexpected-error'; message: string };
