/**
 * BillingGateway backed by the Cloud Billing client library
 */

import { CloudBillingClient } from '@google-cloud/billing';
import type { BillingGateway } from './types';

export function createBillingGateway(client: CloudBillingClient = new CloudBillingClient()): BillingGateway {
  return {
    async getProjectBillingInfo(projectId) {
      const [info] = await client.getProjectBillingInfo({ name: `projects/${projectId}` });
      return {
        billingAccountName: info.billingAccountName ?? '',
        billingEnabled: info.billingEnabled ?? false,
      };
    },

    async listBillingAccounts() {
      const [accounts] = await client.listBillingAccounts({});
      return accounts.map((account) => ({
        name: account.name ?? '',
        displayName: account.displayName ?? '',
        open: account.open ?? false,
      }));
    },

    async countLinkedProjects(accountName) {
      // One item is enough to know the account is in use
      const [projects] = await client.listProjectBillingInfo(
        { name: accountName, pageSize: 1 },
        { autoPaginate: false }
      );
      return projects.length;
    },

    async updateProjectBillingInfo(projectId, accountName) {
      await client.updateProjectBillingInfo({
        name: `projects/${projectId}`,
        projectBillingInfo: { billingAccountName: accountName },
      });
    },

    async renameBillingAccount(accountName, displayName) {
      await client.updateBillingAccount({
        name: accountName,
        account: { displayName },
        updateMask: { paths: ['display_name'] },
      });
    },
  };
}
