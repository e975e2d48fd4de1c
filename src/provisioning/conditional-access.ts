/**
 * Conditional access exclusion for the storage account's directory application.
 *
 * Azure Files identity-based access registers an application named
 * `[Storage Account] <name>.file.core.windows.net`; tenant policies that
 * require MFA or compliant devices must exclude it or Kerberos tickets for
 * the file share are refused.
 */

import { chooseFromList, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type {
  ConditionalAccessPolicy,
  DirectoryClient,
  PolicyApplications,
  ServicePrincipalSummary,
} from '../clients/types.js';
import { formatErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const PLATFORM_POLICY_PREFIX = 'Microsoft-managed';

export function storageAppDisplayName(storageAccountName: string): string {
  return `[Storage Account] ${storageAccountName}.file.core.windows.net`;
}

export function isPlatformManaged(policy: ConditionalAccessPolicy): boolean {
  return policy.displayName.startsWith(PLATFORM_POLICY_PREFIX);
}

/**
 * Set-union of `appId` into the exclusion list. Existing exclusions are kept.
 */
export function addExclusion(
  applications: PolicyApplications,
  appId: string
): { applications: PolicyApplications; changed: boolean } {
  if (applications.excludeApplications.includes(appId)) {
    return { applications, changed: false };
  }
  return {
    applications: {
      includeApplications: [...applications.includeApplications],
      excludeApplications: [...applications.excludeApplications, appId],
    },
    changed: true,
  };
}

/**
 * Find the storage account's application. One exact display-name match is
 * taken as-is; none or several fall back to a numbered pick.
 */
export async function resolveStorageApplication(
  prompter: Prompter,
  directory: DirectoryClient,
  storageAccountName: string,
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<ServicePrincipalSummary | null> {
  const expected = storageAppDisplayName(storageAccountName).toLowerCase();
  const candidates = await directory.searchServicePrincipals(storageAccountName);
  const exact = candidates.filter(sp => sp.displayName.toLowerCase() === expected);

  if (exact.length === 1) return exact[0];

  const pool = exact.length > 1 ? exact : candidates;
  if (pool.length === 0) return null;

  const choice = await chooseFromList(prompter, {
    title: exact.length > 1
      ? `Several applications are named "${storageAppDisplayName(storageAccountName)}":`
      : `No application is named "${storageAppDisplayName(storageAccountName)}". Pick the storage account application:`,
    items: pool,
    label: sp => `${sp.displayName} (${sp.appId})`,
    retryLimit,
  });
  return choice.action === 'selected' ? choice.value : null;
}

export interface ExclusionReport {
  updated: string[];
  unchanged: string[];
  skipped: string[];
  failed: string[];
}

/**
 * Exclude `appId` from every tenant policy not authored by the platform
 */
export async function excludeFromPolicies(
  directory: DirectoryClient,
  appId: string,
  logger: Logger
): Promise<ExclusionReport> {
  const report: ExclusionReport = { updated: [], unchanged: [], skipped: [], failed: [] };
  const policies = await directory.listConditionalAccessPolicies();

  for (const policy of policies) {
    if (isPlatformManaged(policy)) {
      report.skipped.push(policy.displayName);
      continue;
    }

    const { applications, changed } = addExclusion(policy.applications, appId);
    if (!changed) {
      report.unchanged.push(policy.displayName);
      continue;
    }

    try {
      await directory.updatePolicyApplications(policy.id, applications);
      logger.success(`Excluded ${appId} from policy "${policy.displayName}"`);
      report.updated.push(policy.displayName);
    } catch (error) {
      logger.error(`Could not update policy "${policy.displayName}": ${formatErrorMessage(error)}`);
      report.failed.push(policy.displayName);
    }
  }

  return report;
}
