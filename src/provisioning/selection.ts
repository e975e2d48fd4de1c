import { askValidated, chooseFromList, DEFAULT_RETRY_LIMIT, type MenuResult } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type { ResourceGroupSummary, ResourceManagerClient, SubscriptionSummary } from '../clients/types.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const RESOURCE_GROUP_PATTERN = /^[-\w.()]{1,90}$/;
const REGION_PATTERN = /^[a-z][a-z0-9]+$/;

export const DEFAULT_REGION = 'eastus';

export function validateResourceGroupName(value: string): string | null {
  if (!RESOURCE_GROUP_PATTERN.test(value) || value.endsWith('.')) {
    return 'Resource group names are 1-90 letters, digits, -, _, ., ( or ) and cannot end with a period';
  }
  return null;
}

export function validateRegion(value: string): string | null {
  return REGION_PATTERN.test(value) ? null : 'Use the region short name, e.g. eastus or westeurope';
}

/**
 * Pick a subscription. A saved id that is still accessible is reused; a
 * single subscription is taken without asking.
 */
export async function selectSubscription(
  subscriptions: SubscriptionSummary[],
  prompter: Prompter,
  logger: Logger,
  options: { preferredId?: string; retryLimit?: number } = {}
): Promise<SubscriptionSummary> {
  if (subscriptions.length === 0) {
    throw new FatalError('no-subscriptions', 'No accessible subscriptions were found for the signed-in account');
  }

  const preferred = options.preferredId
    ? subscriptions.find(s => s.subscriptionId.toLowerCase() === options.preferredId?.toLowerCase())
    : undefined;
  if (preferred) {
    logger.info(`Using subscription ${preferred.displayName} (${preferred.subscriptionId})`);
    return preferred;
  }

  if (subscriptions.length === 1) {
    const [only] = subscriptions;
    logger.info(`Using the only accessible subscription ${only.displayName} (${only.subscriptionId})`);
    return only;
  }

  const choice = await chooseFromList(prompter, {
    title: 'Select a subscription:',
    items: subscriptions,
    label: s => `${s.displayName} (${s.subscriptionId})`,
    retryLimit: options.retryLimit,
  });
  if (choice.action !== 'selected') {
    throw new FatalError('invalid-selection', 'No subscription selected');
  }
  logger.info(`Selected subscription ${choice.value.displayName} (${choice.value.subscriptionId})`);
  return choice.value;
}

export async function chooseExistingResourceGroup(
  resources: ResourceManagerClient,
  prompter: Prompter,
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<MenuResult<ResourceGroupSummary> | null> {
  const groups = await resources.listResourceGroups();
  if (groups.length === 0) return null;

  return chooseFromList(prompter, {
    title: 'Select a resource group:',
    items: groups,
    label: g => `${g.name} (${g.location})`,
    allowBack: true,
    retryLimit,
  });
}

export async function askNewResourceGroup(
  prompter: Prompter,
  defaults: { name?: string; location?: string } = {},
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<{ name: string; location: string }> {
  const name = await askValidated(prompter, 'New resource group name', validateResourceGroupName, {
    default: defaults.name,
    retryLimit,
  });
  const location = await askValidated(prompter, 'Region', validateRegion, {
    default: defaults.location ?? DEFAULT_REGION,
    retryLimit,
  });
  return { name, location };
}
