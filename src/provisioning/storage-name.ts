import { askValidated, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import { STORAGE_ACCOUNT_NAME_PATTERN } from '../state/deployment-config.js';
import type { ResourceManagerClient } from '../clients/types.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const STORAGE_NAME_MAX_LENGTH = 24;
const SUFFIX_LENGTH = 3;

export function validateStorageAccountName(name: string): string | null {
  if (STORAGE_ACCOUNT_NAME_PATTERN.test(name)) return null;
  return 'Storage account names are 3-24 characters, lowercase letters and numbers only';
}

/**
 * Append a random 3-digit suffix (100-999), shortening the base so the result
 * stays within the platform length limit
 */
export function withRandomSuffix(base: string, random: () => number = Math.random): string {
  const suffix = 100 + Math.floor(random() * 900);
  return `${base.slice(0, STORAGE_NAME_MAX_LENGTH - SUFFIX_LENGTH)}${suffix}`;
}

export interface StorageNameOptions {
  /** Name to try first without prompting (a saved value) */
  proposed?: string;
  /** Resource group whose own storage account may legitimately hold the name */
  resourceGroupName?: string;
  retryLimit?: number;
  random?: () => number;
}

/**
 * Resolve a globally available storage account name. A taken name gets one
 * suffixed retry before the operator is asked again.
 */
export async function resolveStorageAccountName(
  prompter: Prompter,
  resources: ResourceManagerClient,
  logger: Logger,
  options: StorageNameOptions = {}
): Promise<string> {
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
  let proposed = options.proposed && validateStorageAccountName(options.proposed) === null
    ? options.proposed
    : undefined;

  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const name = proposed ?? await askValidated(
      prompter,
      'Storage account name (3-24 lowercase letters and numbers)',
      validateStorageAccountName,
      { retryLimit }
    );
    proposed = undefined;

    const check = await resources.checkStorageAccountName(name);
    if (check.available) {
      logger.success(`Storage account name available: ${name}`);
      return name;
    }

    // Re-running against the same deployment: the account is already ours
    if (options.resourceGroupName && await resources.storageAccountExists(options.resourceGroupName, name)) {
      logger.info(`Storage account ${name} already exists in ${options.resourceGroupName} - reusing it`);
      return name;
    }

    const suffixed = withRandomSuffix(name, options.random);
    logger.warn(`Storage account name ${name} is not available (${check.reason ?? 'taken'}) - trying ${suffixed}`);

    const retry = await resources.checkStorageAccountName(suffixed);
    if (retry.available) {
      logger.success(`Storage account name available: ${suffixed}`);
      return suffixed;
    }

    prompter.say(`  ✗ Neither ${name} nor ${suffixed} is available - choose another name`);
  }

  throw new FatalError(
    'retry-budget-exhausted',
    `No available storage account name after ${retryLimit} attempts - aborting`
  );
}
