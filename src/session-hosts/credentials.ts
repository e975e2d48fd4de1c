import { askSecretTwice, askValidated, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type { SecretStore } from '../clients/types.js';
import type { Logger } from '../utils/logger.js';

export type CredentialSource = 'prompt' | 'key-vault';

export interface AdminCredentials {
  username: string;
  password: string;
}

export const DEFAULT_ADMIN_USERNAME = 'pawadmin';

// Names Azure refuses for the VM local administrator
const RESERVED_USERNAMES = new Set([
  'administrator', 'admin', 'user', 'user1', 'test', 'user2', 'test1', 'user3', 'admin1', '1', '123',
  'a', 'actuser', 'adm', 'admin2', 'aspnet', 'backup', 'console', 'david', 'guest', 'john', 'owner',
  'root', 'server', 'sql', 'support', 'support_388945a0', 'sys', 'test2', 'test3', 'user4', 'user5',
]);

export function validateAdminUsername(value: string): string | null {
  if (value.length > 20) return 'Administrator names are at most 20 characters';
  if (/[\\/"[\]:|<>+=;,?*@&\s]/.test(value) || value.endsWith('.')) {
    return 'Administrator name contains a character Windows does not allow';
  }
  if (RESERVED_USERNAMES.has(value.toLowerCase())) return `"${value}" is a reserved name`;
  return null;
}

export function validateAdminPassword(value: string): string | null {
  if (value.length < 12 || value.length > 123) return 'Password must be 12-123 characters';
  const classes = [/[a-z]/, /[A-Z]/, /\d/, /[^A-Za-z0-9]/].filter(p => p.test(value)).length;
  if (classes < 3) {
    return 'Password needs three of: lowercase, uppercase, digit, symbol';
  }
  return null;
}

export function secretNames(prefix: string): { username: string; password: string } {
  return {
    username: `${prefix}-sessionhost-admin-username`,
    password: `${prefix}-sessionhost-admin-password`,
  };
}

export interface CredentialOptions {
  source: CredentialSource;
  prompter: Prompter;
  logger: Logger;
  prefix: string;
  secretStore?: SecretStore;
  retryLimit?: number;
}

async function promptForCredentials(prompter: Prompter, retryLimit: number): Promise<AdminCredentials> {
  const username = await askValidated(prompter, 'Local administrator name', validateAdminUsername, {
    default: DEFAULT_ADMIN_USERNAME,
    retryLimit,
  });
  const password = await askSecretTwice(prompter, 'Local administrator password', validateAdminPassword, retryLimit);
  return { username, password };
}

/**
 * Session host administrator credentials, typed in or kept in Key Vault.
 * Key Vault values are read when present and written after a first prompt.
 */
export async function obtainAdminCredentials(options: CredentialOptions): Promise<AdminCredentials> {
  const { source, prompter, logger, prefix, secretStore } = options;
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;

  if (source === 'prompt' || !secretStore) {
    return promptForCredentials(prompter, retryLimit);
  }

  const names = secretNames(prefix);
  const [username, password] = await Promise.all([
    secretStore.getSecret(names.username),
    secretStore.getSecret(names.password),
  ]);

  if (username && password && validateAdminUsername(username) === null && validateAdminPassword(password) === null) {
    logger.info(`Using session host administrator credentials from Key Vault (${names.username})`);
    return { username, password };
  }

  logger.info('No usable administrator credentials in Key Vault - enter them once to store them');
  const credentials = await promptForCredentials(prompter, retryLimit);
  await secretStore.setSecret(names.username, credentials.username);
  await secretStore.setSecret(names.password, credentials.password);
  logger.success(`Stored administrator credentials in Key Vault (${names.username}, ${names.password})`);
  return credentials;
}
