import type { TokenCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import { mutateCall, readCall, type RetryOptions } from '../utils/retry.js';
import { isNotFound } from '../utils/errors.js';
import type { SecretStore } from './types.js';

export class KeyVaultSecretStore implements SecretStore {
  private readonly client: SecretClient;

  constructor(vaultUrl: string, credential: TokenCredential, private readonly retryOptions?: RetryOptions) {
    this.client = new SecretClient(vaultUrl, credential);
  }

  async getSecret(name: string): Promise<string | null> {
    return readCall(async abortSignal => {
      try {
        const secret = await this.client.getSecret(name, { abortSignal });
        return secret.value ?? null;
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async setSecret(name: string, value: string): Promise<void> {
    await mutateCall(abortSignal => this.client.setSecret(name, value, { abortSignal }));
  }
}
