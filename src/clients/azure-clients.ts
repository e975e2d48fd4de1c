import type { TokenCredential } from '@azure/identity';
import type { ServiceName } from '../auth/token-cache.js';
import type { RetryOptions } from '../utils/retry.js';
import { AzureResourceManagerClient, AzureSubscriptionDirectory } from './azure-resource-manager.js';
import { AzureDesktopClient } from './azure-desktop-client.js';
import { GraphDirectoryClient } from './graph-directory-client.js';
import { KeyVaultSecretStore } from './key-vault-secret-store.js';
import type { RemoteClients, SubscriptionClients } from './types.js';

export interface CredentialSource {
  credentialFor(service: ServiceName): TokenCredential;
  readonly baseCredential: TokenCredential;
}

/**
 * Build the production client set; per-subscription clients are created once
 * and reused for the rest of the run
 */
export function createAzureClients(credentials: CredentialSource, retryOptions?: RetryOptions): RemoteClients {
  const perSubscription = new Map<string, SubscriptionClients>();
  const resourceCredential = credentials.credentialFor('resource-manager');
  const desktopCredential = credentials.credentialFor('desktop');

  return {
    subscriptions: new AzureSubscriptionDirectory(resourceCredential, retryOptions),
    directory: new GraphDirectoryClient({ credential: credentials.credentialFor('directory'), retryOptions }),
    forSubscription(subscriptionId: string): SubscriptionClients {
      let clients = perSubscription.get(subscriptionId);
      if (!clients) {
        clients = {
          resources: new AzureResourceManagerClient(resourceCredential, subscriptionId, retryOptions),
          desktop: new AzureDesktopClient(desktopCredential, subscriptionId, retryOptions),
        };
        perSubscription.set(subscriptionId, clients);
      }
      return clients;
    },
    secretStore(vaultUrl: string) {
      return new KeyVaultSecretStore(vaultUrl, credentials.baseCredential, retryOptions);
    },
  };
}
