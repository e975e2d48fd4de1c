/**
 * Azure Virtual Desktop control-plane adapter
 *
 * Host pool registration token lifecycle, personal session host assignment
 * and desktop metadata, via @azure/arm-desktopvirtualization.
 */

import type { TokenCredential } from '@azure/identity';
import { DesktopVirtualizationAPIClient } from '@azure/arm-desktopvirtualization';
import { mutateCall, readCall, type RetryOptions } from '../utils/retry.js';
import { isNotFound, RemoteOperationError } from '../utils/errors.js';
import type { ApplicationGroupSummary, DesktopClient, RegistrationToken } from './types.js';

/** Desktop resource created with every desktop application group */
export const SESSION_DESKTOP_NAME = 'SessionDesktop';

/**
 * Session host resource names look like `<hostPool>/<vmName>.<domain>`
 */
export function sessionHostMatchesVm(sessionHostName: string, vmName: string): boolean {
  const hostPart = sessionHostName.includes('/') ? sessionHostName.slice(sessionHostName.indexOf('/') + 1) : sessionHostName;
  const computerName = hostPart.split('.')[0];
  return computerName.toLowerCase() === vmName.toLowerCase();
}

export class AzureDesktopClient implements DesktopClient {
  private readonly client: DesktopVirtualizationAPIClient;

  constructor(
    credential: TokenCredential,
    subscriptionId: string,
    private readonly retryOptions?: RetryOptions
  ) {
    this.client = new DesktopVirtualizationAPIClient(credential, subscriptionId);
  }

  async getApplicationGroup(resourceGroupName: string, name: string): Promise<ApplicationGroupSummary | null> {
    return readCall(async abortSignal => {
      try {
        const group = await this.client.applicationGroups.get(resourceGroupName, name, { abortSignal });
        return { id: group.id ?? '', name: group.name ?? name };
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async createRegistrationToken(
    resourceGroupName: string,
    hostPoolName: string,
    expiresOn: Date
  ): Promise<RegistrationToken> {
    const hostPool = await mutateCall(abortSignal =>
      this.client.hostPools.update(resourceGroupName, hostPoolName, {
        hostPool: {
          registrationInfo: {
            expirationTime: expiresOn,
            registrationTokenOperation: 'Update',
          },
        },
        abortSignal,
      })
    );

    let token = hostPool.registrationInfo?.token;
    if (!token) {
      const info = await readCall(
        abortSignal => this.client.hostPools.retrieveRegistrationToken(resourceGroupName, hostPoolName, { abortSignal }),
        this.retryOptions
      );
      token = info.token;
    }
    if (!token) {
      throw new RemoteOperationError('Registration token mint', `host pool ${hostPoolName} returned no token`);
    }

    return { token, expiresOn };
  }

  async revokeRegistrationToken(resourceGroupName: string, hostPoolName: string): Promise<void> {
    await mutateCall(abortSignal =>
      this.client.hostPools.update(resourceGroupName, hostPoolName, {
        hostPool: {
          registrationInfo: {
            registrationTokenOperation: 'Delete',
          },
        },
        abortSignal,
      })
    );
  }

  async assignSessionHost(
    resourceGroupName: string,
    hostPoolName: string,
    vmName: string,
    userPrincipalName: string
  ): Promise<void> {
    const sessionHostName = await readCall(async abortSignal => {
      for await (const host of this.client.sessionHosts.list(resourceGroupName, hostPoolName, { abortSignal })) {
        if (host.name && sessionHostMatchesVm(host.name, vmName)) {
          return host.name.slice(host.name.indexOf('/') + 1);
        }
      }
      return null;
    }, this.retryOptions);

    if (!sessionHostName) {
      throw new RemoteOperationError(
        'Session host assignment',
        `no session host for ${vmName} is registered in ${hostPoolName}`,
        404
      );
    }

    await mutateCall(abortSignal =>
      this.client.sessionHosts.update(resourceGroupName, hostPoolName, sessionHostName, {
        sessionHost: { assignedUser: userPrincipalName },
        abortSignal,
      })
    );
  }

  async updateDesktopFriendlyName(resourceGroupName: string, appGroupName: string, friendlyName: string): Promise<void> {
    await mutateCall(abortSignal =>
      this.client.desktops.update(resourceGroupName, appGroupName, SESSION_DESKTOP_NAME, {
        desktop: { friendlyName },
        abortSignal,
      })
    );
  }
}
