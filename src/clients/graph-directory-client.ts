import { Client, type GraphRequest } from '@microsoft/microsoft-graph-client';
import { TokenCredentialAuthenticationProvider } from '@microsoft/microsoft-graph-client/authProviders/azureTokenCredentials/index.js';
import type { TokenCredential } from '@azure/identity';
import { mutateCall, readCall, type RetryOptions } from '../utils/retry.js';
import { errorMessageOf, isNotFound, statusCodeOf } from '../utils/errors.js';
import type {
  ConditionalAccessPolicy,
  DirectoryClient,
  DirectoryDevice,
  DirectoryGroup,
  DirectoryUser,
  PolicyApplications,
  ServicePrincipalSummary,
} from './types.js';

export const GRAPH_SCOPES = ['https://graph.microsoft.com/.default'];

const PAGE_SIZE = 999;

interface GraphPage<T> {
  value?: T[];
  '@odata.nextLink'?: string;
}

interface GraphGroup {
  id: string;
  displayName?: string | null;
  description?: string | null;
}

interface GraphUser {
  id: string;
  displayName?: string | null;
  userPrincipalName?: string | null;
}

interface GraphDevice {
  id: string;
  displayName?: string | null;
}

interface GraphServicePrincipal {
  id: string;
  appId: string;
  displayName?: string | null;
}

interface GraphPolicy {
  id: string;
  displayName?: string | null;
  state?: string | null;
  conditions?: {
    applications?: {
      includeApplications?: string[] | null;
      excludeApplications?: string[] | null;
    } | null;
  } | null;
}

export type GraphDirectoryClientConfig =
  | { credential: TokenCredential; retryOptions?: RetryOptions }
  | { client: Client; retryOptions?: RetryOptions };

function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}

function escapeSearchTerm(value: string): string {
  return value.replace(/["\\]/g, '');
}

/**
 * Identity directory adapter over Microsoft Graph v1.0
 */
export class GraphDirectoryClient implements DirectoryClient {
  private client: Client;
  private retryOptions?: RetryOptions;

  constructor(config: GraphDirectoryClientConfig) {
    this.retryOptions = config.retryOptions;

    if ('client' in config) {
      this.client = config.client;
    } else {
      const authProvider = new TokenCredentialAuthenticationProvider(config.credential, {
        scopes: GRAPH_SCOPES,
      });
      this.client = Client.initWithMiddleware({ authProvider });
    }
  }

  /**
   * Follow @odata.nextLink until every page is read
   */
  private async fetchAll<T>(request: GraphRequest): Promise<T[]> {
    const items: T[] = [];
    let page: GraphPage<T> = await request.get();
    items.push(...(page.value ?? []));

    let nextLink = page['@odata.nextLink'];
    while (nextLink) {
      page = await this.client.api(nextLink).get();
      items.push(...(page.value ?? []));
      nextLink = page['@odata.nextLink'];
    }
    return items;
  }

  // ------------------------------------------------------------------
  // Groups
  // ------------------------------------------------------------------

  /**
   * Groups whose display name contains `substring`. Graph `$search` only
   * matches word prefixes, so a miss falls back to scanning every group.
   */
  async searchGroups(substring: string): Promise<DirectoryGroup[]> {
    const needle = substring.toLowerCase();
    const matching = (groups: GraphGroup[]) =>
      groups
        .map(toDirectoryGroup)
        .filter(g => g.displayName.toLowerCase().includes(needle))
        .sort((a, b) => a.displayName.localeCompare(b.displayName));

    const searched = await readCall(() =>
      this.fetchAll<GraphGroup>(
        this.client
          .api('/groups')
          .header('ConsistencyLevel', 'eventual')
          .search(`"displayName:${escapeSearchTerm(substring)}"`)
          .select('id,displayName,description')
          .top(PAGE_SIZE)
      ),
      this.retryOptions
    );
    const found = matching(searched);
    if (found.length > 0) return found;

    const all = await readCall(() =>
      this.fetchAll<GraphGroup>(
        this.client
          .api('/groups')
          .select('id,displayName,description')
          .top(PAGE_SIZE)
      ),
      this.retryOptions
    );
    return matching(all);
  }

  async getGroup(groupId: string): Promise<DirectoryGroup | null> {
    return readCall(async () => {
      try {
        const group: GraphGroup = await this.client
          .api(`/groups/${groupId}`)
          .select('id,displayName,description')
          .get();
        return toDirectoryGroup(group);
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async createGroup(displayName: string, description: string): Promise<DirectoryGroup> {
    const mailNickname = displayName.replace(/[^A-Za-z0-9]/g, '').slice(0, 64) || 'pawgroup';
    const group: GraphGroup = await mutateCall(() =>
      this.client.api('/groups').post({
        displayName,
        description,
        mailEnabled: false,
        mailNickname,
        securityEnabled: true,
      })
    );
    return toDirectoryGroup(group);
  }

  // ------------------------------------------------------------------
  // Users and membership
  // ------------------------------------------------------------------

  async getUserByPrincipalName(upn: string): Promise<DirectoryUser | null> {
    return readCall(async () => {
      try {
        const user: GraphUser = await this.client
          .api(`/users/${encodeURIComponent(upn)}`)
          .select('id,displayName,userPrincipalName')
          .get();
        return {
          id: user.id,
          displayName: user.displayName ?? upn,
          userPrincipalName: user.userPrincipalName ?? upn,
        };
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async isGroupMember(groupId: string, objectId: string): Promise<boolean> {
    return readCall(async () => {
      const response: GraphPage<string> = await this.client
        .api(`/directoryObjects/${objectId}/checkMemberGroups`)
        .post({ groupIds: [groupId] });
      return (response.value ?? []).includes(groupId);
    }, this.retryOptions);
  }

  async addGroupMember(groupId: string, objectId: string): Promise<void> {
    try {
      await mutateCall(() =>
        this.client.api(`/groups/${groupId}/members/$ref`).post({
          '@odata.id': `https://graph.microsoft.com/v1.0/directoryObjects/${objectId}`,
        })
      );
    } catch (error) {
      // Graph answers 400 when the reference is already present
      if (statusCodeOf(error) === 400 && errorMessageOf(error).includes('already exist')) {
        return;
      }
      throw error;
    }
  }

  // ------------------------------------------------------------------
  // Devices
  // ------------------------------------------------------------------

  async listDevicesByNamePrefix(prefix: string): Promise<DirectoryDevice[]> {
    const devices = await readCall(() =>
      this.fetchAll<GraphDevice>(
        this.client
          .api('/devices')
          .filter(`startswith(displayName,'${escapeODataString(prefix)}')`)
          .select('id,displayName')
          .top(PAGE_SIZE)
      ),
      this.retryOptions
    );

    return devices.map(d => ({ id: d.id, displayName: d.displayName ?? '' }));
  }

  async setDeviceExtensionAttribute(deviceId: string, attribute: string, value: string): Promise<void> {
    await mutateCall(() =>
      this.client.api(`/devices/${deviceId}`).patch({
        extensionAttributes: { [attribute]: value },
      })
    );
  }

  // ------------------------------------------------------------------
  // Applications and conditional access
  // ------------------------------------------------------------------

  async searchServicePrincipals(substring: string): Promise<ServicePrincipalSummary[]> {
    const principals = await readCall(() =>
      this.fetchAll<GraphServicePrincipal>(
        this.client
          .api('/servicePrincipals')
          .header('ConsistencyLevel', 'eventual')
          .search(`"displayName:${escapeSearchTerm(substring)}"`)
          .select('id,appId,displayName')
          .top(PAGE_SIZE)
      ),
      this.retryOptions
    );

    return principals.map(p => ({ id: p.id, appId: p.appId, displayName: p.displayName ?? p.appId }));
  }

  async listConditionalAccessPolicies(): Promise<ConditionalAccessPolicy[]> {
    const policies = await readCall(() =>
      this.fetchAll<GraphPolicy>(this.client.api('/identity/conditionalAccess/policies')),
      this.retryOptions
    );

    return policies.map(p => ({
      id: p.id,
      displayName: p.displayName ?? p.id,
      state: p.state ?? 'unknown',
      applications: {
        includeApplications: p.conditions?.applications?.includeApplications ?? [],
        excludeApplications: p.conditions?.applications?.excludeApplications ?? [],
      },
    }));
  }

  async updatePolicyApplications(policyId: string, applications: PolicyApplications): Promise<void> {
    await mutateCall(() =>
      this.client.api(`/identity/conditionalAccess/policies/${policyId}`).patch({
        conditions: {
          applications: {
            includeApplications: applications.includeApplications,
            excludeApplications: applications.excludeApplications,
          },
        },
      })
    );
  }
}

function toDirectoryGroup(group: GraphGroup): DirectoryGroup {
  return {
    id: group.id,
    displayName: group.displayName ?? group.id,
    ...(group.description && { description: group.description }),
  };
}
