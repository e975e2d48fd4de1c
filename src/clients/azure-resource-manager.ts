/**
 * Azure Resource Manager adapter
 *
 * Subscriptions, resource groups, template deployments, RBAC and the
 * existence checks the workflows need, via the @azure/arm-* SDKs.
 */

import { randomUUID } from 'crypto';
import type { TokenCredential } from '@azure/identity';
import { ResourceManagementClient } from '@azure/arm-resources';
import { SubscriptionClient } from '@azure/arm-resources-subscriptions';
import { AuthorizationManagementClient } from '@azure/arm-authorization';
import { StorageManagementClient } from '@azure/arm-storage';
import { ComputeManagementClient } from '@azure/arm-compute';
import { NetworkManagementClient } from '@azure/arm-network';
import { mutateCall, readCall, type RetryOptions } from '../utils/retry.js';
import { isNotFound, RemoteOperationError } from '../utils/errors.js';
import type {
  AutoShutdownSettings,
  DeploymentResult,
  ResourceGroupSummary,
  ResourceManagerClient,
  RoleAssignmentRequest,
  RoleAssignmentSummary,
  StorageNameCheck,
  SubscriptionDirectory,
  SubscriptionSummary,
  TemplateDocument,
  TemplateParameterValues,
  VirtualNetworkSummary,
} from './types.js';

const AUTO_SHUTDOWN_API_VERSION = '2018-09-15';

// Long-running template deployments get their own bound
const DEPLOYMENT_TIMEOUT_MS = 2 * 60 * 60 * 1000;

export class AzureSubscriptionDirectory implements SubscriptionDirectory {
  private readonly client: SubscriptionClient;

  constructor(credential: TokenCredential, private readonly retryOptions?: RetryOptions) {
    this.client = new SubscriptionClient(credential);
  }

  async listSubscriptions(): Promise<SubscriptionSummary[]> {
    return readCall(async abortSignal => {
      const results: SubscriptionSummary[] = [];
      for await (const sub of this.client.subscriptions.list({ abortSignal })) {
        if (!sub.subscriptionId) continue;
        results.push({
          subscriptionId: sub.subscriptionId,
          displayName: sub.displayName ?? sub.subscriptionId,
          tenantId: sub.tenantId,
          state: sub.state,
        });
      }
      return results;
    }, this.retryOptions);
  }
}

/**
 * Convert plain values to the ARM `{ name: { value } }` parameter shape
 */
export function toArmParameters(values: TemplateParameterValues): Record<string, { value: unknown }> {
  const parameters: Record<string, { value: unknown }> = {};
  for (const [name, value] of Object.entries(values)) {
    if (value === null) continue;
    parameters[name] = { value };
  }
  return parameters;
}

export class AzureResourceManagerClient implements ResourceManagerClient {
  private readonly resources: ResourceManagementClient;
  private readonly authorization: AuthorizationManagementClient;
  private readonly storage: StorageManagementClient;
  private readonly compute: ComputeManagementClient;
  private readonly network: NetworkManagementClient;

  constructor(
    credential: TokenCredential,
    private readonly subscriptionId: string,
    private readonly retryOptions?: RetryOptions
  ) {
    this.resources = new ResourceManagementClient(credential, subscriptionId);
    this.authorization = new AuthorizationManagementClient(credential, subscriptionId);
    this.storage = new StorageManagementClient(credential, subscriptionId);
    this.compute = new ComputeManagementClient(credential, subscriptionId);
    this.network = new NetworkManagementClient(credential, subscriptionId);
  }

  // ------------------------------------------------------------------
  // Resource groups
  // ------------------------------------------------------------------

  async listResourceGroups(): Promise<ResourceGroupSummary[]> {
    return readCall(async abortSignal => {
      const groups: ResourceGroupSummary[] = [];
      for await (const group of this.resources.resourceGroups.list({ abortSignal })) {
        if (!group.name) continue;
        groups.push({ name: group.name, location: group.location, id: group.id });
      }
      return groups.sort((a, b) => a.name.localeCompare(b.name));
    }, this.retryOptions);
  }

  async getResourceGroup(name: string): Promise<ResourceGroupSummary | null> {
    return readCall(async abortSignal => {
      try {
        const group = await this.resources.resourceGroups.get(name, { abortSignal });
        return { name: group.name ?? name, location: group.location, id: group.id };
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async createResourceGroup(
    name: string,
    location: string,
    tags?: Record<string, string>
  ): Promise<ResourceGroupSummary> {
    const group = await mutateCall(abortSignal =>
      this.resources.resourceGroups.createOrUpdate(
        name,
        { location, tags: { workload: 'privileged-access-workstation', ...tags } },
        { abortSignal }
      )
    );
    return { name: group.name ?? name, location: group.location, id: group.id };
  }

  // ------------------------------------------------------------------
  // Existence checks
  // ------------------------------------------------------------------

  async listVirtualNetworks(resourceGroupName: string): Promise<VirtualNetworkSummary[]> {
    return readCall(async abortSignal => {
      const networks: VirtualNetworkSummary[] = [];
      for await (const vnet of this.network.virtualNetworks.list(resourceGroupName, { abortSignal })) {
        if (!vnet.name) continue;
        networks.push({
          name: vnet.name,
          addressPrefixes: vnet.addressSpace?.addressPrefixes ?? [],
          subnets: (vnet.subnets ?? []).flatMap(s => (s.name ? [s.name] : [])),
        });
      }
      return networks;
    }, this.retryOptions);
  }

  async checkStorageAccountName(name: string): Promise<StorageNameCheck> {
    return readCall(async abortSignal => {
      const result = await this.storage.storageAccounts.checkNameAvailability(
        { name, type: 'Microsoft.Storage/storageAccounts' },
        { abortSignal }
      );
      return {
        available: result.nameAvailable ?? false,
        reason: result.reason,
        message: result.message,
      };
    }, this.retryOptions);
  }

  async storageAccountExists(resourceGroupName: string, name: string): Promise<boolean> {
    return readCall(async abortSignal => {
      try {
        await this.storage.storageAccounts.getProperties(resourceGroupName, name, { abortSignal });
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
      }
    }, this.retryOptions);
  }

  async virtualMachineExists(resourceGroupName: string, vmName: string): Promise<boolean> {
    return readCall(async abortSignal => {
      try {
        await this.compute.virtualMachines.get(resourceGroupName, vmName, { abortSignal });
        return true;
      } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
      }
    }, this.retryOptions);
  }

  // ------------------------------------------------------------------
  // Template deployments (never retried)
  // ------------------------------------------------------------------

  async deployTemplate(
    resourceGroupName: string,
    deploymentName: string,
    template: TemplateDocument,
    parameters: TemplateParameterValues
  ): Promise<DeploymentResult> {
    const result = await mutateCall(
      abortSignal =>
        this.resources.deployments.beginCreateOrUpdateAndWait(
          resourceGroupName,
          deploymentName,
          {
            properties: {
              mode: 'Incremental',
              template,
              parameters: toArmParameters(parameters),
            },
          },
          { abortSignal }
        ),
      DEPLOYMENT_TIMEOUT_MS
    );

    const provisioningState = result.properties?.provisioningState ?? 'Unknown';
    if (provisioningState !== 'Succeeded') {
      throw new RemoteOperationError(
        `Deployment ${deploymentName}`,
        `finished in state ${provisioningState}`
      );
    }

    return {
      deploymentName,
      provisioningState,
      outputs: flattenOutputs(result.properties?.outputs),
    };
  }

  // ------------------------------------------------------------------
  // RBAC
  // ------------------------------------------------------------------

  async getRoleDefinitionId(scope: string, roleName: string): Promise<string> {
    const id = await readCall(async abortSignal => {
      for await (const definition of this.authorization.roleDefinitions.list(scope, {
        filter: `roleName eq '${roleName}'`,
        abortSignal,
      })) {
        if (definition.id) return definition.id;
      }
      return null;
    }, this.retryOptions);

    if (!id) {
      throw new RemoteOperationError('Role definition lookup', `role "${roleName}" not found at ${scope}`, 404);
    }
    return id;
  }

  async listRoleAssignments(scope: string): Promise<RoleAssignmentSummary[]> {
    return readCall(async abortSignal => {
      const results: RoleAssignmentSummary[] = [];
      for await (const assignment of this.authorization.roleAssignments.listForScope(scope, { abortSignal })) {
        results.push({
          id: assignment.id ?? '',
          principalId: assignment.principalId ?? '',
          roleDefinitionId: assignment.roleDefinitionId ?? '',
          scope: assignment.scope ?? '',
        });
      }
      return results;
    }, this.retryOptions);
  }

  async createRoleAssignment(request: RoleAssignmentRequest): Promise<RoleAssignmentSummary> {
    const result = await mutateCall(abortSignal =>
      this.authorization.roleAssignments.create(
        request.scope,
        randomUUID(),
        {
          principalId: request.principalId,
          roleDefinitionId: request.roleDefinitionId,
          principalType: request.principalType,
        },
        { abortSignal }
      )
    );
    return {
      id: result.id ?? '',
      principalId: result.principalId ?? request.principalId,
      roleDefinitionId: result.roleDefinitionId ?? request.roleDefinitionId,
      scope: result.scope ?? request.scope,
    };
  }

  // ------------------------------------------------------------------
  // Auto-shutdown (Microsoft.DevTestLab/schedules)
  // ------------------------------------------------------------------

  async configureAutoShutdown(
    resourceGroupName: string,
    vmName: string,
    location: string,
    settings: AutoShutdownSettings
  ): Promise<void> {
    const resourceGroupId = `/subscriptions/${this.subscriptionId}/resourceGroups/${resourceGroupName}`;
    const vmId = `${resourceGroupId}/providers/Microsoft.Compute/virtualMachines/${vmName}`;
    const scheduleId = `${resourceGroupId}/providers/Microsoft.DevTestLab/schedules/shutdown-computevm-${vmName}`;

    await mutateCall(abortSignal =>
      this.resources.resources.beginCreateOrUpdateByIdAndWait(
        scheduleId,
        AUTO_SHUTDOWN_API_VERSION,
        {
          location,
          properties: {
            status: 'Enabled',
            taskType: 'ComputeVmShutdownTask',
            dailyRecurrence: { time: settings.time },
            timeZoneId: settings.timeZone,
            targetResourceId: vmId,
            notificationSettings: {
              status: 'Enabled',
              timeInMinutes: 30,
              emailRecipient: settings.notificationEmail,
              notificationLocale: 'en',
            },
          },
        },
        { abortSignal }
      )
    );
  }
}

/**
 * ARM returns outputs as `{ name: { type, value } }`; keep only the values
 */
export function flattenOutputs(outputs: unknown): Record<string, unknown> {
  const flattened: Record<string, unknown> = {};
  if (typeof outputs !== 'object' || outputs === null) return flattened;

  for (const [name, output] of Object.entries(outputs)) {
    if (typeof output === 'object' && output !== null && 'value' in output) {
      flattened[name] = Reflect.get(output, 'value');
    }
  }
  return flattened;
}
