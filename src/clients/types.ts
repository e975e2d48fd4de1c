/**
 * Remote service contracts.
 *
 * The workflows only see these interfaces; the Azure SDK and Microsoft Graph
 * adapters live beside them and tests use in-memory fakes.
 */

export interface SubscriptionSummary {
  subscriptionId: string;
  displayName: string;
  tenantId?: string;
  state?: string;
}

export interface ResourceGroupSummary {
  name: string;
  location: string;
  id?: string;
}

export interface VirtualNetworkSummary {
  name: string;
  addressPrefixes: string[];
  subnets: string[];
}

export interface StorageNameCheck {
  available: boolean;
  reason?: string;
  message?: string;
}

export type TemplateDocument = Record<string, unknown>;

export type TemplateParameterValues = Record<string, string | number | boolean | string[] | null>;

export interface DeploymentResult {
  deploymentName: string;
  provisioningState: string;
  outputs: Record<string, unknown>;
}

export interface RoleAssignmentSummary {
  id: string;
  principalId: string;
  roleDefinitionId: string;
  scope: string;
}

export interface RoleAssignmentRequest {
  scope: string;
  principalId: string;
  roleDefinitionId: string;
  principalType: 'Group' | 'User' | 'ServicePrincipal';
}

export interface AutoShutdownSettings {
  /** Time of day as HHmm */
  time: string;
  timeZone: string;
  notificationEmail: string;
}

export interface SubscriptionDirectory {
  listSubscriptions(): Promise<SubscriptionSummary[]>;
}

export interface ResourceManagerClient {
  listResourceGroups(): Promise<ResourceGroupSummary[]>;
  getResourceGroup(name: string): Promise<ResourceGroupSummary | null>;
  createResourceGroup(name: string, location: string, tags?: Record<string, string>): Promise<ResourceGroupSummary>;
  listVirtualNetworks(resourceGroupName: string): Promise<VirtualNetworkSummary[]>;
  checkStorageAccountName(name: string): Promise<StorageNameCheck>;
  storageAccountExists(resourceGroupName: string, name: string): Promise<boolean>;
  virtualMachineExists(resourceGroupName: string, vmName: string): Promise<boolean>;
  deployTemplate(
    resourceGroupName: string,
    deploymentName: string,
    template: TemplateDocument,
    parameters: TemplateParameterValues
  ): Promise<DeploymentResult>;
  getRoleDefinitionId(scope: string, roleName: string): Promise<string>;
  listRoleAssignments(scope: string): Promise<RoleAssignmentSummary[]>;
  createRoleAssignment(request: RoleAssignmentRequest): Promise<RoleAssignmentSummary>;
  configureAutoShutdown(
    resourceGroupName: string,
    vmName: string,
    location: string,
    settings: AutoShutdownSettings
  ): Promise<void>;
}

export interface DirectoryGroup {
  id: string;
  displayName: string;
  description?: string;
}

export interface DirectoryUser {
  id: string;
  displayName: string;
  userPrincipalName: string;
}

export interface DirectoryDevice {
  id: string;
  displayName: string;
}

export interface ServicePrincipalSummary {
  id: string;
  appId: string;
  displayName: string;
}

export interface PolicyApplications {
  includeApplications: string[];
  excludeApplications: string[];
}

export interface ConditionalAccessPolicy {
  id: string;
  displayName: string;
  state: string;
  applications: PolicyApplications;
}

export interface DirectoryClient {
  searchGroups(substring: string): Promise<DirectoryGroup[]>;
  getGroup(groupId: string): Promise<DirectoryGroup | null>;
  createGroup(displayName: string, description: string): Promise<DirectoryGroup>;
  getUserByPrincipalName(upn: string): Promise<DirectoryUser | null>;
  isGroupMember(groupId: string, objectId: string): Promise<boolean>;
  addGroupMember(groupId: string, objectId: string): Promise<void>;
  listDevicesByNamePrefix(prefix: string): Promise<DirectoryDevice[]>;
  setDeviceExtensionAttribute(deviceId: string, attribute: string, value: string): Promise<void>;
  searchServicePrincipals(substring: string): Promise<ServicePrincipalSummary[]>;
  listConditionalAccessPolicies(): Promise<ConditionalAccessPolicy[]>;
  updatePolicyApplications(policyId: string, applications: PolicyApplications): Promise<void>;
}

export interface ApplicationGroupSummary {
  id: string;
  name: string;
}

export interface RegistrationToken {
  token: string;
  expiresOn: Date;
}

export interface DesktopClient {
  getApplicationGroup(resourceGroupName: string, name: string): Promise<ApplicationGroupSummary | null>;
  createRegistrationToken(resourceGroupName: string, hostPoolName: string, expiresOn: Date): Promise<RegistrationToken>;
  revokeRegistrationToken(resourceGroupName: string, hostPoolName: string): Promise<void>;
  assignSessionHost(resourceGroupName: string, hostPoolName: string, vmName: string, userPrincipalName: string): Promise<void>;
  updateDesktopFriendlyName(resourceGroupName: string, appGroupName: string, friendlyName: string): Promise<void>;
}

export interface SecretStore {
  getSecret(name: string): Promise<string | null>;
  setSecret(name: string, value: string): Promise<void>;
}

export interface SubscriptionClients {
  resources: ResourceManagerClient;
  desktop: DesktopClient;
}

export interface RemoteClients {
  subscriptions: SubscriptionDirectory;
  directory: DirectoryClient;
  forSubscription(subscriptionId: string): SubscriptionClients;
  secretStore(vaultUrl: string): SecretStore;
}
