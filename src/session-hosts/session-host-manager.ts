/**
 * Session Host Lifecycle Manager
 *
 * Provisions a batch of personal session hosts against one host pool:
 *
 *   1. mint one registration token for the batch
 *   2. create each VM that does not exist yet (bounded concurrency)
 *   3. assign each host to its user
 *   4. add each user to the selected directory groups
 *   5. configure auto-shutdown
 *   6. tag the backing directory devices
 *   7. revoke the registration token, whatever happened above
 *
 * Per-host failures are logged and recorded; the batch always moves on.
 */

import pLimit from 'p-limit';
import type {
  DesktopClient,
  DirectoryClient,
  DirectoryDevice,
  RegistrationToken,
  ResourceManagerClient,
  TemplateDocument,
  TemplateParameterValues,
} from '../clients/types.js';
import type { DeviceTagScope } from '../settings.js';
import type { DirectoryGroupRef, GroupRole } from '../state/deployment-config.js';
import { selectDeclaredParameters } from '../templates/template-loader.js';
import type { CancellationToken } from '../utils/cancellation.js';
import { CancelledError, formatErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { AdminCredentials } from './credentials.js';
import type { SessionHostRequest } from './requests.js';

export const REGISTRATION_TOKEN_LIFETIME_HOURS = 24;

export interface HostPoolTarget {
  resourceGroupName: string;
  location: string;
  prefix: string;
  hostPoolName: string;
  vnetName: string;
  subnetName: string;
  /** Resource group holding the virtual network, when it differs */
  vnetResourceGroupName?: string;
  dnsServers?: string[];
  userGroup?: DirectoryGroupRef;
  adminGroup?: DirectoryGroupRef;
}

export interface SessionHostBatchOptions {
  template: TemplateDocument;
  credentials: AdminCredentials;
  concurrency: number;
  autoShutdown: { time: string; timeZone: string };
  deviceTagScope: DeviceTagScope;
  deviceExtensionAttribute: string;
  deviceExtensionValue: string;
  prepScriptUrl?: string;
}

export type ProvisionOutcome = 'created' | 'skipped-existing' | 'failed';
export type StepOutcome = 'done' | 'skipped' | 'failed';
export type MembershipOutcome = 'added' | 'already-member' | 'failed';

export interface HostResult {
  request: SessionHostRequest;
  provision: ProvisionOutcome;
  assigned: StepOutcome;
  groups: Partial<Record<GroupRole, MembershipOutcome>>;
  autoShutdown: StepOutcome;
  deviceTagged: StepOutcome;
  errors: string[];
}

export interface SessionHostManagerDeps {
  resources: ResourceManagerClient;
  desktop: DesktopClient;
  directory: DirectoryClient;
  logger: Logger;
  cancellation?: CancellationToken;
  now?: () => Date;
}

function deploymentStamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

export class SessionHostManager {
  private readonly resources: ResourceManagerClient;
  private readonly desktop: DesktopClient;
  private readonly directory: DirectoryClient;
  private readonly logger: Logger;
  private readonly cancellation?: CancellationToken;
  private readonly now: () => Date;

  constructor(deps: SessionHostManagerDeps) {
    this.resources = deps.resources;
    this.desktop = deps.desktop;
    this.directory = deps.directory;
    this.logger = deps.logger;
    this.cancellation = deps.cancellation;
    this.now = deps.now ?? (() => new Date());
  }

  async provisionHosts(
    requests: SessionHostRequest[],
    pool: HostPoolTarget,
    options: SessionHostBatchOptions
  ): Promise<HostResult[]> {
    if (requests.length === 0) return [];

    const results: HostResult[] = requests.map(request => ({
      request,
      provision: 'failed',
      assigned: 'skipped',
      groups: {},
      autoShutdown: 'skipped',
      deviceTagged: 'skipped',
      errors: [],
    }));

    this.cancellation?.throwIfCancelled();

    let minted = false;
    try {
      const expiresOn = new Date(this.now().getTime() + REGISTRATION_TOKEN_LIFETIME_HOURS * 60 * 60 * 1000);
      const token = await this.desktop.createRegistrationToken(pool.resourceGroupName, pool.hostPoolName, expiresOn);
      minted = true;
      this.logger.success(`Registration token minted for ${pool.hostPoolName} (expires ${expiresOn.toISOString()})`);

      await this.provisionAll(results, pool, options, token);
      const present = await this.presentHosts(results, pool);
      await this.assignAll(present, pool);
      await this.addMemberships(results, pool);
      await this.configureAutoShutdown(present, pool, options);
      await this.tagDevices(results, pool, options);
    } finally {
      if (minted) {
        await this.revokeToken(pool);
      } else {
        this.logger.warn(`No registration token was minted for ${pool.hostPoolName} - nothing to revoke`);
      }
    }

    return results;
  }

  private step(): void {
    this.cancellation?.throwIfCancelled();
  }

  private fail(result: HostResult, what: string, error: unknown): void {
    const message = `${result.request.vmName}: ${what} failed - ${formatErrorMessage(error)}`;
    result.errors.push(message);
    this.logger.error(message);
  }

  // ------------------------------------------------------------------
  // 2. Provisioning
  // ------------------------------------------------------------------

  private async provisionAll(
    results: HostResult[],
    pool: HostPoolTarget,
    options: SessionHostBatchOptions,
    token: RegistrationToken
  ): Promise<void> {
    const limit = pLimit(Math.max(1, options.concurrency));
    const settled = await Promise.allSettled(
      results.map(result => limit(() => this.provisionOne(result, pool, options, token)))
    );

    // Every attempt has finished; only now let a cancellation through
    const cancelled = settled.find(
      (s): s is PromiseRejectedResult => s.status === 'rejected' && s.reason instanceof CancelledError
    );
    if (cancelled) {
      throw cancelled.reason;
    }

    settled.forEach((s, i) => {
      if (s.status === 'rejected') {
        results[i].provision = 'failed';
        this.fail(results[i], 'provisioning', s.reason);
      }
    });
  }

  private async provisionOne(
    result: HostResult,
    pool: HostPoolTarget,
    options: SessionHostBatchOptions,
    token: RegistrationToken
  ): Promise<void> {
    this.step();
    const { vmName } = result.request;

    try {
      if (await this.resources.virtualMachineExists(pool.resourceGroupName, vmName)) {
        result.provision = 'skipped-existing';
        this.logger.info(`${vmName} already exists - skipping provisioning`);
        return;
      }

      this.step();
      const { parameters, dropped } = selectDeclaredParameters(
        options.template,
        this.hostParameters(result.request, pool, options, token)
      );
      if (dropped.length > 0) {
        this.logger.debug(`${vmName}: template does not declare ${dropped.join(', ')}`);
      }

      const deploymentName = `paw-sh-${vmName}-${deploymentStamp(this.now())}`;
      this.logger.info(`Deploying session host ${vmName} (${deploymentName})...`);
      await this.resources.deployTemplate(pool.resourceGroupName, deploymentName, options.template, parameters);

      result.provision = 'created';
      this.logger.success(`Session host ${vmName} deployed`);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      result.provision = 'failed';
      this.fail(result, 'provisioning', error);
    }
  }

  private hostParameters(
    request: SessionHostRequest,
    pool: HostPoolTarget,
    options: SessionHostBatchOptions,
    token: RegistrationToken
  ): TemplateParameterValues {
    return {
      prefix: pool.prefix,
      vmName: request.vmName,
      location: pool.location,
      adminUsername: options.credentials.username,
      adminPassword: options.credentials.password,
      userFirstName: request.firstName,
      userLastName: request.lastName,
      userPrincipalName: request.upn,
      hostPoolName: pool.hostPoolName,
      hostPoolToken: token.token,
      vnetName: pool.vnetName,
      subnetName: pool.subnetName,
      vnetResourceGroupName: pool.vnetResourceGroupName ?? pool.resourceGroupName,
      dnsServers: pool.dnsServers && pool.dnsServers.length > 0 ? pool.dnsServers : null,
      prepScriptUrl: options.prepScriptUrl ?? null,
    };
  }

  /**
   * Hosts with a VM in the resource group. A failed deployment can still
   * leave its VM behind, so those are looked up again.
   */
  private async presentHosts(results: HostResult[], pool: HostPoolTarget): Promise<HostResult[]> {
    const present: HostResult[] = [];
    for (const result of results) {
      if (result.provision !== 'failed') {
        present.push(result);
        continue;
      }
      this.step();
      const { vmName } = result.request;
      try {
        if (await this.resources.virtualMachineExists(pool.resourceGroupName, vmName)) {
          this.logger.warn(`${vmName} exists although its deployment failed - configuring it anyway`);
          present.push(result);
        }
      } catch (error) {
        this.fail(result, 'existence check', error);
      }
    }
    return present;
  }

  // ------------------------------------------------------------------
  // 3. Assignment
  // ------------------------------------------------------------------

  private async assignAll(results: HostResult[], pool: HostPoolTarget): Promise<void> {
    for (const result of results) {
      this.step();
      const { vmName, upn } = result.request;
      try {
        await this.desktop.assignSessionHost(pool.resourceGroupName, pool.hostPoolName, vmName, upn);
        result.assigned = 'done';
        this.logger.success(`Assigned ${vmName} to ${upn}`);
      } catch (error) {
        result.assigned = 'failed';
        this.fail(result, 'assignment', error);
      }
    }
  }

  // ------------------------------------------------------------------
  // 4. Group membership
  // ------------------------------------------------------------------

  private async addMemberships(results: HostResult[], pool: HostPoolTarget): Promise<void> {
    const groups: Record<GroupRole, DirectoryGroupRef | undefined> = {
      standard: pool.userGroup,
      elevated: pool.adminGroup,
    };

    for (const result of results) {
      const { roles, upn } = result.request;
      if (roles.length === 0) continue;
      this.step();

      let userId: string;
      try {
        const user = await this.directory.getUserByPrincipalName(upn);
        if (!user) {
          result.errors.push(`${upn}: user not found in directory`);
          this.logger.warn(`User ${upn} not found in directory - skipping group membership`);
          for (const role of roles) result.groups[role] = 'failed';
          continue;
        }
        userId = user.id;
      } catch (error) {
        for (const role of roles) result.groups[role] = 'failed';
        this.fail(result, 'user lookup', error);
        continue;
      }

      for (const role of roles) {
        const group = groups[role];
        if (!group) {
          result.groups[role] = 'failed';
          result.errors.push(`${upn}: no ${role} group configured`);
          this.logger.warn(`No ${role} group configured - cannot add ${upn}`);
          continue;
        }

        this.step();
        try {
          if (await this.directory.isGroupMember(group.id, userId)) {
            result.groups[role] = 'already-member';
            this.logger.info(`${upn} is already a member of ${group.displayName}`);
            continue;
          }
          await this.directory.addGroupMember(group.id, userId);
          result.groups[role] = 'added';
          this.logger.success(`Added ${upn} to ${group.displayName}`);
        } catch (error) {
          result.groups[role] = 'failed';
          this.fail(result, `adding to ${group.displayName}`, error);
        }
      }
    }
  }

  // ------------------------------------------------------------------
  // 5. Auto-shutdown
  // ------------------------------------------------------------------

  private async configureAutoShutdown(
    results: HostResult[],
    pool: HostPoolTarget,
    options: SessionHostBatchOptions
  ): Promise<void> {
    for (const result of results) {
      this.step();
      const { vmName, upn } = result.request;
      try {
        await this.resources.configureAutoShutdown(pool.resourceGroupName, vmName, pool.location, {
          time: options.autoShutdown.time,
          timeZone: options.autoShutdown.timeZone,
          notificationEmail: upn,
        });
        result.autoShutdown = 'done';
        this.logger.success(`Auto-shutdown at ${options.autoShutdown.time} ${options.autoShutdown.timeZone} set for ${vmName}`);
      } catch (error) {
        result.autoShutdown = 'failed';
        this.fail(result, 'auto-shutdown', error);
      }
    }
  }

  // ------------------------------------------------------------------
  // 6. Device tagging
  // ------------------------------------------------------------------

  private async findDevices(results: HostResult[], pool: HostPoolTarget, scope: DeviceTagScope): Promise<DirectoryDevice[]> {
    if (scope === 'resource-group-prefix') {
      return this.directory.listDevicesByNamePrefix(pool.resourceGroupName);
    }

    const byId = new Map<string, DirectoryDevice>();
    for (const result of results) {
      this.step();
      const vmName = result.request.vmName.toLowerCase();
      const devices = await this.directory.listDevicesByNamePrefix(result.request.vmName);
      for (const device of devices) {
        if (device.displayName.toLowerCase() === vmName) byId.set(device.id, device);
      }
    }
    return [...byId.values()];
  }

  private async tagDevices(results: HostResult[], pool: HostPoolTarget, options: SessionHostBatchOptions): Promise<void> {
    let devices: DirectoryDevice[];
    try {
      devices = await this.findDevices(results, pool, options.deviceTagScope);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.error(`Device lookup failed - ${formatErrorMessage(error)}`);
      return;
    }

    if (devices.length === 0) {
      this.logger.warn('No directory devices found to tag (devices can take a while to register)');
      return;
    }

    const tagged = new Set<string>();
    const failed = new Set<string>();
    for (const device of devices) {
      this.step();
      try {
        await this.directory.setDeviceExtensionAttribute(
          device.id,
          options.deviceExtensionAttribute,
          options.deviceExtensionValue
        );
        tagged.add(device.displayName.toLowerCase());
        this.logger.success(`Tagged device ${device.displayName} (${options.deviceExtensionAttribute}=${options.deviceExtensionValue})`);
      } catch (error) {
        failed.add(device.displayName.toLowerCase());
        this.logger.error(`Tagging device ${device.displayName} failed - ${formatErrorMessage(error)}`);
      }
    }

    for (const result of results) {
      const vmName = result.request.vmName.toLowerCase();
      if (tagged.has(vmName)) result.deviceTagged = 'done';
      else if (failed.has(vmName)) result.deviceTagged = 'failed';
    }
  }

  // ------------------------------------------------------------------
  // 7. Revocation
  // ------------------------------------------------------------------

  private async revokeToken(pool: HostPoolTarget): Promise<void> {
    try {
      await this.desktop.revokeRegistrationToken(pool.resourceGroupName, pool.hostPoolName);
      this.logger.success(`Registration token revoked for ${pool.hostPoolName}`);
    } catch (error) {
      this.logger.error(
        `Could not revoke the registration token for ${pool.hostPoolName} - revoke it manually: ${formatErrorMessage(error)}`
      );
    }
  }
}

export function summarizeHostResults(results: HostResult[]): { created: number; skipped: number; failed: number } {
  return {
    created: results.filter(r => r.provision === 'created').length,
    skipped: results.filter(r => r.provision === 'skipped-existing').length,
    failed: results.filter(r => r.provision === 'failed' || r.errors.length > 0).length,
  };
}
