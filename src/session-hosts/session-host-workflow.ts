/**
 * Session host workflow
 *
 * One parameterized path for "session hosts only" runs and for the hand-off
 * at the end of a core deployment. Variant points: where the administrator
 * credentials live (prompt or Key Vault) and how the target network is found
 * (discovered in the resource group or typed in).
 */

import type { RemoteClients, SubscriptionClients, VirtualNetworkSummary } from '../clients/types.js';
import type { SessionAuthenticator } from '../auth/session-manager.js';
import type { CommandRunner } from '../environment/command-runner.js';
import { checkEnvironment, type ModuleLoader } from '../environment/environment-check.js';
import { askValidated, chooseFromList } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import { resolveGroup } from '../provisioning/group-resolver.js';
import { chooseExistingResourceGroup, selectSubscription } from '../provisioning/selection.js';
import { chooseReuseMode, remoteLivenessProbes, resolveConfig, verifyLiveness } from '../selection/reuse-engine.js';
import type { AppSettings } from '../settings.js';
import type { ConfigStore } from '../state/config-store.js';
import {
  deriveResourceNames,
  PREFIX_PATTERN,
  type DeploymentConfig,
  type GroupRole,
} from '../state/deployment-config.js';
import { chooseTemplate, listTemplates } from '../templates/template-locator.js';
import { loadTemplate } from '../templates/template-loader.js';
import type { CancellationToken } from '../utils/cancellation.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { obtainAdminCredentials, type CredentialSource } from './credentials.js';
import { collectRequests, loadRequestsFromCsv, type SessionHostRequest } from './requests.js';
import {
  SessionHostManager,
  summarizeHostResults,
  type HostPoolTarget,
  type HostResult,
} from './session-host-manager.js';

export type NetworkSource = 'discover' | 'manual';

export interface SessionHostWorkflowOptions {
  credentialSource: CredentialSource;
  networkSource: NetworkSource;
  hostsCsv?: string;
}

export interface SessionHostWorkflowDeps {
  settings: AppSettings;
  prompter: Prompter;
  logger: Logger;
  clients: RemoteClients;
  sessions: SessionAuthenticator;
  configStore: ConfigStore;
  runner: CommandRunner;
  cancellation?: CancellationToken;
  loadModule?: ModuleLoader;
  now?: () => Date;
}

/**
 * Entry point the core orchestrator hands a finished deployment to
 */
export interface SessionHostHandoff {
  runForDeployment(config: DeploymentConfig): Promise<HostResult[]>;
}

export class SessionHostWorkflow implements SessionHostHandoff {
  private readonly retryLimit: number;

  constructor(
    private readonly deps: SessionHostWorkflowDeps,
    private readonly options: SessionHostWorkflowOptions
  ) {
    this.retryLimit = deps.settings.promptRetryLimit;
  }

  /**
   * Session-hosts-only run against an existing host pool
   */
  async run(): Promise<HostResult[]> {
    const { prompter, logger, clients, sessions, configStore, runner, settings, loadModule } = this.deps;

    await checkEnvironment({
      runner,
      logger,
      azCommand: settings.azCommand,
      templateDir: settings.templateDir,
      loadModule,
    });
    await sessions.ensureSessions();

    const load = await configStore.load();
    const mode = await chooseReuseMode(load, prompter, logger, this.retryLimit);
    const resolution = await resolveConfig(load.config, mode, prompter);
    const { excludedTemplatePaths } = resolution;
    let record = resolution.record;

    if (mode !== 'ignore') {
      const liveness = await verifyLiveness(record, remoteLivenessProbes(clients, settings.templateDir));
      if (liveness.staleFields.length > 0) {
        logger.warn(`Saved values no longer valid and will be asked again: ${liveness.staleFields.join(', ')}`);
      }
      record = liveness.record;
    }

    const subscription = await selectSubscription(await clients.subscriptions.listSubscriptions(), prompter, logger, {
      preferredId: record.subscriptionId,
      retryLimit: this.retryLimit,
    });
    record.subscriptionId = subscription.subscriptionId;
    record.subscriptionName = subscription.displayName;
    const subscriptionClients = clients.forSubscription(subscription.subscriptionId);

    await this.resolveResourceGroup(record, subscriptionClients);
    await this.resolvePrefix(record);
    await this.resolveNetwork(record, subscriptionClients);

    if (mode === 'override') {
      await configStore.save(record);
    }

    return this.runBatch(record, subscriptionClients, excludedTemplatePaths);
  }

  async runForDeployment(config: DeploymentConfig): Promise<HostResult[]> {
    if (!config.subscriptionId) {
      throw new FatalError('prerequisite-missing', 'The deployment record has no subscription');
    }
    const subscriptionClients = this.deps.clients.forSubscription(config.subscriptionId);
    const record: DeploymentConfig = { ...config };
    await this.resolveNetwork(record, subscriptionClients);
    return this.runBatch(record, subscriptionClients, []);
  }

  // ------------------------------------------------------------------
  // Pool resolution
  // ------------------------------------------------------------------

  private async resolveResourceGroup(record: DeploymentConfig, clients: SubscriptionClients): Promise<void> {
    if (record.resourceGroupName) {
      const group = await clients.resources.getResourceGroup(record.resourceGroupName);
      if (group) {
        record.location = record.location ?? group.location;
        this.deps.logger.info(`Using resource group ${group.name}`);
        return;
      }
      this.deps.logger.warn(`Resource group ${record.resourceGroupName} no longer exists`);
    }

    const choice = await chooseExistingResourceGroup(clients.resources, this.deps.prompter, this.retryLimit);
    if (!choice || choice.action !== 'selected') {
      throw new FatalError('prerequisite-missing', 'Session hosts need the resource group of an existing host pool');
    }
    record.resourceGroupName = choice.value.name;
    record.location = choice.value.location;
  }

  private async resolvePrefix(record: DeploymentConfig): Promise<void> {
    if (!record.prefix) {
      record.prefix = await askValidated(
        this.deps.prompter,
        'Naming prefix used for the host pool',
        value => (PREFIX_PATTERN.test(value) ? null : 'Prefix is 2-8 lowercase letters and digits, starting with a letter'),
        { retryLimit: this.retryLimit }
      );
    }
    const derived = deriveResourceNames(record.prefix);
    record.hostPoolName = record.hostPoolName ?? derived.hostPoolName;
    record.workspaceName = record.workspaceName ?? derived.workspaceName;
    record.appGroupName = record.appGroupName ?? derived.appGroupName;
  }

  private async resolveNetwork(record: DeploymentConfig, clients: SubscriptionClients): Promise<void> {
    const { prompter, logger } = this.deps;
    const derived = record.prefix ? deriveResourceNames(record.prefix) : undefined;
    const wantedVnet = record.vnetName ?? derived?.vnetName;
    const wantedSubnet = record.subnetName ?? derived?.subnetName;

    if (this.options.networkSource === 'manual') {
      record.vnetName = await askValidated(prompter, 'Virtual network name', () => null, {
        default: wantedVnet,
        retryLimit: this.retryLimit,
      });
      record.subnetName = await askValidated(prompter, 'Subnet name', () => null, {
        default: wantedSubnet,
        retryLimit: this.retryLimit,
      });
      return;
    }

    if (!record.resourceGroupName) {
      throw new FatalError('prerequisite-missing', 'Cannot discover networks without a resource group');
    }
    const networks = await clients.resources.listVirtualNetworks(record.resourceGroupName);
    if (networks.length === 0) {
      throw new FatalError(
        'prerequisite-missing',
        `No virtual networks found in ${record.resourceGroupName}; run the core deployment or use manual network entry`
      );
    }

    const known = networks.find(n => n.name === wantedVnet);
    const vnet = known ?? await this.pickNetwork(networks);
    record.vnetName = vnet.name;

    if (wantedSubnet && vnet.subnets.includes(wantedSubnet)) {
      record.subnetName = wantedSubnet;
    } else if (vnet.subnets.length === 1) {
      record.subnetName = vnet.subnets[0];
    } else if (vnet.subnets.length === 0) {
      throw new FatalError('prerequisite-missing', `Virtual network ${vnet.name} has no subnets`);
    } else {
      const choice = await chooseFromList(prompter, {
        title: `Select a subnet in ${vnet.name}:`,
        items: vnet.subnets,
        label: s => s,
        retryLimit: this.retryLimit,
      });
      if (choice.action !== 'selected') throw new FatalError('invalid-selection', 'No subnet selected');
      record.subnetName = choice.value;
    }

    logger.info(`Session hosts will join ${record.vnetName}/${record.subnetName}`);
  }

  private async pickNetwork(networks: VirtualNetworkSummary[]): Promise<VirtualNetworkSummary> {
    if (networks.length === 1) return networks[0];
    const choice = await chooseFromList(this.deps.prompter, {
      title: 'Select the virtual network for the session hosts:',
      items: networks,
      label: n => `${n.name} (${n.addressPrefixes.join(', ')})`,
      retryLimit: this.retryLimit,
    });
    if (choice.action !== 'selected') throw new FatalError('invalid-selection', 'No virtual network selected');
    return choice.value;
  }

  private async resolveMissingGroups(record: DeploymentConfig, requests: SessionHostRequest[]): Promise<void> {
    const needed = new Set<GroupRole>(requests.flatMap(r => r.roles));
    for (const role of needed) {
      const key = role === 'standard' ? 'userGroup' : 'adminGroup';
      if (record[key]) continue;

      const result = await resolveGroup(this.deps.prompter, this.deps.clients.directory, this.deps.logger, {
        role,
        retryLimit: this.retryLimit,
      });
      if (result.action === 'resolved') {
        record[key] = result.group;
      } else {
        this.deps.logger.warn(`No ${role} group chosen - users requesting it will not be added`);
      }
    }
  }

  // ------------------------------------------------------------------
  // Batch
  // ------------------------------------------------------------------

  private async runBatch(
    record: DeploymentConfig,
    clients: SubscriptionClients,
    excludedTemplatePaths: string[]
  ): Promise<HostResult[]> {
    const { settings, prompter, logger, runner } = this.deps;
    const { resourceGroupName, location, prefix, hostPoolName, vnetName, subnetName } = record;
    if (!resourceGroupName || !location || !prefix || !hostPoolName || !vnetName || !subnetName) {
      throw new FatalError('prerequisite-missing', 'Host pool details are incomplete; run the core deployment first');
    }

    const requests = this.options.hostsCsv
      ? await loadRequestsFromCsv(this.options.hostsCsv, prefix)
      : await collectRequests(prompter, prefix, this.retryLimit);
    logger.info(`Session host batch: ${requests.map(r => `${r.vmName} (${r.upn})`).join(', ')}`);

    await this.resolveMissingGroups(record, requests);

    const templateFile = await chooseTemplate(prompter, {
      templates: listTemplates(settings.templateDir),
      kind: 'session-host',
      excludedPaths: excludedTemplatePaths,
      retryLimit: this.retryLimit,
    });
    const template = await loadTemplate(templateFile.path, runner, settings.azCommand);
    logger.info(`Using session host template ${templateFile.name}`);

    const credentials = await obtainAdminCredentials({
      source: this.options.credentialSource,
      prompter,
      logger,
      prefix,
      secretStore: settings.keyVaultUrl ? this.deps.clients.secretStore(settings.keyVaultUrl) : undefined,
      retryLimit: this.retryLimit,
    });

    const pool: HostPoolTarget = {
      resourceGroupName,
      location,
      prefix,
      hostPoolName,
      vnetName,
      subnetName,
      dnsServers: settings.dnsServers,
      userGroup: record.userGroup,
      adminGroup: record.adminGroup,
    };

    const manager = new SessionHostManager({
      resources: clients.resources,
      desktop: clients.desktop,
      directory: this.deps.clients.directory,
      logger,
      cancellation: this.deps.cancellation,
      now: this.deps.now,
    });

    const results = await manager.provisionHosts(requests, pool, {
      template,
      credentials,
      concurrency: settings.hostConcurrency,
      autoShutdown: { time: settings.autoShutdownTime, timeZone: settings.autoShutdownTimeZone },
      deviceTagScope: settings.deviceTagScope,
      deviceExtensionAttribute: settings.deviceExtensionAttribute,
      deviceExtensionValue: settings.deviceExtensionValue,
      prepScriptUrl: settings.prepScriptUrl,
    });

    this.printResults(results);
    await logger.writeSummary(summarizeHostResults(results));
    return results;
  }

  private printResults(results: HostResult[]): void {
    const { prompter } = this.deps;
    prompter.say('\n' + '='.repeat(60));
    prompter.say('Session host results');
    prompter.say('='.repeat(60));
    for (const r of results) {
      const groups = Object.entries(r.groups).map(([role, outcome]) => `${role}=${outcome}`).join(' ') || 'none';
      prompter.say(
        `  ${r.request.vmName.padEnd(16)} provision=${r.provision} assigned=${r.assigned} ` +
        `groups=[${groups}] shutdown=${r.autoShutdown} device=${r.deviceTagged}`
      );
      for (const error of r.errors) {
        prompter.say(`    ✗ ${error}`);
      }
    }
  }
}
