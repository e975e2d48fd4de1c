/**
 * Resource Provisioning Orchestrator
 *
 * Core deployment state machine. Stages share one ProvisioningContext and
 * each declares the context fields it needs:
 *
 *   environment → authenticate → saved config → subscription → resource group
 *   → directory groups → parameters → persist → deploy → post-deploy RBAC
 *   → conditional access → optional session host hand-off
 */

import type { SessionAuthenticator } from '../auth/session-manager.js';
import type {
  DeploymentResult,
  RemoteClients,
  ResourceGroupSummary,
  SubscriptionClients,
  SubscriptionSummary,
} from '../clients/types.js';
import type { CommandRunner } from '../environment/command-runner.js';
import { checkEnvironment, type ModuleLoader } from '../environment/environment-check.js';
import { askValidated, chooseFromList, confirm } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import {
  chooseReuseMode,
  remoteLivenessProbes,
  resolveConfig,
  verifyLiveness,
  type ReuseMode,
} from '../selection/reuse-engine.js';
import type { SessionHostHandoff } from '../session-hosts/session-host-workflow.js';
import { summarizeHostResults, type HostResult } from '../session-hosts/session-host-manager.js';
import type { AppSettings } from '../settings.js';
import type { ConfigStore } from '../state/config-store.js';
import {
  deriveResourceNames,
  PREFIX_PATTERN,
  type DeploymentConfig,
  type DirectoryGroupRef,
  type GroupRole,
} from '../state/deployment-config.js';
import { chooseTemplate, listTemplates, type TemplateFile } from '../templates/template-locator.js';
import { loadTemplate, selectDeclaredParameters } from '../templates/template-loader.js';
import type { CancellationToken } from '../utils/cancellation.js';
import { CancelledError, FatalError, formatErrorMessage } from '../utils/errors.js';
import type { Logger, RunSummary } from '../utils/logger.js';
import { excludeFromPolicies, resolveStorageApplication } from './conditional-access.js';
import { resolveGroup } from './group-resolver.js';
import { collectNetworkRanges, validateCidr, cidrContains } from './network.js';
import { coreRoleAssignments, ensureRoleAssignment, resourceGroupScope } from './role-assignments.js';
import {
  askNewResourceGroup,
  chooseExistingResourceGroup,
  DEFAULT_REGION,
  selectSubscription,
  validateRegion,
} from './selection.js';
import { CONTINUE, runStages, type Stage, type StageOutcome, type StageRunResult } from './stages.js';
import { resolveStorageAccountName } from './storage-name.js';

export interface CoreParameters {
  prefix: string;
  vnetAddressPrefix: string;
  subnetAddressPrefix: string;
  storageAccountName: string;
}

export interface ProvisioningContext {
  reuseMode?: ReuseMode;
  config: DeploymentConfig;
  excludedTemplatePaths: string[];
  subscription?: SubscriptionSummary;
  clients?: SubscriptionClients;
  resourceGroup?: ResourceGroupSummary;
  userGroup?: DirectoryGroupRef;
  adminGroup?: DirectoryGroupRef;
  parameters?: CoreParameters;
  template?: TemplateFile;
  deployment?: DeploymentResult;
  summary: RunSummary;
}

export interface OrchestratorDeps {
  settings: AppSettings;
  prompter: Prompter;
  logger: Logger;
  clients: RemoteClients;
  sessions: SessionAuthenticator;
  configStore: ConfigStore;
  runner: CommandRunner;
  sessionHosts?: SessionHostHandoff;
  cancellation?: CancellationToken;
  loadModule?: ModuleLoader;
  now?: () => Date;
}

export interface OrchestratorReport {
  result: StageRunResult;
  context: ProvisioningContext;
}

const GROUP_KEYS: Record<GroupRole, 'userGroup' | 'adminGroup'> = {
  standard: 'userGroup',
  elevated: 'adminGroup',
};

function requireValue<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new Error(`${what} is not resolved`);
  }
  return value;
}

export class ProvisioningOrchestrator {
  private readonly retryLimit: number;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.retryLimit = deps.settings.promptRetryLimit;
    this.now = deps.now ?? (() => new Date());
  }

  stages(): Stage<ProvisioningContext>[] {
    return [
      { name: 'environment check', run: () => this.checkEnvironment() },
      { name: 'authentication', run: () => this.authenticate() },
      { name: 'saved configuration', run: ctx => this.loadConfiguration(ctx) },
      { name: 'subscription', run: ctx => this.selectSubscription(ctx) },
      {
        name: 'resource group',
        requires: ['clients'],
        reenterable: true,
        run: ctx => this.resolveResourceGroup(ctx),
      },
      {
        name: 'directory groups',
        requires: ['resourceGroup'],
        reenterable: true,
        run: ctx => this.resolveDirectoryGroups(ctx),
      },
      {
        name: 'parameters',
        requires: ['clients', 'resourceGroup', 'userGroup', 'adminGroup'],
        run: ctx => this.collectParameters(ctx),
      },
      { name: 'persist configuration', requires: ['parameters', 'template'], run: ctx => this.persist(ctx) },
      { name: 'deploy', requires: ['clients', 'resourceGroup', 'parameters', 'template'], run: ctx => this.deploy(ctx) },
      {
        name: 'post-deploy configuration',
        requires: ['clients', 'subscription', 'resourceGroup', 'userGroup', 'adminGroup', 'deployment'],
        run: ctx => this.postDeploy(ctx),
      },
      { name: 'conditional access', requires: ['parameters'], run: ctx => this.conditionalAccess(ctx) },
      { name: 'session host hand-off', run: ctx => this.sessionHostHandoff(ctx) },
    ];
  }

  async run(): Promise<OrchestratorReport> {
    const context: ProvisioningContext = {
      config: {},
      excludedTemplatePaths: [],
      summary: { created: 0, skipped: 0, failed: 0 },
    };

    const result = await runStages(this.stages(), context, {
      logger: this.deps.logger,
      transitionBudget: this.retryLimit,
      cancellation: this.deps.cancellation,
    });

    await this.deps.logger.writeSummary(context.summary);
    return { result, context };
  }

  // ------------------------------------------------------------------
  // 1-2. Environment and sign-in
  // ------------------------------------------------------------------

  private async checkEnvironment(): Promise<StageOutcome> {
    const { runner, logger, settings, loadModule } = this.deps;
    await checkEnvironment({
      runner,
      logger,
      azCommand: settings.azCommand,
      templateDir: settings.templateDir,
      loadModule,
    });
    return CONTINUE;
  }

  private async authenticate(): Promise<StageOutcome> {
    const statuses = await this.deps.sessions.ensureSessions();
    const signedIn = statuses.filter(s => s.status === 'signed-in').map(s => s.service);
    if (signedIn.length === 0) {
      this.deps.logger.info('All services already authenticated');
    }
    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // Saved configuration
  // ------------------------------------------------------------------

  private async loadConfiguration(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { configStore, prompter, logger, clients } = this.deps;

    const load = await configStore.load();
    const mode = await chooseReuseMode(load, prompter, logger, this.retryLimit);
    const resolution = await resolveConfig(load.config, mode, prompter);
    ctx.reuseMode = mode;
    ctx.excludedTemplatePaths = resolution.excludedTemplatePaths;

    if (mode === 'ignore') {
      ctx.config = resolution.record;
      return CONTINUE;
    }

    const liveness = await verifyLiveness(
      resolution.record,
      remoteLivenessProbes(clients, this.deps.settings.templateDir)
    );

    if (liveness.staleFields.length > 0) {
      logger.warn(`Saved values no longer valid and will be asked again: ${liveness.staleFields.join(', ')}`);
    }
    ctx.config = liveness.record;
    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 3. Subscription
  // ------------------------------------------------------------------

  private async selectSubscription(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { clients, prompter, logger } = this.deps;
    const subscription = await selectSubscription(await clients.subscriptions.listSubscriptions(), prompter, logger, {
      preferredId: ctx.config.subscriptionId,
      retryLimit: this.retryLimit,
    });

    ctx.subscription = subscription;
    ctx.clients = clients.forSubscription(subscription.subscriptionId);
    ctx.config.subscriptionId = subscription.subscriptionId;
    ctx.config.subscriptionName = subscription.displayName;
    if (subscription.tenantId) ctx.config.tenantId = subscription.tenantId;
    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 4. Resource group
  // ------------------------------------------------------------------

  private async resolveResourceGroup(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { prompter, logger } = this.deps;
    const resources = requireValue(ctx.clients, 'Subscription').resources;

    if (ctx.config.resourceGroupName) {
      const existing = await resources.getResourceGroup(ctx.config.resourceGroupName);
      if (existing) {
        ctx.resourceGroup = existing;
        ctx.config.location = existing.location;
        logger.info(`Using resource group ${existing.name} (${existing.location})`);
        return CONTINUE;
      }
      // An override may name a group that does not exist yet
      logger.info(`Resource group ${ctx.config.resourceGroupName} does not exist - creating it`);
      return this.createResourceGroup(ctx, ctx.config.resourceGroupName, ctx.config.location);
    }

    const mode = await chooseFromList(prompter, {
      title: 'Resource group:',
      items: ['existing', 'new'] as const,
      label: item => (item === 'existing' ? 'Use an existing resource group' : 'Create a new resource group'),
      retryLimit: this.retryLimit,
    });
    if (mode.action !== 'selected') return { kind: 'retry', reason: 'choose a resource group' };

    if (mode.value === 'existing') {
      const choice = await chooseExistingResourceGroup(resources, prompter, this.retryLimit);
      if (choice === null) {
        prompter.say('  ✗ The subscription has no resource groups - create one instead');
        return { kind: 'retry', reason: 'no existing resource groups' };
      }
      if (choice.action === 'back') return { kind: 'retry', reason: 'back to the resource group choice' };

      ctx.resourceGroup = choice.value;
      ctx.config.resourceGroupName = choice.value.name;
      ctx.config.location = choice.value.location;
      logger.info(`Selected resource group ${choice.value.name}`);
      return CONTINUE;
    }

    const { name, location } = await askNewResourceGroup(prompter, { location: ctx.config.location }, this.retryLimit);
    const existing = await resources.getResourceGroup(name);
    if (existing) {
      logger.info(`Resource group ${name} already exists - using it`);
      ctx.resourceGroup = existing;
      ctx.config.resourceGroupName = existing.name;
      ctx.config.location = existing.location;
      ctx.summary.skipped++;
      return CONTINUE;
    }
    return this.createResourceGroup(ctx, name, location);
  }

  private async createResourceGroup(
    ctx: ProvisioningContext,
    name: string,
    location: string | undefined
  ): Promise<StageOutcome> {
    const resources = requireValue(ctx.clients, 'Subscription').resources;
    const region = location ?? await askValidated(this.deps.prompter, `Region for ${name}`, validateRegion, {
      default: DEFAULT_REGION,
      retryLimit: this.retryLimit,
    });

    const group = await resources.createResourceGroup(name, region);
    this.deps.logger.success(`Created resource group ${group.name} in ${group.location}`);
    ctx.summary.created++;
    ctx.resourceGroup = group;
    ctx.config.resourceGroupName = group.name;
    ctx.config.location = group.location;
    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 5. Directory groups
  // ------------------------------------------------------------------

  private async resolveDirectoryGroups(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { prompter, logger, clients } = this.deps;

    for (const role of ['standard', 'elevated'] as const) {
      const key = GROUP_KEYS[role];
      const saved = ctx.config[key];
      if (saved) {
        ctx[key] = saved;
        logger.info(`Using ${role} group ${saved.displayName} (${saved.id})`);
        continue;
      }

      const result = await resolveGroup(prompter, clients.directory, logger, { role, retryLimit: this.retryLimit });
      if (result.action === 'back') {
        // Re-open the resource group choice
        delete ctx.config.resourceGroupName;
        ctx.resourceGroup = undefined;
        return { kind: 'back' };
      }
      ctx[key] = result.group;
      ctx.config[key] = result.group;
    }

    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 6. Parameters
  // ------------------------------------------------------------------

  private async collectParameters(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { prompter, logger, settings } = this.deps;
    const resources = requireValue(ctx.clients, 'Subscription').resources;
    const resourceGroup = requireValue(ctx.resourceGroup, 'Resource group');
    const config = ctx.config;

    const prefix = config.prefix && PREFIX_PATTERN.test(config.prefix)
      ? config.prefix
      : await askValidated(
          prompter,
          'Naming prefix (2-8 lowercase letters and digits)',
          value => (PREFIX_PATTERN.test(value) ? null : 'Prefix is 2-8 lowercase letters and digits, starting with a letter'),
          { default: 'paw', retryLimit: this.retryLimit }
        );

    const savedRanges =
      config.vnetAddressPrefix && config.subnetAddressPrefix &&
      validateCidr(config.vnetAddressPrefix) === null &&
      validateCidr(config.subnetAddressPrefix) === null &&
      cidrContains(config.vnetAddressPrefix, config.subnetAddressPrefix)
        ? { vnetAddressPrefix: config.vnetAddressPrefix, subnetAddressPrefix: config.subnetAddressPrefix }
        : undefined;
    const ranges = savedRanges ?? await collectNetworkRanges(prompter, {}, this.retryLimit);

    const storageAccountName = await resolveStorageAccountName(prompter, resources, logger, {
      proposed: config.storageAccountName,
      resourceGroupName: resourceGroup.name,
      retryLimit: this.retryLimit,
    });

    const template = await chooseTemplate(prompter, {
      templates: listTemplates(settings.templateDir),
      kind: 'core',
      excludedPaths: ctx.excludedTemplatePaths,
      retryLimit: this.retryLimit,
    });

    ctx.parameters = { prefix, ...ranges, storageAccountName };
    ctx.template = template;
    Object.assign(config, {
      prefix,
      vnetAddressPrefix: ranges.vnetAddressPrefix,
      subnetAddressPrefix: ranges.subnetAddressPrefix,
      storageAccountName,
      templatePath: template.path,
      ...deriveResourceNames(prefix),
    });

    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 7. Persist
  // ------------------------------------------------------------------

  private async persist(ctx: ProvisioningContext): Promise<StageOutcome> {
    ctx.config = await this.deps.configStore.save(ctx.config);
    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 8. Deploy
  // ------------------------------------------------------------------

  private async deploy(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { logger, runner, settings } = this.deps;
    const resources = requireValue(ctx.clients, 'Subscription').resources;
    const resourceGroup = requireValue(ctx.resourceGroup, 'Resource group');
    const parameters = requireValue(ctx.parameters, 'Parameters');
    const templateFile = requireValue(ctx.template, 'Template');
    const userGroup = requireValue(ctx.userGroup, 'Standard group');
    const adminGroup = requireValue(ctx.adminGroup, 'Elevated group');

    const stamp = this.now().toISOString().replace(/[-:T]/g, '').slice(0, 14);
    const deploymentName = `paw-core-${parameters.prefix}-${stamp}`;

    try {
      const template = await loadTemplate(templateFile.path, runner, settings.azCommand);
      const { parameters: values, dropped } = selectDeclaredParameters(template, {
        prefix: parameters.prefix,
        location: resourceGroup.location,
        vnetAddressPrefix: parameters.vnetAddressPrefix,
        subnetAddressPrefix: parameters.subnetAddressPrefix,
        storageAccountName: parameters.storageAccountName,
        userGroupId: userGroup.id,
        adminGroupId: adminGroup.id,
      });
      if (dropped.length > 0) {
        logger.debug(`Template ${templateFile.name} does not declare ${dropped.join(', ')}`);
      }

      logger.info(`Deploying ${templateFile.name} to ${resourceGroup.name} as ${deploymentName} (this can take a while)...`);
      ctx.deployment = await resources.deployTemplate(resourceGroup.name, deploymentName, template, values);
      ctx.summary.created++;
      logger.success(`Deployment ${deploymentName} succeeded`);
      return CONTINUE;
    } catch (error) {
      ctx.summary.failed++;
      logger.error(`Deployment ${deploymentName} failed: ${formatErrorMessage(error)}`);
      logger.warn('Resources created before the failure are left in place; re-run to resume');
      return { kind: 'stop', reason: 'core deployment failed' };
    }
  }

  // ------------------------------------------------------------------
  // 9. Post-deploy RBAC
  // ------------------------------------------------------------------

  private async postDeploy(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { logger, prompter } = this.deps;
    const clients = requireValue(ctx.clients, 'Subscription');
    const subscription = requireValue(ctx.subscription, 'Subscription');
    const resourceGroup = requireValue(ctx.resourceGroup, 'Resource group');
    const userGroup = requireValue(ctx.userGroup, 'Standard group');
    const adminGroup = requireValue(ctx.adminGroup, 'Elevated group');
    const appGroupName = requireValue(ctx.config.appGroupName, 'Application group name');

    const appGroup = await clients.desktop.getApplicationGroup(resourceGroup.name, appGroupName);
    if (!appGroup) {
      throw new FatalError(
        'prerequisite-missing',
        `Application group ${appGroupName} was not found in ${resourceGroup.name}; the core template must create it`
      );
    }

    const rgScope = resourceGroupScope(subscription.subscriptionId, resourceGroup.name);
    for (const target of coreRoleAssignments(rgScope, appGroup.id, userGroup.id, adminGroup.id)) {
      this.deps.cancellation?.throwIfCancelled();
      const group = target.principalId === userGroup.id ? userGroup : adminGroup;
      const where = target.scope === rgScope ? resourceGroup.name : appGroup.name;
      try {
        const outcome = await ensureRoleAssignment(clients.resources, target);
        if (outcome === 'created') {
          ctx.summary.created++;
          logger.success(`Granted ${target.roleName} to ${group.displayName} on ${where}`);
        } else {
          ctx.summary.skipped++;
          logger.info(`${group.displayName} already has ${target.roleName} on ${where}`);
        }
      } catch (error) {
        ctx.summary.failed++;
        logger.error(`Granting ${target.roleName} to ${group.displayName} on ${where} failed: ${formatErrorMessage(error)}`);
      }
    }

    if (await confirm(prompter, 'Set a friendly name for the desktop?', { default: false, retryLimit: this.retryLimit })) {
      const friendlyName = await askValidated(
        prompter,
        'Desktop friendly name',
        value => (value.length > 64 ? 'Friendly names are at most 64 characters' : null),
        { default: 'Privileged Access Workstation', retryLimit: this.retryLimit }
      );
      try {
        await clients.desktop.updateDesktopFriendlyName(resourceGroup.name, appGroup.name, friendlyName);
        logger.success(`Desktop friendly name set to "${friendlyName}"`);
      } catch (error) {
        ctx.summary.failed++;
        logger.error(`Setting the desktop friendly name failed: ${formatErrorMessage(error)}`);
      }
    }

    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 10. Conditional access
  // ------------------------------------------------------------------

  private async conditionalAccess(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { prompter, logger, clients } = this.deps;
    const { storageAccountName } = requireValue(ctx.parameters, 'Parameters');

    try {
      const app = await resolveStorageApplication(prompter, clients.directory, storageAccountName, this.retryLimit);
      if (!app) {
        logger.warn(`No directory application found for storage account ${storageAccountName} - skipping policy exclusions`);
        return CONTINUE;
      }

      logger.info(`Excluding ${app.displayName} (${app.appId}) from conditional access policies`);
      const report = await excludeFromPolicies(clients.directory, app.appId, logger);
      ctx.summary.created += report.updated.length;
      ctx.summary.skipped += report.unchanged.length;
      ctx.summary.failed += report.failed.length;
      if (report.skipped.length > 0) {
        logger.info(`Left ${report.skipped.length} platform-managed policies untouched`);
      }
    } catch (error) {
      if (error instanceof FatalError || error instanceof CancelledError) throw error;
      ctx.summary.failed++;
      logger.error(`Conditional access update failed: ${formatErrorMessage(error)}`);
    }

    return CONTINUE;
  }

  // ------------------------------------------------------------------
  // 11. Session host hand-off
  // ------------------------------------------------------------------

  private async sessionHostHandoff(ctx: ProvisioningContext): Promise<StageOutcome> {
    const { sessionHosts, prompter, logger } = this.deps;
    if (!sessionHosts) return CONTINUE;

    if (!(await confirm(prompter, 'Provision session hosts now?', { default: false, retryLimit: this.retryLimit }))) {
      logger.info('Session hosts can be added later with --session-hosts');
      return CONTINUE;
    }

    let results: HostResult[];
    try {
      results = await sessionHosts.runForDeployment(ctx.config);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      ctx.summary.failed++;
      logger.error(`Session host provisioning failed: ${formatErrorMessage(error)}`);
      logger.info('The core deployment is complete; retry session hosts with --session-hosts');
      return CONTINUE;
    }
    const hosts = summarizeHostResults(results);
    logger.info(`Session hosts: created=${hosts.created} skipped=${hosts.skipped} failed=${hosts.failed}`);
    return CONTINUE;
  }
}
