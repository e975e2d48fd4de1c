/**
 * Selection/Reuse Engine
 *
 * Decides, per field of the saved deployment record, whether a previous
 * value is reused, replaced by the operator, or re-derived from live state.
 */

import type { RemoteClients } from '../clients/types.js';
import { chooseFromList } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type { ConfigLoadResult } from '../state/config-store.js';
import { GUID_PATTERN, type DeploymentConfig, type DirectoryGroupRef, type GroupRole } from '../state/deployment-config.js';
import { listTemplates } from '../templates/template-locator.js';
import type { Logger } from '../utils/logger.js';

export type ReuseMode = 'use_all' | 'ignore' | 'override';

export interface ConfigResolution {
  record: DeploymentConfig;
  /** Template files left out of the next template selection listing */
  excludedTemplatePaths: string[];
}

interface OverrideField {
  label: string;
  read(config: DeploymentConfig): string | undefined;
  write(config: DeploymentConfig, value: string): void;
}

function groupField(key: 'userGroup' | 'adminGroup', role: GroupRole, label: string): OverrideField {
  return {
    label,
    read: config => config[key]?.id,
    write: (config, value) => {
      // Display name is refreshed from the directory when the id is verified
      const ref: DirectoryGroupRef = { id: value, displayName: value, role };
      config[key] = ref;
    },
  };
}

/**
 * Fields offered for override, in prompt order. The template path is not in
 * this list: it is always re-selected from the template directory.
 */
export const OVERRIDE_FIELDS: readonly OverrideField[] = [
  {
    label: 'Subscription ID',
    read: c => c.subscriptionId,
    write: (c, v) => {
      c.subscriptionId = v;
      c.subscriptionName = undefined;
    },
  },
  { label: 'Resource group', read: c => c.resourceGroupName, write: (c, v) => { c.resourceGroupName = v; } },
  { label: 'Region', read: c => c.location, write: (c, v) => { c.location = v; } },
  { label: 'Naming prefix', read: c => c.prefix, write: (c, v) => { c.prefix = v; } },
  { label: 'Virtual network address range', read: c => c.vnetAddressPrefix, write: (c, v) => { c.vnetAddressPrefix = v; } },
  { label: 'Subnet address range', read: c => c.subnetAddressPrefix, write: (c, v) => { c.subnetAddressPrefix = v; } },
  { label: 'Storage account name', read: c => c.storageAccountName, write: (c, v) => { c.storageAccountName = v; } },
  groupField('userGroup', 'standard', 'Standard users group object ID'),
  groupField('adminGroup', 'elevated', 'Elevated admins group object ID'),
];

function cloneConfig(config: DeploymentConfig): DeploymentConfig {
  return {
    ...config,
    ...(config.userGroup && { userGroup: { ...config.userGroup } }),
    ...(config.adminGroup && { adminGroup: { ...config.adminGroup } }),
  };
}

export async function resolveConfig(
  prior: DeploymentConfig | null,
  mode: ReuseMode,
  prompter: Prompter
): Promise<ConfigResolution> {
  if (!prior || mode === 'ignore') {
    return { record: {}, excludedTemplatePaths: [] };
  }

  if (mode === 'use_all') {
    return { record: cloneConfig(prior), excludedTemplatePaths: [] };
  }

  const record = cloneConfig(prior);
  prompter.say('\nPress Enter to keep the current value, or type a replacement.');

  for (const field of OVERRIDE_FIELDS) {
    const current = field.read(record);
    const answer = (await prompter.ask(`${field.label} [${current ?? 'not set'}]`)).trim();
    if (answer !== '') {
      field.write(record, answer);
    }
  }

  const excludedTemplatePaths: string[] = [];
  if (record.templatePath) {
    excludedTemplatePaths.push(record.templatePath);
    delete record.templatePath;
  }

  return { record, excludedTemplatePaths };
}

const MODE_CHOICES: ReadonlyArray<{ mode: ReuseMode; label: string }> = [
  { mode: 'use_all', label: 'Use all saved values' },
  { mode: 'ignore', label: 'Ignore saved values and start fresh' },
  { mode: 'override', label: 'Review and override some saved values' },
];

export function summarizeConfig(config: DeploymentConfig): string[] {
  const lines: string[] = [];
  const add = (label: string, value: string | undefined) => {
    if (value) lines.push(`  ${label.padEnd(22)} ${value}`);
  };

  add('Subscription:', config.subscriptionName ? `${config.subscriptionName} (${config.subscriptionId})` : config.subscriptionId);
  add('Resource group:', config.resourceGroupName);
  add('Region:', config.location);
  add('Naming prefix:', config.prefix);
  add('Virtual network:', config.vnetName);
  add('Subnet:', config.subnetName);
  add('Storage account:', config.storageAccountName);
  add('Standard users group:', config.userGroup?.displayName);
  add('Elevated admins group:', config.adminGroup?.displayName);
  add('Template:', config.templatePath);
  add('Saved:', config.savedAt);

  return lines;
}

/**
 * Ask how to treat a previous run's record. Missing or malformed files mean
 * starting fresh.
 */
export async function chooseReuseMode(
  load: ConfigLoadResult,
  prompter: Prompter,
  logger: Logger,
  retryLimit?: number
): Promise<ReuseMode> {
  if (load.status === 'malformed') {
    logger.warn('Previous configuration could not be read - starting fresh');
    return 'ignore';
  }
  if (load.status === 'missing' || !load.config || Object.keys(load.config).length === 0) {
    return 'ignore';
  }

  prompter.say('\nA previous configuration was found:');
  for (const line of summarizeConfig(load.config)) {
    prompter.say(line);
  }

  const choice = await chooseFromList(prompter, {
    title: 'How should the saved configuration be used?',
    items: MODE_CHOICES,
    label: c => c.label,
    retryLimit,
  });

  if (choice.action !== 'selected') {
    return 'ignore';
  }

  logger.info(`Saved configuration mode: ${choice.value.mode}`);
  return choice.value.mode;
}

export interface LivenessProbes {
  subscriptionExists(subscriptionId: string): Promise<boolean>;
  resourceGroupExists(subscriptionId: string, resourceGroupName: string): Promise<boolean>;
  /** Current display name of a directory group, or null when it no longer exists */
  groupDisplayName(groupId: string): Promise<string | null>;
  templateExists(templatePath: string): Promise<boolean>;
}

/**
 * Probes backed by the live subscription, directory and template directory
 */
export function remoteLivenessProbes(clients: RemoteClients, templateDir: string): LivenessProbes {
  let subscriptionIds: Set<string> | undefined;
  return {
    subscriptionExists: async id => {
      subscriptionIds ??= new Set(
        (await clients.subscriptions.listSubscriptions()).map(s => s.subscriptionId.toLowerCase())
      );
      return subscriptionIds.has(id.toLowerCase());
    },
    resourceGroupExists: async (subscriptionId, name) =>
      (await clients.forSubscription(subscriptionId).resources.getResourceGroup(name)) !== null,
    groupDisplayName: async id =>
      GUID_PATTERN.test(id) ? (await clients.directory.getGroup(id))?.displayName ?? null : null,
    templateExists: async templatePath => listTemplates(templateDir).some(t => t.path === templatePath),
  };
}

export interface LivenessReport {
  record: DeploymentConfig;
  staleFields: string[];
}

/**
 * Drop saved references whose remote object no longer exists, so the
 * workflow re-resolves them. Group display names are refreshed.
 */
export async function verifyLiveness(config: DeploymentConfig, probes: LivenessProbes): Promise<LivenessReport> {
  const record = cloneConfig(config);
  const staleFields: string[] = [];

  if (record.subscriptionId && !(await probes.subscriptionExists(record.subscriptionId))) {
    staleFields.push('subscriptionId');
    delete record.subscriptionId;
    delete record.subscriptionName;
  }

  if (record.resourceGroupName) {
    const live = record.subscriptionId
      ? await probes.resourceGroupExists(record.subscriptionId, record.resourceGroupName)
      : false;
    if (!live) {
      staleFields.push('resourceGroupName');
      delete record.resourceGroupName;
    }
  }

  for (const key of ['userGroup', 'adminGroup'] as const) {
    const group = record[key];
    if (!group) continue;
    const displayName = await probes.groupDisplayName(group.id);
    if (displayName === null) {
      staleFields.push(key);
      delete record[key];
    } else {
      record[key] = { ...group, displayName };
    }
  }

  if (record.templatePath && !(await probes.templateExists(record.templatePath))) {
    staleFields.push('templatePath');
    delete record.templatePath;
  }

  return { record, staleFields };
}
