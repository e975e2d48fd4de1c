/**
 * Deployment Configuration Record
 *
 * Resumable outcome of a previous core deployment run. Every field is
 * optional: a missing or invalid field is re-resolved by the workflow.
 */

import { z } from 'zod';

export type GroupRole = 'standard' | 'elevated';

export interface DirectoryGroupRef {
  id: string;
  displayName: string;
  role: GroupRole;
}

export interface DeploymentConfig {
  tenantId?: string;
  subscriptionId?: string;
  subscriptionName?: string;
  resourceGroupName?: string;
  location?: string;
  vnetName?: string;
  subnetName?: string;
  vnetAddressPrefix?: string;
  subnetAddressPrefix?: string;
  prefix?: string;
  storageAccountName?: string;
  userGroup?: DirectoryGroupRef;
  adminGroup?: DirectoryGroupRef;
  templatePath?: string;
  hostPoolName?: string;
  workspaceName?: string;
  appGroupName?: string;
  savedAt?: string;
}

export const STORAGE_ACCOUNT_NAME_PATTERN = /^[a-z0-9]{3,24}$/;
export const PREFIX_PATTERN = /^[a-z][a-z0-9]{1,7}$/;
export const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const nonEmpty = z.string().trim().min(1);

function groupSchema(role: GroupRole) {
  return z.object({
    id: z.string().regex(GUID_PATTERN),
    displayName: nonEmpty,
    role: z.literal(role).default(role),
  });
}

const fieldSchemas = {
  tenantId: z.string().regex(GUID_PATTERN),
  subscriptionId: z.string().regex(GUID_PATTERN),
  subscriptionName: nonEmpty,
  resourceGroupName: nonEmpty,
  location: nonEmpty,
  vnetName: nonEmpty,
  subnetName: nonEmpty,
  vnetAddressPrefix: nonEmpty,
  subnetAddressPrefix: nonEmpty,
  prefix: z.string().regex(PREFIX_PATTERN),
  storageAccountName: z.string().regex(STORAGE_ACCOUNT_NAME_PATTERN),
  userGroup: groupSchema('standard'),
  adminGroup: groupSchema('elevated'),
  templatePath: nonEmpty,
  hostPoolName: nonEmpty,
  workspaceName: nonEmpty,
  appGroupName: nonEmpty,
  savedAt: nonEmpty,
} satisfies { [K in keyof DeploymentConfig]-?: z.ZodType<NonNullable<DeploymentConfig[K]>, z.ZodTypeDef, unknown> };

export type ConfigField = keyof typeof fieldSchemas;

export const CONFIG_FIELDS: readonly ConfigField[] = [
  'tenantId',
  'subscriptionId',
  'subscriptionName',
  'resourceGroupName',
  'location',
  'vnetName',
  'subnetName',
  'vnetAddressPrefix',
  'subnetAddressPrefix',
  'prefix',
  'storageAccountName',
  'userGroup',
  'adminGroup',
  'templatePath',
  'hostPoolName',
  'workspaceName',
  'appGroupName',
  'savedAt',
];

export interface ParsedConfig {
  config: DeploymentConfig;
  droppedFields: string[];
}

/**
 * Validate a decoded JSON value field by field. Unknown keys are ignored and
 * invalid fields are dropped so the workflow re-prompts for them.
 */
export function parseDeploymentConfig(raw: unknown): ParsedConfig {
  const config: DeploymentConfig = {};
  const droppedFields: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { config, droppedFields };
  }

  for (const field of CONFIG_FIELDS) {
    if (!(field in raw)) continue;
    const value: unknown = Reflect.get(raw, field);
    if (value === null || value === undefined || value === '') continue;
    if (!assignField(config, field, value)) {
      droppedFields.push(field);
    }
  }

  return { config, droppedFields };
}

function assignField(config: DeploymentConfig, field: ConfigField, value: unknown): boolean {
  switch (field) {
    case 'userGroup':
    case 'adminGroup': {
      const result = fieldSchemas[field].safeParse(value);
      if (result.success) config[field] = result.data;
      return result.success;
    }
    default: {
      const result = fieldSchemas[field].safeParse(value);
      if (result.success) config[field] = result.data;
      return result.success;
    }
  }
}

export interface DerivedNames {
  hostPoolName: string;
  workspaceName: string;
  appGroupName: string;
  vnetName: string;
  subnetName: string;
}

/**
 * Resource names the core template creates for a naming prefix
 */
export function deriveResourceNames(prefix: string): DerivedNames {
  return {
    hostPoolName: `${prefix}-hp`,
    workspaceName: `${prefix}-ws`,
    appGroupName: `${prefix}-dag`,
    vnetName: `${prefix}-vnet`,
    subnetName: `${prefix}-snet`,
  };
}

export function emptyConfig(): DeploymentConfig {
  return {};
}
