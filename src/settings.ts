import os from 'os';
import path from 'path';

export type DeviceTagScope = 'resource-group-prefix' | 'batch-vm-names';

export interface AppSettings {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  configPath: string;
  templateDir: string;
  logDir: string;
  tokenCacheDir: string;
  azCommand: string;
  promptRetryLimit: number;
  hostConcurrency: number;
  deviceTagScope: DeviceTagScope;
  deviceExtensionAttribute: string;
  deviceExtensionValue: string;
  autoShutdownTime: string;
  autoShutdownTimeZone: string;
  keyVaultUrl?: string;
  prepScriptUrl?: string;
  dnsServers: string[];
}

export const MAX_HOST_CONCURRENCY = 4;

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const IPV4_PATTERN = /^(25[0-5]|2[0-4]\d|1?\d?\d)(\.(25[0-5]|2[0-4]\d|1?\d?\d)){3}$/;

export function parseDnsServers(value: string | undefined): string[] {
  if (!value?.trim()) return [];
  const servers = value.split(',').map(s => s.trim()).filter(Boolean);
  const invalid = servers.filter(s => !IPV4_PATTERN.test(s));
  if (invalid.length > 0) {
    throw new Error(`PAW_DNS_SERVERS contains invalid addresses: ${invalid.join(', ')}`);
  }
  return servers;
}

export function parseDeviceTagScope(value: string | undefined): DeviceTagScope {
  if (value === 'batch-vm-names') return 'batch-vm-names';
  if (value === undefined || value === '' || value === 'resource-group-prefix') return 'resource-group-prefix';
  throw new Error(`Unknown device tag scope: ${value} (expected resource-group-prefix or batch-vm-names)`);
}

/**
 * Read settings from the environment (populated from .env by dotenv)
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const autoShutdownTime = env.PAW_AUTO_SHUTDOWN_TIME || '1900';
  if (!/^([01]\d|2[0-3])[0-5]\d$/.test(autoShutdownTime)) {
    throw new Error(`PAW_AUTO_SHUTDOWN_TIME must be HHmm, got "${autoShutdownTime}"`);
  }

  return {
    tenantId: optional(env.AZURE_TENANT_ID),
    clientId: optional(env.AZURE_CLIENT_ID),
    clientSecret: optional(env.AZURE_CLIENT_SECRET),
    configPath: env.PAW_CONFIG_PATH || path.join('config', 'deployment-config.json'),
    templateDir: env.PAW_TEMPLATE_DIR || 'templates',
    logDir: env.PAW_LOG_DIR || 'logs',
    tokenCacheDir: env.PAW_TOKEN_CACHE_DIR || path.join(os.homedir(), '.paw-provision'),
    azCommand: env.PAW_AZ_COMMAND || 'az',
    promptRetryLimit: positiveInt(env.PAW_PROMPT_RETRY_LIMIT, 5),
    hostConcurrency: Math.min(positiveInt(env.PAW_HOST_CONCURRENCY, 1), MAX_HOST_CONCURRENCY),
    deviceTagScope: parseDeviceTagScope(env.PAW_DEVICE_TAG_SCOPE),
    deviceExtensionAttribute: env.PAW_DEVICE_EXTENSION_ATTRIBUTE || 'extensionAttribute1',
    deviceExtensionValue: env.PAW_DEVICE_EXTENSION_VALUE || 'PAW',
    autoShutdownTime,
    autoShutdownTimeZone: env.PAW_AUTO_SHUTDOWN_TIMEZONE || 'UTC',
    keyVaultUrl: optional(env.PAW_KEY_VAULT_URL),
    prepScriptUrl: optional(env.PAW_PREP_SCRIPT_URL),
    dnsServers: parseDnsServers(env.PAW_DNS_SERVERS),
  };
}
