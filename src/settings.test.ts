import path from 'path';
import { describe, expect, it } from 'vitest';

import { loadSettings, parseDeviceTagScope, parseDnsServers } from './settings.js';

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({});

    expect(settings).toMatchObject({
      configPath: path.join('config', 'deployment-config.json'),
      templateDir: 'templates',
      logDir: 'logs',
      azCommand: 'az',
      promptRetryLimit: 5,
      hostConcurrency: 1,
      deviceTagScope: 'resource-group-prefix',
      deviceExtensionAttribute: 'extensionAttribute1',
      deviceExtensionValue: 'PAW',
      autoShutdownTime: '1900',
      autoShutdownTimeZone: 'UTC',
      dnsServers: [],
    });
    expect(settings.clientSecret).toBeUndefined();
  });

  it('caps host concurrency at four', () => {
    expect(loadSettings({ PAW_HOST_CONCURRENCY: '9' }).hostConcurrency).toBe(4);
    expect(loadSettings({ PAW_HOST_CONCURRENCY: 'zero' }).hostConcurrency).toBe(1);
  });

  it('rejects a malformed shutdown time', () => {
    expect(() => loadSettings({ PAW_AUTO_SHUTDOWN_TIME: '7pm' })).toThrow('PAW_AUTO_SHUTDOWN_TIME must be HHmm, got "7pm"');
  });

  it('treats blank secrets as unset', () => {
    expect(loadSettings({ AZURE_CLIENT_SECRET: '  ' }).clientSecret).toBeUndefined();
  });
});

describe('parseDnsServers', () => {
  it('splits and validates addresses', () => {
    expect(parseDnsServers('10.0.0.4, 10.0.0.5')).toEqual(['10.0.0.4', '10.0.0.5']);
    expect(parseDnsServers(undefined)).toEqual([]);
    expect(() => parseDnsServers('10.0.0.4,dns.local')).toThrow('PAW_DNS_SERVERS contains invalid addresses: dns.local');
  });
});

describe('parseDeviceTagScope', () => {
  it('accepts the two strategies', () => {
    expect(parseDeviceTagScope('batch-vm-names')).toBe('batch-vm-names');
    expect(parseDeviceTagScope(undefined)).toBe('resource-group-prefix');
    expect(() => parseDeviceTagScope('all')).toThrow('Unknown device tag scope: all');
  });
});
