import { describe, expect, it } from 'vitest';

import { FakeSecretStore } from '../testing/fakes.js';
import { ScriptedPrompter } from '../testing/scripted-prompter.js';
import { Logger } from '../utils/logger.js';
import { obtainAdminCredentials, secretNames, validateAdminPassword, validateAdminUsername } from './credentials.js';

const logger = new Logger('session-host', { consoleEnabled: false, fileEnabled: false });
const PASSWORD = 'Test-secret-123';

describe('validateAdminUsername', () => {
  it('rejects reserved and malformed names', () => {
    expect(validateAdminUsername('pawadmin')).toBeNull();
    expect(validateAdminUsername('Administrator')).toBe('"Administrator" is a reserved name');
    expect(validateAdminUsername('bad name')).not.toBeNull();
    expect(validateAdminUsername('x'.repeat(21))).toBe('Administrator names are at most 20 characters');
  });
});

describe('validateAdminPassword', () => {
  it('requires length and three character classes', () => {
    expect(validateAdminPassword(PASSWORD)).toBeNull();
    expect(validateAdminPassword('short-1A')).toBe('Password must be 12-123 characters');
    expect(validateAdminPassword('alllowercaseletters')).toBe('Password needs three of: lowercase, uppercase, digit, symbol');
  });
});

describe('obtainAdminCredentials', () => {
  it('prompts with a default name and a confirmed password', async () => {
    const prompter = new ScriptedPrompter([''], [PASSWORD, PASSWORD]);

    const credentials = await obtainAdminCredentials({ source: 'prompt', prompter, logger, prefix: 'paw' });

    expect(credentials).toEqual({ username: 'pawadmin', password: PASSWORD });
    expect(prompter.asked).toEqual([
      'Local administrator name [pawadmin]',
      'Local administrator password',
      'Confirm local administrator password',
    ]);
  });

  it('reads stored credentials from the secret store', async () => {
    const store = new FakeSecretStore();
    const names = secretNames('paw');
    store.secrets.set(names.username, 'pawadmin');
    store.secrets.set(names.password, PASSWORD);
    const prompter = new ScriptedPrompter();

    const credentials = await obtainAdminCredentials({ source: 'key-vault', prompter, logger, prefix: 'paw', secretStore: store });

    expect(credentials).toEqual({ username: 'pawadmin', password: PASSWORD });
    expect(prompter.asked).toEqual([]);
  });

  it('prompts once and stores credentials the vault lacks', async () => {
    const store = new FakeSecretStore();
    const prompter = new ScriptedPrompter(['opsadmin'], [PASSWORD, PASSWORD]);

    await obtainAdminCredentials({ source: 'key-vault', prompter, logger, prefix: 'paw', secretStore: store });

    expect(store.secrets.get('paw-sessionhost-admin-username')).toBe('opsadmin');
    expect(store.secrets.get('paw-sessionhost-admin-password')).toBe(PASSWORD);
  });
});
