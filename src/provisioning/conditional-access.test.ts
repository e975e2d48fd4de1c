import { describe, expect, it, vi } from 'vitest';

import { FakeDirectory } from '../testing/fakes.js';
import { ScriptedPrompter } from '../testing/scripted-prompter.js';
import { RemoteOperationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import {
  addExclusion,
  excludeFromPolicies,
  resolveStorageApplication,
  storageAppDisplayName,
} from './conditional-access.js';

const logger = new Logger('core', { consoleEnabled: false, fileEnabled: false });
const STORAGE_APP_ID = 'cccccccc-1111-2222-3333-444444444444';

describe('storageAppDisplayName', () => {
  it('names the file endpoint application', () => {
    expect(storageAppDisplayName('pawstorage')).toBe('[Storage Account] pawstorage.file.core.windows.net');
  });
});

describe('addExclusion', () => {
  it('adds the app id once', () => {
    const first = addExclusion({ includeApplications: ['All'], excludeApplications: ['other-app'] }, STORAGE_APP_ID);
    expect(first.changed).toBe(true);
    expect(first.applications.excludeApplications).toEqual(['other-app', STORAGE_APP_ID]);

    const second = addExclusion(first.applications, STORAGE_APP_ID);
    expect(second.changed).toBe(false);
    expect(second.applications.excludeApplications).toEqual(['other-app', STORAGE_APP_ID]);
  });
});

describe('resolveStorageApplication', () => {
  it('takes a single exact match without asking', async () => {
    const directory = new FakeDirectory();
    const app = { id: 'sp-1', appId: STORAGE_APP_ID, displayName: storageAppDisplayName('pawstorage') };
    directory.servicePrincipals.push(app, { id: 'sp-2', appId: 'other', displayName: 'pawstorage-backup' });
    const prompter = new ScriptedPrompter();

    await expect(resolveStorageApplication(prompter, directory, 'pawstorage')).resolves.toEqual(app);
    expect(prompter.asked).toEqual([]);
  });

  it('asks when only partial matches exist', async () => {
    const directory = new FakeDirectory();
    const app = { id: 'sp-2', appId: 'partial-app', displayName: 'pawstorage (files)' };
    directory.servicePrincipals.push(app);

    await expect(resolveStorageApplication(new ScriptedPrompter(['1']), directory, 'pawstorage')).resolves.toEqual(app);
  });

  it('returns null when nothing matches', async () => {
    await expect(resolveStorageApplication(new ScriptedPrompter(), new FakeDirectory(), 'pawstorage')).resolves.toBeNull();
  });
});

describe('excludeFromPolicies', () => {
  function directoryWithPolicies(): FakeDirectory {
    const directory = new FakeDirectory();
    directory.policies.push(
      { id: 'p1', displayName: 'Require MFA', state: 'enabled', applications: { includeApplications: ['All'], excludeApplications: [] } },
      { id: 'p2', displayName: 'Microsoft-managed: MFA for admins', state: 'enabled', applications: { includeApplications: ['All'], excludeApplications: [] } },
      { id: 'p3', displayName: 'Compliant device', state: 'enabled', applications: { includeApplications: ['All'], excludeApplications: [STORAGE_APP_ID] } },
    );
    return directory;
  }

  it('updates tenant policies and skips platform-managed ones', async () => {
    const directory = directoryWithPolicies();

    const report = await excludeFromPolicies(directory, STORAGE_APP_ID, logger);

    expect(report).toEqual({
      updated: ['Require MFA'],
      unchanged: ['Compliant device'],
      skipped: ['Microsoft-managed: MFA for admins'],
      failed: [],
    });
    expect(directory.policies[0].applications.excludeApplications).toEqual([STORAGE_APP_ID]);
    expect(directory.policies[1].applications.excludeApplications).toEqual([]);
  });

  it('leaves each policy with the app excluded exactly once on re-run', async () => {
    const directory = directoryWithPolicies();

    await excludeFromPolicies(directory, STORAGE_APP_ID, logger);
    const second = await excludeFromPolicies(directory, STORAGE_APP_ID, logger);

    expect(second.updated).toEqual([]);
    expect(directory.policyUpdates).toHaveLength(1);
    for (const policy of [directory.policies[0], directory.policies[2]]) {
      expect(policy.applications.excludeApplications.filter(id => id === STORAGE_APP_ID)).toHaveLength(1);
    }
  });

  it('records a failed update and continues', async () => {
    const directory = directoryWithPolicies();
    directory.policies.push(
      { id: 'p4', displayName: 'Block legacy auth', state: 'enabled', applications: { includeApplications: ['All'], excludeApplications: [] } },
    );
    vi.spyOn(directory, 'updatePolicyApplications').mockImplementationOnce(async () => {
      throw new RemoteOperationError('Policy update', 'forbidden', 403);
    });

    const report = await excludeFromPolicies(directory, STORAGE_APP_ID, logger);

    expect(report.failed).toEqual(['Require MFA']);
    expect(report.updated).toEqual(['Block legacy auth']);
  });
});
