import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadSettings, type AppSettings } from '../settings.js';
import { ConfigStore } from '../state/config-store.js';
import { createFakeClients, FakeCommandRunner, FakeSessions, TEST_SUBSCRIPTION, type FakeClientSet } from '../testing/fakes.js';
import { ScriptedPrompter } from '../testing/scripted-prompter.js';
import { RemoteOperationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { ProvisioningOrchestrator, type OrchestratorDeps } from './orchestrator.js';

const CORE_TEMPLATE = {
  $schema: 'https://schema.management.azure.com/schemas/2019-04-01/deploymentTemplate.json#',
  parameters: {
    prefix: { type: 'string' },
    location: { type: 'string' },
    vnetAddressPrefix: { type: 'string' },
    subnetAddressPrefix: { type: 'string' },
    storageAccountName: { type: 'string' },
    userGroupId: { type: 'string' },
    adminGroupId: { type: 'string' },
  },
  resources: [],
};

const USER_GROUP_ID = 'aaaaaaaa-1111-2222-3333-444444444444';
const ADMIN_GROUP_ID = 'bbbbbbbb-1111-2222-3333-444444444444';
const STORAGE_APP_ID = 'cccccccc-1111-2222-3333-444444444444';

describe('ProvisioningOrchestrator', () => {
  let dir: string;
  let settings: AppSettings;
  let fakes: FakeClientSet;
  let logger: Logger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'paw-orchestrator-'));
    await fs.writeFile(path.join(dir, 'core-infra.json'), JSON.stringify(CORE_TEMPLATE), 'utf-8');
    settings = loadSettings({
      PAW_TEMPLATE_DIR: dir,
      PAW_CONFIG_PATH: path.join(dir, 'config', 'deployment-config.json'),
      PAW_LOG_DIR: dir,
    });
    fakes = createFakeClients();
    fakes.desktop.addApplicationGroup('rg-paw', 'paw-dag');
    fakes.directory.servicePrincipals.push({
      id: 'sp-1',
      appId: STORAGE_APP_ID,
      displayName: '[Storage Account] pawstore01.file.core.windows.net',
    });
    fakes.directory.policies.push({
      id: 'p1',
      displayName: 'Require MFA',
      state: 'enabled',
      applications: { includeApplications: ['All'], excludeApplications: [] },
    });
    logger = new Logger('core', { consoleEnabled: false, fileEnabled: false });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function orchestrator(prompter: ScriptedPrompter, extra: Partial<OrchestratorDeps> = {}): ProvisioningOrchestrator {
    return new ProvisioningOrchestrator({
      settings,
      prompter,
      logger,
      clients: fakes.clients,
      sessions: new FakeSessions(),
      configStore: new ConfigStore(settings.configPath, logger, () => new Date('2026-05-06T07:08:09.000Z')),
      runner: new FakeCommandRunner(),
      loadModule: async () => ({}),
      now: () => new Date('2026-05-06T07:08:09.000Z'),
      ...extra,
    });
  }

  async function savedConfig(): Promise<unknown> {
    return JSON.parse(await fs.readFile(settings.configPath, 'utf-8'));
  }

  it('runs a fresh deployment end to end', async () => {
    const prompter = new ScriptedPrompter([
      '2', 'rg-paw', '',   // new resource group in the default region
      '2', '',             // create the standard users group
      '2', '',             // create the elevated admins group
      '', '', '',          // prefix and network defaults
      'pawstore01',
      '',                  // use the suggested core template
      '',                  // no friendly name
    ]);

    const report = await orchestrator(prompter).run();

    expect(report.result).toEqual({ status: 'completed' });
    expect(prompter.remaining()).toBe(0);
    expect(fakes.resources.deployments).toEqual([{
      resourceGroupName: 'rg-paw',
      deploymentName: 'paw-core-paw-20260506070809',
      parameters: {
        prefix: 'paw',
        location: 'eastus',
        vnetAddressPrefix: '10.10.0.0/16',
        subnetAddressPrefix: '10.10.1.0/24',
        storageAccountName: 'pawstore01',
        userGroupId: '00000000-0000-0000-0000-000000000001',
        adminGroupId: '00000000-0000-0000-0000-000000000002',
      },
    }]);
    expect(fakes.resources.roleAssignments).toHaveLength(6);
    expect(fakes.directory.policies[0].applications.excludeApplications).toEqual([STORAGE_APP_ID]);
    expect(report.context.summary).toEqual({ created: 9, skipped: 0, failed: 0 });

    expect(await savedConfig()).toMatchObject({
      subscriptionId: TEST_SUBSCRIPTION.subscriptionId,
      resourceGroupName: 'rg-paw',
      location: 'eastus',
      prefix: 'paw',
      storageAccountName: 'pawstore01',
      hostPoolName: 'paw-hp',
      appGroupName: 'paw-dag',
      templatePath: path.join(dir, 'core-infra.json'),
      userGroup: { id: '00000000-0000-0000-0000-000000000001', displayName: 'PAW-Users', role: 'standard' },
      savedAt: '2026-05-06T07:08:09.000Z',
    });
  });

  it('finishes the core run when session host provisioning fails', async () => {
    const runForDeployment = vi.fn(async () => {
      throw new RemoteOperationError('Registration token mint', 'internal error', 500);
    });
    const writeSummary = vi.spyOn(logger, 'writeSummary');
    const prompter = new ScriptedPrompter([
      '2', 'rg-paw', '', '2', '', '2', '', '', '', '', 'pawstore01', '', '',
      'y',                 // provision session hosts now
    ]);

    const report = await orchestrator(prompter, { sessionHosts: { runForDeployment } }).run();

    expect(report.result).toEqual({ status: 'completed' });
    expect(prompter.remaining()).toBe(0);
    expect(runForDeployment).toHaveBeenCalledTimes(1);
    expect(report.context.summary).toEqual({ created: 9, skipped: 0, failed: 1 });
    expect(writeSummary).toHaveBeenCalledWith({ created: 9, skipped: 0, failed: 1 });
    expect(fakes.resources.deployments).toHaveLength(1);
  });

  it('stops after a failed deployment with the configuration already saved', async () => {
    fakes.resources.failDeployment = () => true;
    const prompter = new ScriptedPrompter(['2', 'rg-paw', '', '2', '', '2', '', '', '', '', 'pawstore01', '']);

    const report = await orchestrator(prompter).run();

    expect(report.result).toEqual({ status: 'stopped', stage: 'deploy', reason: 'core deployment failed' });
    expect(report.context.summary.failed).toBe(1);
    expect(fakes.resources.roleAssignments).toEqual([]);
    expect(await savedConfig()).toMatchObject({ resourceGroupName: 'rg-paw', storageAccountName: 'pawstore01' });
  });

  it('resumes from a saved configuration without asking again', async () => {
    fakes.resources.addResourceGroup('rg-paw');
    fakes.resources.unavailableStorageNames.add('pawstore01');
    fakes.resources.storageAccounts.add('rg-paw/pawstore01');
    fakes.directory.addGroup('PAW-Users', USER_GROUP_ID);
    fakes.directory.addGroup('PAW-Admins', ADMIN_GROUP_ID);
    await fs.mkdir(path.dirname(settings.configPath), { recursive: true });
    await fs.writeFile(settings.configPath, JSON.stringify({
      subscriptionId: TEST_SUBSCRIPTION.subscriptionId,
      resourceGroupName: 'rg-paw',
      location: 'eastus',
      prefix: 'paw',
      vnetAddressPrefix: '10.20.0.0/16',
      subnetAddressPrefix: '10.20.1.0/24',
      storageAccountName: 'pawstore01',
      userGroup: { id: USER_GROUP_ID, displayName: 'PAW-Users' },
      adminGroup: { id: ADMIN_GROUP_ID, displayName: 'PAW-Admins' },
    }), 'utf-8');
    const runForDeployment = vi.fn(async () => []);
    const prompter = new ScriptedPrompter(['1', '', '', 'y']);

    const report = await orchestrator(prompter, { sessionHosts: { runForDeployment } }).run();

    expect(report.result).toEqual({ status: 'completed' });
    expect(prompter.remaining()).toBe(0);
    expect(fakes.events.filter(e => e.startsWith('rg:create') || e.startsWith('group:create'))).toEqual([]);
    expect(fakes.resources.deployments[0].parameters.vnetAddressPrefix).toBe('10.20.0.0/16');
    expect(runForDeployment).toHaveBeenCalledWith(expect.objectContaining({ hostPoolName: 'paw-hp', prefix: 'paw' }));
  });

  it('re-opens the resource group choice when group selection goes back', async () => {
    fakes.resources.addResourceGroup('rg-paw');
    fakes.resources.addResourceGroup('rg-other', 'westeurope');
    const prompter = new ScriptedPrompter([
      '1', '2',          // existing group: rg-paw
      'b',               // back from the standard users group
      '1', '1',          // existing group: rg-other
      '2', '', '2', '',
      '', '', '', 'pawstore01', '', '',
    ]);
    fakes.desktop.addApplicationGroup('rg-other', 'paw-dag');

    const report = await orchestrator(prompter).run();

    expect(report.result).toEqual({ status: 'completed' });
    expect(fakes.resources.deployments[0].resourceGroupName).toBe('rg-other');
    expect(fakes.resources.deployments[0].parameters.location).toBe('westeurope');
  });
});
