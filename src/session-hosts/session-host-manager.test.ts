import { describe, expect, it, vi } from 'vitest';

import type { GroupRole } from '../state/deployment-config.js';
import { createFakeClients, type FakeClientSet } from '../testing/fakes.js';
import { CancellationToken } from '../utils/cancellation.js';
import { CancelledError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { deriveVmName, type SessionHostRequest } from './requests.js';
import {
  SessionHostManager,
  summarizeHostResults,
  type HostPoolTarget,
  type SessionHostBatchOptions,
} from './session-host-manager.js';

const USER_GROUP = { id: 'aaaaaaaa-1111-2222-3333-444444444444', displayName: 'PAW-Users', role: 'standard' as const };
const ADMIN_GROUP = { id: 'bbbbbbbb-1111-2222-3333-444444444444', displayName: 'PAW-Admins', role: 'elevated' as const };

const pool: HostPoolTarget = {
  resourceGroupName: 'rg-paw',
  location: 'eastus',
  prefix: 'paw',
  hostPoolName: 'paw-hp',
  vnetName: 'paw-vnet',
  subnetName: 'paw-snet',
  userGroup: USER_GROUP,
  adminGroup: ADMIN_GROUP,
};

function batchOptions(overrides: Partial<SessionHostBatchOptions> = {}): SessionHostBatchOptions {
  return {
    template: {
      parameters: { vmName: {}, location: {}, adminPassword: {}, hostPoolToken: {} },
      resources: [],
    },
    credentials: { username: 'pawadmin', password: 'Test-secret-123' },
    concurrency: 1,
    autoShutdown: { time: '1900', timeZone: 'UTC' },
    deviceTagScope: 'resource-group-prefix',
    deviceExtensionAttribute: 'extensionAttribute1',
    deviceExtensionValue: 'PAW',
    ...overrides,
  };
}

function request(firstName: string, lastName: string, roles: GroupRole[] = []): SessionHostRequest {
  return {
    firstName,
    lastName,
    upn: `${firstName.toLowerCase()}@contoso.test`,
    vmName: deriveVmName('paw', firstName, lastName),
    roles,
  };
}

function setup(cancellation?: CancellationToken): { fakes: FakeClientSet; manager: SessionHostManager; logger: Logger } {
  const fakes = createFakeClients();
  const logger = new Logger('session-host', { consoleEnabled: false, fileEnabled: false });
  const manager = new SessionHostManager({
    resources: fakes.resources,
    desktop: fakes.desktop,
    directory: fakes.directory,
    logger,
    cancellation,
    now: () => new Date('2026-05-06T07:08:09.000Z'),
  });
  return { fakes, manager, logger };
}

describe('SessionHostManager', () => {
  it('mints one token before any deployment and revokes it after all of them', async () => {
    const { fakes, manager } = setup();
    const requests = [request('Ann', 'Lee'), request('Bob', 'Ray'), request('Cy', 'Fox')];

    const results = await manager.provisionHosts(requests, pool, batchOptions({ concurrency: 2 }));

    expect(results.map(r => r.provision)).toEqual(['created', 'created', 'created']);
    expect(fakes.desktop.mintCount).toBe(1);
    expect(fakes.desktop.revokeCount).toBe(1);
    expect(fakes.events[0]).toBe('token:mint:paw-hp');
    expect(fakes.events.at(-1)).toBe('token:revoke:paw-hp');
    const lastDeploy = Math.max(...fakes.events.map((e, i) => (e.startsWith('deploy:') ? i : -1)));
    const firstAssign = fakes.events.findIndex(e => e.startsWith('assign:'));
    expect(firstAssign).toBeGreaterThan(lastDeploy);
  });

  it('passes only the parameters the template declares', async () => {
    const { fakes, manager } = setup();

    await manager.provisionHosts([request('Ann', 'Lee')], pool, batchOptions());

    expect(fakes.resources.deployments).toEqual([{
      resourceGroupName: 'rg-paw',
      deploymentName: 'paw-sh-pawannlee-20260506070809',
      parameters: {
        vmName: 'pawannlee',
        location: 'eastus',
        adminPassword: 'Test-secret-123',
        hostPoolToken: 'test-registration-token',
      },
    }]);
  });

  it('keeps going when one host fails to deploy', async () => {
    const { fakes, manager } = setup();
    fakes.resources.failDeployment = call => call.parameters.vmName === 'pawbobray';
    const requests = [request('Ann', 'Lee'), request('Bob', 'Ray'), request('Cy', 'Fox')];

    const results = await manager.provisionHosts(requests, pool, batchOptions());

    expect(results.map(r => r.provision)).toEqual(['created', 'failed', 'created']);
    expect(results[1].assigned).toBe('skipped');
    expect(results[1].autoShutdown).toBe('skipped');
    expect(fakes.desktop.assignments.map(a => a.vmName)).toEqual(['pawannlee', 'pawcyfox']);
    expect(summarizeHostResults(results)).toEqual({ created: 2, skipped: 0, failed: 1 });
    expect(fakes.desktop.revokeCount).toBe(1);
  });

  it('configures a host whose VM was left behind by a failed deployment', async () => {
    const { fakes, manager } = setup();
    fakes.resources.failDeployment = call => {
      if (call.parameters.vmName !== 'pawbobray') return false;
      fakes.resources.virtualMachines.add('rg-paw/pawbobray');
      return true;
    };
    const requests = [request('Ann', 'Lee'), request('Bob', 'Ray'), request('Cy', 'Fox')];

    const results = await manager.provisionHosts(requests, pool, batchOptions());

    expect(results.map(r => r.provision)).toEqual(['created', 'failed', 'created']);
    expect(results.map(r => r.assigned)).toEqual(['done', 'done', 'done']);
    expect(results.map(r => r.autoShutdown)).toEqual(['done', 'done', 'done']);
    expect(fakes.desktop.assignments.map(a => a.vmName)).toEqual(['pawannlee', 'pawbobray', 'pawcyfox']);
    expect(fakes.resources.autoShutdowns.map(a => a.vmName)).toEqual(['pawannlee', 'pawbobray', 'pawcyfox']);
  });

  it('skips deployment for a VM that already exists but still configures it', async () => {
    const { fakes, manager } = setup();
    fakes.resources.virtualMachines.add('rg-paw/pawannlee');
    const ann = fakes.directory.addUser('ann@contoso.test');

    const [result] = await manager.provisionHosts([request('Ann', 'Lee', ['standard'])], pool, batchOptions());

    expect(result.provision).toBe('skipped-existing');
    expect(result.assigned).toBe('done');
    expect(result.groups).toEqual({ standard: 'added' });
    expect(result.autoShutdown).toBe('done');
    expect(fakes.directory.members.get(USER_GROUP.id)?.has(ann.id)).toBe(true);
    expect(fakes.resources.deployments).toEqual([]);
  });

  it('does not revoke a token that was never minted', async () => {
    const { fakes, manager, logger } = setup();
    vi.spyOn(fakes.desktop, 'createRegistrationToken').mockRejectedValue(new Error('host pool not found'));

    const pending = manager.provisionHosts([request('Ann', 'Lee')], pool, batchOptions());

    await expect(pending).rejects.toThrow('host pool not found');
    expect(fakes.desktop.revokeCount).toBe(0);
    expect(fakes.events).toEqual([]);
    expect(logger.count('warn')).toBe(1);
  });

  it('records an assignment failure without stopping the batch', async () => {
    const { fakes, manager } = setup();
    fakes.desktop.failAssignmentFor.add('pawannlee');

    const results = await manager.provisionHosts([request('Ann', 'Lee'), request('Bob', 'Ray')], pool, batchOptions());

    expect(results.map(r => r.assigned)).toEqual(['failed', 'done']);
    expect(results.map(r => r.autoShutdown)).toEqual(['done', 'done']);
    expect(summarizeHostResults(results)).toEqual({ created: 2, skipped: 0, failed: 1 });
  });

  it('still revokes the token when the operator cancels mid-batch', async () => {
    const cancellation = new CancellationToken();
    const { fakes, manager } = setup(cancellation);
    fakes.resources.failDeployment = () => {
      cancellation.cancel();
      return false;
    };

    const pending = manager.provisionHosts([request('Ann', 'Lee'), request('Bob', 'Ray')], pool, batchOptions());

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(fakes.desktop.revokeCount).toBe(1);
    expect(fakes.events).toEqual([
      'token:mint:paw-hp',
      'vm:exists:pawannlee',
      'deploy:pawannlee',
      'token:revoke:paw-hp',
    ]);
  });

  it('adds users to the groups for their roles', async () => {
    const { fakes, manager } = setup();
    const ann = fakes.directory.addUser('ann@contoso.test');
    await fakes.directory.addGroupMember(ADMIN_GROUP.id, ann.id);

    const [result] = await manager.provisionHosts(
      [request('Ann', 'Lee', ['standard', 'elevated'])],
      pool,
      batchOptions()
    );

    expect(result.groups).toEqual({ standard: 'added', elevated: 'already-member' });
    expect(fakes.directory.members.get(USER_GROUP.id)?.has(ann.id)).toBe(true);
  });

  it('warns when the user is not in the directory', async () => {
    const { manager, logger } = setup();

    const [result] = await manager.provisionHosts([request('Ann', 'Lee', ['standard'])], pool, batchOptions());

    expect(result.groups).toEqual({ standard: 'failed' });
    expect(result.errors).toEqual(['ann@contoso.test: user not found in directory']);
    expect(logger.count('warn')).toBe(2);
  });

  it('tags devices whose names start with the resource group name', async () => {
    const { fakes, manager } = setup();
    fakes.directory.devices.push(
      { id: 'device-1', displayName: 'rg-paw-host-1' },
      { id: 'device-2', displayName: 'other-device' },
    );

    await manager.provisionHosts([request('Ann', 'Lee')], pool, batchOptions());

    expect(fakes.directory.deviceTags).toEqual([
      { deviceId: 'device-1', attribute: 'extensionAttribute1', value: 'PAW' },
    ]);
  });

  it('tags only devices named exactly like a VM in the batch', async () => {
    const { fakes, manager } = setup();
    fakes.directory.devices.push(
      { id: 'device-1', displayName: 'PAWANNLEE' },
      { id: 'device-2', displayName: 'pawannlee2' },
    );

    const [result] = await manager.provisionHosts(
      [request('Ann', 'Lee')],
      pool,
      batchOptions({ deviceTagScope: 'batch-vm-names' })
    );

    expect(fakes.directory.deviceTags.map(t => t.deviceId)).toEqual(['device-1']);
    expect(result.deviceTagged).toBe('done');
  });

  it('logs a revoke failure as an error', async () => {
    const { fakes, manager, logger } = setup();
    vi.spyOn(fakes.desktop, 'revokeRegistrationToken').mockRejectedValue(new Error('forbidden'));

    await manager.provisionHosts([request('Ann', 'Lee')], pool, batchOptions());

    expect(logger.count('error')).toBe(1);
  });

  it('does nothing for an empty batch', async () => {
    const { fakes, manager } = setup();

    await expect(manager.provisionHosts([], pool, batchOptions())).resolves.toEqual([]);
    expect(fakes.desktop.mintCount).toBe(0);
  });
});
