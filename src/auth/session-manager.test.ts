import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AccessToken, TokenCredential } from '@azure/identity';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { Logger } from '../utils/logger.js';
import { SessionManager, SERVICE_SCOPES } from './session-manager.js';
import { TokenCache } from './token-cache.js';

const HOUR_MS = 60 * 60 * 1000;

function fakeCredential(expiresOnTimestamp = Date.now() + HOUR_MS) {
  const getToken = vi.fn(async (): Promise<AccessToken> => ({ token: 'test-access-token', expiresOnTimestamp }));
  const credential: TokenCredential = { getToken };
  return { credential, getToken };
}

describe('SessionManager', () => {
  let cacheDir: string;
  const logger = new Logger('core', { consoleEnabled: false, fileEnabled: false });

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paw-sessions-'));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it('signs in to each service once and reuses the cached sessions later', async () => {
    const first = fakeCredential();
    const statuses = await new SessionManager({ cacheDir, logger, credential: first.credential }).ensureSessions();

    expect(statuses.map(s => `${s.service}:${s.status}`)).toEqual([
      'resource-manager:signed-in',
      'directory:signed-in',
      'desktop:signed-in',
    ]);
    expect(first.getToken).toHaveBeenCalledTimes(3);
    expect(first.getToken).toHaveBeenCalledWith(SERVICE_SCOPES.directory);

    const second = fakeCredential();
    const reused = await new SessionManager({ cacheDir, logger, credential: second.credential }).ensureSessions();

    expect(reused.every(s => s.status === 'reused')).toBe(true);
    expect(second.getToken).not.toHaveBeenCalled();
  });

  it('signs in again when forced', async () => {
    await new SessionManager({ cacheDir, logger, credential: fakeCredential().credential }).ensureSessions();
    const forced = fakeCredential();

    const statuses = await new SessionManager({
      cacheDir,
      logger,
      credential: forced.credential,
      forceRefresh: true,
    }).ensureSessions();

    expect(statuses.every(s => s.status === 'signed-in')).toBe(true);
    expect(forced.getToken).toHaveBeenCalledTimes(3);
  });

  it('treats a token about to expire as signed out', async () => {
    await new SessionManager({
      cacheDir,
      logger,
      credential: fakeCredential(Date.now() + 60_000).credential,
    }).ensureSession('desktop');
    const next = fakeCredential();

    const status = await new SessionManager({ cacheDir, logger, credential: next.credential }).ensureSession('desktop');

    expect(status.status).toBe('signed-in');
    expect(next.getToken).toHaveBeenCalledTimes(1);
  });

  it('hands the cached token to SDK clients and passes other scopes through', async () => {
    const expiresOn = Math.floor((Date.now() + HOUR_MS) / 1000);
    new TokenCache(cacheDir, 'directory').save({ accessToken: 'cached-token', expiresOn, service: 'directory' });
    const inner = fakeCredential();
    const credential = new SessionManager({ cacheDir, logger, credential: inner.credential }).credentialFor('directory');

    await expect(credential.getToken('https://graph.microsoft.com/.default')).resolves.toEqual({
      token: 'cached-token',
      expiresOnTimestamp: expiresOn * 1000,
    });
    expect(inner.getToken).not.toHaveBeenCalled();

    await credential.getToken(['https://vault.azure.net/.default']);
    expect(inner.getToken).toHaveBeenCalledWith(['https://vault.azure.net/.default'], undefined);
  });

  it('clears every cached session on logout', async () => {
    const manager = new SessionManager({ cacheDir, logger, credential: fakeCredential().credential });
    await manager.ensureSessions();

    manager.logout();

    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });
});

describe('TokenCache', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paw-token-'));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it('ignores a malformed cache file', () => {
    fs.writeFileSync(path.join(cacheDir, 'desktop-token.json'), JSON.stringify({ accessToken: 42 }));

    expect(new TokenCache(cacheDir, 'desktop').load()).toBeNull();
  });

  it('reports the remaining lifetime', () => {
    const cache = new TokenCache(cacheDir, 'desktop');
    const now = Date.now();
    cache.save({ accessToken: 'test-access-token', expiresOn: Math.floor((now + HOUR_MS) / 1000), service: 'desktop' });

    expect(cache.load(now)?.accessToken).toBe('test-access-token');
    expect(cache.getStatus()).toMatch(/^desktop: token valid for 5\d minutes$/);
  });
});
