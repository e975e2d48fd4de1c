/**
 * Session Manager
 *
 * One sign-in per remote service (resource manager, identity directory,
 * virtual desktop control plane). A live cached token means the service is
 * already authenticated and no login happens.
 */

import {
  ClientSecretCredential,
  InteractiveBrowserCredential,
  type AccessToken,
  type GetTokenOptions,
  type TokenCredential,
} from '@azure/identity';
import { TokenCache, type ServiceName } from './token-cache.js';
import type { Logger } from '../utils/logger.js';

export const SERVICE_SCOPES: Record<ServiceName, string[]> = {
  'resource-manager': ['https://management.azure.com/.default'],
  directory: ['https://graph.microsoft.com/.default'],
  desktop: ['https://management.azure.com/.default'],
};

export const SERVICES: readonly ServiceName[] = ['resource-manager', 'directory', 'desktop'];

export interface SessionStatus {
  service: ServiceName;
  status: 'reused' | 'signed-in';
  expiresOn: number;
}

export interface SessionAuthenticator {
  ensureSessions(): Promise<SessionStatus[]>;
}

export interface SessionManagerConfig {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  cacheDir: string;
  forceRefresh?: boolean;
  /** Overrides the credential built from tenant/client settings */
  credential?: TokenCredential;
  logger: Logger;
}

function sameScopes(a: string | string[], b: string[]): boolean {
  const left = (Array.isArray(a) ? a : [a]).slice().sort();
  const right = b.slice().sort();
  return left.length === right.length && left.every((scope, i) => scope === right[i]);
}

/**
 * Presents a service's cached token to the SDK clients, falling back to the
 * underlying credential (and re-caching) once it expires
 */
export class CachedCredential implements TokenCredential {
  constructor(
    private readonly cache: TokenCache,
    private readonly inner: TokenCredential,
    private readonly service: ServiceName,
    private readonly tenantId?: string
  ) {}

  async getToken(scopes: string | string[], options?: GetTokenOptions): Promise<AccessToken | null> {
    const serviceScopes = SERVICE_SCOPES[this.service];
    if (!sameScopes(scopes, serviceScopes)) {
      return this.inner.getToken(scopes, options);
    }

    const cached = this.cache.load();
    if (cached) {
      return { token: cached.accessToken, expiresOnTimestamp: cached.expiresOn * 1000 };
    }

    const token = await this.inner.getToken(serviceScopes, options);
    if (token) {
      this.cache.save({
        accessToken: token.token,
        expiresOn: Math.floor(token.expiresOnTimestamp / 1000),
        service: this.service,
        tenantId: this.tenantId,
      });
    }
    return token;
  }
}

export class SessionManager implements SessionAuthenticator {
  private readonly credential: TokenCredential;
  private readonly caches: Record<ServiceName, TokenCache>;
  private readonly pendingRefresh: Set<ServiceName>;
  private readonly logger: Logger;
  private readonly tenantId?: string;

  constructor(config: SessionManagerConfig) {
    this.logger = config.logger;
    this.tenantId = config.tenantId;
    this.credential = config.credential ?? SessionManager.buildCredential(config);
    this.caches = {
      'resource-manager': new TokenCache(config.cacheDir, 'resource-manager'),
      directory: new TokenCache(config.cacheDir, 'directory'),
      desktop: new TokenCache(config.cacheDir, 'desktop'),
    };
    this.pendingRefresh = new Set(config.forceRefresh ? SERVICES : []);
  }

  private static buildCredential(config: SessionManagerConfig): TokenCredential {
    if (config.tenantId && config.clientId && config.clientSecret) {
      return new ClientSecretCredential(config.tenantId, config.clientId, config.clientSecret);
    }
    return new InteractiveBrowserCredential({
      tenantId: config.tenantId,
      clientId: config.clientId,
      redirectUri: 'http://localhost',
    });
  }

  /**
   * Authenticate one service unless it already has a live session
   */
  async ensureSession(service: ServiceName): Promise<SessionStatus> {
    const cache = this.caches[service];

    if (!this.pendingRefresh.has(service)) {
      const cached = cache.load();
      if (cached) {
        this.logger.info(`Using existing ${service} session`);
        return { service, status: 'reused', expiresOn: cached.expiresOn };
      }
    }

    this.logger.info(`Signing in to ${service}...`);
    const token = await this.credential.getToken(SERVICE_SCOPES[service]);
    if (!token) {
      throw new Error(`Sign-in to ${service} returned no token`);
    }

    const expiresOn = Math.floor(token.expiresOnTimestamp / 1000);
    cache.save({ accessToken: token.token, expiresOn, service, tenantId: this.tenantId });
    this.pendingRefresh.delete(service);
    this.logger.success(`Signed in to ${service}`);

    return { service, status: 'signed-in', expiresOn };
  }

  async ensureSessions(): Promise<SessionStatus[]> {
    const statuses: SessionStatus[] = [];
    for (const service of SERVICES) {
      statuses.push(await this.ensureSession(service));
    }
    return statuses;
  }

  credentialFor(service: ServiceName): TokenCredential {
    return new CachedCredential(this.caches[service], this.credential, service, this.tenantId);
  }

  /** Credential for resources outside the three cached services (e.g. Key Vault) */
  get baseCredential(): TokenCredential {
    return this.credential;
  }

  logout(): void {
    for (const service of SERVICES) {
      this.caches[service].clear();
    }
    this.logger.success('Cleared cached sessions');
  }
}
