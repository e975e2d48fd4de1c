import fs from 'fs';
import path from 'path';
import { errorMessageOf } from '../utils/errors.js';

export type ServiceName = 'resource-manager' | 'directory' | 'desktop';

export interface CachedToken {
  accessToken: string;
  expiresOn: number; // Unix timestamp (seconds)
  service: ServiceName;
  tenantId?: string;
}

// Tokens this close to expiry are treated as expired
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

export class TokenCache {
  private cacheFile: string;

  constructor(private readonly cacheDir: string, private readonly service: ServiceName) {
    this.cacheFile = path.join(cacheDir, `${service}-token.json`);
  }

  private ensureCacheDir(): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Save token to cache
   */
  save(token: CachedToken): void {
    try {
      this.ensureCacheDir();
      fs.writeFileSync(this.cacheFile, JSON.stringify(token, null, 2), {
        mode: 0o600,
      });
    } catch (error) {
      console.warn(`⚠ Failed to cache ${this.service} token: ${errorMessageOf(error)}`);
    }
  }

  /**
   * Load a still-valid token, or null
   */
  load(now: number = Date.now()): CachedToken | null {
    try {
      if (!fs.existsSync(this.cacheFile)) {
        return null;
      }

      const parsed: unknown = JSON.parse(fs.readFileSync(this.cacheFile, 'utf8'));
      const token = toCachedToken(parsed, this.service);
      if (!token) {
        return null;
      }

      if (token.expiresOn * 1000 < now + EXPIRY_BUFFER_MS) {
        return null;
      }

      return token;
    } catch (error) {
      console.warn(`⚠ Failed to load cached ${this.service} token: ${errorMessageOf(error)}`);
      return null;
    }
  }

  /**
   * Clear cached token
   */
  clear(): void {
    try {
      if (fs.existsSync(this.cacheFile)) {
        fs.unlinkSync(this.cacheFile);
      }
    } catch (error) {
      console.warn(`⚠ Failed to clear ${this.service} token cache: ${errorMessageOf(error)}`);
    }
  }

  getStatus(): string {
    const token = this.load();
    if (!token) {
      return `${this.service}: not signed in`;
    }

    const expiresIn = Math.floor((token.expiresOn * 1000 - Date.now()) / 1000 / 60);
    return `${this.service}: token valid for ${expiresIn} minutes`;
  }
}

function toCachedToken(value: unknown, service: ServiceName): CachedToken | null {
  if (typeof value !== 'object' || value === null) return null;
  const accessToken: unknown = Reflect.get(value, 'accessToken');
  const expiresOn: unknown = Reflect.get(value, 'expiresOn');
  const tenantId: unknown = Reflect.get(value, 'tenantId');
  if (typeof accessToken !== 'string' || typeof expiresOn !== 'number') return null;
  return {
    accessToken,
    expiresOn,
    service,
    ...(typeof tenantId === 'string' && { tenantId }),
  };
}
