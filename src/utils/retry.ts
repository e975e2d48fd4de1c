/**
 * Retry and timeout helpers for remote calls.
 *
 * Idempotent reads (listing, existence checks) go through `readCall`, which
 * bounds each attempt with a timeout and retries throttling, 5xx and network
 * failures with exponential backoff. Mutations (deployments, token mint and
 * revoke, group and role assignment creation) are never retried.
 */

import { errorCodeOf, errorMessageOf, statusCodeOf } from './errors.js';

export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  timeoutMs?: number;
}

export type RetryConfig = Required<RetryOptions>;

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 200,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
  timeoutMs: 60_000,
};

const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'RequestTimeout',
  'ServiceUnavailable',
  'InternalServerError',
  'ServerBusy',
  'TooManyRequests',
  'GatewayTimeout',
  'OperationTimedOut',
]);

const RETRYABLE_PATTERNS = [
  'throttl',
  'too many requests',
  'rate limit',
  'temporarily unavailable',
  'socket hang up',
  'network error',
  'fetch failed',
];

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Remote call timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function shouldRetry(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;

  const code = errorCodeOf(error);
  if (code && RETRYABLE_CODES.has(code)) return true;

  const statusCode = statusCodeOf(error);
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  const message = errorMessageOf(error).toLowerCase();
  return RETRYABLE_PATTERNS.some(pattern => message.includes(pattern));
}

/**
 * Retry-After header value carried by an SDK error, in milliseconds
 */
export function retryAfterMs(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return null;
  }
  const response: unknown = Reflect.get(error, 'response');
  if (typeof response !== 'object' || response === null || !('headers' in response)) {
    return null;
  }
  const headers: unknown = Reflect.get(response, 'headers');
  if (typeof headers !== 'object' || headers === null || !('get' in headers)) {
    return null;
  }
  const getHeader: unknown = Reflect.get(headers, 'get');
  if (typeof getHeader !== 'function') return null;

  const value: unknown = getHeader.call(headers, 'retry-after');
  if (typeof value !== 'string') return null;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(value);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }
  return null;
}

/**
 * Run a call with an abort signal that fires after `timeoutMs`
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute a function with retry, exponential backoff and jitter
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const config: RetryConfig = { ...RETRY_DEFAULTS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await withTimeout(fn, config.timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetry(error)) break;

      const serverDelay = retryAfterMs(error);
      let delayMs: number;
      if (serverDelay !== null) {
        delayMs = serverDelay;
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

/**
 * Idempotent read: bounded timeout, retried on transient failures
 */
export function readCall<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  return withRetry(fn, options);
}

/**
 * Mutation: bounded timeout, never retried
 */
export function mutateCall<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number = RETRY_DEFAULTS.timeoutMs
): Promise<T> {
  return withTimeout(fn, timeoutMs);
}
