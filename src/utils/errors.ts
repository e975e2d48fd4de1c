/**
 * Error taxonomy for the provisioning workflows.
 *
 * Only FatalError and CancelledError are allowed to end a run; every other
 * failure is caught at the call site, logged, and the workflow moves on.
 */

export type FatalErrorKind =
  | 'environment'
  | 'restart-required'
  | 'no-subscriptions'
  | 'prerequisite-missing'
  | 'invalid-selection'
  | 'retry-budget-exhausted';

export class FatalError extends Error {
  constructor(readonly kind: FatalErrorKind, message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled by operator') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class RemoteOperationError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    readonly statusCode?: number,
    readonly code?: string
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'RemoteOperationError';
  }
}

type ErrorProperty = 'code' | 'statusCode' | 'status' | 'message';

function property(error: unknown, key: ErrorProperty): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

/**
 * HTTP status code carried by an SDK error, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  const value = property(error, 'statusCode') ?? property(error, 'status');
  return typeof value === 'number' ? value : undefined;
}

/**
 * Service error code (e.g. "RoleAssignmentExists") carried by an SDK error, if any
 */
export function errorCodeOf(error: unknown): string | undefined {
  const code = property(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  const message = property(error, 'message');
  return typeof message === 'string' ? message : 'Unknown error';
}

/**
 * Format an error into a human-readable message: `[code] (HTTP status) message`
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  if (typeof error === 'string') return error;

  const code = errorCodeOf(error);
  const statusCode = statusCodeOf(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(errorMessageOf(error));

  return parts.join(' ');
}

export function isNotFound(error: unknown): boolean {
  return statusCodeOf(error) === 404;
}
