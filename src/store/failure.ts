import { RegionQueryError, StoreError, StoreUnavailableError, type Stage } from '../errors.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'EAI_AGAIN',
]);

// Raised by pg / pg-pool without a code
const CONNECTION_ERROR_MESSAGES = [
  'Connection terminated',
  'timeout exceeded when trying to connect',
  'Client has encountered a connection error',
];

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * True when the failure means the database could not be reached or dropped
 * the session: socket errors, SQLSTATE class 08 (connection exception),
 * 57P (operator intervention) and 53300 (too many connections).
 */
export function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== undefined) {
    return CONNECTION_ERROR_CODES.has(code)
      || code.startsWith('08')
      || code.startsWith('57P')
      || code === '53300';
  }
  const message = err instanceof Error ? err.message : String(err);
  return CONNECTION_ERROR_MESSAGES.some((m) => message.includes(m));
}

/**
 * Wraps a driver failure in StoreUnavailableError or StoreError.
 * Errors already raised by this package pass through unchanged.
 */
export function storeFailure(action: string, err: unknown, stage: Stage = 'evaluate'): RegionQueryError {
  if (err instanceof RegionQueryError) return err;
  if (isConnectionFailure(err)) {
    return new StoreUnavailableError(`Point store unavailable while trying to ${action}: ${String(err)}`, err, stage);
  }
  return new StoreError(`Failed to ${action}: ${String(err)}`, err, stage);
}
