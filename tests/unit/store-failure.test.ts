import { describe, it, expect } from 'vitest';
import { isConnectionFailure, storeFailure } from '../../src/store/failure.js';
import { MalformedQueryError, StoreError, StoreUnavailableError } from '../../src/errors.js';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isConnectionFailure', () => {
  it.each(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', '08006', '08001', '57P01', '53300'])('is true for code %s', (code) => {
    expect(isConnectionFailure(pgError('x', code))).toBe(true);
  });

  it.each(['42P01', '42703', '22P02', '57014'])('is false for code %s', (code) => {
    expect(isConnectionFailure(pgError('x', code))).toBe(false);
  });

  it('recognizes pg messages without a code', () => {
    expect(isConnectionFailure(new Error('Connection terminated unexpectedly'))).toBe(true);
    expect(isConnectionFailure(new Error('timeout exceeded when trying to connect'))).toBe(true);
  });

  it('is false for other errors', () => {
    expect(isConnectionFailure(new Error('boom'))).toBe(false);
    expect(isConnectionFailure('boom')).toBe(false);
  });
});

describe('storeFailure', () => {
  it('wraps connection failures in StoreUnavailableError', () => {
    const root = pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    const err = storeFailure('scan region', root);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err.cause).toBe(root);
    expect(err.stage).toBe('evaluate');
    expect(err.message).toBe(
      'Point store unavailable while trying to scan region: Error: connect ECONNREFUSED 127.0.0.1:5432',
    );
  });

  it('wraps statement failures in StoreError', () => {
    const err = storeFailure('scan region', pgError('relation "inspection_region" does not exist', '42P01'));
    expect(err).toBeInstanceOf(StoreError);
    expect(err.message).toBe('Failed to scan region: Error: relation "inspection_region" does not exist');
  });

  it('uses the given stage', () => {
    expect(storeFailure('load points', new Error('boom'), 'load').stage).toBe('load');
  });

  it('passes errors of this package through', () => {
    const own = new MalformedQueryError('bad', 'query');
    expect(storeFailure('scan region', own)).toBe(own);
  });
});
