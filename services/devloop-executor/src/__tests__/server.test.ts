import { describe, it, expect } from 'vitest';
import { extractInternalKey, isAuthorized } from '../server';

describe('internal API key', () => {
  it('reads the dedicated header first', () => {
    expect(extractInternalKey({ 'x-internal-api-key': 'test-secret', authorization: 'Bearer other' })).toBe('test-secret');
  });

  it('accepts Bearer and Internal authorization schemes', () => {
    expect(extractInternalKey({ authorization: 'Bearer test-secret' })).toBe('test-secret');
    expect(extractInternalKey({ authorization: 'Internal test-secret' })).toBe('test-secret');
    expect(extractInternalKey({ authorization: 'Basic dGVzdA==' })).toBeUndefined();
  });

  it('falls back to the internalKey query parameter', () => {
    const url = new URL('http://localhost/ws/executor?internalKey=test-secret');
    expect(extractInternalKey({}, url)).toBe('test-secret');
    expect(extractInternalKey({}, new URL('http://localhost/ws/executor'))).toBeUndefined();
  });

  it('authorizes everything when no key is configured', () => {
    expect(isAuthorized('', undefined)).toBe(true);
    expect(isAuthorized('test-secret', undefined)).toBe(false);
    expect(isAuthorized('test-secret', 'wrong')).toBe(false);
    expect(isAuthorized('test-secret', 'test-secret')).toBe(true);
  });
});
