import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';

describe('isAbortError', () => {
  it('returns true for instances of AbortError', () => {
    const err = new AbortError('stopped');
    expect(isAbortError(err)).toBe(true);
    expect(err.name).toBe('AbortError');
  });

  it('returns true when the AbortError is a nested cause', () => {
    const err = new Error('error sending request', { cause: new AbortError('owner cleaned up') });
    expect(isAbortError(err)).toBe(true);
  });

  it('returns false for non-abort errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
  });
});
