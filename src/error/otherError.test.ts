import { describe, expect, it } from 'vitest';
import { getOtherError, isOtherError, OtherError } from './otherError.js';

describe('OtherError', () => {
  it('keeps the underlying failure as cause', () => {
    const cause = new TypeError('fetch failed');
    const err = new OtherError('error sending POST request', { cause });

    expect(err.cause).toBe(cause);
    expect(isOtherError(err)).toBe(true);
  });

  it('returns null from getOtherError when absent', () => {
    expect(getOtherError(new Error('boom'))).toBeNull();
  });
});
