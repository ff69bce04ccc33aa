import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { LemmyError } from './lemmyError.js';
import { OtherError } from './otherError.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { ValidationError } from './validationError.js';

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(OtherError, { foo: 'bar' })).toEqual(null);
    expect(unwrapErrorType(OtherError, null)).toEqual(null);
  });

  it('unwraps the first matching layer', () => {
    const validation = new ValidationError('error validating data', []);
    const http = new HTTPError(400, 'error in POST request', { cause: validation });
    const outer = new OtherError('error decoding response', { cause: http });

    expect(unwrapErrorType(HTTPError, outer)).toBe(http);
    expect(unwrapErrorType(ValidationError, outer)).toBe(validation);
  });

  it('returns null when the chain ends without a match', () => {
    const outer = new OtherError('error sending request', { cause: new Error('ECONNREFUSED') });

    expect(unwrapErrorType(LemmyError, outer)).toBeNull();
  });

  it('stops at non-error causes', () => {
    const outer = new Error('outer', { cause: 'a string cause' });

    expect(unwrapErrorType(ValidationError, outer)).toBeNull();
  });
});
