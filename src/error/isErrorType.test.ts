import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { LemmyError } from './lemmyError.js';
import { OtherError } from './otherError.js';

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(OtherError, { error: 'incorrect_login' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(LemmyError, new LemmyError('incorrect_login'))).toEqual(true);
  });

  it('expect three layers deep to correctly return true', () => {
    const err = new HTTPError(500);
    const wrapped1 = new Error('error decoding', { cause: err });
    const wrapped2 = new OtherError('error decoding response', { cause: wrapped1 });

    expect(isErrorType(HTTPError, wrapped2)).toEqual(true);
  });

  it('expect an unrelated cause chain to return false', () => {
    const wrapped = new OtherError('error decoding response', { cause: new Error('unexpected token') });

    expect(isErrorType(HTTPError, wrapped)).toEqual(false);
  });
});
