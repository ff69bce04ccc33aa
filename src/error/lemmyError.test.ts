import { describe, expect, it } from 'vitest';
import { getLemmyError, isLemmyError, LemmyError } from './lemmyError.js';
import { OtherError } from './otherError.js';

describe('LemmyError', () => {
  it('exposes the error kind and builds the message from it', () => {
    const err = new LemmyError('incorrect_login');

    expect(err.errorType).toBe('incorrect_login');
    expect(err.detail).toBeNull();
    expect(err.message).toBe('Lemmy Error: incorrect_login');
  });

  it('includes the detail when the server sent one', () => {
    const err = new LemmyError('person_is_banned_from_site', '2030-01-01T00:00:00Z');

    expect(err.detail).toBe('2030-01-01T00:00:00Z');
    expect(err.message).toBe('Lemmy Error: person_is_banned_from_site: 2030-01-01T00:00:00Z');
  });
});

describe('isLemmyError', () => {
  it('distinguishes LemmyError from OtherError', () => {
    expect(isLemmyError(new LemmyError('not_logged_in'))).toBe(true);
    expect(isLemmyError(new OtherError('error sending request'))).toBe(false);
  });

  it('unwraps nested causes', () => {
    const err = new LemmyError('couldnt_find_post');
    expect(getLemmyError(new Error('outer', { cause: err }))).toBe(err);
  });
});
