import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { encodeQuery } from './encodeQuery.js';

const route = 'https://lemmy.ml/api/v3/post/list';

describe('encodeQuery', () => {
  it('stringifies scalars and skips absent fields', () => {
    const [err, query] = encodeQuery(route, {
      community_id: 5,
      sort: 'Hot',
      saved_only: false,
      page: undefined,
      page_cursor: null,
    });

    expect(err).toBeNull();
    expect(query).toBe('community_id=5&sort=Hot&saved_only=false');
  });

  it('returns an empty string for empty forms', () => {
    expect(encodeQuery(route, {})).toEqual([null, '']);
  });

  it('percent-encodes values', () => {
    const [, query] = encodeQuery(route, { q: 'rust & go' });

    expect(query).toBe('q=rust+%26+go');
  });

  it('rejects nested values', () => {
    const [err, query] = encodeQuery(route, { post_ids: [1, 2] });

    expect(query).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('error encoding query, unsupported value for post_ids');
    expect(err?.url).toBe(route);
  });
});
