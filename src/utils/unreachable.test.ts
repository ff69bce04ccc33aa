import { describe, expect, it } from 'vitest';
import { toWireMethod } from './unreachable.js';

describe('toWireMethod', () => {
  it('maps client methods to wire methods', () => {
    expect(toWireMethod('get')).toBe('GET');
    expect(toWireMethod('post')).toBe('POST');
    expect(toWireMethod('put')).toBe('PUT');
  });

  it('throws for methods the API does not use', () => {
    expect(() => Reflect.apply(toWireMethod, undefined, ['delete'])).toThrow(
      'unreachable: only GET, POST and PUT are used by the Lemmy API, got delete',
    );
  });
});
