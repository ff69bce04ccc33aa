import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('exposes url via getter', () => {
    const err = new ConstructURLError('bad query', 'https://lemmy.example/api/v3/post/list');
    expect(err.url).toBe('https://lemmy.example/api/v3/post/list');
  });
});

describe('isConstructURLError', () => {
  it('returns true for instances of ConstructURLError', () => {
    const err = new ConstructURLError('bad query', 'https://lemmy.example/api/v3/post/list');
    expect(isConstructURLError(err)).toBe(true);
  });

  it('returns false for non ConstructURLError errors', () => {
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});

describe('getConstructURLError', () => {
  it('unwraps nested causes', () => {
    const err = new ConstructURLError('bad query', 'https://lemmy.example/api/v3/post/list');
    const wrapped = new Error('outer', { cause: err });
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('returns null when no ConstructURLError exists', () => {
    expect(getConstructURLError(new Error('outer', { cause: new Error('inner') }))).toBeNull();
  });
});
