import { describe, expect, it } from 'vitest';
import { buildRoute } from './buildRoute.js';

describe('buildRoute', () => {
  it('builds https routes for secure instances', () => {
    expect(buildRoute('user/login', { domain: 'lemmy.ml', secure: true })).toBe('https://lemmy.ml/api/v3/user/login');
  });

  it('builds http routes and keeps the port', () => {
    expect(buildRoute('site', { domain: 'localhost:8536', secure: false })).toBe('http://localhost:8536/api/v3/site');
  });

  it('leaves the path untouched', () => {
    expect(buildRoute('post/list?x=1 y', { domain: 'a.b', secure: true })).toBe('https://a.b/api/v3/post/list?x=1 y');
  });
});
