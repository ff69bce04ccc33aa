import { afterEach, describe, expect, expectTypeOf, it, vi } from 'vitest';
import { LemmyError } from '../error/lemmyError.js';
import { lemmyEndpoints } from '../lemmy/endpoints.js';
import { getSiteResponseSchema, siteResponseSchema } from '../lemmy/responses.js';
import type { TransportProviderDefinition, TransportResponse } from '../types/request.js';
import { createClientLogger } from '../utils/logger.js';
import { LemmyClient } from './client.js';
import type { LemmyResult } from './types.js';

function jsonResponse(status: number, body: string): TransportResponse {
  return { status, ok: status >= 200 && status < 300, headers: new Headers(), text: async () => body };
}

function createTransport(response: TransportResponse) {
  return {
    get: vi.fn<TransportProviderDefinition['get']>(async () => [null, response]),
    post: vi.fn<TransportProviderDefinition['post']>(async () => [null, response]),
    put: vi.fn<TransportProviderDefinition['put']>(async () => [null, response]),
    dispose: vi.fn(),
  };
}

const logger = createClientLogger({ silent: true });
const success = jsonResponse(200, '{"success":true}');

describe('LemmyClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('endpoints', () => {
    it('maps each path and method to its response schema', () => {
      expectTypeOf(lemmyEndpoints.site.get.response).toEqualTypeOf<typeof getSiteResponseSchema>();
      expect(lemmyEndpoints.site.get.response).toBe(getSiteResponseSchema);
      expect(lemmyEndpoints.site.put.response).toBe(siteResponseSchema);
    });

    it('defaults the request of form-less endpoints', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      const [err, data] = await client.validateAuth();

      expect(err).toBeNull();
      expect(data).toEqual({ success: true });
      expect(transport.get.mock.calls[0][0]).toBe('https://lemmy.ml/api/v3/user/validate_auth');
    });

    it('sends GET forms as query strings', async () => {
      const transport = createTransport(jsonResponse(200, '{"posts":[]}'));
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      const [err, data] = await client.getPosts({ body: { community_name: 'rust', limit: 10 } });

      expect(err).toBeNull();
      expect(data).toEqual({ posts: [] });
      expect(transport.get.mock.calls[0][0]).toBe('https://lemmy.ml/api/v3/post/list?community_name=rust&limit=10');
    });

    it('sends POST forms as json', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      await client.markPostAsRead({ body: { post_ids: [1, 2], read: true } });

      const [url, opts] = transport.post.mock.calls[0];
      expect(url).toBe('https://lemmy.ml/api/v3/post/mark_as_read');
      expect(opts.body).toBe('{"post_ids":[1,2],"read":true}');
    });

    it('sends PUT forms as json', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      await client.hideCommunity({ body: { community_id: 3, hidden: true } });

      const [url, opts] = transport.put.mock.calls[0];
      expect(url).toBe('https://lemmy.ml/api/v3/community/hide');
      expect(opts.body).toBe('{"community_id":3,"hidden":true}');
    });

    it('returns the server error kind', async () => {
      const transport = createTransport(jsonResponse(400, '{"error":"incorrect_login"}'));
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      const [err, data] = await client.login({ body: { username_or_email: 'alice', password: 'wrong' } });

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(LemmyError);
      expect(err instanceof LemmyError && err.errorType).toBe('incorrect_login');
    });

    const allOptionalCalls: Array<[string, (client: LemmyClient) => LemmyResult<unknown>]> = [
      ['resolveObject', (client) => client.resolveObject({ body: { q: 'https://lemmy.ml/post/1' } })],
      ['getFederatedInstances', (client) => client.getFederatedInstances()],
      ['getCaptcha', (client) => client.getCaptcha()],
    ];

    it.each(allOptionalCalls)('returns the server error kind from %s', async (_name, call) => {
      const transport = createTransport(jsonResponse(400, '{"error":"couldnt_find_object"}'));
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      const [err, data] = await call(client);

      expect(data).toBeNull();
      expect(err instanceof LemmyError && err.errorType).toBe('couldnt_find_object');
    });
  });

  describe('headers', () => {
    it('sends Accept by default and lets per-call headers override it', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      await client.validateAuth();
      await client.validateAuth({ body: {} }, { Accept: 'text/plain' });

      expect(transport.get.mock.calls[0][1].headers.get('accept')).toBe('application/json');
      expect(transport.get.mock.calls[1][1].headers.get('accept')).toBe('text/plain');
    });

    it('merges and removes default headers through config', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({
        domain: 'lemmy.ml',
        secure: true,
        headers: { 'X-Base': '1' },
        transport,
        logger,
      });

      client.config({ headers: { 'X-Base': null, 'X-Extra': '2' } });
      await client.validateAuth();

      const { headers } = transport.get.mock.calls[0][1];
      expect(headers.has('x-base')).toBe(false);
      expect(headers.get('x-extra')).toBe('2');
    });
  });

  describe('token', () => {
    it('sends the token set after construction', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      client.setJwt('test-secret');
      await client.getUnreadCount();

      expect(transport.get.mock.calls[0][1].headers.get('authorization')).toBe('Bearer test-secret');
    });

    it('prefers the per-call token', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, jwt: 'client-token', transport, logger });

      await client.logout({ body: {}, jwt: 'call-token' });

      expect(transport.post.mock.calls[0][1].headers.get('authorization')).toBe('Bearer call-token');
    });

    it('clears the token through config', async () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, jwt: 'client-token', transport, logger });

      client.config({ jwt: null });
      await client.validateAuth();

      expect(transport.get.mock.calls[0][1].headers.has('authorization')).toBe(false);
      expect(client.clientOptions.jwt).toBeUndefined();
    });
  });

  describe('clientOptions', () => {
    it('returns a frozen snapshot', () => {
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport: createTransport(success), logger });

      const snapshot = client.clientOptions;
      client.setJwt('test-secret');

      expect(snapshot).toEqual({ domain: 'lemmy.ml', secure: true, jwt: undefined });
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(client.clientOptions.jwt).toBe('test-secret');
    });
  });

  describe('transport', () => {
    it('uses the fetch transport by default', async () => {
      const fetchMock = vi.fn<typeof fetch>(async () => new Response('{"success":true}', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, logger });

      const [err, data] = await client.validateAuth();

      expect(err).toBeNull();
      expect(data).toEqual({ success: true });
      expect(fetchMock.mock.calls[0][0]).toBe('https://lemmy.ml/api/v3/user/validate_auth');
    });

    it('disposes the transport', () => {
      const transport = createTransport(success);
      const client = new LemmyClient({ domain: 'lemmy.ml', secure: true, transport, logger });

      client.dispose();

      expect(transport.dispose).toHaveBeenCalledTimes(1);
    });
  });
});
