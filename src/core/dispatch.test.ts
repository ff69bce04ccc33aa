import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ConstructURLError } from '../error/constructUrlError.js';
import { HTTPError } from '../error/httpError.js';
import { LemmyError } from '../error/lemmyError.js';
import { OtherError } from '../error/otherError.js';
import { ValidationError } from '../error/validationError.js';
import { getCaptchaResponseSchema, loginResponseSchema, resolveObjectResponseSchema } from '../lemmy/responses.js';
import type { TransportProviderDefinition, TransportResponse } from '../types/request.js';
import { createClientLogger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import { makeRequest } from './dispatch.js';

function jsonResponse(status: number, body: string): TransportResponse {
  return { status, ok: status >= 200 && status < 300, headers: new Headers(), text: async () => body };
}

function createTransport(result: SafeWrap<Error, TransportResponse>) {
  return {
    get: vi.fn<TransportProviderDefinition['get']>(async () => result),
    post: vi.fn<TransportProviderDefinition['post']>(async () => result),
    put: vi.fn<TransportProviderDefinition['put']>(async () => result),
  };
}

const okSchema = z.object({ ok: z.boolean() });
const options = { domain: 'lemmy.ml', secure: true };
const logger = createClientLogger({ silent: true });
const loginBody = '{"jwt":"abc","registration_created":false,"verify_email_sent":false}';

describe('makeRequest', () => {
  describe('request building', () => {
    it('encodes GET forms as a query string without a body', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);

      await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'post/list',
        request: { body: { community_id: 5, sort: 'Hot', page: undefined } },
        response: okSchema,
        logger,
      });

      expect(transport.get).toHaveBeenCalledTimes(1);
      const [url, opts] = transport.get.mock.calls[0];
      expect(url).toBe('https://lemmy.ml/api/v3/post/list?community_id=5&sort=Hot');
      expect(opts).not.toHaveProperty('body');
      expect(opts.headers.get('user-agent')).toBe('Lemmy-Client-ts/0.19.5');
    });

    it('does not append a question mark for empty GET forms', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);

      await makeRequest({
        transport,
        options: { domain: 'localhost:8536', secure: false },
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger,
      });

      expect(transport.get.mock.calls[0][0]).toBe('http://localhost:8536/api/v3/site');
    });

    it('sends POST forms as a json body', async () => {
      const transport = createTransport([null, jsonResponse(200, loginBody)]);

      await makeRequest({
        transport,
        options,
        method: 'post',
        path: 'user/login',
        request: { body: { username_or_email: 'alice', password: 'test-password' } },
        response: loginResponseSchema,
        logger,
      });

      const [url, opts] = transport.post.mock.calls[0];
      expect(url).toBe('https://lemmy.ml/api/v3/user/login');
      expect(opts.body).toBe('{"username_or_email":"alice","password":"test-password"}');
      expect(opts.headers.get('content-type')).toBe('application/json');
      expect(transport.get).not.toHaveBeenCalled();
    });

    it('sends PUT forms as a json body', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);

      await makeRequest({
        transport,
        options,
        method: 'put',
        path: 'post',
        request: { body: { post_id: 1, name: 'edited' } },
        response: okSchema,
        logger,
      });

      const [url, opts] = transport.put.mock.calls[0];
      expect(url).toBe('https://lemmy.ml/api/v3/post');
      expect(opts.body).toBe('{"post_id":1,"name":"edited"}');
    });

    it('applies extra headers', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);

      await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'site',
        request: { body: {} },
        headers: { 'X-Trace': 't-1', 'User-Agent': 'my-bot/1.0' },
        response: okSchema,
        logger,
      });

      const { headers } = transport.get.mock.calls[0][1];
      expect(headers.get('x-trace')).toBe('t-1');
      expect(headers.get('user-agent')).toBe('my-bot/1.0');
    });
  });

  describe('auth', () => {
    const send = async (clientJwt: string | undefined, callJwt: string | undefined, headers?: Record<string, string>) => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);
      await makeRequest({
        transport,
        options: { ...options, jwt: clientJwt },
        method: 'get',
        path: 'site',
        request: { body: {}, jwt: callJwt },
        headers,
        response: okSchema,
        logger,
      });
      return transport.get.mock.calls[0][1].headers.get('authorization');
    };

    it('prefers the per-call token over the client token', async () => {
      expect(await send('client-token', 'call-token')).toBe('Bearer call-token');
    });

    it('falls back to the client token', async () => {
      expect(await send('client-token', undefined)).toBe('Bearer client-token');
    });

    it('sends no Authorization header without a token', async () => {
      expect(await send(undefined, undefined)).toBeNull();
    });

    it('keeps a caller supplied Authorization header', async () => {
      expect(await send('client-token', 'call-token', { Authorization: 'Bearer manual' })).toBe('Bearer manual');
    });
  });

  describe('decoding', () => {
    it('returns the decoded success body', async () => {
      const transport = createTransport([null, jsonResponse(200, loginBody)]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'post',
        path: 'user/login',
        request: { body: {} },
        response: loginResponseSchema,
        logger,
      });

      expect(err).toBeNull();
      expect(data).toEqual({ jwt: 'abc', registration_created: false, verify_email_sent: false });
    });

    it('returns a LemmyError for a structured error body', async () => {
      const transport = createTransport([null, jsonResponse(400, '{"error":"incorrect_login"}')]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'post',
        path: 'user/login',
        request: { body: {} },
        response: loginResponseSchema,
        logger,
      });

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(LemmyError);
      expect(err instanceof LemmyError && err.errorType).toBe('incorrect_login');
      expect(err?.message).toBe('Lemmy Error: incorrect_login');
    });

    it('keeps the message some error kinds carry', async () => {
      const transport = createTransport([
        null,
        jsonResponse(400, '{"error":"site_ban","message":"2030-01-01T00:00:00Z"}'),
      ]);

      const [err] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger,
      });

      expect(err instanceof LemmyError && err.detail).toBe('2030-01-01T00:00:00Z');
    });

    it('returns a LemmyError for responses whose fields are all optional', async () => {
      const transport = createTransport([null, jsonResponse(400, '{"error":"couldnt_find_object"}')]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'resolve_object',
        request: { body: { q: 'https://lemmy.ml/post/1' } },
        response: resolveObjectResponseSchema,
        logger,
      });

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(LemmyError);
      expect(err instanceof LemmyError && err.errorType).toBe('couldnt_find_object');
    });

    it('decodes an all-optional success body', async () => {
      const transport = createTransport([null, jsonResponse(200, '{}')]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'user/get_captcha',
        request: { body: {} },
        response: getCaptchaResponseSchema,
        logger,
      });

      expect(err).toBeNull();
      expect(data).toEqual({});
    });

    it('returns an OtherError caused by the decoding error for unknown 2xx bodies', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"unexpected":true}')]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger,
      });

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(OtherError);
      expect(err?.message).toBe('error decoding response from site');
      expect(err?.cause).toBeInstanceOf(ValidationError);
    });

    it('keeps the status of unknown non-2xx bodies', async () => {
      const transport = createTransport([null, jsonResponse(500, '{"unexpected":true}')]);

      const [err] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger,
      });

      expect(err).toBeInstanceOf(OtherError);
      const cause = err?.cause;
      expect(cause).toBeInstanceOf(HTTPError);
      expect(cause instanceof HTTPError && cause.status).toBe(500);
      expect(cause instanceof HTTPError && cause.cause).toBeInstanceOf(ValidationError);
    });

    it('returns an OtherError for bodies that are not json', async () => {
      const transport = createTransport([null, jsonResponse(502, '<html>Bad Gateway</html>')]);

      const [err] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger,
      });

      expect(err).toBeInstanceOf(OtherError);
      expect(err?.message).toBe('error reading response from site');
      expect(err?.cause).toBeInstanceOf(HTTPError);
    });
  });

  describe('failures', () => {
    it('wraps transport failures in an OtherError', async () => {
      const failure = new Error('connect ECONNREFUSED');
      const transport = createTransport([failure, null]);

      const [err, data] = await makeRequest({
        transport,
        options,
        method: 'post',
        path: 'user/login',
        request: { body: {} },
        response: loginResponseSchema,
        logger,
      });

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(OtherError);
      expect(err?.message).toBe('error sending POST request to user/login');
      expect(err?.cause).toBe(failure);
    });

    it('fails without sending when the form cannot be encoded', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);

      const [err] = await makeRequest({
        transport,
        options,
        method: 'get',
        path: 'post/list',
        request: { body: { post_ids: [1, 2] } },
        response: okSchema,
        logger,
      });

      expect(err).toBeInstanceOf(OtherError);
      expect(err?.cause).toBeInstanceOf(ConstructURLError);
      expect(transport.get).not.toHaveBeenCalled();
    });

    it('throws for methods outside of GET, POST and PUT', async () => {
      const transport = createTransport([null, jsonResponse(200, '{"ok":true}')]);
      const args = {
        transport,
        options,
        method: 'delete',
        path: 'post',
        request: { body: {} },
        response: okSchema,
        logger,
      };

      await expect(Reflect.apply(makeRequest, undefined, [args])).rejects.toThrow(
        'unreachable: only GET, POST and PUT are used by the Lemmy API, got delete',
      );
    });
  });

  describe('logging', () => {
    it('logs sends and failures without the token', async () => {
      const spiedLogger = createClientLogger({ silent: true });
      const debug = vi.spyOn(spiedLogger, 'debug');
      const warn = vi.spyOn(spiedLogger, 'warn');
      const transport = createTransport([new Error('connect ECONNREFUSED'), null]);

      await makeRequest({
        transport,
        options: { ...options, jwt: 'test-secret' },
        method: 'get',
        path: 'site',
        request: { body: {} },
        response: okSchema,
        logger: spiedLogger,
      });

      expect(debug).toHaveBeenCalledWith('sending lemmy request', { method: 'GET', path: 'site' });
      expect(warn).toHaveBeenCalledWith('lemmy request failed', {
        method: 'GET',
        path: 'site',
        error: 'error sending GET request to site',
      });
      expect(JSON.stringify([...debug.mock.calls, ...warn.mock.calls])).not.toContain('test-secret');
    });
  });
});
