import * as http from 'node:http';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { NodeTransport } from './client.js';

/** Adapter answering every request with the given status and body, recording the request. */
function adapterReturning(status: number, data: string, seen: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return {
      data,
      status,
      statusText: '',
      headers: { 'content-type': 'application/json', 'set-cookie': ['a=1', 'b=2'] },
      config,
    };
  };
}

describe('NodeTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends GET requests with the given headers', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const transport = new NodeTransport({ axiosConfig: { adapter: adapterReturning(200, '{"ok":true}', seen) } });

    const [err, response] = await transport.get('http://localhost:8536/api/v3/site', {
      headers: new Headers({ Authorization: 'Bearer abc', 'User-Agent': 'Lemmy-Client-ts/0.19.5' }),
    });
    transport.dispose();

    expect(err).toBeNull();
    expect(response?.status).toBe(200);
    expect(response?.ok).toBe(true);
    expect(await response?.text()).toBe('{"ok":true}');
    expect(response?.headers.get('content-type')).toBe('application/json');
    expect(response?.headers.get('set-cookie')).toBe('a=1, b=2');

    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('http://localhost:8536/api/v3/site');
    expect(seen[0].method).toBe('get');
    expect(seen[0].headers.get('authorization')).toBe('Bearer abc');
    expect(seen[0].data).toBeUndefined();
  });

  it('sends POST and PUT bodies as given', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const transport = new NodeTransport({ axiosConfig: { adapter: adapterReturning(200, '{}', seen) } });
    const headers = new Headers({ 'Content-Type': 'application/json' });

    await transport.post('http://localhost:8536/api/v3/user/login', { headers, body: '{"password":"test-password"}' });
    await transport.put('http://localhost:8536/api/v3/post', { headers, body: '{"post_id":1}' });
    transport.dispose();

    expect(seen.map((config) => config.method)).toEqual(['post', 'put']);
    expect(seen.map((config) => config.data)).toEqual(['{"password":"test-password"}', '{"post_id":1}']);
  });

  it('returns error statuses as responses', async () => {
    const transport = new NodeTransport({
      axiosConfig: { adapter: adapterReturning(400, '{"error":"incorrect_login"}', []) },
    });

    const [err, response] = await transport.post('http://localhost:8536/api/v3/user/login', {
      headers: new Headers(),
      body: '{}',
    });
    transport.dispose();

    expect(err).toBeNull();
    expect(response?.ok).toBe(false);
    expect(await response?.text()).toBe('{"error":"incorrect_login"}');
  });

  it('wraps connection failures', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:1');
    const transport = new NodeTransport({ axiosConfig: { adapter: () => Promise.reject(failure) } });

    const [err, response] = await transport.get('http://127.0.0.1:1/api/v3/site', { headers: new Headers() });
    transport.dispose();

    expect(response).toBeNull();
    expect(err?.message).toBe('error wrapping GET request in nodeTransport');
    expect(err?.cause).toBe(failure);
  });

  it('destroys both keep-alive agents on dispose', () => {
    const destroy = vi.spyOn(http.Agent.prototype, 'destroy');

    new NodeTransport().dispose();

    expect(destroy).toHaveBeenCalledTimes(2);
  });
});
