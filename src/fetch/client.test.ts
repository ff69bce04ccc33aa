import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError, isAbortError } from '../error/abortError.js';
import { FetchTransport } from './client.js';

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends GET requests through the global fetch', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const headers = new Headers({ Accept: 'application/json' });

    const [err, response] = await new FetchTransport().get('https://lemmy.ml/api/v3/site', { headers });

    expect(err).toBeNull();
    expect(response?.status).toBe(200);
    expect(await response?.text()).toBe('{"ok":true}');
    expect(fetchMock).toHaveBeenCalledWith('https://lemmy.ml/api/v3/site', {
      body: undefined,
      method: 'GET',
      mode: undefined,
      credentials: undefined,
      headers,
    });
  });

  it('passes body, credentials and mode to an injected fetch', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ fetch: fetchMock, credentials: 'include', mode: 'cors' });
    const headers = new Headers();

    await transport.put('https://lemmy.ml/api/v3/post', { headers, body: '{"post_id":1}' });

    expect(fetchMock).toHaveBeenCalledWith('https://lemmy.ml/api/v3/post', {
      body: '{"post_id":1}',
      method: 'PUT',
      mode: 'cors',
      credentials: 'include',
      headers,
    });
  });

  it('returns non-2xx responses instead of errors', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{"error":"incorrect_login"}', { status: 400 }));
    const transport = new FetchTransport({ fetch: fetchMock });

    const [err, response] = await transport.post('https://lemmy.ml/api/v3/user/login', {
      headers: new Headers(),
      body: '{}',
    });

    expect(err).toBeNull();
    expect(response?.ok).toBe(false);
    expect(response?.status).toBe(400);
  });

  it('wraps fetch failures', async () => {
    const failure = new TypeError('fetch failed');
    const fetchMock = vi.fn<typeof fetch>(() => Promise.reject(failure));
    const transport = new FetchTransport({ fetch: fetchMock });

    const [err, response] = await transport.get('https://lemmy.ml/api/v3/site', { headers: new Headers() });

    expect(response).toBeNull();
    expect(err?.message).toBe('error wrapping GET request in fetchTransport');
    expect(err?.cause).toBe(failure);
  });

  it('does not attach a signal without a cleanup hook', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ fetch: fetchMock });

    await transport.get('https://lemmy.ml/api/v3/site', { headers: new Headers() });

    expect(fetchMock.mock.calls[0][1]).not.toHaveProperty('signal');
  });

  it('aborts the in-flight request when the owner cleans up', async () => {
    const cleanups: Array<() => void> = [];
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signal.addEventListener('abort', () => reject(signal.reason));
          }
        }),
    );
    const transport = new FetchTransport({ fetch: fetchMock, onCleanup: (cleanup) => cleanups.push(cleanup) });

    const pending = transport.get('https://lemmy.ml/api/v3/site', { headers: new Headers() });
    expect(cleanups).toHaveLength(1);
    for (const cleanup of cleanups) {
      cleanup();
    }

    const [err, response] = await pending;
    expect(response).toBeNull();
    expect(err?.cause).toBeInstanceOf(AbortError);
    expect(isAbortError(err)).toBe(true);
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('leaves settled requests alone when the owner cleans up', async () => {
    const cleanups: Array<() => void> = [];
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ fetch: fetchMock, onCleanup: (cleanup) => cleanups.push(cleanup) });

    const [err] = await transport.get('https://lemmy.ml/api/v3/site', { headers: new Headers() });
    for (const cleanup of cleanups) {
      cleanup();
    }

    expect(err).toBeNull();
    expect(cleanups).toHaveLength(1);
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(false);
  });
});
