import * as http from 'node:http';
import * as https from 'node:https';
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import type {
  HttpMethod,
  TransportProviderDefinition,
  TransportRequestOptions,
  TransportResponse,
} from '../types/request.js';
import { toWireMethod } from '../utils/unreachable.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link NodeTransport}. */
export interface NodeTransportOptions {
  /**
   * Extra axios defaults, e.g. `proxy` or `adapter`.
   * Body handling, status handling and agents are owned by the transport.
   */
  axiosConfig?: Omit<
    CreateAxiosDefaults,
    'httpAgent' | 'httpsAgent' | 'responseType' | 'transformResponse' | 'validateStatus'
  >;
}

/**
 * Copies axios response headers into a `Headers` instance, dropping non-scalar values.
 */
function toHeaders(raw: object): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw)) {
    const values: unknown[] = Array.isArray(value) ? value : [value];
    for (const entry of values) {
      if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
        headers.append(key, String(entry));
      }
    }
  }

  return headers;
}

/**
 * Transport for Node.js over axios, reusing connections through keep-alive agents.
 *
 * - Sends exactly one request per call, without timeout or retries.
 * - Every status is returned as a response, the body is read as raw text.
 * - Requests cannot be cancelled; call {@link NodeTransport.dispose} to close idle sockets.
 */
export class NodeTransport implements TransportProviderDefinition {
  /** Keep-alive agent for `http` instances */
  #httpAgent: http.Agent;
  /** Keep-alive agent for `https` instances */
  #httpsAgent: https.Agent;
  /** axios instance bound to the agents */
  #client: AxiosInstance;

  /** Creates a new transport with its own connection pool */
  constructor({ axiosConfig }: NodeTransportOptions = {}) {
    this.#httpAgent = new http.Agent({ keepAlive: true });
    this.#httpsAgent = new https.Agent({ keepAlive: true });
    this.#client = axios.create({
      ...axiosConfig,
      httpAgent: this.#httpAgent,
      httpsAgent: this.#httpsAgent,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  /**
   * Executes a GET request, the form is already encoded in `url`.
   */
  public get(url: string, opts: Omit<TransportRequestOptions, 'body'>): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('get', url, opts);
  }

  /**
   * Executes a POST request with a serialized JSON body.
   */
  public post(url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('post', url, opts);
  }

  /**
   * Executes a PUT request with a serialized JSON body.
   */
  public put(url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('put', url, opts);
  }

  /**
   * Destroys the keep-alive agents, closing pooled sockets.
   */
  public dispose() {
    this.#httpAgent.destroy();
    this.#httpsAgent.destroy();
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   * Connection and protocol failures are wrapped in `Error`.
   */
  async #request(method: HttpMethod, url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    const wireMethod = toWireMethod(method);
    const [err, res] = await safeWrapAsync(() =>
      this.#client.request<unknown>({
        url,
        method: wireMethod,
        headers: Object.fromEntries(opts.headers),
        data: opts.body,
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${wireMethod} request in nodeTransport`, { cause: err }), null];
    }

    const text = typeof res.data === 'string' ? res.data : '';
    return [
      null,
      {
        status: res.status,
        ok: res.status >= 200 && res.status < 300,
        headers: toHeaders(res.headers),
        text: async () => text,
      },
    ];
  }
}
