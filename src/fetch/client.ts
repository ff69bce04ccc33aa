import { AbortError } from '../error/abortError.js';
import type {
  HttpMethod,
  TransportProviderDefinition,
  TransportRequestOptions,
  TransportResponse,
} from '../types/request.js';
import { toWireMethod } from '../utils/unreachable.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** `fetch` implementation, defaults to the global one at call time. */
  fetch?: typeof fetch;
  /**
   * Fetch credentials mode.
   * {@link RequestCredentials}
   */
  credentials?: RequestCredentials;
  /** Fetch mode.
   * {@link RequestMode}
   */
  mode?: RequestMode;
  /**
   * Lifecycle hook of the owning component, e.g. a UI framework's cleanup registration.
   *
   * When set, every request gets its own `AbortController` and its abort is handed to the hook,
   * so running the cleanup cancels the in-flight request. Without it requests cannot be cancelled.
   *
   * The hook receives one callback per request and may keep it until the component is torn down.
   * Once the response arrives the callback releases its controller and does nothing when run.
   */
  onCleanup?: (cleanup: () => void) => void;
}

/**
 * Transport over the `fetch` API, for browsers and any runtime that has it.
 *
 * - Sends exactly one request per call, without timeout or retries.
 * - Returns every response, whatever its status; only failing to get one is an error.
 * - Returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchTransport implements TransportProviderDefinition {
  /** Default fetch options (credentials, mode, lifecycle hook). */
  #opts: FetchTransportOptions;

  /** Creates a new instance of the fetch transport */
  constructor(opts?: FetchTransportOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request, the form is already encoded in `url`.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<TransportRequestOptions, 'body'>): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('get', url, opts);
  }

  /**
   * Executes a POST request with a serialized JSON body.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('post', url, opts);
  }

  /**
   * Executes a PUT request with a serialized JSON body.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  public put(url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    return this.#request('put', url, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`.
   * - An abort through `onCleanup` surfaces with an {@link AbortError} cause.
   */
  async #request(method: HttpMethod, url: string, opts: TransportRequestOptions): SafeWrapAsync<Error, TransportResponse> {
    const wireMethod = toWireMethod(method);
    const { signal, release } = this.#registerCleanup(wireMethod, url);
    const fetchImpl = this.#opts.fetch ?? globalThis.fetch;

    const [err, res] = await safeWrapAsync(() =>
      fetchImpl(url, {
        body: opts.body,
        method: wireMethod,
        mode: this.#opts.mode,
        credentials: this.#opts.credentials,
        headers: opts.headers,
        ...(signal && { signal }),
      }),
    );
    release();

    if (err) {
      return [new Error(`error wrapping ${wireMethod} request in fetchTransport`, { cause: err }), null];
    }

    return [null, res];
  }

  /**
   * Hands an abort for this request to `onCleanup`, when one is configured.
   * `release` detaches the controller once the request has settled.
   */
  #registerCleanup(method: string, url: string): { signal?: AbortSignal; release: () => void } {
    const { onCleanup } = this.#opts;
    if (!onCleanup) {
      return { release: () => {} };
    }

    let controller: AbortController | null = new AbortController();
    const { signal } = controller;
    onCleanup(() => controller?.abort(new AbortError(`${method} ${url} aborted on cleanup`)));

    return {
      signal,
      release: () => {
        controller = null;
      },
    };
  }
}
