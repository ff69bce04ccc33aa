import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the client, `null` removes a default header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/**
 * HTTP methods used by the Lemmy API. Any other method is a programming error.
 */
export type HttpMethod = 'get' | 'post' | 'put';

/** Options handed to a transport for a single request. */
export interface TransportRequestOptions {
  /** Fully resolved headers, including auth and user-agent. */
  headers: Headers;
  /** Serialized JSON body for POST and PUT. */
  body?: string;
}

/**
 * Minimal response contract shared by every transport. A fetch `Response` satisfies it as-is.
 * Non-2xx responses are still responses; only failures to get one are errors.
 */
export interface TransportResponse {
  /** HTTP status code. */
  readonly status: number;
  /** Whether the status is in the 2xx range. */
  readonly ok: boolean;
  /** Response headers. */
  readonly headers: Headers;
  /** Reads the full body as text. */
  text(): Promise<string>;
}

/**
 * Contract for transports used by the dispatch core. Only GET, POST and PUT exist,
 * so a request with any other method cannot be expressed.
 */
export interface TransportProviderDefinition {
  /** Executes a GET request, the form is already encoded in `url`. */
  get: (url: string, options: Omit<TransportRequestOptions, 'body'>) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a POST request with a JSON body. */
  post: (url: string, options: TransportRequestOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a PUT request with a JSON body. */
  put: (url: string, options: TransportRequestOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Optional lifecycle hook to release resources (e.g., keep-alive agents). */
  dispose?: () => void;
}
