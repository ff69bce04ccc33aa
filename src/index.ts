/**
 * Root entrypoint: re-exports the client, transports, Lemmy types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor options and runtime configuration accepted by {@link LemmyClient}.
 */
export type { LemmyClientConfig, LemmyClientProps } from './core/client.js';

/**
 * Client for the Lemmy v3 API with one method per endpoint.
 */
export { LemmyClient } from './core/client.js';

/**
 * Generic request routine for endpoints the client does not wrap.
 */
export { type MakeRequestArgs, makeRequest } from './core/dispatch.js';

/**
 * Options, request envelope, result and endpoint definition types.
 */
export type {
  ClientOptions,
  EndpointDefinition,
  EndpointDefinitions,
  LemmyClientError,
  LemmyRequest,
  LemmyResult,
} from './core/types.js';

/**
 * Error utilities.
 */
export * from './error/index.js';

/**
 * Transport over `fetch`, the default.
 */
export { FetchTransport, type FetchTransportOptions } from './fetch/client.js';

/**
 * Forms, response schemas and types of the Lemmy API.
 */
export * from './lemmy/index.js';

/**
 * Transport contract implemented by {@link FetchTransport} and the Node transport.
 */
export type {
  HeaderOptions,
  HttpMethod,
  TransportProviderDefinition,
  TransportRequestOptions,
  TransportResponse,
} from './types/request.js';

/**
 * Logger factory used when no logger is injected.
 */
export { type ClientLoggerOptions, createClientLogger, LOG_LEVEL_ENV } from './utils/logger.js';

/**
 * Error-first result types.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
