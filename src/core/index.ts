/**
 * Core entrypoint: exports the Lemmy client, the dispatch routine and request types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor options and runtime configuration accepted by {@link LemmyClient}.
 */
export type { LemmyClientConfig, LemmyClientProps } from './client.js';

/**
 * Client for the Lemmy v3 API with one method per endpoint.
 */
export { LemmyClient } from './client.js';

/**
 * Generic request routine for endpoints the client does not wrap.
 */
export { type MakeRequestArgs, makeRequest } from './dispatch.js';

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
  SchemaType,
} from './types.js';
