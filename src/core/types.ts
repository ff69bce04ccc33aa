import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { LemmyError } from '../error/lemmyError.js';
import type { OtherError } from '../error/otherError.js';
import type { HttpMethod } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Schema for unknown input, used to infer the decoded output */
export type SchemaType = StandardSchemaV1<unknown, unknown>;

/**
 * Connection settings read by every request.
 */
export interface ClientOptions {
  /** Instance domain without scheme, e.g. `lemmy.ml` or `localhost:8536` */
  domain: string;
  /** Use `https` when true, `http` otherwise */
  secure: boolean;
  /** Default token attached to every request */
  jwt?: string;
}

/**
 * Request envelope handed to every endpoint call.
 *
 * `jwt` overrides the client's default token for this call only.
 */
export interface LemmyRequest<Form> {
  body: Form;
  jwt?: string;
}

/** Error returned from any endpoint call. */
export type LemmyClientError = LemmyError | OtherError;

/** Error-first result of an endpoint call. */
export type LemmyResult<T> = SafeWrapAsync<LemmyClientError, T>;

/** Definition of one method on an endpoint, naming the schema its success body decodes with. */
export interface EndpointDefinition {
  response: SchemaType;
}

/**
 * EndpointDefinitions maps each path under `/api/v3/` to the methods it accepts.
 */
export type EndpointDefinitions = {
  [path: string]: Partial<Record<HttpMethod, EndpointDefinition>>;
};
