import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'winston';
import { HTTPError } from '../error/httpError.js';
import { LemmyError } from '../error/lemmyError.js';
import { OtherError } from '../error/otherError.js';
import { lemmyErrorResponseSchema } from '../lemmy/error.js';
import type {
  HeaderOptions,
  HttpMethod,
  TransportProviderDefinition,
  TransportResponse,
} from '../types/request.js';
import { buildRoute } from '../utils/buildRoute.js';
import { encodeQuery } from '../utils/encodeQuery.js';
import { getResponseData } from '../utils/getResponseData.js';
import { withHeaders, withJwt } from '../utils/headers.js';
import { toWireMethod, unreachableMethod } from '../utils/unreachable.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { ClientOptions, LemmyRequest, LemmyResult, SchemaType } from './types.js';

/** Everything {@link makeRequest} needs for one call. */
export interface MakeRequestArgs<Schema extends SchemaType, Form extends object> {
  /** Transport that performs the round trip. */
  transport: TransportProviderDefinition;
  /** Connection settings and default token. */
  options: ClientOptions;
  method: HttpMethod;
  /** Path relative to `/api/v3/`, e.g. `user/login`. */
  path: string;
  request: LemmyRequest<Form>;
  /** Extra headers, applied before auth and user-agent. */
  headers?: HeaderOptions;
  /** Schema the success body decodes with. */
  response: Schema;
  logger: Logger;
}

/**
 * Sends the serialized body (if any) with the transport method matching `method`.
 */
function send(
  transport: TransportProviderDefinition,
  method: HttpMethod,
  url: string,
  headers: Headers,
  body: string | undefined,
): SafeWrapAsync<Error, TransportResponse> {
  switch (method) {
    case 'get':
      return transport.get(url, { headers });
    case 'post':
      return transport.post(url, { headers, body });
    case 'put':
      return transport.put(url, { headers, body });
    default:
      return unreachableMethod(method);
  }
}

/**
 * Builds the URL for a call, appending the encoded form as a query string for GET.
 */
function buildUrl(method: HttpMethod, route: string, form: object): SafeWrap<OtherError, string> {
  if (method !== 'get') {
    return [null, route];
  }

  const [err, query] = encodeQuery(route, form);
  if (err) {
    return [new OtherError('error encoding query string', { cause: err }), null];
  }

  return [null, query ? `${route}?${query}` : route];
}

/**
 * Keeps the status of a failed response on the error chain.
 */
function withStatus(response: TransportResponse, cause: Error): Error {
  return response.ok ? cause : new HTTPError(response.status, `HTTP Error: ${response.status}`, { cause });
}

/**
 * Performs a single request against a Lemmy instance and decodes the result.
 *
 * Steps:
 * - builds `http(s)://{domain}/api/v3/{path}`,
 * - encodes the form as a query string for GET, or as a JSON body for POST and PUT,
 * - applies extra headers, the default `user-agent` and the bearer token (per-call `jwt` over the client default),
 * - sends once over the transport,
 * - decodes the body as a Lemmy error, then as the success shape.
 *
 * Errors:
 * - A body shaped like `{"error": "..."}` is returned as {@link LemmyError}.
 * - Anything else that fails is an {@link OtherError} with the failure as `cause`.
 *   For a non-2xx status the cause is an {@link HTTPError} wrapping the decoding error.
 *
 * Nothing is thrown, except for a method outside of GET, POST and PUT.
 *
 * @example
 * const [err, site] = await makeRequest({
 *   transport: new FetchTransport(),
 *   options: { domain: 'lemmy.ml', secure: true },
 *   method: 'get',
 *   path: 'site',
 *   request: { body: {} },
 *   response: getSiteResponseSchema,
 *   logger: createClientLogger(),
 * });
 */
export async function makeRequest<Schema extends SchemaType, Form extends object>({
  transport,
  options,
  method,
  path,
  request,
  headers,
  response: schema,
  logger,
}: MakeRequestArgs<Schema, Form>): LemmyResult<StandardSchemaV1.InferOutput<Schema>> {
  const wireMethod = toWireMethod(method);
  const meta = { method: wireMethod, path };

  const fail = (error: OtherError): [OtherError, null] => {
    logger.warn('lemmy request failed', { ...meta, error: error.message });
    return [error, null];
  };

  const [errUrl, url] = buildUrl(method, buildRoute(path, options), request.body);
  if (errUrl) {
    return fail(errUrl);
  }

  let body: string | undefined;
  const requestHeaders = withJwt(withHeaders(headers), request.jwt ?? options.jwt);
  if (method !== 'get') {
    const [errBody, json] = safeWrap(() => JSON.stringify(request.body));
    if (errBody) {
      return fail(new OtherError('error serializing request body', { cause: errBody }));
    }

    body = json;
    if (!requestHeaders.has('content-type')) {
      requestHeaders.set('content-type', 'application/json');
    }
  }

  logger.debug('sending lemmy request', meta);
  const [errSend, res] = await send(transport, method, url, requestHeaders, body);
  if (errSend) {
    return fail(new OtherError(`error sending ${wireMethod} request to ${path}`, { cause: errSend }));
  }

  const [errData, data] = await getResponseData(res);
  if (errData) {
    return fail(new OtherError(`error reading response from ${path}`, { cause: withStatus(res, errData) }));
  }

  const [errLemmy, lemmyError] = await validator(data, lemmyErrorResponseSchema);
  if (!errLemmy) {
    logger.debug('lemmy request returned an error', { ...meta, status: res.status, errorType: lemmyError.error });
    return [new LemmyError(lemmyError.error, lemmyError.message), null];
  }

  const [errSuccess, value] = await validator(data, schema);
  if (!errSuccess) {
    logger.debug('lemmy request succeeded', { ...meta, status: res.status });
    return [null, value];
  }

  return fail(new OtherError(`error decoding response from ${path}`, { cause: withStatus(res, errSuccess) }));
}
