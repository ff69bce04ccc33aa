import type { TransportResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the response body and parses it as JSON, whatever the `Content-Type`.
 *
 * - 204 and 205 responses, and empty bodies, resolve to `[null, null]`.
 * - A body that cannot be read or is not JSON resolves to `[Error, null]` with the original error as `cause`.
 *
 * The status code is not inspected beyond that, error bodies are parsed the same way as success bodies.
 */
export async function getResponseData(response: TransportResponse): SafeWrapAsync<Error, unknown> {
  // 204 and 205 carry no body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
