import type { HeaderOptions } from '../types/request.js';

/** User agent sent when the caller does not provide one. */
export const DEFAULT_USER_AGENT = 'Lemmy-Client-ts/0.19.5';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * A `null` local value removes the global header.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/**
 * Applies extra headers, then sets the default `user-agent` unless one was given under any casing.
 */
export function withHeaders(headers?: HeaderOptions): Headers {
  const merged = mergeHeaderOptions(headers);
  if (!merged.has('user-agent')) {
    merged.set('user-agent', DEFAULT_USER_AGENT);
  }

  return merged;
}

/**
 * Adds `Authorization: Bearer {jwt}` when a token is present.
 * An explicit `Authorization` header from the caller is kept as-is.
 */
export function withJwt(headers: Headers, jwt?: string | null): Headers {
  if (!jwt || headers.has('authorization')) {
    return headers;
  }

  headers.set('authorization', `Bearer ${jwt}`);
  return headers;
}
