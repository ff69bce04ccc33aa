import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/**
 * Encodes a GET form as a query string.
 *
 * - `undefined` and `null` fields are left out.
 * - Strings, numbers and booleans are stringified.
 * - Arrays and objects cannot be expressed in a flat query string and yield a {@link ConstructURLError}.
 *
 * @param route - Route the query belongs to, only used for error reporting.
 * @param form - Form to encode.
 * @returns `[error, query]` where `query` has no leading `?` and may be empty.
 */
export function encodeQuery(route: string, form: object): SafeWrap<ConstructURLError, string> {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(form)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      searchParams.append(key, String(value));
      continue;
    }

    return [new ConstructURLError(`error encoding query, unsupported value for ${key}`, route), null];
  }

  return [null, searchParams.toString()];
}
