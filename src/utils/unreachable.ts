import type { HttpMethod } from '../types/request.js';

/** Upper-case method names as sent on the wire. */
export type WireMethod = 'GET' | 'POST' | 'PUT';

/**
 * Maps a client method to its wire name.
 *
 * The Lemmy API only uses GET, POST and PUT; any other method throws.
 */
export function toWireMethod(method: HttpMethod): WireMethod {
  switch (method) {
    case 'get':
      return 'GET';
    case 'post':
      return 'POST';
    case 'put':
      return 'PUT';
    default:
      return unreachableMethod(method);
  }
}

/**
 * Throws for a method outside of GET, POST and PUT.
 */
export function unreachableMethod(method: never): never {
  throw new Error(`unreachable: only GET, POST and PUT are used by the Lemmy API, got ${String(method)}`);
}
