import type { ClientOptions } from '../core/types.js';

/** Base path every Lemmy v3 endpoint lives under. */
export const API_BASE_PATH = '/api/v3/';

/**
 * Builds the absolute URL of an endpoint, `http(s)://{domain}/api/v3/{path}`.
 *
 * `path` is used as-is; it is neither encoded nor normalized.
 */
export function buildRoute(path: string, { domain, secure }: Pick<ClientOptions, 'domain' | 'secure'>): string {
  return `http${secure ? 's' : ''}://${domain}${API_BASE_PATH}${path}`;
}
