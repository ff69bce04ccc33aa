import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error for everything that is not a {@link LemmyError}:
 * - sending the request failed (connection refused, DNS, aborted),
 * - the query string could not be built,
 * - the response body matched neither the expected response nor a Lemmy error,
 *   which usually means the instance runs a different API version.
 *
 * The underlying failure is kept as `cause`.
 */
export class OtherError extends Error {
  /** OtherError error-name */
  static name = 'OtherError';
}

/**
 * Type guard for {@link OtherError}.
 */
export function isOtherError(error: unknown): error is OtherError {
  return isErrorType(OtherError, error);
}

/**
 * Extract an {@link OtherError} from an unknown error value, following nested causes.
 */
export function getOtherError(error: unknown): null | OtherError {
  return unwrapErrorType(OtherError, error);
}
