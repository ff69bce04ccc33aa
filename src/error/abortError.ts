import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an in-flight request is aborted because its owner was torn down.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, following nested causes.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
