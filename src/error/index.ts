/**
 * Error entrypoint: exports the client error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error raised when an in-flight request is aborted by its owner's cleanup. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a failure to encode a GET form into a query string. */
/** Extract a {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Extracts an {@link HTTPError} from an unknown error value. */
/** Error representing a non-2xx HTTP response with an undecodable body. */
/** Type guard that checks if an error is an {@link HTTPError}. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error returned by the Lemmy instance, carrying the server's error kind. */
/** Extract a {@link LemmyError} from an unknown error value, following nested causes. */
/** Type guard for {@link LemmyError}. */
export { getLemmyError, isLemmyError, LemmyError } from './lemmyError.js';
/** Error wrapping transport and decoding failures. */
/** Extract an {@link OtherError} from an unknown error value, following nested causes. */
/** Type guard for {@link OtherError}. */
export { getOtherError, isOtherError, OtherError } from './otherError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
