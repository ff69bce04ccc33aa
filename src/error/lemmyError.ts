import type { LemmyErrorType } from '../lemmy/error.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned by the Lemmy instance itself, e.g. `{"error": "incorrect_login"}`.
 *
 * These are actionable: the request reached the server and was rejected for a
 * reason the API declares.
 */
export class LemmyError extends Error {
  /** LemmyError error-name */
  static name = 'LemmyError';
  /** Error kind as sent by the server */
  #errorType: LemmyErrorType;
  /** Extra detail some error kinds carry in the `message` field */
  #detail: string | null;

  /** Creates a new LemmyError from the decoded error kind and optional detail */
  constructor(errorType: LemmyErrorType, detail?: string | null, opts?: ErrorOptions) {
    super(detail ? `Lemmy Error: ${errorType}: ${detail}` : `Lemmy Error: ${errorType}`, opts);
    this.#errorType = errorType;
    this.#detail = detail ?? null;
  }

  /** Error kind as sent by the server, e.g. `incorrect_login` */
  get errorType(): LemmyErrorType {
    return this.#errorType;
  }

  /** Extra detail sent alongside the error kind, if any */
  get detail(): string | null {
    return this.#detail;
  }
}

/**
 * Type guard for {@link LemmyError}.
 */
export function isLemmyError(error: unknown): error is LemmyError {
  return isErrorType(LemmyError, error);
}

/**
 * Extract a {@link LemmyError} from an unknown error value, following nested causes.
 */
export function getLemmyError(error: unknown): null | LemmyError {
  return unwrapErrorType(LemmyError, error);
}
