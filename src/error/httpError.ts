import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a non-2xx HTTP response whose body could not be decoded
 * into either the expected response or a Lemmy error.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Status code of the response causing the HTTPError */
  #status: number;

  /** Creates a new instance of a HTTPError with defaulting message + status to wrap */
  constructor(status: number, message: string = `HTTP Error: ${status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
  }

  /**
   * Status code of the response causing the HTTPError
   */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
