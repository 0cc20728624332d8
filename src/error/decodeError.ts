import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a successful response body is not JSON, or does not
 * match the schema it was decoded with.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
  /** Raw body that failed to decode */
  #body: string;

  /** Creates a new instance of a DecodeError with the raw body */
  constructor(message: string, body: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#body = body;
  }

  /** Raw body that failed to decode */
  get body(): string {
    return this.#body;
  }
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}
