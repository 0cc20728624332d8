import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed HTTP exchange: connection refused, DNS failure, a
 * reset socket or a body that could not be read. The underlying error is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  /** Request target */
  #url: string;

  /** Creates a new instance of a TransportError for the request target */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** Request target */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
