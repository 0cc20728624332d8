import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a resource name is looked up without being registered.
 */
export class UnknownResourceError extends Error {
  /** UnknownResourceError error-name */
  static name = 'UnknownResourceError';
  /** Resource name that was looked up */
  #resource: string;

  /** Creates a new instance of an UnknownResourceError for the given resource name */
  constructor(resource: string, opts?: ErrorOptions) {
    super(`${resource} is not registered as a resource`, opts);
    this.#resource = resource;
  }

  /** Resource name that was looked up */
  get resource(): string {
    return this.#resource;
  }
}

/**
 * Extract an {@link UnknownResourceError} from an unknown error value, following nested causes.
 */
export function getUnknownResourceError(error: unknown): null | UnknownResourceError {
  return unwrapErrorType(UnknownResourceError, error);
}

/**
 * Type guard for {@link UnknownResourceError}.
 */
export function isUnknownResourceError(error: unknown): error is UnknownResourceError {
  return isErrorType(UnknownResourceError, error);
}
