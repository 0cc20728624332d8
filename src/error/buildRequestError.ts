import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a request cannot be assembled for a resource, e.g. a `GET` with a body.
 */
export class BuildRequestError extends Error {
  /** BuildRequestError error-name */
  static name = 'BuildRequestError';
  /** Resource name of the refused request */
  #resource: string;

  /** Creates a new instance of a BuildRequestError for the given resource name */
  constructor(message: string, resource: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#resource = resource;
  }

  /** Resource name of the refused request */
  get resource(): string {
    return this.#resource;
  }
}

/**
 * Extract a {@link BuildRequestError} from an unknown error value, following nested causes.
 */
export function getBuildRequestError(error: unknown): null | BuildRequestError {
  return unwrapErrorType(BuildRequestError, error);
}

/**
 * Type guard for {@link BuildRequestError}.
 */
export function isBuildRequestError(error: unknown): error is BuildRequestError {
  return isErrorType(BuildRequestError, error);
}
