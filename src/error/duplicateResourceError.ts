import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a resource name is registered twice on the same registry.
 */
export class DuplicateResourceError extends Error {
  /** DuplicateResourceError error-name */
  static name = 'DuplicateResourceError';
  /** Resource name that was already taken */
  #resource: string;

  /** Creates a new instance of a DuplicateResourceError for the given resource name */
  constructor(resource: string, opts?: ErrorOptions) {
    super(`${resource} is already used`, opts);
    this.#resource = resource;
  }

  /** Resource name that was already taken */
  get resource(): string {
    return this.#resource;
  }
}

/**
 * Extract a {@link DuplicateResourceError} from an unknown error value, following nested causes.
 */
export function getDuplicateResourceError(error: unknown): null | DuplicateResourceError {
  return unwrapErrorType(DuplicateResourceError, error);
}

/**
 * Type guard for {@link DuplicateResourceError}.
 */
export function isDuplicateResourceError(error: unknown): error is DuplicateResourceError {
  return isErrorType(DuplicateResourceError, error);
}
