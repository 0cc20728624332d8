import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a request body cannot be serialized to JSON.
 */
export class EncodeError extends Error {
  /** EncodeError error-name */
  static name = 'EncodeError';
}

/**
 * Extract an {@link EncodeError} from an unknown error value, following nested causes.
 */
export function getEncodeError(error: unknown): null | EncodeError {
  return unwrapErrorType(EncodeError, error);
}

/**
 * Type guard for {@link EncodeError}.
 */
export function isEncodeError(error: unknown): error is EncodeError {
  return isErrorType(EncodeError, error);
}
