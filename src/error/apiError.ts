import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options for {@link APIError}, on top of the standard error options. */
export interface APIErrorOptions extends ErrorOptions {
  /** HTTP status of the response the error came from. */
  status: number;
  /**
   * True when the body did not carry the error envelope and the error
   * was built from the status line instead.
   * @default false
   */
  synthesized?: boolean;
}

/**
 * Error reported by the service itself, either read from the
 * `{"error": {"code", "message"}}` envelope or synthesized from the HTTP status.
 */
export class APIError extends Error {
  /** APIError error-name */
  static name = 'APIError';
  /** Error code from the envelope, or the HTTP status when synthesized */
  #code: number;
  /** HTTP status of the response */
  #status: number;
  /** Whether the error was built from the status line */
  #synthesized: boolean;

  /** Creates a new instance of an APIError */
  constructor(code: number, message: string, { status, synthesized = false, ...opts }: APIErrorOptions) {
    super(message, opts);
    this.#code = code;
    this.#status = status;
    this.#synthesized = synthesized;
  }

  /** Error code from the envelope, or the HTTP status when synthesized */
  get code(): number {
    return this.#code;
  }

  /** HTTP status of the response */
  get status(): number {
    return this.#status;
  }

  /** Whether the error was built from the status line rather than the body */
  get synthesized(): boolean {
    return this.#synthesized;
  }
}

/**
 * Extract an {@link APIError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | APIError {
  return unwrapErrorType(APIError, error);
}

/**
 * Type guard for {@link APIError}.
 */
export function isApiError(error: unknown): error is APIError {
  return isErrorType(APIError, error);
}
