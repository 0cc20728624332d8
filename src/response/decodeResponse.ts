import { z } from 'zod';
import { APIError } from '../error/apiError.js';
import { DecodeError } from '../error/decodeError.js';
import { TransportError } from '../error/transportError.js';
import { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { Destination, JsonPayload, NoPayload } from './destination.js';

/** Only this status counts as success; anything else is decoded as an error. */
export const SUCCESS_STATUS = 200;

/** The service's documented error envelope. */
export const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.number().int(),
    message: z.string(),
  }),
});

/** Status line of a response, e.g. `502 Bad Gateway`. */
export function statusLine(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

/**
 * Turns a non-200 response into an {@link APIError}.
 *
 * The body is read as the error envelope. When that fails for any reason
 * (unreadable, not JSON, another shape) the error is synthesized from the
 * status code and status line, with the failure kept as `cause`.
 */
export async function decodeApiError(response: Response): Promise<APIError> {
  const status = response.status;
  const synthesize = (cause: Error) =>
    new APIError(status, statusLine(response), { status, synthesized: true, cause });

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return synthesize(errText);
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return synthesize(errJson);
  }

  const envelope = errorEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return synthesize(new ValidationError('error validating error envelope', envelope.error.issues));
  }

  return new APIError(envelope.data.error.code, envelope.data.error.message, { status });
}

/**
 * Decodes a completed response into the destination.
 *
 * - Status 200 with {@link NoPayload}: `[null, null]`, the body is cancelled unread.
 * - Status 200 with a {@link JsonPayload}: the body is parsed and validated.
 *   A body that cannot be read is a {@link TransportError}; one that is not JSON
 *   (an empty body included) or does not match the schema is a {@link DecodeError}.
 * - Any other status: `[APIError, null]`, see {@link decodeApiError}.
 */
export function decodeResponse(response: Response, destination: NoPayload): SafeWrapAsync<Error, null>;
export function decodeResponse<T>(response: Response, destination: JsonPayload<T>): SafeWrapAsync<Error, T>;
export function decodeResponse<T>(response: Response, destination: Destination<T>): SafeWrapAsync<Error, T | null>;
export async function decodeResponse<T>(
  response: Response,
  destination: Destination<T>,
): SafeWrapAsync<Error, T | null> {
  if (response.status !== SUCCESS_STATUS) {
    return [await decodeApiError(response), null];
  }

  if (destination.kind === 'none') {
    // The body is discarded unread; cancelling it hands the connection back.
    const [errCancel] = await safeWrapAsync(async () => response.body?.cancel());
    if (errCancel) {
      return [
        new TransportError('error releasing response body in decodeResponse', response.url, { cause: errCancel }),
        null,
      ];
    }

    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new TransportError('error reading response body in decodeResponse', response.url, { cause: errText }), null];
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error decoding json response body in decodeResponse', text, { cause: errJson }), null];
  }

  const [errValidate, value] = await validator(json, destination.schema);
  if (errValidate) {
    return [new DecodeError('error validating response body in decodeResponse', text, { cause: errValidate }), null];
  }

  return [null, value];
}
