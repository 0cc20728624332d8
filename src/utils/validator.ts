import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an untrusted value against a Standard Schema (zod schemas implement it)
 * and wraps the result in a tuple-style `[error, value]` response.
 *
 * - Validation may be sync or async; an async rejection is wrapped in a
 *   {@link ValidationError} with the rejection as `cause`.
 * - Reported issues produce a {@link ValidationError} carrying those issues.
 * - Otherwise the schema's output value is returned, so transforms and
 *   defaults declared on the schema apply.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  let [err, result] = safeWrap<Error, ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => Promise.resolve(result));
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
