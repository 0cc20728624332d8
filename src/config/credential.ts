import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Password sent alongside an API token. The service authenticates token
 * logins with this literal in place of a password.
 */
export const API_TOKEN_SECRET = 'api_token';

/** Environment variable holding the API token. */
export const TOKEN_ENV = 'TOGGL_API_TOKEN';
/** Environment variable overriding the secret. */
export const SECRET_ENV = 'TOGGL_API_SECRET';

const credentialSchema = z.object({
  token: z.string().trim().min(1, 'token must not be empty'),
  secret: z.string().trim().min(1, 'secret must not be empty').default(API_TOKEN_SECRET),
});

/** Token/secret pair sent as HTTP Basic Auth on every request. */
export type Credential = Readonly<z.output<typeof credentialSchema>>;

/** Validates a raw `{ token, secret? }` record and freezes it. */
function parseCredential(input: unknown): SafeWrap<ValidationError, Credential> {
  const result = credentialSchema.safeParse(input);
  if (!result.success) {
    return [new ValidationError('error validating credential', result.error.issues), null];
  }

  return [null, Object.freeze(result.data)];
}

/**
 * Creates an immutable credential. The secret defaults to {@link API_TOKEN_SECRET}.
 */
export function createCredential(
  token: string,
  secret: string = API_TOKEN_SECRET,
): SafeWrap<ValidationError, Credential> {
  return parseCredential({ token, secret });
}

/**
 * Reads the credential from {@link TOKEN_ENV} and, optionally, {@link SECRET_ENV}.
 */
export function credentialFromEnv(
  env: Record<string, string | undefined> = process.env,
): SafeWrap<ValidationError, Credential> {
  return parseCredential({
    token: env[TOKEN_ENV],
    secret: env[SECRET_ENV] || undefined,
  });
}
