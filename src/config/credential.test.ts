import { describe, expect, it } from 'vitest';
import { isValidationError } from '../error/validationError.js';
import { API_TOKEN_SECRET, createCredential, credentialFromEnv } from './credential.js';

describe('createCredential', () => {
  it('defaults the secret to the api token literal', () => {
    const [err, credential] = createCredential('test-token');

    expect(err).toBeNull();
    expect(credential).toEqual({ token: 'test-token', secret: API_TOKEN_SECRET });
  });

  it('keeps an explicit secret', () => {
    const [err, credential] = createCredential('user@example.com', 'test-secret');

    expect(err).toBeNull();
    expect(credential).toEqual({ token: 'user@example.com', secret: 'test-secret' });
  });

  it('freezes the credential', () => {
    const [, credential] = createCredential('test-token');

    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('trims surrounding whitespace from both fields', () => {
    const [err, credential] = createCredential(' test-token\n', '  test-secret ');

    expect(err).toBeNull();
    expect(credential).toEqual({ token: 'test-token', secret: 'test-secret' });
  });

  it('rejects a blank secret', () => {
    const [err, credential] = createCredential('test-token', '   ');

    expect(credential).toBeNull();
    expect(err?.message).toBe('error validating credential; secret: secret must not be empty');
  });

  it('rejects an empty token', () => {
    const [err, credential] = createCredential('   ');

    expect(credential).toBeNull();
    expect(isValidationError(err)).toBe(true);
    expect(err?.message).toBe('error validating credential; token: token must not be empty');
  });
});

describe('credentialFromEnv', () => {
  it('reads the token and secret variables', () => {
    const [err, credential] = credentialFromEnv({ TOGGL_API_TOKEN: 'test-token', TOGGL_API_SECRET: 'test-secret' });

    expect(err).toBeNull();
    expect(credential).toEqual({ token: 'test-token', secret: 'test-secret' });
  });

  it('falls back to the api token literal for an empty secret', () => {
    const [err, credential] = credentialFromEnv({ TOGGL_API_TOKEN: 'test-token', TOGGL_API_SECRET: '' });

    expect(err).toBeNull();
    expect(credential?.secret).toBe(API_TOKEN_SECRET);
  });

  it('fails without a token', () => {
    const [err, credential] = credentialFromEnv({});

    expect(credential).toBeNull();
    expect(err?.issues[0]?.path).toEqual(['token']);
  });
});
