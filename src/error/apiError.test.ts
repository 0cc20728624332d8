import { describe, expect, it } from 'vitest';
import { APIError, getApiError, isApiError } from './apiError.js';
import { TransportError } from './transportError.js';

describe('APIError', () => {
  it('exposes code, message and status from the envelope', () => {
    const err = new APIError(403, 'Forbidden', { status: 403 });

    expect(err.code).toBe(403);
    expect(err.message).toBe('Forbidden');
    expect(err.status).toBe(403);
    expect(err.synthesized).toBe(false);
  });

  it('marks synthesized errors and keeps their cause', () => {
    const cause = new SyntaxError('Unexpected token <');
    const err = new APIError(502, '502 Bad Gateway', { status: 502, synthesized: true, cause });

    expect(err.synthesized).toBe(true);
    expect(err.cause).toBe(cause);
  });
});

describe('isApiError', () => {
  it('distinguishes service errors from transport errors', () => {
    expect(isApiError(new APIError(500, 'boom', { status: 500 }))).toBe(true);
    expect(isApiError(new TransportError('error sending GET request', 'https://example.com'))).toBe(false);
  });
});

describe('getApiError', () => {
  it('unwraps nested causes', () => {
    const err = new APIError(404, 'Not Found', { status: 404 });

    expect(getApiError(new Error('outer', { cause: err }))).toBe(err);
    expect(getApiError(new Error('outer'))).toBeNull();
  });
});
