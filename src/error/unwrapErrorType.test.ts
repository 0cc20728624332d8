import { describe, expect, it } from 'vitest';
import { APIError } from './apiError.js';
import { TransportError } from './transportError.js';
import { UnknownResourceError } from './unknownResourceError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class OtherError extends Error {}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(TargetError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(TargetError, 'boom')).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new UnknownResourceError('projects');

    expect(unwrapErrorType(UnknownResourceError, err)).toBe(err);
  });

  it('finds the error through several layers of causes', () => {
    const cause = new TypeError('fetch failed');
    const err = new TransportError('error sending GET request in fetchClient', 'https://example.com/api/x', {
      cause,
    });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new OtherError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });

    expect(unwrapErrorType(TransportError, wrapped3)).toBe(err);
    expect(unwrapErrorType(TypeError, wrapped3)).toBe(cause);
  });

  it('returns null when the chain does not contain the class', () => {
    const err = new OtherError('err', { cause: new Error('inner') });

    expect(unwrapErrorType(APIError, err)).toBeNull();
  });

  it('stops on cause chains that loop', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(unwrapErrorType(TargetError, second)).toBeNull();
  });

  it('returns error when name matches errorClass name even if not instanceof', () => {
    const err = new OtherError('boom');
    Object.defineProperty(err, 'name', { value: TargetError.name });

    expect(err).not.toBeInstanceOf(TargetError);
    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });
});
