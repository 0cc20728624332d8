import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

const toRecord = (headers: Headers) => Object.fromEntries(headers.entries());

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(toRecord(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('last source takes precedence', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, [['a', 'c']], new Headers({ a: 'd' }));

    expect(merged.get('a')).toBe('d');
  });

  test('keys are case-insensitive', () => {
    const merged = mergeHeaderOptions({ 'content-type': 'text/plain' }, { 'Content-Type': 'application/json' });

    expect(toRecord(merged)).toEqual({ 'content-type': 'application/json' });
  });

  test('joins list values', () => {
    const merged = mergeHeaderOptions({ Accept: ['application/json', 'text/plain'] });

    expect(merged.get('accept')).toBe('application/json, text/plain');
  });

  test('drops headers explicitly set to null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: 'x' }, { added: '2', remove: null });

    expect(toRecord(merged)).toEqual({ keep: '1', added: '2' });
    expect(merged.get('remove')).toBeNull();
  });

  test('skips undefined sources', () => {
    const merged = mergeHeaderOptions(undefined, { a: 'b' }, undefined);

    expect(toRecord(merged)).toEqual({ a: 'b' });
  });
});
