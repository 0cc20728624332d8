import type { HeaderOptions } from '../types/request.js';

/**
 * Turns a header value into its wire string. Lists are comma-joined; objects,
 * functions and symbols have no wire form and are dropped.
 */
function sanitize(value: unknown): string | null {
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }

  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key = '', ...values]): [string, unknown] => [key, values.join(', ')]);
  }

  return Object.entries(headers);
}

/**
 * Merges header sources left to right into a single `Headers` instance.
 * Later sources win; a `null` or `undefined` value removes the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}
