/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches on `instanceof` first, then on the class name, so errors that crossed a
 * realm or bundle boundary are still found. Cause chains that loop back on
 * themselves end the search.
 */
export function unwrapErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name || current.constructor.name === errorClass.name) {
      return current as T;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
