import type { StandardSchemaV1 } from '@standard-schema/spec';

/** No payload expected: a successful body is cancelled unread. */
export interface NoPayload {
  readonly kind: 'none';
}

/** JSON payload decoded and validated with `schema`. */
export interface JsonPayload<T> {
  readonly kind: 'json';
  readonly schema: StandardSchemaV1<unknown, T>;
}

/** Where a successful response body goes. */
export type Destination<T = unknown> = NoPayload | JsonPayload<T>;

/** Shared {@link NoPayload} destination. */
export const NO_PAYLOAD: NoPayload = Object.freeze({ kind: 'none' });

/** Creates a {@link JsonPayload} destination for `schema`. */
export function jsonPayload<T>(schema: StandardSchemaV1<unknown, T>): JsonPayload<T> {
  return Object.freeze({ kind: 'json', schema });
}
