import type { TransportError } from '../error/transportError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Header options accepted when merging default headers. A `null` value removes the
 * header; a list value is sent comma-joined.
 */
export type HeaderOptions =
  | NonNullable<RequestInit['headers']>
  | Record<string, string | ReadonlyArray<string> | null>;

/** HTTP methods the client issues. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** A fully-formed, authenticated request ready for the transport. */
export interface BuiltRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Absolute request URL */
  url: string;
  /** Headers including Authorization, User-Agent and Content-Type */
  headers: Headers;
  /** JSON-encoded body, absent when the request carries none */
  body?: string;
}

/** Options to configure the transport. */
export interface FetchClientOptions {
  /**
   * `fetch` implementation used to send requests. Defaults to the global `fetch`.
   * Timeouts, proxies and connection pooling are configured by supplying one here.
   */
  fetch?: typeof fetch;
}

/** Contract for transport implementations used by the client. */
export interface FetchClientProviderDefinition {
  /**
   * Sends the request and resolves with the raw response, whatever its status.
   * Only failures of the exchange itself are reported as errors.
   */
  send: (request: BuiltRequest) => SafeWrapAsync<TransportError, Response>;
}

/** Factory signature for constructing transports. */
export interface FetchClientProvider {
  /** Creates a new instance of the transport with its options */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}
