import { TransportError } from '../error/transportError.js';
import type { BuiltRequest, FetchClientOptions, FetchClientProviderDefinition } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Thin wrapper around the `fetch` API that sends a {@link BuiltRequest} and
 * returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every response is handed back as-is, whatever its status: deciding what a
 * non-200 means is the decoder's job. Only a failed exchange (DNS, refused
 * connection, aborted signal) becomes a {@link TransportError}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Custom fetch implementation, if any. */
  #fetch?: typeof fetch;

  /** Creates a new instance of the fetch-client with its options */
  constructor(opts?: FetchClientOptions) {
    this.#fetch = opts?.fetch;
  }

  /**
   * Sends the request.
   *
   * @param request - Request produced by `buildRequest`.
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: BuiltRequest): SafeWrapAsync<TransportError, Response> {
    // Resolved per call so a global fetch swapped in later (tests, polyfills) is picked up
    const fetchImpl = this.#fetch ?? globalThis.fetch;

    const [err, res] = await safeWrapAsync(() =>
      fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
      }),
    );

    if (err) {
      return [
        new TransportError(`error sending ${request.method} request in fetchClient`, request.url, { cause: err }),
        null,
      ];
    }

    return [null, res];
  }
}
