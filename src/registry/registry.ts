import { ConstructURLError } from '../error/constructUrlError.js';
import { DuplicateResourceError } from '../error/duplicateResourceError.js';
import { UnknownResourceError } from '../error/unknownResourceError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { createEndpoint, ENDPOINT_KINDS, type Endpoint, endpointUrl } from './endpoints.js';

/**
 * Maps resource names to endpoints.
 *
 * Entries are only ever added through {@link EndpointRegistry.add}, which refuses
 * to overwrite; lookups never create entries. The registry is not synchronized:
 * populate it before handing it to a client and treat it as read-only afterwards.
 */
export class EndpointRegistry {
  /** Registered endpoints by resource name. */
  #endpoints = new Map<string, Endpoint>();

  /** Number of registered resources. */
  get size(): number {
    return this.#endpoints.size;
  }

  /**
   * Registers an endpoint under `name`.
   *
   * @returns `[DuplicateResourceError, null]` when the name is taken, leaving the
   * existing endpoint in place; otherwise `[null, endpoint]`.
   */
  add(name: string, endpoint: Endpoint): SafeWrap<DuplicateResourceError, Endpoint> {
    if (this.#endpoints.has(name)) {
      return [new DuplicateResourceError(name), null];
    }

    this.#endpoints.set(name, endpoint);
    return [null, endpoint];
  }

  /** Whether `name` is registered. */
  has(name: string): boolean {
    return this.#endpoints.has(name);
  }

  /** Registered resource names. */
  names(): string[] {
    return [...this.#endpoints.keys()];
  }

  /** Returns the endpoint registered under `name`. */
  endpoint(name: string): SafeWrap<UnknownResourceError, Endpoint> {
    const endpoint = this.#endpoints.get(name);
    if (!endpoint) {
      return [new UnknownResourceError(name), null];
    }

    return [null, endpoint];
  }

  /**
   * Resolves `name` to a fresh `URL`, safe for the caller to mutate.
   *
   * @returns `[UnknownResourceError, null]` for unregistered names and
   * `[ConstructURLError, null]` when the endpoint's href does not parse.
   */
  url(name: string): SafeWrap<UnknownResourceError | ConstructURLError, URL> {
    const [errEndpoint, endpoint] = this.endpoint(name);
    if (errEndpoint) {
      return [errEndpoint, null];
    }

    const [errUrl, url] = safeWrap(() => endpointUrl(endpoint));
    if (errUrl) {
      return [new ConstructURLError(`error parsing url of ${name}`, endpoint.href, { cause: errUrl }), null];
    }

    return [null, url];
  }

  /** Resolves `name` to its URL string. */
  urlString(name: string): SafeWrap<UnknownResourceError | ConstructURLError, string> {
    const [err, url] = this.url(name);
    if (err) {
      return [err, null];
    }

    return [null, url.toString()];
  }
}

/**
 * Registers every known endpoint under its kind name (`workspaces`, `clients`, ...)
 * at its default URL. All or nothing: when a kind name is already taken nothing
 * is registered and the first taken name is reported.
 */
export function registerDefaultEndpoints(
  registry: EndpointRegistry,
): SafeWrap<DuplicateResourceError, EndpointRegistry> {
  const taken = ENDPOINT_KINDS.find((kind) => registry.has(kind));
  if (taken) {
    return [new DuplicateResourceError(taken), null];
  }

  for (const kind of ENDPOINT_KINDS) {
    registry.add(kind, createEndpoint(kind));
  }

  return [null, registry];
}
