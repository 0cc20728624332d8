import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Credential } from '../config/credential.js';
import { FetchClient } from '../fetch/client.js';
import type { EndpointRegistry } from '../registry/registry.js';
import { buildRequest } from '../request/buildRequest.js';
import { decodeResponse } from '../response/decodeResponse.js';
import { type Destination, type JsonPayload, jsonPayload, NO_PAYLOAD, type NoPayload } from '../response/destination.js';
import type { Logger } from '../types/logger.js';
import type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
} from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Configuration for constructing a {@link TogglClient}. */
export interface TogglClientProps {
  /** Credential sent as Basic Auth on every request. */
  credential: Credential;
  /**
   * Registry resolving resource names. Shared, not copied: register every
   * resource before the first request.
   */
  registry: EndpointRegistry;
  /** Transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Options handed to the transport, e.g. a `fetch` that applies timeouts. */
  fetchOpts?: FetchClientOptions;
  /** Extra default headers. `Authorization`, `User-Agent` and `Content-Type` cannot be overridden. */
  headers?: HeaderOptions;
  /** Receives debug traces of each exchange. Nothing is logged without one. */
  logger?: Logger;
}

/**
 * Client for the Toggl REST API that:
 * - resolves resource names through an {@link EndpointRegistry},
 * - authenticates every request with the credential,
 * - decodes 200 bodies into the requested destination and everything else into an `APIError`.
 *
 * Each call is one request/response cycle; the first failing stage (resolution,
 * build, transport, decode) ends it. All methods return error-first tuples via
 * {@link SafeWrapAsync}; none of them throw.
 */
export class TogglClient {
  /** Shared resource registry. */
  #registry: EndpointRegistry;
  /** Credential used for Basic Auth. */
  #credential: Credential;
  /** Extra default headers. */
  #headers?: HeaderOptions;
  /** Underlying transport. */
  #fetchClient: FetchClientProviderDefinition;
  /** Optional trace sink. */
  #logger?: Logger;

  /**
   * Creates a client over a populated registry.
   *
   * @param props - Credential, registry and optional transport, headers and logger.
   */
  constructor({ credential, registry, fetchProvider = FetchClient, fetchOpts, headers, logger }: TogglClientProps) {
    this.#credential = credential;
    this.#registry = registry;
    this.#headers = headers;
    this.#logger = logger;
    this.#fetchClient = new fetchProvider({ ...fetchOpts });
  }

  /**
   * Sends a GET request to the resource and expects no payload back.
   *
   * @returns `[null, null]` on a 200 response, otherwise the first error of the pipeline.
   */
  get(name: string): SafeWrapAsync<Error, null> {
    return this.request('GET', name, NO_PAYLOAD);
  }

  /**
   * Sends a GET request to the resource and decodes the body with `schema`.
   *
   * @returns A promise resolving to `[error, data]` where `data` is the schema output.
   */
  getJson<T>(name: string, schema: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T> {
    return this.request('GET', name, jsonPayload(schema));
  }

  /** Sends a POST request; the body is decoded only when a schema is given. */
  post(name: string, body?: unknown): SafeWrapAsync<Error, null>;
  post<T>(name: string, body: unknown, schema: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T>;
  post<T>(name: string, body?: unknown, schema?: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T | null> {
    return this.#send('POST', name, body, schema);
  }

  /** Sends a PUT request; the body is decoded only when a schema is given. */
  put(name: string, body?: unknown): SafeWrapAsync<Error, null>;
  put<T>(name: string, body: unknown, schema: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T>;
  put<T>(name: string, body?: unknown, schema?: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T | null> {
    return this.#send('PUT', name, body, schema);
  }

  /** Sends a DELETE request; the body is decoded only when a schema is given. */
  delete(name: string): SafeWrapAsync<Error, null>;
  delete<T>(name: string, schema: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T>;
  delete<T>(name: string, schema?: StandardSchemaV1<unknown, T>): SafeWrapAsync<Error, T | null> {
    return this.#send('DELETE', name, undefined, schema);
  }

  /**
   * Lower-level request path: any method, any destination.
   *
   * - Resolves `name` and builds the request; registry and build errors are returned as-is.
   * - Sends it; a failed exchange is returned as a `TransportError` wrapping the cause.
   * - Decodes the response into `destination`; see `decodeResponse`.
   *
   * @param method - HTTP method.
   * @param name - Registered resource name.
   * @param destination - Where a 200 body goes; {@link NO_PAYLOAD} cancels it unread.
   * @param body - Request body, JSON-encoded when defined.
   */
  request(method: HttpMethod, name: string, destination: NoPayload, body?: unknown): SafeWrapAsync<Error, null>;
  request<T>(method: HttpMethod, name: string, destination: JsonPayload<T>, body?: unknown): SafeWrapAsync<Error, T>;
  request<T>(
    method: HttpMethod,
    name: string,
    destination: Destination<T>,
    body?: unknown,
  ): SafeWrapAsync<Error, T | null>;
  async request<T>(
    method: HttpMethod,
    name: string,
    destination: Destination<T>,
    body?: unknown,
  ): SafeWrapAsync<Error, T | null> {
    const [errBuild, built] = buildRequest(
      { registry: this.#registry, credential: this.#credential, headers: this.#headers },
      method,
      name,
      body,
    );
    if (errBuild) {
      return [errBuild, null];
    }

    this.#logger?.debug('sending request', { method, resource: name, url: built.url });
    const [errSend, response] = await this.#fetchClient.send(built);
    if (errSend) {
      return [errSend, null];
    }

    this.#logger?.debug('received response', { method, resource: name, status: response.status });
    return decodeResponse(response, destination);
  }

  /** Picks the destination from an optional schema. */
  #send<T>(
    method: HttpMethod,
    name: string,
    body: unknown,
    schema?: StandardSchemaV1<unknown, T>,
  ): SafeWrapAsync<Error, T | null> {
    if (schema) {
      return this.request(method, name, jsonPayload(schema), body);
    }

    return this.request(method, name, NO_PAYLOAD, body);
  }
}
