/**
 * Root entrypoint for toggl-rest-client: re-exports the client, the endpoint registry,
 * the request pipeline stages, payload schemas and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor options accepted by {@link TogglClient}.
 */
export type { TogglClientProps } from './core/client.js';

/**
 * Client resolving resource names, authenticating requests and decoding responses.
 */
export { TogglClient } from './core/client.js';

/**
 * Credential pair sent as HTTP Basic Auth, and the helpers creating it.
 */
export {
  API_TOKEN_SECRET,
  type Credential,
  createCredential,
  credentialFromEnv,
  SECRET_ENV,
  TOKEN_ENV,
} from './config/credential.js';

/**
 * Endpoint variants and the name-keyed registry resolving them.
 */
export {
  createEndpoint,
  DEFAULT_ENDPOINT_URLS,
  ENDPOINT_KINDS,
  type Endpoint,
  type EndpointKind,
  EndpointRegistry,
  endpointUrl,
  endpointUrlString,
  registerDefaultEndpoints,
} from './registry/index.js';

/**
 * Request builder and the fixed headers it attaches.
 */
export {
  basicAuth,
  buildRequest,
  CONTENT_TYPE_JSON,
  type RequestContext,
  USER_AGENT,
} from './request/buildRequest.js';

/**
 * Response decoder and the destinations a successful body can go to.
 */
export { decodeApiError, decodeResponse, statusLine, SUCCESS_STATUS } from './response/decodeResponse.js';
export {
  type Destination,
  type JsonPayload,
  jsonPayload,
  NO_PAYLOAD,
  type NoPayload,
} from './response/destination.js';

/**
 * Default fetch transport and header merging.
 */
export { FetchClient, mergeHeaderOptions } from './fetch/index.js';

/**
 * Request and transport types.
 */
export type {
  BuiltRequest,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
} from './types/request.js';

/**
 * Logging port and its console adapter.
 */
export type { LogData, Logger } from './types/logger.js';
export { ConsoleLogger } from './logger/consoleLogger.js';

/**
 * zod schemas for the payloads of the default endpoints.
 */
export * from './schemas/index.js';

/**
 * Typed errors and helpers for identifying and unwrapping them.
 */
export * from './error/index.js';

/**
 * Tuple-style results returned by every fallible operation.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/** Library version, as sent in the User-Agent header. */
export { VERSION } from './version.js';
