/**
 * Registry entrypoint: endpoint definitions and the name-keyed registry.
 * @module
 */
export {
  createEndpoint,
  DEFAULT_ENDPOINT_URLS,
  ENDPOINT_KINDS,
  type Endpoint,
  type EndpointKind,
  endpointUrl,
  endpointUrlString,
} from './endpoints.js';
export { EndpointRegistry, registerDefaultEndpoints } from './registry.js';
