/**
 * Core entrypoint: exports the client, its destinations and the request pipeline stages.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/** Constructor options accepted by {@link TogglClient}. */
export type { TogglClientProps } from './client.js';

/** Client resolving resource names, authenticating requests and decoding responses. */
export { TogglClient } from './client.js';

/** Where a successful response body goes. */
export {
  type Destination,
  type JsonPayload,
  jsonPayload,
  NO_PAYLOAD,
  type NoPayload,
} from '../response/destination.js';
