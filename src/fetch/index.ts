/**
 * Fetch entrypoint: exports the default transport and its header helper.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
