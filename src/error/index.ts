/**
 * Error entrypoint: exports the typed errors of the request pipeline and helpers
 * for identifying and unwrapping them.
 * @module
 */

/** Error reported by the service, or synthesized from the HTTP status. */
export { APIError, type APIErrorOptions, getApiError, isApiError } from './apiError.js';
/** Error representing a request that cannot be assembled. */
export { BuildRequestError, getBuildRequestError, isBuildRequestError } from './buildRequestError.js';
/** Error representing an endpoint URL that cannot be requested. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a successful body that failed to decode. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error representing a resource name registered twice. */
export { DuplicateResourceError, getDuplicateResourceError, isDuplicateResourceError } from './duplicateResourceError.js';
/** Error representing a request body that could not be serialized. */
export { EncodeError, getEncodeError, isEncodeError } from './encodeError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error representing a failed HTTP exchange. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error representing a lookup of an unregistered resource name. */
export { getUnknownResourceError, isUnknownResourceError, UnknownResourceError } from './unknownResourceError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
