import type { Credential } from '../config/credential.js';
import { BuildRequestError } from '../error/buildRequestError.js';
import { ConstructURLError } from '../error/constructUrlError.js';
import { EncodeError } from '../error/encodeError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { EndpointRegistry } from '../registry/registry.js';
import type { BuiltRequest, HeaderOptions, HttpMethod } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { VERSION } from '../version.js';

/** Content type declared on every request. */
export const CONTENT_TYPE_JSON = 'application/json';

/** User-Agent sent on every request. */
export const USER_AGENT = `toggl-rest-client/${VERSION}`;

/** What the builder needs besides the call arguments. */
export interface RequestContext {
  /** Registry resolving resource names to URLs. */
  registry: EndpointRegistry;
  /** Credential sent as Basic Auth. */
  credential: Credential;
  /** Extra default headers. The fixed headers always win over these. */
  headers?: HeaderOptions;
}

/** Encodes `token:secret` as the value of a Basic `Authorization` header. */
export function basicAuth({ token, secret }: Credential): string {
  return `Basic ${Buffer.from(`${token}:${secret}`, 'utf8').toString('base64')}`;
}

/**
 * Builds an authenticated request for a registered resource.
 *
 * Errors, in the order they are checked: the registry's `UnknownResourceError`
 * or `ConstructURLError` unchanged, a `ConstructURLError` for non-http(s) URLs,
 * a `BuildRequestError` for a body on `GET`, and an `EncodeError` for unserializable bodies.
 *
 * 1. Resolves `name` through the registry.
 * 2. Requires an http(s) URL.
 * 3. Encodes `body` as JSON when defined. `GET` requests cannot carry one.
 * 4. Sets Basic Auth from the credential, plus the fixed `User-Agent` and `Content-Type`.
 */
export function buildRequest(
  context: RequestContext,
  method: HttpMethod,
  name: string,
  body?: unknown,
): SafeWrap<Error, BuiltRequest> {
  const [errUrl, url] = context.registry.url(name);
  if (errUrl) {
    return [errUrl, null];
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return [new ConstructURLError(`error building request, unsupported protocol ${url.protocol}`, url.href), null];
  }

  const headers = mergeHeaderOptions(context.headers, {
    Authorization: basicAuth(context.credential),
    'User-Agent': USER_AGENT,
    'Content-Type': CONTENT_TYPE_JSON,
  });
  const request: BuiltRequest = { method, url: url.toString(), headers };
  if (body === undefined) {
    return [null, request];
  }

  if (method === 'GET') {
    return [new BuildRequestError(`error building request, ${method} ${name} cannot carry a body`, name), null];
  }

  const [errEncode, json] = safeWrap<Error, string | undefined>(() => JSON.stringify(body));
  if (errEncode) {
    return [new EncodeError(`error encoding request body for ${name}`, { cause: errEncode }), null];
  }

  if (json === undefined) {
    return [new EncodeError(`error encoding request body for ${name}, value has no json form`), null];
  }

  request.body = json;
  return [null, request];
}
