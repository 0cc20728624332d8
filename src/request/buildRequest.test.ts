import { describe, expect, it } from 'vitest';
import type { Credential } from '../config/credential.js';
import { BuildRequestError, isBuildRequestError } from '../error/buildRequestError.js';
import { ConstructURLError } from '../error/constructUrlError.js';
import { EncodeError } from '../error/encodeError.js';
import { UnknownResourceError } from '../error/unknownResourceError.js';
import { createEndpoint } from '../registry/endpoints.js';
import { EndpointRegistry } from '../registry/registry.js';
import { basicAuth, buildRequest, type RequestContext, USER_AGENT } from './buildRequest.js';

const CREDENTIAL: Credential = { token: 'test-token', secret: 'test-secret' };

function context(overrides: Partial<RequestContext> = {}): RequestContext {
  const registry = new EndpointRegistry();
  registry.add('x', createEndpoint('workspaces', 'https://example.com/api/x'));
  registry.add('ftp', createEndpoint('clients', 'ftp://example.com/api/x'));

  return { registry, credential: CREDENTIAL, ...overrides };
}

describe('basicAuth', () => {
  it('encodes token and secret as username and password', () => {
    expect(basicAuth({ token: 'test-token', secret: 'api_token' })).toBe('Basic dGVzdC10b2tlbjphcGlfdG9rZW4=');
  });

  it('encodes non-ascii input as utf-8', () => {
    expect(basicAuth({ token: 'tëst', secret: 'api_token' })).toBe('Basic dMOrc3Q6YXBpX3Rva2Vu');
  });
});

describe('buildRequest', () => {
  it('carries basic auth, content type and user agent for the resolved url', () => {
    const [err, request] = buildRequest(context(), 'GET', 'x');

    expect(err).toBeNull();
    expect(request?.method).toBe('GET');
    expect(request?.url).toBe('https://example.com/api/x');
    expect(request?.body).toBeUndefined();
    expect(request?.headers.get('authorization')).toBe('Basic dGVzdC10b2tlbjp0ZXN0LXNlY3JldA==');
    expect(request?.headers.get('content-type')).toBe('application/json');
    expect(request?.headers.get('user-agent')).toBe(USER_AGENT);
    expect(USER_AGENT).toBe('toggl-rest-client/0.1.0');
  });

  it('returns the registry error unchanged for unknown resources', () => {
    const [err, request] = buildRequest(context(), 'GET', 'projects');

    expect(request).toBeNull();
    expect(err).toBeInstanceOf(UnknownResourceError);
    expect(err?.message).toBe('projects is not registered as a resource');
  });

  it('rejects non-http urls', () => {
    const [err, request] = buildRequest(context(), 'GET', 'ftp');

    expect(request).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('error building request, unsupported protocol ftp:');
  });

  it('encodes the body as json', () => {
    const [err, request] = buildRequest(context(), 'POST', 'x', {
      time_entry: { description: 'Meeting', created_with: 'test' },
    });

    expect(err).toBeNull();
    expect(request?.method).toBe('POST');
    expect(request?.body).toBe('{"time_entry":{"description":"Meeting","created_with":"test"}}');
  });

  it('refuses a body on GET', () => {
    const [err, request] = buildRequest(context(), 'GET', 'x', { id: 1 });

    expect(request).toBeNull();
    expect(err).toBeInstanceOf(BuildRequestError);
    expect(isBuildRequestError(err) && err.resource).toBe('x');
    expect(err?.message).toBe('error building request, GET x cannot carry a body');
  });

  it('reports bodies that cannot be serialized', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const [errCyclic] = buildRequest(context(), 'PUT', 'x', cyclic);
    expect(errCyclic).toBeInstanceOf(EncodeError);
    expect(errCyclic?.message).toBe('error encoding request body for x');
    expect(errCyclic?.cause).toBeInstanceOf(TypeError);

    const [errNoJson] = buildRequest(context(), 'POST', 'x', () => 1);
    expect(errNoJson).toBeInstanceOf(EncodeError);
    expect(errNoJson?.message).toBe('error encoding request body for x, value has no json form');
  });

  it('lets the fixed headers win over caller defaults', () => {
    const [err, request] = buildRequest(
      context({ headers: { 'Content-Type': 'text/plain', 'User-Agent': 'other', 'X-Request-Source': 'cli' } }),
      'DELETE',
      'x',
    );

    expect(err).toBeNull();
    expect(request?.headers.get('content-type')).toBe('application/json');
    expect(request?.headers.get('user-agent')).toBe(USER_AGENT);
    expect(request?.headers.get('x-request-source')).toBe('cli');
  });
});
