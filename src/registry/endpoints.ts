/**
 * Known API surfaces. The set is closed: every endpoint the client talks to is
 * one of these kinds.
 */
export const ENDPOINT_KINDS = [
  'workspaces',
  'clients',
  'weekly-report',
  'detailed-report',
  'summary-report',
  'start-time-entry',
] as const;

/** One of {@link ENDPOINT_KINDS}. */
export type EndpointKind = (typeof ENDPOINT_KINDS)[number];

/** Default URLs of the public Toggl API for each {@link EndpointKind}. */
export const DEFAULT_ENDPOINT_URLS = {
  workspaces: 'https://www.toggl.com/api/v8/workspaces',
  clients: 'https://www.toggl.com/api/v8/clients',
  'weekly-report': 'https://toggl.com/reports/api/v2/weekly',
  'detailed-report': 'https://toggl.com/reports/api/v2/details',
  'summary-report': 'https://toggl.com/reports/api/v2/summary',
  'start-time-entry': 'https://www.toggl.com/api/v8/time_entries/start',
} as const satisfies Record<EndpointKind, string>;

/** A concrete URL bound to one {@link EndpointKind}. Immutable. */
export interface Endpoint<Kind extends EndpointKind = EndpointKind> {
  readonly kind: Kind;
  readonly href: string;
}

/**
 * Creates a frozen endpoint, pointing at the default URL unless one is given
 * (a proxy or a test server, say).
 */
export function createEndpoint<Kind extends EndpointKind>(
  kind: Kind,
  href: string = DEFAULT_ENDPOINT_URLS[kind],
): Endpoint<Kind> {
  return Object.freeze({ kind, href });
}

/**
 * Returns a fresh `URL` for the endpoint; mutating it leaves the endpoint untouched.
 * Throws a `TypeError` when the href does not parse.
 */
export function endpointUrl(endpoint: Endpoint): URL {
  return new URL(endpoint.href);
}

/** Returns the endpoint URL as a string. */
export function endpointUrlString(endpoint: Endpoint): string {
  return endpoint.href;
}
