/**
 * Credential material and conversational state for one authenticated client.
 *
 * @remarks
 * A session has a single owner and is mutated in place by the
 * {@link SessionManager}, the dispatcher and the protocol handler. It is not
 * safe to share one session between concurrent operations: the fields are
 * written without locking.
 *
 * Acquisition order is fixed: cookies, then CSRF, then (lazily) the
 * activity-log CSRF token and the conversational bearer token. None of the
 * fields is re-validated once populated; expiry only surfaces as an HTTP
 * failure.
 */
export interface Session {
  readonly amazonDomain: string;
  readonly refreshToken: string;
  cookies?: string;
  csrf?: string;
  activityCsrf?: string;
  bearerToken?: string;
  customerId?: string;
  conversationId?: string;
}

export function createSession(refreshToken: string, amazonDomain: string): Session {
  return { refreshToken, amazonDomain };
}

/**
 * Read-only summary safe to hand to output layers.
 */
export interface SessionSnapshot {
  amazonDomain: string;
  hasCookies: boolean;
  hasCsrf: boolean;
  hasActivityCsrf: boolean;
  hasBearerToken: boolean;
  customerId?: string;
  conversationId?: string;
}

export function snapshotSession(session: Session): SessionSnapshot {
  return {
    amazonDomain: session.amazonDomain,
    hasCookies: Boolean(session.cookies),
    hasCsrf: Boolean(session.csrf),
    hasActivityCsrf: Boolean(session.activityCsrf),
    hasBearerToken: Boolean(session.bearerToken),
    customerId: session.customerId,
    conversationId: session.conversationId,
  };
}

/**
 * Backend hosts for a marketplace domain.
 */
export interface BackendHosts {
  /** Behaviour, device and smart-home APIs. */
  behaviors: string;
  /** Alexa web app APIs (routines, CSRF probe). */
  alexa: string;
  /** Human-facing privacy pages (activity history). */
  privacy: string;
  /** Identity service used for every credential exchange. */
  identity: string;
}

export function resolveHosts(amazonDomain: string): BackendHosts {
  return {
    behaviors:
      amazonDomain === "amazon.com" ? "https://pitangui.amazon.com" : "https://layla.amazon.com",
    alexa: `https://alexa.${amazonDomain}`,
    privacy: `https://www.${amazonDomain}`,
    identity: "https://api.amazon.com",
  };
}
