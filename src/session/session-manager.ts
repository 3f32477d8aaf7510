import { Logger } from "../core/logger";
import { previewSecret } from "../helpers/error/redaction";
import { extractActivityCsrf } from "../extraction/activity-csrf";
import type { HttpTransport } from "../transport/http-transport";
import {
  APP_VERSION,
  BROWSER_USER_AGENT,
  asArray,
  asRecord,
  asString,
  encodeForm,
  isSuccess,
  parseJson,
  readCookieBlob,
  readSetCookie,
} from "../transport/wire";
import { AuthError, BackendError, ProtocolError } from "../types/error/echo-relay-error";
import { resolveHosts, type BackendHosts, type Session } from "./session";

const APP_NAME = "Amazon Alexa";

/**
 * Owns credential acquisition for a {@link Session}.
 *
 * Every `ensure*` operation is idempotent: once the field it fills is
 * populated it returns without a network call. Higher components call them on
 * demand; only {@link ensureCookies} and {@link ensureCsrf} run eagerly when a
 * client connects.
 */
export class SessionManager {
  readonly hosts: BackendHosts;
  private readonly logger: Logger;

  constructor(
    readonly session: Session,
    private readonly transport: HttpTransport,
    logger?: Logger,
  ) {
    this.hosts = resolveHosts(session.amazonDomain);
    this.logger = logger ?? new Logger("SessionManager");
  }

  /**
   * Exchanges the refresh secret for per-domain session cookies.
   *
   * @throws AuthError when the exchange does not return 200 or yields no cookies.
   */
  async ensureCookies(secret: string = this.session.refreshToken): Promise<string> {
    if (this.session.cookies) {
      return this.session.cookies;
    }
    const response = await this.transport.send({
      method: "POST",
      url: `${this.hosts.identity}/ap/exchangetoken/cookies`,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "x-amzn-identity-auth-domain": `api.${this.session.amazonDomain}`,
      },
      body: encodeForm({
        app_name: APP_NAME,
        requested_token_type: "auth_cookies",
        source_token_type: "refresh_token",
        source_token: secret,
        domain: `.${this.session.amazonDomain}`,
      }),
    });
    if (response.status !== 200) {
      throw new AuthError(`token exchange failed with status ${response.status}: ${response.body}`, {
        status: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = parseJson(response, "token exchange");
    } catch (error: unknown) {
      throw new AuthError("token exchange returned an unreadable body", { status: response.status }, error);
    }
    const cookiesByDomain = asRecord(asRecord(asRecord(asRecord(parsed).response).tokens).cookies);
    const parts: string[] = [];
    for (const cookies of Object.values(cookiesByDomain)) {
      for (const cookie of asArray(cookies)) {
        const name = asString(asRecord(cookie).Name);
        if (name) {
          parts.push(`${name}=${asString(asRecord(cookie).Value)}`);
        }
      }
    }
    if (parts.length === 0) {
      throw new AuthError("no cookies received from token exchange");
    }

    this.session.cookies = parts.join("; ");
    this.logger.debug("Session cookies acquired", {
      count: parts.length,
      domains: Object.keys(cookiesByDomain),
    });
    return this.session.cookies;
  }

  /**
   * Probes the web app for a CSRF token, falling back to one already present in the cookie blob.
   *
   * @throws AuthError when cookies are missing or neither source yields a token.
   */
  async ensureCsrf(): Promise<string> {
    if (this.session.csrf) {
      return this.session.csrf;
    }
    const cookies = this.requireCookies();
    const response = await this.transport.send({
      method: "GET",
      url: `${this.hosts.alexa}/api/language`,
      headers: {
        Cookie: cookies,
        Accept: "application/json",
      },
    });

    const fromHeader = readSetCookie(response.setCookies, "csrf");
    if (fromHeader) {
      this.session.csrf = fromHeader;
      this.session.cookies = `${cookies}; csrf=${fromHeader}`;
      this.logger.debug("CSRF token read from response cookie");
      return fromHeader;
    }

    const fromBlob = readCookieBlob(cookies, "csrf");
    if (fromBlob) {
      this.session.csrf = fromBlob;
      this.logger.debug("CSRF token read from session cookies");
      return fromBlob;
    }

    throw new AuthError("CSRF token not found", { status: response.status });
  }

  /**
   * Scrapes the activity page for the token guarding the voice-history endpoints.
   *
   * @throws ProtocolError when no known pattern matches the page.
   */
  async ensureActivityCsrf(): Promise<string> {
    if (this.session.activityCsrf) {
      return this.session.activityCsrf;
    }
    const cookies = this.requireCookies();
    const url = `${this.hosts.privacy}/alexa-privacy/apd/activity?ref=activityHistory`;
    const response = await this.transport.send({
      method: "GET",
      url,
      headers: {
        Cookie: cookies,
        Accept: "text/html,application/xhtml+xml",
        "User-Agent": BROWSER_USER_AGENT,
      },
    });
    if (!isSuccess(response.status)) {
      throw new BackendError("activity page", response.status, response.body);
    }

    const found = extractActivityCsrf(response.body);
    if (!found) {
      throw new ProtocolError("activity CSRF token not found in page", {
        bodyLength: response.body.length,
      });
    }
    this.session.activityCsrf = found.value;
    this.logger.debug("Activity CSRF token extracted", { matcher: found.matcher });
    return found.value;
  }

  /**
   * Exchanges the refresh secret for a bearer token scoped to the
   * conversational backend. Cached for the lifetime of the session.
   *
   * @throws AuthError when the exchange fails or returns no access token.
   */
  async ensureBearerToken(): Promise<string> {
    if (this.session.bearerToken) {
      this.logger.debug("Using cached bearer token");
      return this.session.bearerToken;
    }
    this.logger.debug("Requesting bearer token");
    const response = await this.transport.send({
      method: "POST",
      url: `${this.hosts.identity}/auth/token`,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "x-amzn-identity-auth-domain": "api.amazon.com",
        Accept: "application/json",
      },
      body: encodeForm({
        requested_token_type: "access_token",
        source_token_type: "refresh_token",
        source_token: this.session.refreshToken,
        app_name: APP_NAME,
        app_version: APP_VERSION,
      }),
    });
    if (response.status !== 200) {
      throw new AuthError(`bearer token failed with status ${response.status}: ${response.body}`, {
        status: response.status,
      });
    }

    let token = "";
    try {
      token = asString(asRecord(parseJson(response, "bearer token")).access_token);
    } catch (error: unknown) {
      throw new AuthError("bearer token response was unreadable", { status: response.status }, error);
    }
    if (!token) {
      throw new AuthError("bearer token response did not contain an access token");
    }
    this.session.bearerToken = token;
    this.logger.debug("Bearer token acquired", { prefix: previewSecret(token) });
    return token;
  }

  requireCookies(): string {
    if (!this.session.cookies) {
      throw new AuthError("session cookies are required before this call");
    }
    return this.session.cookies;
  }

  requireCsrf(): { cookies: string; csrf: string } {
    const cookies = this.requireCookies();
    if (!this.session.csrf) {
      throw new AuthError("CSRF token is required before this call");
    }
    return { cookies, csrf: this.session.csrf };
  }
}
