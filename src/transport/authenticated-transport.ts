import type { Logger } from "../core/logger";
import type { SessionManager } from "../session/session-manager";
import { BackendError } from "../types/error/echo-relay-error";
import { stripQuery, type HttpMethod, type HttpResponse, type HttpTransport } from "./http-transport";
import { isSuccess, parseJson } from "./wire";

/**
 * Cookie + CSRF authenticated JSON calls against the behaviour and web-app hosts.
 */
export class AuthenticatedTransport {
  constructor(
    private readonly sessions: SessionManager,
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
  ) {}

  /**
   * Calls the regional behaviour host (devices, behaviours, smart home).
   */
  request(method: HttpMethod, endpoint: string, body?: unknown): Promise<HttpResponse> {
    return this.execute(this.sessions.hosts.behaviors, method, endpoint, body);
  }

  /**
   * Calls the web-app host (routines).
   */
  requestAlexa(method: HttpMethod, endpoint: string, body?: unknown): Promise<HttpResponse> {
    return this.execute(this.sessions.hosts.alexa, method, endpoint, body);
  }

  async requestJson(method: HttpMethod, endpoint: string, what: string, body?: unknown): Promise<unknown> {
    return parseJson(await this.request(method, endpoint, body), what);
  }

  async requestAlexaJson(method: HttpMethod, endpoint: string, what: string, body?: unknown): Promise<unknown> {
    return parseJson(await this.requestAlexa(method, endpoint, body), what);
  }

  private async execute(
    baseUrl: string,
    method: HttpMethod,
    endpoint: string,
    body?: unknown,
  ): Promise<HttpResponse> {
    const { cookies, csrf } = this.sessions.requireCsrf();
    const url = `${baseUrl}${endpoint}`;
    this.logger.debug("Backend request", { method, url: stripQuery(url) });
    const response = await this.transport.send({
      method,
      url,
      headers: {
        Cookie: cookies,
        csrf,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!isSuccess(response.status)) {
      throw new BackendError(`${method} ${stripQuery(endpoint)}`, response.status, response.body);
    }
    return response;
  }
}
