import type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from "../../src/transport/http-transport";

export type Responder = HttpResponse | ((request: HttpRequest) => HttpResponse);

interface Route {
  method: HttpMethod;
  urlFragment: string;
  responders: Responder[];
}

/**
 * In-process {@link HttpTransport}. Routes match on method and URL substring
 * in registration order; each route replays its responders in sequence and
 * then keeps answering with the last one. Every request is recorded.
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: HttpMethod, urlFragment: string, ...responders: Responder[]): this {
    this.routes.push({ method, urlFragment, responders });
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const route = this.routes.find(
      (candidate) => candidate.method === request.method && request.url.includes(candidate.urlFragment),
    );
    if (!route) {
      throw new Error(`unscripted request: ${request.method} ${request.url}`);
    }
    const responder = route.responders.length > 1 ? route.responders.shift() : route.responders[0];
    if (responder === undefined) {
      throw new Error(`route has no responses: ${request.method} ${route.urlFragment}`);
    }
    return typeof responder === "function" ? responder(request) : responder;
  }

  sent(method: HttpMethod, urlFragment: string): HttpRequest[] {
    return this.requests.filter((request) => request.method === method && request.url.includes(urlFragment));
  }
}

export function jsonResponse(body: unknown, status = 200, setCookies: string[] = []): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    setCookies,
    body: JSON.stringify(body),
  };
}

export function textResponse(body: string, status = 200, setCookies: string[] = []): HttpResponse {
  return { status, headers: {}, setCookies, body };
}

export function emptyResponse(status = 204): HttpResponse {
  return { status, headers: {}, setCookies: [], body: "" };
}
