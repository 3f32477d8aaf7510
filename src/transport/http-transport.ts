import axios, { type AxiosInstance, type RawAxiosResponseHeaders, type AxiosResponseHeaders } from "axios";
import { BackendError } from "../types/error/echo-relay-error";

export type HttpMethod = "GET" | "POST" | "PUT";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Pre-serialized body. JSON, form and multipart encoding happen before the transport. */
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased single-value headers. `set-cookie` is exposed separately. */
  headers: Record<string, string>;
  setCookies: string[];
  body: string;
}

/**
 * Executes one HTTP exchange. Implementations never throw on status codes;
 * only failures without a response (DNS, reset, timeout) reject.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

function normalizeHeaders(
  raw: RawAxiosResponseHeaders | AxiosResponseHeaders,
): Pick<HttpResponse, "headers" | "setCookies"> {
  const headers: Record<string, string> = {};
  let setCookies: string[] = [];
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null) {
      continue;
    }
    const key = name.toLowerCase();
    if (key === "set-cookie") {
      setCookies = Array.isArray(value) ? value.map(String) : [String(value)];
      continue;
    }
    headers[key] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return { headers, setCookies };
}

/**
 * {@link HttpTransport} backed by axios. Bodies are exchanged as raw text so
 * that callers decide how (and whether) to decode them.
 */
export class AxiosHttpTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(options: { timeoutMs?: number; client?: AxiosInstance } = {}) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? 30_000,
      });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.client.request<string>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        responseType: "text",
        transformRequest: [(data: unknown) => data],
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      const body = typeof response.data === "string" ? response.data : String(response.data ?? "");
      return {
        status: response.status,
        body,
        ...normalizeHeaders(response.headers),
      };
    } catch (error: unknown) {
      throw new BackendError(`${request.method} ${stripQuery(request.url)}`, 0, "", error);
    }
  }
}

/**
 * Drops the query string so that time windows and tokens stay out of error messages.
 */
export function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
