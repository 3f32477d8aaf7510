import { ProtocolError } from "../types/error/echo-relay-error";
import type { HttpResponse } from "./http-transport";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const APP_USER_AGENT = "Alexa/2.2.696573 CFNetwork/3860.200.71 Darwin/25.1.0";

export const APP_VERSION = "2.2.696573.0";

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Decodes a JSON body.
 *
 * @throws ProtocolError when the body is not JSON.
 */
export function parseJson(response: HttpResponse, what: string): unknown {
  try {
    return JSON.parse(response.body);
  } catch (error: unknown) {
    throw new ProtocolError(`failed to parse ${what} response`, { status: response.status }, error);
  }
}

export function encodeForm(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

/**
 * Builds the single-part multipart/form-data body the event endpoint expects.
 */
export function buildMultipartBody(boundary: string, name: string, json: string): string {
  return (
    `--${boundary}\r\n` +
    `Content-Disposition: form-data; name="${name}"\r\n` +
    "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
    json +
    `\r\n--${boundary}--`
  );
}

/**
 * Reads `name` from a list of `Set-Cookie` header values.
 */
export function readSetCookie(setCookies: readonly string[], name: string): string | undefined {
  for (const header of setCookies) {
    const pair = header.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator === -1) {
      continue;
    }
    if (pair.slice(0, separator).trim() === name) {
      return pair.slice(separator + 1).trim();
    }
  }
  return undefined;
}

/**
 * Reads `name` from a `name=value; other=value` cookie blob.
 */
export function readCookieBlob(blob: string, name: string): string | undefined {
  for (const part of blob.split(";")) {
    const trimmed = part.trim();
    if (trimmed.startsWith(`${name}=`)) {
      return trimmed.slice(name.length + 1);
    }
  }
  return undefined;
}

// Narrowing helpers for untyped JSON bodies.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
