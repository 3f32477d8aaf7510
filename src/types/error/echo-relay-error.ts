import { sanitizeUnknown } from "../../helpers/error/redaction";
import {
  DEFAULT_SEVERITY_FOR_DOMAIN,
  type FaultDomain,
  type Severity,
} from "./error-taxonomy";

/**
 * Stable error codes. Callers should branch on these (or on the class) rather than on messages.
 */
export enum EchoRelayErrorCode {
  AuthFailed = "AUTH_FAILED",
  BackendStatus = "BACKEND_STATUS",
  ProtocolDrift = "PROTOCOL_DRIFT",
  NotFound = "NOT_FOUND",
  Timeout = "CORRELATION_TIMEOUT",
  NoConversation = "NO_CONVERSATION",
  InvalidConfiguration = "INVALID_CONFIGURATION",
}

export interface EchoRelayErrorOptions {
  code: EchoRelayErrorCode;
  faultDomain: FaultDomain;
  message: string;
  remediation: string;
  severity?: Severity;
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every failure surfaced by the client.
 */
export class EchoRelayError extends Error {
  public readonly code: EchoRelayErrorCode;
  public readonly faultDomain: FaultDomain;
  public readonly severity: Severity;
  public readonly remediation: string;
  public readonly metadata?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(options: EchoRelayErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EchoRelayError";
    this.code = options.code;
    this.faultDomain = options.faultDomain;
    this.severity = options.severity ?? DEFAULT_SEVERITY_FOR_DOMAIN[options.faultDomain];
    this.remediation = options.remediation;
    this.metadata = options.metadata;
    this.timestamp = new Date();
  }
}

/**
 * Credential exchange or CSRF acquisition failed. Requires re-authentication outside this client.
 */
export class AuthError extends EchoRelayError {
  constructor(message: string, metadata?: Record<string, unknown>, cause?: unknown) {
    super({
      code: EchoRelayErrorCode.AuthFailed,
      faultDomain: "auth",
      message,
      remediation: "Obtain a fresh refresh token with the browser login helper and reconnect.",
      metadata,
      cause,
    });
    this.name = "AuthError";
  }
}

/**
 * A backend answered with a non-success status, or could not be reached (status 0).
 */
export class BackendError extends EchoRelayError {
  public readonly status: number;
  public readonly body: string;

  constructor(operation: string, status: number, body: string, cause?: unknown) {
    super({
      code: EchoRelayErrorCode.BackendStatus,
      faultDomain: "transport",
      message:
        status === 0
          ? `${operation} failed before a response was received`
          : `${operation} failed with status ${status}: ${body}`,
      remediation:
        status === 401 || status === 403
          ? "Session material was rejected; reconnect with a fresh refresh token."
          : "Inspect the status and body; the backend contract may have changed.",
      metadata: { operation, status },
      cause,
    });
    this.name = "BackendError";
    this.status = status;
    this.body = body;
  }
}

/**
 * An expected field or textual pattern was missing from a response that has no stable contract.
 */
export class ProtocolError extends EchoRelayError {
  constructor(message: string, metadata?: Record<string, unknown>, cause?: unknown) {
    super({
      code: EchoRelayErrorCode.ProtocolDrift,
      faultDomain: "protocol",
      message,
      remediation: "The backend format has drifted; update the matching extraction strategy.",
      metadata,
      cause,
    });
    this.name = "ProtocolError";
  }
}

export type NotFoundResource = "device" | "routine" | "smart-home device";

export class NotFoundError extends EchoRelayError {
  public readonly resource: NotFoundResource;
  public readonly lookupName: string;

  constructor(resource: NotFoundResource, lookupName: string) {
    super({
      code: EchoRelayErrorCode.NotFound,
      faultDomain: "dispatch",
      message: `${resource} '${lookupName}' not found`,
      remediation: `List the available ${resource}s and retry with an existing name.`,
      metadata: { resource, name: lookupName },
    });
    this.name = "NotFoundError";
    this.resource = resource;
    this.lookupName = lookupName;
  }
}

/**
 * The polling deadline elapsed without a matching record. The command may still have run.
 */
export class TimeoutError extends EchoRelayError {
  public readonly timeoutMs: number;
  public readonly polls: number;

  constructor(operation: string, timeoutMs: number, polls: number) {
    super({
      code: EchoRelayErrorCode.Timeout,
      faultDomain: "correlation",
      message: `timeout waiting for ${operation} response after ${timeoutMs}ms (${polls} polls)`,
      remediation: "Increase the timeout; the command may already have been executed.",
      metadata: { operation, timeoutMs, polls },
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
    this.polls = polls;
  }
}

export class NoConversationError extends EchoRelayError {
  constructor(message = "no conversation ID available to poll") {
    super({
      code: EchoRelayErrorCode.NoConversation,
      faultDomain: "correlation",
      severity: "error",
      message,
      remediation: "Set a conversation ID from the conversation list, or retry so the backend assigns one.",
    });
    this.name = "NoConversationError";
  }
}

export class ConfigurationError extends EchoRelayError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super({
      code: EchoRelayErrorCode.InvalidConfiguration,
      faultDomain: "configuration",
      message: errors.length > 0 ? `${message}: ${errors.join("; ")}` : message,
      remediation: "Set ALEXA_REFRESH_TOKEN (and optionally ALEXA_AMAZON_DOMAIN) or pass the values explicitly.",
      metadata: { errors },
    });
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}

export function isEchoRelayError(value: unknown): value is EchoRelayError {
  return value instanceof EchoRelayError;
}

/**
 * Converts any thrown value into a log-safe record. Response bodies are truncated and credentials redacted.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (isEchoRelayError(error)) {
    return {
      name: error.name,
      code: error.code,
      faultDomain: error.faultDomain,
      severity: error.severity,
      message: error.message,
      remediation: error.remediation,
      metadata: sanitizeUnknown(error.metadata),
      timestamp: error.timestamp.toISOString(),
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
