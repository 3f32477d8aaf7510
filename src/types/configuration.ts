import type { LogLevel } from "../core/logger";

/**
 * Fully resolved client settings.
 */
export interface EchoRelayConfig {
  /** Long-lived refresh secret produced by the browser login helper. */
  refreshToken: string;
  /** Marketplace domain such as `amazon.com` or `amazon.de`. */
  amazonDomain: string;
  /** Device name or serial used when the caller does not name one. */
  defaultDevice?: string;
  logLevel: LogLevel;
  askTimeoutMs: number;
  askPlusTimeoutMs: number;
  /** Per-request timeout applied by the HTTP transport. */
  httpTimeoutMs: number;
  pollIntervalMs: number;
  avsBaseUrl: string;
}

export type EchoRelayConfigOverrides = Partial<EchoRelayConfig>;

/**
 * Environment variables consulted when an override is not given.
 */
export const CONFIG_ENV_KEYS = {
  refreshToken: "ALEXA_REFRESH_TOKEN",
  amazonDomain: "ALEXA_AMAZON_DOMAIN",
  defaultDevice: "ALEXA_DEFAULT_DEVICE",
  logLevel: "ALEXA_LOG_LEVEL",
  askTimeoutMs: "ALEXA_ASK_TIMEOUT_MS",
  askPlusTimeoutMs: "ALEXA_ASK_PLUS_TIMEOUT_MS",
  httpTimeoutMs: "ALEXA_HTTP_TIMEOUT_MS",
  pollIntervalMs: "ALEXA_POLL_INTERVAL_MS",
  avsBaseUrl: "ALEXA_AVS_BASE_URL",
} as const satisfies Record<keyof EchoRelayConfig, string>;

export const CONFIG_DEFAULTS = {
  amazonDomain: "amazon.com",
  logLevel: "info",
  askTimeoutMs: 10_000,
  askPlusTimeoutMs: 30_000,
  httpTimeoutMs: 30_000,
  pollIntervalMs: 500,
  avsBaseUrl: "https://avs-alexa-12-na.amazon.com",
} as const satisfies Partial<EchoRelayConfig>;
