import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { LOG_LEVELS, type LogLevel } from "../core/logger";
import {
  CONFIG_DEFAULTS,
  CONFIG_ENV_KEYS,
  type EchoRelayConfig,
  type EchoRelayConfigOverrides,
} from "../types/configuration";
import { ConfigurationError } from "../types/error/echo-relay-error";
import clientConfigSchema from "./schemas/client-config.schema.json";

type Environment = Record<string, string | undefined>;

const INTEGER_KEYS = [
  "askTimeoutMs",
  "askPlusTimeoutMs",
  "httpTimeoutMs",
  "pollIntervalMs",
] as const;

function formatAjvError(error: ErrorObject): string {
  const path = error.instancePath ? error.instancePath.slice(1) : "config";
  if (error.keyword === "required") {
    const missing = String(error.params.missingProperty);
    const envKey = Object.entries(CONFIG_ENV_KEYS).find(([key]) => key === missing)?.[1];
    return envKey ? `${missing} is required (set ${envKey})` : `${missing} is required`;
  }
  return `${path} ${error.message ?? "is invalid"}`;
}

function readInteger(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves client settings from explicit overrides, then environment
 * variables, then defaults, and validates the result against the JSON schema.
 *
 * @remarks
 * Persisting settings to disk belongs to the caller; this class only reads.
 */
export class ConfigurationManager {
  private readonly validator: ValidateFunction<EchoRelayConfig>;

  constructor(private readonly env: Environment = process.env) {
    const ajv = new Ajv({ allErrors: true, strict: true });
    addFormats(ajv);
    this.validator = ajv.compile<EchoRelayConfig>(clientConfigSchema);
  }

  /**
   * @throws ConfigurationError listing every schema violation.
   */
  load(overrides: EchoRelayConfigOverrides = {}): EchoRelayConfig {
    const candidate = this.collect(overrides);
    if (!this.validator(candidate)) {
      const errors = (this.validator.errors ?? []).map(formatAjvError);
      throw new ConfigurationError("Invalid client configuration", errors);
    }
    return candidate;
  }

  private collect(overrides: EchoRelayConfigOverrides): Record<string, unknown> {
    const candidate: Record<string, unknown> = {
      refreshToken: overrides.refreshToken ?? nonEmpty(this.env[CONFIG_ENV_KEYS.refreshToken]),
      amazonDomain:
        overrides.amazonDomain ??
        nonEmpty(this.env[CONFIG_ENV_KEYS.amazonDomain]) ??
        CONFIG_DEFAULTS.amazonDomain,
      defaultDevice: overrides.defaultDevice ?? nonEmpty(this.env[CONFIG_ENV_KEYS.defaultDevice]),
      logLevel:
        overrides.logLevel ??
        nonEmpty(this.env[CONFIG_ENV_KEYS.logLevel])?.toLowerCase() ??
        CONFIG_DEFAULTS.logLevel,
      avsBaseUrl:
        overrides.avsBaseUrl ??
        nonEmpty(this.env[CONFIG_ENV_KEYS.avsBaseUrl]) ??
        CONFIG_DEFAULTS.avsBaseUrl,
    };
    for (const key of INTEGER_KEYS) {
      candidate[key] =
        overrides[key] ?? readInteger(this.env[CONFIG_ENV_KEYS[key]]) ?? CONFIG_DEFAULTS[key];
    }
    for (const [key, value] of Object.entries(candidate)) {
      if (value === undefined) {
        delete candidate[key];
      }
    }
    return candidate;
  }
}

/**
 * Convenience wrapper around {@link ConfigurationManager.load}.
 */
export function loadConfig(
  overrides: EchoRelayConfigOverrides = {},
  env: Environment = process.env,
): EchoRelayConfig {
  return new ConfigurationManager(env).load(overrides);
}
