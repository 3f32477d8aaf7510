/**
 * Case-insensitive keys whose values carry session material and must never be logged.
 */
const REDACTION_KEYS = new Set([
  "cookie",
  "cookies",
  "set-cookie",
  "csrf",
  "activitycsrf",
  "anti-csrftoken-a2z",
  "authorization",
  "bearertoken",
  "access_token",
  "refresh_token",
  "refreshtoken",
  "secret",
  "source_token",
  "token",
]);

export const REDACTION_PLACEHOLDER = "***REDACTED***";

const MAX_STRING_LENGTH = 256;

type JsonMap = Record<string, unknown>;

function shouldRedactKey(key: string): boolean {
  return key.length > 0 && REDACTION_KEYS.has(key.toLowerCase());
}

function redactPrimitive(value: unknown): unknown {
  if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
    return `${value.slice(0, MAX_STRING_LENGTH / 2)}…`;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

function isPlainRecord(value: unknown): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactUnknown(value: unknown, seen: WeakSet<object>): unknown {
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value === "function" || typeof value === "symbol") {
    return undefined;
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
    };
  }
  if (Array.isArray(value)) {
    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);
    return value.map((item) => redactUnknown(item, seen));
  }
  if (isPlainRecord(value)) {
    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);
    const result: JsonMap = {};
    for (const [key, entry] of Object.entries(value)) {
      if (shouldRedactKey(key)) {
        result[key] = REDACTION_PLACEHOLDER;
        continue;
      }
      const redacted = redactUnknown(entry, seen);
      if (redacted !== undefined) {
        result[key] = redacted;
      }
    }
    return result;
  }
  return redactPrimitive(value);
}

/**
 * Normalizes arbitrary values into serializable structures, replacing
 * credential-bearing fields and truncating long strings.
 */
export function sanitizeUnknown(input: unknown): unknown {
  if (input instanceof Error) {
    return {
      name: input.name,
      message: input.message,
      stack: input.stack,
    };
  }
  return redactUnknown(input, new WeakSet<object>());
}

/**
 * Shortens an opaque credential for debug output, keeping only a prefix.
 */
export function previewSecret(value: string | undefined, visible = 6): string {
  if (!value) {
    return "<none>";
  }
  return value.length <= visible ? REDACTION_PLACEHOLDER : `${value.slice(0, visible)}…`;
}
