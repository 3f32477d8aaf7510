/**
 * All fault domains recognized by the client's error taxonomy.
 */
export const FAULT_DOMAINS = [
  "auth",
  "transport",
  "protocol",
  "dispatch",
  "correlation",
  "configuration",
] as const;

/**
 * Enumerated fault domain derived from {@link FAULT_DOMAINS}.
 */
export type FaultDomain = (typeof FAULT_DOMAINS)[number];

/**
 * Severity levels surfaced to callers and logs.
 */
export const SEVERITIES = ["info", "warning", "error", "critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

export function isFaultDomain(value: string): value is FaultDomain {
  return (FAULT_DOMAINS as readonly string[]).includes(value);
}

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Default severity applied when an error does not provide an override.
 */
export const DEFAULT_SEVERITY_FOR_DOMAIN: Record<FaultDomain, Severity> = {
  auth: "critical",
  transport: "error",
  protocol: "error",
  dispatch: "error",
  correlation: "warning",
  configuration: "error",
};
