import { Logger } from "../../src/core/logger";
import { createSession, type Session } from "../../src/session/session";
import { SessionManager } from "../../src/session/session-manager";
import type { EchoRelayConfig } from "../../src/types/configuration";
import type { Device } from "../../src/types/records";
import { jsonResponse, type ScriptedTransport } from "./scripted-transport";

export const TEST_SECRET = "test-secret";
export const TEST_CSRF = "test-csrf";
export const TEST_ACTIVITY_CSRF = "test-activity-csrf";
export const TEST_BEARER = "test-bearer";
export const TEST_COOKIES = "session-id=test-session; ubid-main=test-ubid";

export const KITCHEN: Device = {
  accountName: "Kitchen Echo",
  serialNumber: "G090LF0994210ABC",
  deviceType: "A3S5BH2HU6VAYF",
  deviceFamily: "ECHO",
  customerId: "A1TESTCUSTOMER",
  online: true,
  capabilities: ["VOLUME_SETTING", "MICROPHONE"],
};

export const TEST_CONFIG: EchoRelayConfig = {
  refreshToken: TEST_SECRET,
  amazonDomain: "amazon.com",
  logLevel: "error",
  askTimeoutMs: 10_000,
  askPlusTimeoutMs: 30_000,
  httpTimeoutMs: 30_000,
  pollIntervalMs: 500,
  avsBaseUrl: "https://avs.test",
};

export function quietLogger(scope = "Test"): Logger {
  return new Logger(scope, "error");
}

export function cookieExchangeBody(): unknown {
  return {
    response: {
      tokens: {
        cookies: {
          ".amazon.com": [
            { Name: "session-id", Value: "test-session" },
            { Name: "ubid-main", Value: "test-ubid" },
          ],
        },
      },
    },
  };
}

/**
 * Scripts the two exchanges a client performs when connecting.
 */
export function scriptConnect(transport: ScriptedTransport): ScriptedTransport {
  return transport
    .on("POST", "/ap/exchangetoken/cookies", jsonResponse(cookieExchangeBody()))
    .on("GET", "/api/language", jsonResponse({ language: "en-US" }, 200, [`csrf=${TEST_CSRF}; Path=/; Secure`]));
}

export function activityPage(token = TEST_ACTIVITY_CSRF): string {
  return `<html><head><meta name="csrf-token" content="${token}"></head><body></body></html>`;
}

/**
 * A session that already holds cookies and CSRF, as after connecting.
 */
export function authenticatedSession(overrides: Partial<Session> = {}): Session {
  return {
    ...createSession(TEST_SECRET, "amazon.com"),
    cookies: `${TEST_COOKIES}; csrf=${TEST_CSRF}`,
    csrf: TEST_CSRF,
    ...overrides,
  };
}

export function sessionManagerFor(transport: ScriptedTransport, session: Session = authenticatedSession()): SessionManager {
  return new SessionManager(session, transport, quietLogger("SessionManager"));
}

export function historyRecord(options: {
  timestamp: number;
  utterance?: string;
  reply?: string;
  serialNumber?: string;
}): unknown {
  const serial = options.serialNumber ?? KITCHEN.serialNumber;
  const items: unknown[] = [];
  if (options.utterance !== undefined) {
    items.push({ recordItemType: "ASR_REPLACEMENT_TEXT", transcriptText: options.utterance });
  }
  if (options.reply !== undefined) {
    items.push({ recordItemType: "TTS_REPLACEMENT_TEXT", transcriptText: options.reply });
  }
  return {
    recordKey: `${KITCHEN.customerId}#${options.timestamp}#${KITCHEN.deviceType}#${serial}`,
    timestamp: options.timestamp,
    voiceHistoryRecordItems: items,
  };
}
