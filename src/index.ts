export { EchoRelayClient, type EchoRelayClientDependencies } from "./client/echo-relay-client";
export { announce, audioSsml, automation, speak, textCommand, type Command, type CommandKind } from "./commands/command";
export { buildCommandPayload, CommandDispatcher, type BehaviorPayload } from "./commands/command-dispatcher";
export { ConfigurationManager, isLogLevel, loadConfig } from "./config/configuration-manager";
export { buildDeviceContext, type ContextEntry } from "./conversation/device-context";
export { ConversationProtocol, buildEventEnvelope, type EventEnvelope, type EventHeader } from "./conversation/conversation-protocol";
export { renderAgentText, selectAgentReply } from "./conversation/fragments";
export { Logger, LOG_LEVELS, type LogEvent, type LogLevel } from "./core/logger";
export { pollUntil, systemClock } from "./core/retry/poll-executor";
export type { PollClock, PollHooks, PollPolicy, PollRequest } from "./core/retry/poll-types";
export { matchesQuestion, ResponseCorrelator } from "./correlation/response-correlator";
export { ACTIVITY_CSRF_MATCHERS, extractActivityCsrf } from "./extraction/activity-csrf";
export { parseEventReply, type EventReply } from "./extraction/event-reply";
export { firstMatch, regexMatcher, type MatchResult, type PatternMatcher } from "./extraction/pattern-matcher";
export { findDevice } from "./services/device-service";
export { findRoutine } from "./services/routine-service";
export { buildControlRequest, findSmartHomeDevice, type SmartHomeAction } from "./services/smart-home-service";
export { createSession, snapshotSession, type Session, type SessionSnapshot } from "./session/session";
export { SessionManager } from "./session/session-manager";
export { AxiosHttpTransport, type HttpRequest, type HttpResponse, type HttpTransport } from "./transport/http-transport";
export { CONFIG_DEFAULTS, CONFIG_ENV_KEYS, type EchoRelayConfig, type EchoRelayConfigOverrides } from "./types/configuration";
export {
  AuthError,
  BackendError,
  ConfigurationError,
  describeError,
  EchoRelayError,
  EchoRelayErrorCode,
  isEchoRelayError,
  NoConversationError,
  NotFoundError,
  ProtocolError,
  TimeoutError,
} from "./types/error/echo-relay-error";
export {
  DEFAULT_SEVERITY_FOR_DOMAIN,
  FAULT_DOMAINS,
  isFaultDomain,
  isSeverity,
  SEVERITIES,
  type FaultDomain,
  type Severity,
} from "./types/error/error-taxonomy";
export type {
  ConversationFragment,
  ConversationSnapshot,
  ConversationSummary,
  Device,
  FragmentItem,
  FragmentPurpose,
  HistoryRecord,
  Routine,
  SmartHomeDevice,
} from "./types/records";
