import { regexMatcher, type PatternMatcher } from "./pattern-matcher";

/**
 * What could be recovered from a raw event-endpoint reply.
 */
export interface EventReply {
  conversationId?: string;
  responseText?: string;
}

export const CONVERSATION_ID_MATCHER: PatternMatcher = regexMatcher(
  "conversation-id",
  /"conversationId"\s*:\s*"(amzn1\.conversation\.[^"]+)"/,
);

const TEXT_FIELD_PATTERN = /"text"\s*:\s*"([^"]+)"/g;

/** Markers showing the reply carries generated (agent) content. */
export const AGENT_MARKERS: readonly string[] = ["LLM:APE", '"purpose":"AGENT"'];

function decodeJsonString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === "string" ? decoded : raw;
  } catch {
    return raw;
  }
}

/**
 * Every quoted `"text"` value in the body, in order of appearance.
 */
export function extractTextFields(raw: string): string[] {
  const values: string[] = [];
  for (const match of raw.matchAll(TEXT_FIELD_PATTERN)) {
    const value = match[1];
    if (value) {
      values.push(decodeJsonString(value));
    }
  }
  return values;
}

export function hasAgentMarker(raw: string): boolean {
  return AGENT_MARKERS.some((marker) => raw.includes(marker));
}

/**
 * Applies literal-pattern extraction to the multipart reply of a TextMessage
 * event. The body is not decoded as multipart.
 *
 * The first `"text"` value is the backend's echo of the question and is never
 * the reply, however it is worded. A later value is the reply only when it
 * does not contain the sent text and the body carries an agent marker.
 */
export function parseEventReply(raw: string, sentText: string): EventReply {
  const reply: EventReply = {};
  const conversationId = CONVERSATION_ID_MATCHER.match(raw);
  if (conversationId) {
    reply.conversationId = conversationId;
  }
  if (!hasAgentMarker(raw)) {
    return reply;
  }
  const candidate = extractTextFields(raw)
    .slice(1)
    .find((value) => !value.includes(sentText));
  if (candidate) {
    reply.responseText = candidate;
  }
  return reply;
}
