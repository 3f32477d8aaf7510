import { randomUUID } from "crypto";
import type { Logger } from "../core/logger";
import { parseEventReply, type EventReply } from "../extraction/event-reply";
import type { SessionManager } from "../session/session-manager";
import { stripQuery, type HttpRequest, type HttpResponse, type HttpTransport } from "../transport/http-transport";
import { APP_USER_AGENT, buildMultipartBody, parseJson } from "../transport/wire";
import { BackendError, NoConversationError } from "../types/error/echo-relay-error";
import type { ConversationSnapshot, ConversationSummary } from "../types/records";
import { buildDeviceContext, type ContextEntry } from "./device-context";
import { toConversationSnapshot, toConversationSummaries } from "./fragments";

const EVENTS_PATH = "/v20160207/events";
const CONVERSATION_ID_PREFIX = "amzn1.conversation.";
const DIALOG_REQUEST_PREFIX = "Mobile_TTA_";

export interface EventHeader {
  namespace: string;
  name: string;
  messageId: string;
  dialogRequestId?: string;
}

export interface EventEnvelope {
  event: { header: EventHeader; payload: Record<string, unknown> };
  context: ContextEntry[];
}

export interface ConversationProtocolOptions {
  avsBaseUrl: string;
  /** Identifier source; upper-cased UUIDs unless replaced. */
  newId?: () => string;
}

export function buildEventEnvelope(
  header: EventHeader,
  payload: Record<string, unknown>,
  conversationId?: string,
): EventEnvelope {
  return {
    event: { header, payload },
    context: buildDeviceContext(conversationId),
  };
}

/**
 * Event exchange with the conversational (LLM) backend. Uses the bearer
 * token, plus session cookies when present.
 */
export class ConversationProtocol {
  private readonly avsBaseUrl: string;
  private readonly newId: () => string;

  constructor(
    private readonly sessions: SessionManager,
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
    options: ConversationProtocolOptions,
  ) {
    this.avsBaseUrl = options.avsBaseUrl.replace(/\/+$/, "");
    this.newId = options.newId ?? (() => randomUUID().toUpperCase());
  }

  get conversationId(): string | undefined {
    return this.sessions.session.conversationId;
  }

  setConversationId(id: string): void {
    this.sessions.session.conversationId = id;
  }

  /**
   * Returns the current conversation, creating a locally generated identifier when none is set.
   */
  startConversation(): string {
    const existing = this.sessions.session.conversationId;
    if (existing) {
      return existing;
    }
    const created = `${CONVERSATION_ID_PREFIX}${randomUUID()}`;
    this.sessions.session.conversationId = created;
    return created;
  }

  /**
   * Sends typed text as if spoken. A 204 reply is valid and carries nothing:
   * the identifier and answer must then be recovered by polling.
   *
   * @throws BackendError on any status other than 200 or 204.
   */
  async sendTextMessage(text: string): Promise<EventReply> {
    const dialogRequestId = `${DIALOG_REQUEST_PREFIX}${this.newId()}`;
    const envelope = buildEventEnvelope(
      {
        namespace: "Alexa.Input.Text",
        name: "TextMessage",
        messageId: this.newId(),
        dialogRequestId,
      },
      { text },
      this.conversationId,
    );
    this.logger.debug("Sending text message", {
      dialogRequestId,
      conversationId: this.conversationId,
    });

    const response = await this.postEvent(envelope, {
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      Priority: "u=1, i",
    });
    this.logger.debug("Text message response", { status: response.status, length: response.body.length });

    if (response.status === 204) {
      return {};
    }
    if (response.status !== 200) {
      throw new BackendError("text message event", response.status, response.body);
    }
    const reply = parseEventReply(response.body, text);
    if (reply.conversationId) {
      this.logger.debug("Conversation ID found in reply", { conversationId: reply.conversationId });
    }
    return reply;
  }

  /**
   * Announces the synthetic device state. 200 and 204 are both success.
   */
  async synchronizeState(): Promise<void> {
    const envelope = buildEventEnvelope(
      { namespace: "System", name: "SynchronizeState", messageId: this.newId() },
      {},
      this.conversationId,
    );
    const response = await this.postEvent(envelope, { Priority: "u=3" });
    this.logger.debug("SynchronizeState response", { status: response.status });
    if (response.status !== 200 && response.status !== 204) {
      throw new BackendError("SynchronizeState event", response.status, response.body);
    }
  }

  /**
   * @throws NoConversationError when no conversation identifier is set.
   */
  async getFragments(): Promise<ConversationSnapshot> {
    const conversationId = this.conversationId;
    if (!conversationId) {
      throw new NoConversationError("no conversation ID set");
    }
    const response = await this.get(
      `/v1/conversations/${encodeURIComponent(conversationId)}/fragments/synchronize`,
      "conversation fragments",
    );
    const snapshot = toConversationSnapshot(parseJson(response, "conversation"));
    if (this.logger.isEnabled("debug")) {
      const agentWithText = snapshot.fragments.filter((f) => f.purpose === "AGENT" && f.text !== "").length;
      this.logger.debug("Fragments fetched", { total: snapshot.fragments.length, agentWithText });
    }
    return snapshot;
  }

  async listConversations(): Promise<ConversationSummary[]> {
    const response = await this.get("/v1/conversations", "conversations");
    return toConversationSummaries(parseJson(response, "conversations"));
  }

  private async get(path: string, what: string): Promise<HttpResponse> {
    const bearer = await this.sessions.ensureBearerToken();
    const url = `${this.avsBaseUrl}${path}`;
    const response = await this.transport.send({
      method: "GET",
      url,
      headers: this.withCookies({
        Authorization: `Bearer ${bearer}`,
        Accept: "application/json",
      }),
    });
    if (response.status !== 200) {
      throw new BackendError(`${what} (${stripQuery(path)})`, response.status, response.body);
    }
    return response;
  }

  private async postEvent(envelope: EventEnvelope, extraHeaders: Record<string, string>): Promise<HttpResponse> {
    const bearer = await this.sessions.ensureBearerToken();
    const boundary = this.newId();
    const body = buildMultipartBody(boundary, "metadata", JSON.stringify(envelope));
    const request: HttpRequest = {
      method: "POST",
      url: `${this.avsBaseUrl}${EVENTS_PATH}`,
      headers: this.withCookies({
        Authorization: `Bearer ${bearer}`,
        "Content-Type": `multipart/form-data; boundary=${boundary}`,
        Accept: "*/*",
        "User-Agent": APP_USER_AGENT,
        ...extraHeaders,
      }),
      body,
    };
    return this.transport.send(request);
  }

  private withCookies(headers: Record<string, string>): Record<string, string> {
    const cookies = this.sessions.session.cookies;
    return cookies ? { ...headers, Cookie: cookies } : headers;
  }
}
