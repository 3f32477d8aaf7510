import type { CommandDispatcher } from "../commands/command-dispatcher";
import { textCommand } from "../commands/command";
import type { Logger } from "../core/logger";
import { pollUntil } from "../core/retry/poll-executor";
import { DEFAULT_POLL_INTERVAL_MS, type PollClock } from "../core/retry/poll-types";
import type { ConversationProtocol } from "../conversation/conversation-protocol";
import { selectAgentReply } from "../conversation/fragments";
import type { HistoryService } from "../services/history-service";
import { describeError, NoConversationError } from "../types/error/echo-relay-error";
import type { Device, HistoryRecord } from "../types/records";

/** Records stamped slightly before the command was sent still count. */
export const ISSUE_TIME_BUFFER_MS = 1_000;
/** History is queried up to this far past "now" to tolerate clock skew. */
export const HISTORY_LOOKAHEAD_MS = 60_000;
/** Length of the question prefix an utterance must contain. */
export const UTTERANCE_PREFIX_LENGTH = 20;

export interface HistoryMatchCriteria {
  serialNumber: string;
  notBefore: number;
  question: string;
}

/**
 * Decides whether a history record answers the question.
 *
 * @remarks
 * Approximate: a similar opening from an unrelated turn can match, and an
 * utterance transcribed differently from the typed question will not.
 */
export function matchesQuestion(record: HistoryRecord, criteria: HistoryMatchCriteria): boolean {
  if (!record.recordKey.includes(criteria.serialNumber)) {
    return false;
  }
  if (record.timestamp < criteria.notBefore) {
    return false;
  }
  if (!record.utterance) {
    return false;
  }
  const prefix = criteria.question.slice(0, UTTERANCE_PREFIX_LENGTH).toLowerCase();
  return record.utterance.toLowerCase().includes(prefix);
}

export function selectHistoryReply(
  records: readonly HistoryRecord[],
  criteria: HistoryMatchCriteria,
): string | undefined {
  for (const record of records) {
    if (matchesQuestion(record, criteria) && record.reply) {
      return record.reply;
    }
  }
  return undefined;
}

export interface ResponseCorrelatorOptions {
  clock: PollClock;
  intervalMs?: number;
}

/**
 * Recovers answers the backends deliver out of band, by polling either the
 * voice-activity log or the conversation-fragment log until a deadline.
 */
export class ResponseCorrelator {
  private readonly clock: PollClock;
  private readonly intervalMs: number;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly history: HistoryService,
    private readonly conversation: ConversationProtocol,
    private readonly logger: Logger,
    options: ResponseCorrelatorOptions,
  ) {
    this.clock = options.clock;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Issues `question` as a text command on `device`, then watches that
   * device's voice history for the spoken reply.
   *
   * @throws TimeoutError when no matching record appears before `timeoutMs`.
   */
  async ask(device: Device, question: string, timeoutMs: number): Promise<string> {
    const notBefore = this.clock.now() - ISSUE_TIME_BUFFER_MS;
    await this.dispatcher.dispatch(device, textCommand(question));

    const criteria: HistoryMatchCriteria = {
      serialNumber: device.serialNumber,
      notBefore,
      question,
    };
    return pollUntil({
      operation: "Alexa",
      policy: { intervalMs: this.intervalMs, timeoutMs },
      clock: this.clock,
      fetch: () => this.history.getRecords(notBefore, this.clock.now() + HISTORY_LOOKAHEAD_MS),
      select: (records) => selectHistoryReply(records, criteria),
      hooks: {
        onError: (error, poll) => this.logger.debug("History poll failed", { poll, error: describeError(error) }),
      },
    });
  }

  /**
   * Asks the conversational backend. Returns the inline answer when the event
   * reply carries one, otherwise polls the conversation's fragments.
   *
   * @throws NoConversationError when no conversation identifier is available.
   * @throws TimeoutError when no agent fragment appears before `timeoutMs`.
   */
  async askPlus(question: string, timeoutMs: number): Promise<string> {
    try {
      await this.conversation.synchronizeState();
    } catch (error: unknown) {
      this.logger.warn("SynchronizeState failed; continuing", describeError(error));
    }

    const reply = await this.conversation.sendTextMessage(question);
    if (reply.responseText) {
      this.logger.debug("Answer returned inline");
      return reply.responseText;
    }
    if (reply.conversationId) {
      this.conversation.setConversationId(reply.conversationId);
    }
    if (!this.conversation.conversationId) {
      throw new NoConversationError("no conversation ID received from Alexa+");
    }

    return pollUntil({
      operation: "Alexa+",
      policy: { intervalMs: this.intervalMs, timeoutMs },
      clock: this.clock,
      fetch: () => this.conversation.getFragments(),
      select: (snapshot) => selectAgentReply(snapshot.fragments),
      hooks: {
        onPoll: (poll) => this.logger.debug("Fragment poll", { poll }),
        onError: (error, poll) => this.logger.debug("Fragment poll failed", { poll, error: describeError(error) }),
      },
    });
  }
}
