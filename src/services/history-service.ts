import type { Logger } from "../core/logger";
import type { SessionManager } from "../session/session-manager";
import type { HttpTransport } from "../transport/http-transport";
import { BROWSER_USER_AGENT, asArray, asNumber, asRecord, asString, isSuccess, parseJson } from "../transport/wire";
import { BackendError } from "../types/error/echo-relay-error";
import type { HistoryRecord } from "../types/records";

const UTTERANCE_ITEM = "ASR_REPLACEMENT_TEXT";
const REPLY_ITEM = "TTS_REPLACEMENT_TEXT";

function appendTranscript(current: string, addition: string): string {
  if (!addition) {
    return current;
  }
  return current ? `${current} ${addition}` : addition;
}

/**
 * Maps one raw history record. The owning device is the fourth `#` segment of the record key.
 */
export function toHistoryRecord(raw: unknown): HistoryRecord {
  const record = asRecord(raw);
  const recordKey = asString(record.recordKey);
  const keyParts = recordKey.split("#");
  const result: HistoryRecord = {
    recordKey,
    timestamp: asNumber(record.timestamp),
    device: keyParts.length >= 4 ? (keyParts[3] ?? "") : "",
    utterance: "",
    reply: "",
  };
  for (const rawItem of asArray(record.voiceHistoryRecordItems)) {
    const item = asRecord(rawItem);
    const text = asString(item.transcriptText);
    switch (asString(item.recordItemType)) {
      case UTTERANCE_ITEM:
        result.utterance = appendTranscript(result.utterance, text);
        break;
      case REPLY_ITEM:
        result.reply = appendTranscript(result.reply, text);
        break;
      default:
        break;
    }
  }
  return result;
}

/**
 * Voice-activity log reader. Lives on the privacy host and needs the separately scoped activity CSRF token.
 */
export class HistoryService {
  constructor(
    private readonly sessions: SessionManager,
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
  ) {}

  /**
   * @param startTime - Window start, epoch milliseconds.
   * @param endTime - Window end, epoch milliseconds.
   */
  async getRecords(startTime: number, endTime: number): Promise<HistoryRecord[]> {
    const activityCsrf = await this.sessions.ensureActivityCsrf();
    const { cookies, csrf } = this.sessions.requireCsrf();
    const privacy = this.sessions.hosts.privacy;
    const query = new URLSearchParams({
      startTime: String(Math.trunc(startTime)),
      endTime: String(Math.trunc(endTime)),
      pageType: "VOICE_HISTORY",
    });
    const response = await this.transport.send({
      method: "POST",
      url: `${privacy}/alexa-privacy/apd/rvh/customer-history-records-v2/?${query.toString()}`,
      headers: {
        Cookie: cookies,
        csrf,
        "anti-csrftoken-a2z": activityCsrf,
        "Content-Type": "application/json",
        Accept: "application/json, text/plain, */*",
        "Accept-Language": "en-US,en;q=0.9",
        Origin: privacy,
        Referer: `${privacy}/alexa-privacy/apd/activity?ref=activityHistory`,
        "User-Agent": BROWSER_USER_AGENT,
      },
      body: JSON.stringify({ previousRequestToken: null }),
    });
    if (!isSuccess(response.status)) {
      throw new BackendError("history query", response.status, response.body);
    }
    const records = asArray(asRecord(parseJson(response, "history")).customerHistoryRecords).map(
      toHistoryRecord,
    );
    this.logger.debug("History records fetched", { count: records.length, startTime, endTime });
    return records;
  }
}
