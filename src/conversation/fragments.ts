import { asArray, asRecord, asString, isRecord } from "../transport/wire";
import type {
  ConversationFragment,
  ConversationSnapshot,
  ConversationSummary,
  FragmentItem,
} from "../types/records";

export const ATTRIBUTION_STYLE = "text-style-attribution";
export const LLM_FRAGMENT_MARKER = "LLM:APE";

function toItems(raw: unknown): FragmentItem[] {
  return asArray(raw).map((item) => {
    const record = asRecord(item);
    return { text: asString(record.text), style: asString(record.style) };
  });
}

/**
 * Normalizes one fragment. Card fragments carry their text directly; APL
 * fragments nest it under `datasources.cardData`.
 */
export function toFragment(raw: unknown): ConversationFragment {
  const record = asRecord(raw);
  const metadata = asRecord(record.metadata);
  const content = asRecord(record.content);
  const datasources = asRecord(content.datasources);
  const cardData = isRecord(datasources.cardData) ? datasources.cardData : undefined;

  const directItems = toItems(content.items);
  const provenance = asString(asRecord(metadata.provenance).type);
  return {
    fragmentUri: asString(record.fragmentURI),
    timestamp: asString(record.timestamp),
    purpose: asString(metadata.purpose),
    ...(provenance ? { provenance } : {}),
    text: asString(content.text) || (cardData ? asString(cardData.text) : ""),
    items: directItems.length > 0 ? directItems : toItems(cardData?.items),
  };
}

export function toConversationSnapshot(raw: unknown): ConversationSnapshot {
  const record = asRecord(raw);
  const token = asString(record.token);
  return {
    conversationId: asString(record.conversationId),
    fragments: asArray(record.fragments).map(toFragment),
    ...(token ? { token } : {}),
  };
}

export function toConversationSummaries(raw: unknown): ConversationSummary[] {
  return asArray(asRecord(raw).conversations).map((item) => {
    const record = asRecord(item);
    const created = asString(asRecord(asRecord(record.creation).origin).name);
    const lastTurn = asString(asRecord(asRecord(record.lastTurn).origin).name);
    return {
      conversationId: asString(record.id),
      deviceName: lastTurn || created,
    };
  });
}

export function isAgentFragment(fragment: ConversationFragment): boolean {
  return fragment.purpose === "AGENT" || fragment.fragmentUri.includes(LLM_FRAGMENT_MARKER);
}

/**
 * Fragment text followed by its attribution lines, one per line.
 */
export function renderAgentText(fragment: ConversationFragment): string {
  const attributions = fragment.items
    .filter((item) => item.style === ATTRIBUTION_STYLE)
    .map((item) => item.text);
  return [fragment.text, ...attributions].join("\n");
}

/**
 * First agent fragment with non-empty text, rendered with attributions.
 */
export function selectAgentReply(fragments: readonly ConversationFragment[]): string | undefined {
  const fragment = fragments.find((f) => f.text !== "" && isAgentFragment(f));
  return fragment ? renderAgentText(fragment) : undefined;
}
