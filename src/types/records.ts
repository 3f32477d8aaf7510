/**
 * Plain structured values handed to output layers. No backend encoding leaks through these shapes.
 */

export interface Device {
  accountName: string;
  serialNumber: string;
  deviceType: string;
  deviceFamily: string;
  /** Owning customer; becomes the session's customer identifier on first listing. */
  customerId: string;
  online: boolean;
  capabilities: string[];
}

/**
 * A stored automation. `sequence` is the raw execution payload, replayed verbatim.
 */
export interface Routine {
  automationId: string;
  name: string;
  sequence: string;
}

export interface SmartHomeDevice {
  entityId: string;
  applianceId: string;
  name: string;
  description: string;
  types: string[];
  reachable: boolean;
}

/**
 * One voice-activity turn.
 */
export interface HistoryRecord {
  /** Composite key: `customerId#timestamp#deviceType#serialNumber`. */
  recordKey: string;
  /** Epoch milliseconds. */
  timestamp: number;
  /** Device serial recovered from the record key, empty when the key is short. */
  device: string;
  /** Recognized user utterance. */
  utterance: string;
  /** Synthesized assistant reply. */
  reply: string;
}

export type FragmentPurpose = "USER" | "AGENT" | (string & {});

export interface FragmentItem {
  text: string;
  style: string;
}

export interface ConversationFragment {
  fragmentUri: string;
  timestamp: string;
  purpose: FragmentPurpose;
  provenance?: string;
  /** Plain text, or the text nested in the card payload. Empty when the fragment has none. */
  text: string;
  items: FragmentItem[];
}

export interface ConversationSnapshot {
  conversationId: string;
  fragments: ConversationFragment[];
  token?: string;
}

export interface ConversationSummary {
  conversationId: string;
  deviceName: string;
}
