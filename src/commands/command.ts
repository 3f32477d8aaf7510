/**
 * A logical command, consumed by a single dispatch call.
 */
export type Command =
  | { kind: "speak"; text: string }
  | { kind: "announce"; text: string }
  | { kind: "textCommand"; text: string }
  | { kind: "automation"; routineName: string };

export type CommandKind = Command["kind"];

export const speak = (text: string): Extract<Command, { kind: "speak" }> => ({ kind: "speak", text });
export const announce = (text: string): Extract<Command, { kind: "announce" }> => ({ kind: "announce", text });
export const textCommand = (text: string): Extract<Command, { kind: "textCommand" }> => ({ kind: "textCommand", text });
export const automation = (routineName: string): Extract<Command, { kind: "automation" }> => ({ kind: "automation", routineName });

/**
 * SSML that plays a hosted MP3 through the speak command.
 */
export function audioSsml(url: string): string {
  return `<speak><audio src="${url}"/></speak>`;
}
