import type { ChatMessage } from "../llm/types";

/** The first `[1, 5, 12]` array in a model reply, or undefined when there is none. */
export function parseCleaningIds(reply: string): number[] | undefined {
  const match = /\[[\d,\s]+\]/.exec(reply);
  if (!match) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed)) return undefined;
  const ids: number[] = [];
  for (const item of parsed) {
    if (typeof item === "number" && Number.isInteger(item)) ids.push(item);
  }
  return ids;
}

/** Messages whose 1-based position is in `ids`, in their original order. */
export function keepMessagesById(messages: ChatMessage[], ids: number[]): ChatMessage[] {
  const wanted = new Set(ids);
  return messages.filter((_, i) => wanted.has(i + 1));
}
