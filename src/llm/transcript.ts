import type { ChatMessage, OptimizedMessage } from "./types";

export const MAX_MESSAGE_CHARS = 200;
export const MAX_TRANSCRIPT_CHARS = 8000;
export const TRANSCRIPT_TRUNCATION_MARKER = "\n... (текст обрезан для экономии токенов)";
export const UNKNOWN_SENDER = "Неизвестно";
export const UNKNOWN_TIME = "??:??";

const timeFormatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string | undefined): Intl.DateTimeFormat {
  const key = timeZone ?? "";
  let formatter = timeFormatters.get(key);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-GB", {
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
      timeZone,
    });
    timeFormatters.set(key, formatter);
  }
  return formatter;
}

export function formatMessageTime(timestamp: number | null | undefined, timeZone?: string): string {
  if (timestamp === null || timestamp === undefined || !Number.isFinite(timestamp) || timestamp <= 0) {
    return UNKNOWN_TIME;
  }
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return UNKNOWN_TIME;
  const parts = formatterFor(timeZone).formatToParts(date);
  const hour = parts.find((p) => p.type === "hour")?.value;
  const minute = parts.find((p) => p.type === "minute")?.value;
  return hour && minute ? `${hour}:${minute}` : UNKNOWN_TIME;
}

/** Collapses whitespace and caps the text at MAX_MESSAGE_CHARS plus "...". */
export function clipMessageText(text: string): string {
  const collapsed = text.trim().replace(/\s+/g, " ");
  return collapsed.length > MAX_MESSAGE_CHARS ? `${collapsed.slice(0, MAX_MESSAGE_CHARS)}...` : collapsed;
}

/**
 * Drops empty messages, collapses whitespace and caps every message at
 * MAX_MESSAGE_CHARS (plus "..."). Never returns more entries than it was given.
 */
export function optimizeText(messages: ChatMessage[], timeZone?: string): OptimizedMessage[] {
  const optimized: OptimizedMessage[] = [];
  for (const msg of messages) {
    const text = clipMessageText(msg.text ?? "");
    if (!text) continue;

    const sender = msg.senderName?.trim() || UNKNOWN_SENDER;
    optimized.push({ time: formatMessageTime(msg.timestamp, timeZone), sender, text });
  }
  return optimized;
}

/** `[HH:MM] sender: text` lines; anything past MAX_TRANSCRIPT_CHARS is cut and marked once. */
export function formatMessagesForAnalysis(messages: OptimizedMessage[]): string {
  if (messages.length === 0) return "";

  const lines = messages
    .filter((m) => m.text.trim().length > 0)
    .map((m) => `[${m.time || UNKNOWN_TIME}] ${m.sender || UNKNOWN_SENDER}: ${m.text}`);

  const full = lines.join("\n");
  if (full.length > MAX_TRANSCRIPT_CHARS) {
    return full.slice(0, MAX_TRANSCRIPT_CHARS) + TRANSCRIPT_TRUNCATION_MARKER;
  }
  return full;
}
