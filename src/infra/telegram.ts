import type { FetchLike } from "../llm/http";
import { logger } from "./logger";

export const TELEGRAM_MESSAGE_LIMIT = 4096;

let telegramEnvWarned = false;

function getTelegramToken(): string {
  const token = process.env.TELEGRAM_BOT_TOKEN?.trim();
  if (!token) {
    const errorMsg = "Telegram send failed: TELEGRAM_BOT_TOKEN missing";
    if (!telegramEnvWarned) {
      telegramEnvWarned = true;
      logger.error(errorMsg);
    }
    throw new Error(errorMsg);
  }
  return token;
}

/**
 * Chunks of at most `limit` characters, cut on line boundaries. A single line
 * longer than the limit is cut mid-line.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let current: string | undefined;
  for (const line of text.split("\n")) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += limit) {
      pieces.push(line.slice(i, i + limit));
    }
    if (pieces.length === 0) pieces.push("");

    for (const piece of pieces) {
      if (current === undefined) {
        current = piece;
      } else if (current.length + 1 + piece.length <= limit) {
        current = `${current}\n${piece}`;
      } else {
        chunks.push(current);
        current = piece;
      }
    }
  }
  if (current !== undefined) chunks.push(current);
  return chunks;
}

export type TelegramDeps = {
  fetch?: FetchLike;
  token?: string;
};

/**
 * Sends a plain-text message, split into as many Telegram messages as needed.
 */
export async function sendTelegramMessage(
  chatId: number | string,
  text: string,
  deps: TelegramDeps = {}
): Promise<void> {
  const token = deps.token ?? getTelegramToken();
  const fetchImpl: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));
  const url = `https://api.telegram.org/bot${token}/sendMessage`;

  for (const chunk of splitMessage(text)) {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ chat_id: chatId, text: chunk, disable_web_page_preview: true }),
    });
    if (!response.ok) {
      const errorText = await response.text();
      logger.error("Telegram API error", { status: response.status, error: errorText, chatId });
      throw new Error(`Telegram API error: ${response.status} ${errorText}`);
    }
  }
}
