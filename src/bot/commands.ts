import type { MessageStore } from "../chats/types";
import { formatDateInZone, isIsoDate } from "../chats/dates";
import { logger } from "../infra/logger";
import { isRecord } from "../llm/http";
import {
  HELP_TEXT,
  modelsText,
  NOT_ALLOWED_TEXT,
  providersText,
  providerTestText,
  storedSummaryText,
  SUMMARY_QUEUED_TEXT,
  summariesListText,
  UNKNOWN_COMMAND_TEXT,
} from "../messages/replies";
import type { GenerateSummaryPayload } from "../queues/summaryQueue";
import type { AnalysisService } from "../summary/service";
import type { SummaryType } from "../summary/types";

export type ParsedCommand = {
  command: string;
  args: string[];
};

export type IncomingCommand = {
  text: string;
  fromId: number;
  chatId: number;
};

export type CommandDeps = {
  service: Pick<AnalysisService, "listAvailableProviders" | "testAllProviders" | "listModels">;
  store: Pick<MessageStore, "getAvailableSummaries" | "getSummary">;
  enqueueSummary: (payload: GenerateSummaryPayload) => Promise<void>;
  adminIds: ReadonlySet<number>;
  timeZone: string;
  now?: () => Date;
};

/** `/cmd@BotName a b` → { command: "/cmd", args: ["a", "b"] }; null for plain text. */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) return null;
  const [head = "", ...args] = trimmed.split(/\s+/);
  const command = head.split("@")[0]?.toLowerCase() ?? "";
  return { command, args };
}

/** The text command inside a Telegram update, if it carries one. */
export function getIncomingCommand(update: unknown): IncomingCommand | null {
  if (!isRecord(update) || !isRecord(update.message)) return null;
  const { text, from, chat } = update.message;
  if (typeof text !== "string" || !isRecord(from) || !isRecord(chat)) return null;
  if (typeof from.id !== "number" || typeof chat.id !== "number") return null;
  return { text, fromId: from.id, chatId: chat.id };
}

function usage(line: string): string {
  return `ℹ️ Использование: ${line}`;
}

async function summaryCommand(args: string[], input: IncomingCommand, deps: CommandDeps): Promise<string> {
  const [chatId, ...rest] = args;
  if (!chatId) return usage("/summary <chatId> [YYYY-MM-DD] [провайдер] [модель]");

  let date = formatDateInZone((deps.now ?? (() => new Date()))(), deps.timeZone);
  if (rest[0] && isIsoDate(rest[0])) {
    date = rest[0];
    rest.shift();
  } else if (rest[0] && /^\d{4}-/.test(rest[0])) {
    return `❌ Неверная дата: ${rest[0]}. Формат: YYYY-MM-DD`;
  }
  const [providerName, modelId] = rest;

  await deps.enqueueSummary({
    chatId,
    date,
    providerName: providerName?.toLowerCase(),
    modelId,
    replyTo: input.chatId,
    requestedBy: input.fromId,
  });
  logger.info("summary requested", { chatId, date, providerName, modelId, by: input.fromId });
  return SUMMARY_QUEUED_TEXT;
}

function isSummaryType(value: string): value is SummaryType {
  return value === "daily" || value === "custom";
}

/** Without a type the daily summary is shown, else the one requested through /summary. */
async function showCommand(args: string[], deps: CommandDeps): Promise<string> {
  const [chatId, date, rawType] = args;
  if (!chatId || !date) return usage("/show <chatId> <YYYY-MM-DD> [daily|custom]");
  if (!isIsoDate(date)) return `❌ Неверная дата: ${date}. Формат: YYYY-MM-DD`;

  const type = rawType?.toLowerCase();
  if (type !== undefined && !isSummaryType(type)) {
    return `❌ Неверный тип сводки: ${rawType}. Допустимо: daily, custom`;
  }
  const summary = type
    ? await deps.store.getSummary(chatId, date, type)
    : (await deps.store.getSummary(chatId, date, "daily")) ?? (await deps.store.getSummary(chatId, date, "custom"));
  return summary ? storedSummaryText(summary) : `📭 Сводка чата ${chatId} за ${date} не найдена.`;
}

/** Reply text for one bot command. Everything but /start is admin-only. */
export async function handleCommand(input: IncomingCommand, deps: CommandDeps): Promise<string | null> {
  const parsed = parseCommand(input.text);
  if (!parsed) return null;
  const { command, args } = parsed;

  if (command === "/start" || command === "/help") return HELP_TEXT;
  if (!deps.adminIds.has(input.fromId)) {
    logger.warn("command rejected: not an admin", { command, fromId: input.fromId });
    return NOT_ALLOWED_TEXT;
  }

  switch (command) {
    case "/providers":
      return providersText(await deps.service.listAvailableProviders());
    case "/test":
      return providerTestText(await deps.service.testAllProviders());
    case "/models": {
      const providerName = args[0]?.toLowerCase();
      if (!providerName) return usage("/models <openrouter|ollama>");
      return modelsText(providerName, await deps.service.listModels(providerName));
    }
    case "/summary":
      return summaryCommand(args, input, deps);
    case "/summaries": {
      const chatId = args[0];
      if (!chatId) return usage("/summaries <chatId>");
      return summariesListText(chatId, await deps.store.getAvailableSummaries(chatId));
    }
    case "/show":
      return showCommand(args, deps);
    default:
      return UNKNOWN_COMMAND_TEXT;
  }
}
