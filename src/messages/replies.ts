import { ADVISORY_MARK, FAILURE_MARK, type ModelInfo } from "../llm/types";
import { assembleResult } from "../summary/assemble";
import type { ProviderStatus } from "../summary/service";
import type { SummaryStageError } from "../summary/stageRunner";
import type { StoredSummary, SummaryListing } from "../summary/types";

export const HELP_TEXT = [
  "🤖 Бот сводок чатов",
  "",
  "/providers - список AI провайдеров и их доступность",
  "/test - проверить все провайдеры",
  "/models <провайдер> - модели OpenRouter или Ollama",
  "/summary <chatId> [YYYY-MM-DD] [провайдер] [модель] - создать сводку",
  "/summaries <chatId> - сохраненные сводки",
  "/show <chatId> <YYYY-MM-DD> [daily|custom] - показать сводку",
].join("\n");

export const NOT_ALLOWED_TEXT = "⛔ Команда доступна только администраторам.";
export const UNKNOWN_COMMAND_TEXT = "❓ Неизвестная команда. Отправьте /start для списка команд.";
export const SUMMARY_QUEUED_TEXT = "⏳ Сводка поставлена в очередь, результат придет сюда.";
export const MODELS_SHOWN_LIMIT = 10;

export function summaryAlreadyRunningText(chatId: string, date: string): string {
  return `⏳ Сводка чата ${chatId} за ${date} уже создается. Подождите.`;
}

export function noMessagesText(chatId: string, date: string): string {
  return `📭 Нет сообщений в чате ${chatId} за ${date}.`;
}

export function summaryReadyText(input: {
  chatId: string;
  date: string;
  providerName: string;
  modelName: string;
  text: string;
}): string {
  return `📊 Сводка чата ${input.chatId} за ${input.date}\n🤖 ${input.providerName} (${input.modelName})\n\n${input.text}`;
}

export function summaryFailedText(err: SummaryStageError): string {
  if (err.kind === "safety_block" && err.detail.startsWith(ADVISORY_MARK)) return err.detail;
  return `${FAILURE_MARK} Не удалось создать сводку: ${err.detail}`;
}

export function providersText(statuses: ProviderStatus[]): string {
  if (statuses.length === 0) return "❌ Нет зарегистрированных провайдеров.";
  const lines = statuses.map(
    (s) => `${s.available ? "✅" : "❌"} ${s.displayName} (${s.name})`
  );
  return ["🔌 AI провайдеры:", ...lines].join("\n");
}

export function providerTestText(report: Record<string, boolean>): string {
  const names = Object.keys(report);
  if (names.length === 0) return "❌ Нет зарегистрированных провайдеров.";
  const available = names.filter((name) => report[name]).length;
  return [
    `🧪 Проверка провайдеров: доступно ${available} из ${names.length}`,
    ...names.map((name) => `${report[name] ? "✅" : "❌"} ${name}`),
  ].join("\n");
}

export function modelsText(providerName: string, models: ModelInfo[] | undefined): string {
  if (models === undefined) {
    return `❌ Провайдер ${providerName} не поддерживает список моделей.`;
  }
  if (models.length === 0) return `📭 У провайдера ${providerName} нет доступных моделей.`;
  const lines = models.slice(0, MODELS_SHOWN_LIMIT).map((m) => {
    const context = m.contextLength ? ` (${m.contextLength} токенов)` : "";
    return `• ${m.id}${context}`;
  });
  return [`🧠 Модели ${providerName}:`, ...lines].join("\n");
}

export function summariesListText(chatId: string, listing: SummaryListing[]): string {
  if (listing.length === 0) return `📭 Для чата ${chatId} нет сохраненных сводок.`;
  return [
    `🗂 Сводки чата ${chatId}:`,
    ...listing.map((s) => `• ${s.date} (${s.summaryType === "daily" ? "ежедневная" : "по запросу"})`),
  ].join("\n");
}

export function storedSummaryText(summary: StoredSummary): string {
  const text = assembleResult({
    summary: summary.summaryText,
    reflection: summary.reflectionText ?? undefined,
    improved: summary.improvedSummaryText ?? undefined,
  });
  const source = summary.providerName
    ? `\n🤖 ${summary.providerName}${summary.modelName ? ` (${summary.modelName})` : ""}`
    : "";
  return `📊 Сводка чата ${summary.chatId} за ${summary.date}${source}\n\n${text}`;
}
