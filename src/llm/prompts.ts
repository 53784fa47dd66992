import fs from "node:fs";
import path from "node:path";
import { logger } from "../infra/logger";
import { clipMessageText } from "./transcript";
import type { ChatMessage, OptimizedMessage } from "./types";

export type PromptName = "cleaning" | "summary" | "reflection" | "improvement";

export type PromptTemplates = Record<PromptName, string>;

export const REFLECTION_SAMPLE_SIZE = 5;
export const IMPROVEMENT_SAMPLE_SIZE = 10;

const DEFAULT_CLEANING_TEMPLATE = `Отфильтруй сообщения чата, оставив только те, которые содержат важную информацию для родителей.

СООБЩЕНИЯ:
{{messages}}

Исключи:
- Координационные сообщения ("кто заберет", "во сколько", "где встречаемся")
- Микроменеджмент ("не забудьте", "напомните детям")
- Повторяющиеся сообщения и короткие реакции ("ок", "спасибо", "понял")

Оставь:
- Важные объявления и информацию о мероприятиях
- Правила, требования и сроки
- Проблемы и жалобы

Верни только JSON массив с ID сообщений, которые нужно оставить, например: [1, 5, 12]`;

const DEFAULT_SUMMARY_TEMPLATE = `Действуй так, как будто ты учитель первого класса и это твой родительский чат. Проанализируй сообщения родительского чата. Включи ТОЛЬКО важные события, которые требуют действий от родителей. Сейчас конец дня: нужно сообщить всем родителям, что сегодня было за день, что надо сделать завтра и что надо сделать в ближайшем будущем.

ИГНОРИРУЙ микроменеджмент и перемещения:
- Кто кого забирает или отпускает, кто приехал, кто уехал
- Кто где ждет (у школы, дома, на остановке)
- Координацию встреч, уточнения без последствий, бытовые вопросы
- Пустые сообщения вроде "Я тоже", "кто идет", "забираю"

ВАЖНО: если есть ссылки на то, что нужно сделать, ОБЯЗАТЕЛЬНО выводи их.

Дата: {{date}}

Чат:
{{transcript}}

Формат резюме:

## 📋 НОВАЯ ИНФОРМАЦИЯ (если есть):
- Нововведения или напоминания, точные требования, последствия, ссылки на регламенты

## 🚨 Родителям (если есть):
- Что именно сделать, к какому сроку, ссылки на документы и формы

## ⚠️ Детям (если есть):
- Что именно сделать, к какому сроку, ссылки на документы и формы

Пиши только про то, что было в сообщениях. Если событий нет, не пиши про них.
Только факты. Только действия. Без воды.`;

const DEFAULT_REFLECTION_TEMPLATE = `Проанализируй следующую суммаризацию чата и дай критическую оценку.

СУММАРИЗАЦИЯ:
{{summary}}

КОНТЕКСТ:
- Дата: {{date}}
- Всего сообщений: {{messageCount}}
- Примеры сообщений (первые {{sampleSize}}):
{{sample}}

Оцени по критериям:
1. Полнота: все ли важные события и требования вошли в суммаризацию
2. Точность: нет ли искажений фактов и выдуманных деталей
3. Структура: логично ли изложение, удобно ли читать
4. Главное: выделены ли ключевые действия и сроки
5. Итоговая оценка качества по шкале от 1 до 10

Дай конструктивную критику и конкретные предложения по улучшению.`;

const DEFAULT_IMPROVEMENT_TEMPLATE = `На основе исходной суммаризации и её анализа создай одну улучшенную версию.

ИСХОДНАЯ СУММАРИЗАЦИЯ:
{{summary}}

АНАЛИЗ И КРИТИКА:
{{reflection}}

ИСХОДНЫЕ СООБЩЕНИЯ (первые {{sampleSize}} из {{messageCount}}):
{{sample}}

Требования к улучшенной версии:
- учти замечания из анализа
- сохрани все важные детали, сроки и ссылки
- сохрани формат исходной суммаризации

Выведи только итоговый текст суммаризации, без пояснений, комментариев и упоминания анализа.`;

export const DEFAULT_PROMPTS: PromptTemplates = {
  cleaning: DEFAULT_CLEANING_TEMPLATE,
  summary: DEFAULT_SUMMARY_TEMPLATE,
  reflection: DEFAULT_REFLECTION_TEMPLATE,
  improvement: DEFAULT_IMPROVEMENT_TEMPLATE,
};

const PROMPT_NAMES: PromptName[] = ["cleaning", "summary", "reflection", "improvement"];

const PROMPT_FILES: Record<PromptName, string> = {
  cleaning: "cleaning.txt",
  summary: "summary.txt",
  reflection: "reflection.txt",
  improvement: "improvement.txt",
};

/**
 * Default templates, each replaced by `<templateDir>/<name>.txt` when that file exists.
 */
export function loadPromptTemplates(templateDir?: string): PromptTemplates {
  const templates: PromptTemplates = { ...DEFAULT_PROMPTS };
  if (!templateDir) return templates;

  if (!fs.existsSync(templateDir)) {
    logger.warn("prompt template dir not found, using defaults", { templateDir, cwd: process.cwd() });
    return templates;
  }

  for (const name of PROMPT_NAMES) {
    const filePath = path.join(templateDir, PROMPT_FILES[name]);
    if (!fs.existsSync(filePath)) continue;
    const content = fs.readFileSync(filePath, "utf8").trim();
    if (content.length === 0) {
      logger.warn("empty prompt template ignored", { name, path: filePath });
      continue;
    }
    templates[name] = content;
  }
  return templates;
}

/** Replaces `{{key}}` placeholders; unknown keys are left as they are. */
export function renderTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}

export function formatSample(messages: OptimizedMessage[], size: number): string {
  if (messages.length === 0) return "(нет сообщений)";
  return messages
    .slice(0, size)
    .map((m, i) => `${i + 1}. [${m.time}] ${m.sender}: ${m.text}`)
    .join("\n");
}

/** Messages are numbered from 1 in input order; empty ones are left out but keep their number. */
export function buildCleaningPrompt(templates: PromptTemplates, messages: ChatMessage[]): string {
  const blocks: string[] = [];
  messages.forEach((m, i) => {
    const text = clipMessageText(m.text ?? "");
    if (text) blocks.push(`ID: ${i + 1}\nТекст: ${text}`);
  });
  return renderTemplate(templates.cleaning, { messages: blocks.join("\n\n") });
}

export function buildSummaryPrompt(
  templates: PromptTemplates,
  transcript: string,
  date?: string
): string {
  return renderTemplate(templates.summary, {
    transcript,
    date: date ?? "неизвестная дата",
  });
}

export function buildReflectionPrompt(
  templates: PromptTemplates,
  input: { summary: string; date?: string; messages: OptimizedMessage[] }
): string {
  const sampleSize = Math.min(REFLECTION_SAMPLE_SIZE, input.messages.length);
  return renderTemplate(templates.reflection, {
    summary: input.summary,
    date: input.date ?? "неизвестная дата",
    messageCount: input.messages.length,
    sampleSize,
    sample: formatSample(input.messages, REFLECTION_SAMPLE_SIZE),
  });
}

export function buildImprovementPrompt(
  templates: PromptTemplates,
  input: { summary: string; reflection: string; messages: OptimizedMessage[] }
): string {
  const sampleSize = Math.min(IMPROVEMENT_SAMPLE_SIZE, input.messages.length);
  return renderTemplate(templates.improvement, {
    summary: input.summary,
    reflection: input.reflection,
    messageCount: input.messages.length,
    sampleSize,
    sample: formatSample(input.messages, IMPROVEMENT_SAMPLE_SIZE),
  });
}
