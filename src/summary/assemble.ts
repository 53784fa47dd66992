import type { SummarizationResult } from "./types";

export const SECTION_LABELS = {
  summary: "📝 Исходная суммаризация:",
  reflection: "🤔 Рефлексия и анализ:",
  improved: "✨ Улучшенная суммаризация:",
} as const;

/**
 * Summary alone when nothing else ran; otherwise labelled sections in
 * summary, reflection, improved order.
 */
export function assembleResult(result: SummarizationResult): string {
  if (!result.reflection) return result.summary;

  const sections = [
    `${SECTION_LABELS.summary}\n${result.summary}`,
    `${SECTION_LABELS.reflection}\n${result.reflection}`,
  ];
  if (result.improved) {
    sections.push(`${SECTION_LABELS.improved}\n${result.improved}`);
  }
  return sections.join("\n\n");
}
