import { describe, expect, it } from "vitest";
import { safetyAdvisory } from "../src/llm/providers/gemini";
import { modelsText, summaryFailedText, summaryReadyText } from "../src/messages/replies";
import { SummaryStageError } from "../src/summary/stageRunner";

describe("summaryFailedText", () => {
  it("passes a safety advisory through unchanged", () => {
    const err = new SummaryStageError("summarizing", "safety_block", safetyAdvisory("SAFETY"));
    expect(summaryFailedText(err)).toBe(safetyAdvisory("SAFETY"));
  });

  it("reports other failures without the stage prefix", () => {
    const err = new SummaryStageError("selecting", "provider_unavailable", "Нет доступных AI провайдеров");
    expect(err.message).toBe("[selecting] Нет доступных AI провайдеров");
    expect(summaryFailedText(err)).toBe("❌ Не удалось создать сводку: Нет доступных AI провайдеров");
  });
});

describe("modelsText", () => {
  it("shows at most ten models with their context size", () => {
    const models = Array.from({ length: 12 }, (_, i) => ({ id: `vendor/m${i}:free`, name: `M${i}`, contextLength: 8192 }));
    const lines = modelsText("openrouter", models).split("\n");
    expect(lines).toHaveLength(11);
    expect(lines[1]).toBe("• vendor/m0:free (8192 токенов)");
  });

  it("says so when the list is empty", () => {
    expect(modelsText("ollama", [])).toBe("📭 У провайдера ollama нет доступных моделей.");
  });
});

describe("summaryReadyText", () => {
  it("heads the summary with chat, date and model", () => {
    expect(
      summaryReadyText({ chatId: "chat-1", date: "2025-10-15", providerName: "gigachat", modelName: "GigaChat:latest", text: "Итог" })
    ).toBe("📊 Сводка чата chat-1 за 2025-10-15\n🤖 gigachat (GigaChat:latest)\n\nИтог");
  });
});
