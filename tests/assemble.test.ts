import { describe, expect, it } from "vitest";
import { assembleResult } from "../src/summary/assemble";

describe("assembleResult", () => {
  it("returns the summary alone without a reflection", () => {
    expect(assembleResult({ summary: "Итог", improved: "Лучше" })).toBe("Итог");
  });

  it("labels each section and joins them with a blank line", () => {
    expect(assembleResult({ summary: "Итог", reflection: "Замечания" })).toBe(
      "📝 Исходная суммаризация:\nИтог\n\n🤔 Рефлексия и анализ:\nЗамечания"
    );
    expect(assembleResult({ summary: "Итог", reflection: "Замечания", improved: "Лучше" })).toBe(
      "📝 Исходная суммаризация:\nИтог\n\n🤔 Рефлексия и анализ:\nЗамечания\n\n✨ Улучшенная суммаризация:\nЛучше"
    );
  });
});
