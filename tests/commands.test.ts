import { describe, expect, it, vi } from "vitest";
import {
  getIncomingCommand,
  handleCommand,
  parseCommand,
  type CommandDeps,
  type IncomingCommand,
} from "../src/bot/commands";
import {
  HELP_TEXT,
  NOT_ALLOWED_TEXT,
  SUMMARY_QUEUED_TEXT,
  UNKNOWN_COMMAND_TEXT,
} from "../src/messages/replies";
import type { GenerateSummaryPayload } from "../src/queues/summaryQueue";
import { MemoryStore } from "./helpers";

const ADMIN = 1001;
const STRANGER = 2002;
const CHAT = 555;

function setup() {
  const store = new MemoryStore();
  const enqueueSummary = vi.fn<(payload: GenerateSummaryPayload) => Promise<void>>(async () => {});
  const listModels = vi.fn<CommandDeps["service"]["listModels"]>(async (name: string) =>
    name === "ollama" ? [{ id: "llama3:8b", name: "llama3:8b" }] : undefined
  );
  const deps: CommandDeps = {
    service: {
      listAvailableProviders: async () => [
        { name: "gigachat", displayName: "GigaChat", available: true },
        { name: "ollama", displayName: "Ollama (Локальная)", available: false },
      ],
      testAllProviders: async () => ({ gigachat: true, ollama: false }),
      listModels,
    },
    store,
    enqueueSummary,
    adminIds: new Set([ADMIN]),
    timeZone: "Europe/Moscow",
    // 00:30 on 16 October in Moscow
    now: () => new Date(Date.UTC(2025, 9, 15, 21, 30)),
  };
  const send = (text: string, fromId = ADMIN) => {
    const input: IncomingCommand = { text, fromId, chatId: CHAT };
    return handleCommand(input, deps);
  };
  return { store, enqueueSummary, listModels, send };
}

describe("parseCommand", () => {
  it("splits the command from its arguments and drops the bot name", () => {
    expect(parseCommand("  /Summary@DigestBot chat-1   2025-10-15 ")).toEqual({
      command: "/summary",
      args: ["chat-1", "2025-10-15"],
    });
    expect(parseCommand("просто текст")).toBeNull();
  });
});

describe("getIncomingCommand", () => {
  it("reads text, sender and chat from an update", () => {
    const update = { update_id: 1, message: { text: "/start", from: { id: 7 }, chat: { id: -100 } } };
    expect(getIncomingCommand(update)).toEqual({ text: "/start", fromId: 7, chatId: -100 });
  });

  it("ignores updates without a text message", () => {
    expect(getIncomingCommand({ update_id: 1, edited_message: {} })).toBeNull();
    expect(getIncomingCommand({ message: { photo: [], from: { id: 7 }, chat: { id: 1 } } })).toBeNull();
    expect(getIncomingCommand("nope")).toBeNull();
  });
});

describe("handleCommand", () => {
  it("answers /start for anyone", async () => {
    const { send } = setup();
    expect(await send("/start", STRANGER)).toBe(HELP_TEXT);
  });

  it("refuses admin commands to other users", async () => {
    const { send, enqueueSummary } = setup();
    expect(await send("/summary chat-1", STRANGER)).toBe(NOT_ALLOWED_TEXT);
    expect(enqueueSummary).not.toHaveBeenCalled();
  });

  it("ignores plain text and rejects unknown commands", async () => {
    const { send } = setup();
    expect(await send("привет")).toBeNull();
    expect(await send("/dance")).toBe(UNKNOWN_COMMAND_TEXT);
  });

  it("queues a summary for today in the bot's time zone", async () => {
    const { send, enqueueSummary } = setup();
    expect(await send("/summary chat-1")).toBe(SUMMARY_QUEUED_TEXT);
    expect(enqueueSummary).toHaveBeenCalledWith({
      chatId: "chat-1",
      date: "2025-10-16",
      providerName: undefined,
      modelId: undefined,
      replyTo: CHAT,
      requestedBy: ADMIN,
    });
  });

  it("passes date, provider and model through", async () => {
    const { send, enqueueSummary } = setup();
    await send("/summary chat-1 2025-10-15 OpenRouter deepseek/deepseek-r1:free");
    expect(enqueueSummary).toHaveBeenCalledWith(
      expect.objectContaining({
        date: "2025-10-15",
        providerName: "openrouter",
        modelId: "deepseek/deepseek-r1:free",
      })
    );
  });

  it("rejects a malformed date and a missing chat id", async () => {
    const { send, enqueueSummary } = setup();
    expect(await send("/summary chat-1 2025-13-40")).toBe("❌ Неверная дата: 2025-13-40. Формат: YYYY-MM-DD");
    expect(await send("/summary")).toBe("ℹ️ Использование: /summary <chatId> [YYYY-MM-DD] [провайдер] [модель]");
    expect(enqueueSummary).not.toHaveBeenCalled();
  });

  it("lists providers and test results", async () => {
    const { send } = setup();
    expect(await send("/providers")).toBe(
      "🔌 AI провайдеры:\n✅ GigaChat (gigachat)\n❌ Ollama (Локальная) (ollama)"
    );
    expect(await send("/test")).toBe("🧪 Проверка провайдеров: доступно 1 из 2\n✅ gigachat\n❌ ollama");
  });

  it("lists models for a provider", async () => {
    const { send, listModels } = setup();
    expect(await send("/models Ollama")).toBe("🧠 Модели ollama:\n• llama3:8b");
    expect(listModels).toHaveBeenCalledWith("ollama");
    expect(await send("/models gigachat")).toBe("❌ Провайдер gigachat не поддерживает список моделей.");
  });

  it("lists and shows stored summaries", async () => {
    const { send, store } = setup();
    await store.saveSummary("chat-1", "2025-10-15", {
      summaryText: "Итог",
      providerName: "gigachat",
      modelName: "GigaChat:latest",
    });

    expect(await send("/summaries chat-1")).toBe("🗂 Сводки чата chat-1:\n• 2025-10-15 (ежедневная)");
    expect(await send("/show chat-1 2025-10-15")).toBe(
      "📊 Сводка чата chat-1 за 2025-10-15\n🤖 gigachat (GigaChat:latest)\n\nИтог"
    );
    expect(await send("/show chat-1 2025-10-14")).toBe("📭 Сводка чата chat-1 за 2025-10-14 не найдена.");
    expect(await send("/summaries chat-9")).toBe("📭 Для чата chat-9 нет сохраненных сводок.");
  });

  it("opens a summary requested through /summary", async () => {
    const { send, store } = setup();
    await store.saveSummary(
      "chat-1",
      "2025-10-15",
      { summaryText: "Итог по запросу", providerName: "openrouter", modelName: null },
      "custom"
    );

    expect(await send("/summaries chat-1")).toBe("🗂 Сводки чата chat-1:\n• 2025-10-15 (по запросу)");
    const shown = "📊 Сводка чата chat-1 за 2025-10-15\n🤖 openrouter\n\nИтог по запросу";
    expect(await send("/show chat-1 2025-10-15")).toBe(shown);
    expect(await send("/show chat-1 2025-10-15 custom")).toBe(shown);
    expect(await send("/show chat-1 2025-10-15 daily")).toBe("📭 Сводка чата chat-1 за 2025-10-15 не найдена.");
    expect(await send("/show chat-1 2025-10-15 weekly")).toBe(
      "❌ Неверный тип сводки: weekly. Допустимо: daily, custom"
    );
  });

  it("prefers the daily summary when both kinds exist", async () => {
    const { send, store } = setup();
    await store.saveSummary("chat-1", "2025-10-15", { summaryText: "Ежедневный итог", providerName: null, modelName: null });
    await store.saveSummary("chat-1", "2025-10-15", { summaryText: "Итог по запросу", providerName: null, modelName: null }, "custom");

    expect(await send("/show chat-1 2025-10-15")).toBe("📊 Сводка чата chat-1 за 2025-10-15\n\nЕжедневный итог");
  });
});
