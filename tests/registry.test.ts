import { describe, expect, it } from "vitest";
import { createDefaultRegistry } from "../src/llm/index";
import { OpenRouterProvider } from "../src/llm/providers/openrouter";
import { ProviderRegistry, type ProviderFactory } from "../src/llm/registry";
import { FakeProvider } from "./helpers";

describe("ProviderRegistry", () => {
  it("creates registered providers by case-insensitive name", () => {
    const registry = new ProviderRegistry();
    expect(registry.register("Fake", () => new FakeProvider("fake"))).toBe(true);
    expect(registry.isRegistered("FAKE")).toBe(true);
    expect(registry.create(" fake ", {})?.name).toBe("fake");
    expect(registry.size).toBe(1);
  });

  it("returns undefined for an unknown provider", () => {
    const registry = createDefaultRegistry();
    expect(registry.create("unknown_provider", {})).toBeUndefined();
  });

  it("rejects empty names", () => {
    const registry = new ProviderRegistry();
    expect(registry.register("  ", () => new FakeProvider("x"))).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("never throws when a factory fails or returns a non-provider", () => {
    const registry = new ProviderRegistry();
    const throwing: ProviderFactory = () => {
      throw new Error("boom");
    };
    registry.register("throwing", throwing);
    registry.register("broken", () => Object.assign(new FakeProvider("broken"), { summarizeChat: undefined }));
    expect(registry.create("throwing", {})).toBeUndefined();
    expect(registry.create("broken", {})).toBeUndefined();
  });

  it("lists names in registration order and can be cleared", () => {
    const registry = createDefaultRegistry();
    expect(registry.listNames()).toEqual(["gigachat", "openrouter", "chatgpt", "gemini", "ollama"]);
    registry.clear();
    expect(registry.size).toBe(0);
  });

  it("hands its dependencies to every factory", () => {
    const registry = createDefaultRegistry({ timeZone: "UTC" });
    const provider = registry.create("openrouter", { apiKey: "test-secret-openrouter-key", model: "m:free" });
    expect(provider).toBeInstanceOf(OpenRouterProvider);
    expect(provider?.getCurrentModel()).toBe("m:free");
    expect(provider?.optimizeText([{ senderName: "A", text: "x", timestamp: Date.UTC(2025, 0, 1, 7, 3) }])).toEqual([
      { time: "07:03", sender: "A", text: "x" },
    ]);
  });
});
