import { describe, expect, it, vi } from "vitest";
import {
  FALLBACK_MODELS_CACHE_TTL_MS,
  MODELS_CACHE_TTL_MS,
  OpenRouterProvider,
  RATE_LIMIT_DELAY_MS,
  selectTopFreeModels,
} from "../src/llm/providers/openrouter";
import type { FetchLike } from "../src/llm/http";
import { chatCompletion, jsonResponse, sequenceFetch, textResponse } from "./helpers";

const API_KEY = "test-secret-openrouter-key";

function freeModel(id: string, contextLength: number) {
  return { id, name: id, context_length: contextLength, pricing: { prompt: "0", completion: "0" } };
}

function makeProvider(fetch: FetchLike, now: () => number = () => 0) {
  const sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  const provider = new OpenRouterProvider({ apiKey: API_KEY }, { fetch, sleep, now });
  return { provider, sleep };
}

describe("OpenRouterProvider rate limiting", () => {
  it("gives up after four rate-limited attempts with fixed delays", async () => {
    const fetch = sequenceFetch([() => textResponse("rate limited", 429)]);
    const { provider, sleep } = makeProvider(fetch);

    expect(await provider.generateResponse("Привет")).toBeUndefined();
    expect(fetch).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
      RATE_LIMIT_DELAY_MS,
      RATE_LIMIT_DELAY_MS,
      RATE_LIMIT_DELAY_MS,
    ]);
  });

  it("succeeds once the limit clears", async () => {
    const fetch = sequenceFetch([
      () => textResponse("rate limited", 429),
      () => textResponse("rate limited", 429),
      () => jsonResponse(chatCompletion("ok")),
    ]);
    const { provider, sleep } = makeProvider(fetch);

    expect(await provider.generateResponse("Привет")).toBe("ok");
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("succeeds on the fourth attempt after three rate-limited ones", async () => {
    const fetch = sequenceFetch([
      () => textResponse("rate limited", 429),
      () => textResponse("rate limited", 429),
      () => textResponse("rate limited", 429),
      () => jsonResponse(chatCompletion("ok")),
    ]);
    const { provider, sleep } = makeProvider(fetch);

    expect(await provider.complete("Привет")).toEqual({ ok: true, value: "ok" });
    expect(fetch).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("takes the attempt count from the config and always sends at least one request", async () => {
    const twice = sequenceFetch([() => textResponse("rate limited", 429)]);
    const limited = new OpenRouterProvider({ apiKey: API_KEY, maxAttempts: 2 }, { fetch: twice, sleep: async () => {} });
    expect(await limited.complete("Привет")).toMatchObject({ ok: false, error: { kind: "rate_limited", status: 429 } });
    expect(twice).toHaveBeenCalledTimes(2);

    const once = sequenceFetch([() => jsonResponse(chatCompletion("ok"))]);
    const fractional = new OpenRouterProvider({ apiKey: API_KEY, maxAttempts: 0.5 }, { fetch: once, sleep: async () => {} });
    expect(await fractional.complete("Привет")).toEqual({ ok: true, value: "ok" });
    expect(once).toHaveBeenCalledTimes(1);
  });

  it("does not retry other HTTP errors", async () => {
    const fetch = sequenceFetch([() => textResponse("boom", 500)]);
    const { provider, sleep } = makeProvider(fetch);

    const result = await provider.complete("Привет");
    expect(result).toEqual({
      ok: false,
      error: { kind: "http", message: "OpenRouter API error 500: boom", status: 500 },
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sends the bearer key and the current model", async () => {
    const fetch = sequenceFetch([() => jsonResponse(chatCompletion("ok"))]);
    const { provider } = makeProvider(fetch);
    provider.setModel("qwen/qwen3-8b:free");

    await provider.complete("Привет");
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(init).toMatchObject({ method: "POST", headers: { Authorization: `Bearer ${API_KEY}` } });
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: "qwen/qwen3-8b:free" });
  });
});

describe("selectTopFreeModels", () => {
  it("keeps free models only, priority table first, then by context length", () => {
    const ranked = selectTopFreeModels([
      freeModel("vendor/big:free", 200000),
      freeModel("deepseek/deepseek-r1:free", 8000),
      { id: "vendor/paid", context_length: 1000000, pricing: { prompt: "0.001", completion: "0.002" } },
      freeModel("deepseek/deepseek-chat-v3.1:free", 8000),
      freeModel("vendor/small:free", 32000),
      "not a model",
    ]);
    expect(ranked.map((m) => m.id)).toEqual([
      "deepseek/deepseek-chat-v3.1:free",
      "deepseek/deepseek-r1:free",
      "vendor/big:free",
      "vendor/small:free",
    ]);
  });

  it("caps the list at ten", () => {
    const models = Array.from({ length: 12 }, (_, i) => freeModel(`vendor/m${i}:free`, 1000 + i));
    const ranked = selectTopFreeModels(models);
    expect(ranked).toHaveLength(10);
    expect(ranked[0]?.id).toBe("vendor/m11:free");
    expect(ranked[9]?.id).toBe("vendor/m2:free");
  });
});

describe("OpenRouterProvider.getAvailableModels", () => {
  it("caches the live list for an hour", async () => {
    let now = 1_000;
    const fetch = sequenceFetch([() => jsonResponse({ data: [freeModel("vendor/a:free", 4096)] })]);
    const { provider } = makeProvider(fetch, () => now);

    expect((await provider.getAvailableModels()).map((m) => m.id)).toEqual(["vendor/a:free"]);
    now += MODELS_CACHE_TTL_MS - 1;
    await provider.getAvailableModels();
    expect(fetch).toHaveBeenCalledTimes(1);

    now += 1;
    await provider.getAvailableModels();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("falls back to the local catalog and retries sooner", async () => {
    let now = 0;
    const fetch = sequenceFetch([() => textResponse("unavailable", 503)]);
    const { provider } = makeProvider(fetch, () => now);

    const models = await provider.getAvailableModels();
    expect(models.map((m) => m.id)).toEqual([
      "deepseek/deepseek-chat-v3.1:free",
      "deepseek/deepseek-r1:free",
      "qwen/qwen3-8b:free",
      "moonshotai/kimi-dev-72b:free",
      "microsoft/mai-ds-r1:free",
    ]);

    now = FALLBACK_MODELS_CACHE_TTL_MS - 1;
    await provider.getAvailableModels();
    expect(fetch).toHaveBeenCalledTimes(1);
    now = FALLBACK_MODELS_CACHE_TTL_MS;
    await provider.getAvailableModels();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("clearModelsCache forces a refetch", async () => {
    const fetch = sequenceFetch([() => jsonResponse({ data: [] })]);
    const { provider } = makeProvider(fetch);
    await provider.getAvailableModels();
    provider.clearModelsCache();
    await provider.getAvailableModels();
    expect(fetch).toHaveBeenCalledTimes(2);
  });
});

describe("OpenRouterProvider.validateConfig", () => {
  it("rejects placeholder and short keys", () => {
    expect(new OpenRouterProvider({ apiKey: "your_openrouter_key" }).validateConfig()).toBe(false);
    expect(new OpenRouterProvider({ apiKey: "short-key" }).validateConfig()).toBe(false);
    expect(new OpenRouterProvider({ apiKey: API_KEY }).validateConfig()).toBe(true);
  });
});
