import { describe, expect, it, vi } from "vitest";
import { ChatGPTProvider } from "../src/llm/providers/chatgpt";
import type { FetchLike } from "../src/llm/http";
import { chatCompletion, jsonResponse, sequenceFetch, textResponse } from "./helpers";

const API_KEY = "sk-test-secret-chatgpt-key";

describe("ChatGPTProvider", () => {
  it("probes with a tiny completion", async () => {
    const fetch = sequenceFetch([() => jsonResponse(chatCompletion("Hi"))]);
    const provider = new ChatGPTProvider({ apiKey: API_KEY }, { fetch });

    expect(await provider.initialize()).toBe(true);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-4",
      messages: [{ role: "user", content: "Hello" }],
      max_tokens: 5,
      temperature: 0,
    });
  });

  it("maps rejected credentials and rate limits to their kinds", async () => {
    const fetch = sequenceFetch([() => textResponse("no", 401), () => textResponse("slow down", 429)]);
    const provider = new ChatGPTProvider({ apiKey: API_KEY }, { fetch });

    const denied = await provider.complete("Привет");
    expect(denied.ok ? "ok" : denied.error.kind).toBe("auth");
    const limited = await provider.complete("Привет");
    expect(limited.ok ? "ok" : limited.error.kind).toBe("rate_limited");
  });

  it("treats empty content as a malformed answer", async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse(chatCompletion("   ")));
    const provider = new ChatGPTProvider({ apiKey: API_KEY }, { fetch });
    expect(await provider.generateResponse("Привет")).toBeUndefined();
  });

  it("never probes without a usable key", async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse(chatCompletion("Hi")));
    const provider = new ChatGPTProvider({ apiKey: "your_openai_key" }, { fetch });
    expect(await provider.isAvailable()).toBe(false);
    expect(fetch).not.toHaveBeenCalled();
  });
});
