import type { ProviderDeps } from "./http";
import { ChatGPTProvider } from "./providers/chatgpt";
import { GeminiProvider } from "./providers/gemini";
import { GigaChatProvider } from "./providers/gigachat";
import { OllamaProvider } from "./providers/ollama";
import { OpenRouterProvider } from "./providers/openrouter";
import { ProviderRegistry } from "./registry";

export type { AIProvider, ChatMessage, LlmResult, ProviderConfig, SummaryContext } from "./types";
export { isFailureText, failureText } from "./types";
export { loadAiConfig, ConfigError, type AiConfig } from "./config";
export { ProviderRegistry } from "./registry";
export { ProviderSelector } from "./selector";

/** A registry with every built-in backend under its lowercase name, in default probe order. */
export function createDefaultRegistry(deps: ProviderDeps = {}): ProviderRegistry {
  const registry = new ProviderRegistry(deps);
  registry.register("gigachat", (config, d) => new GigaChatProvider(config, d));
  registry.register("openrouter", (config, d) => new OpenRouterProvider(config, d));
  registry.register("chatgpt", (config, d) => new ChatGPTProvider(config, d));
  registry.register("gemini", (config, d) => new GeminiProvider(config, d));
  registry.register("ollama", (config, d) => new OllamaProvider(config, d));
  return registry;
}
