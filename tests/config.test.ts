import { describe, expect, it } from "vitest";
import { ConfigError, loadAiConfig, parseAiConfig, resolveEnv } from "../src/llm/config";

const minimal = (extra = "") => `
default_provider: gigachat
providers:
  gigachat:
    api_key: "\${GIGACHAT_API_KEY}"
  openrouter:
    api_key: test-openrouter-key
${extra}`;

describe("resolveEnv", () => {
  it("substitutes variables and defaults", () => {
    expect(resolveEnv("${A}-${B:-fallback}", { A: "x" })).toBe("x-fallback");
    expect(resolveEnv("${A:-d}", { A: "" })).toBe("d");
    expect(resolveEnv("${MISSING}", {})).toBe("");
  });
});

describe("parseAiConfig", () => {
  it("builds one typed record per provider", () => {
    const config = parseAiConfig(minimal(), { GIGACHAT_API_KEY: "test-secret" });
    expect(config.defaultProvider).toBe("gigachat");
    expect(config.providers.gigachat).toEqual({ apiKey: "test-secret" });
    expect(config.providers.openrouter).toEqual({ apiKey: "test-openrouter-key" });
    expect(config.fallbackProviders).toEqual([]);
    expect(config.enableCleaning).toBe(false);
    expect(config.enableReflection).toBe(true);
    expect(config.autoImproveSummary).toBe(false);
    expect(config.probeConcurrency).toBe(3);
    expect(config.runLogs).toEqual({ enabled: true, sink: "file", dir: "llm_logs" });
  });

  it("splits and normalizes the fallback list", () => {
    const yaml = minimal().replace("default_provider: gigachat", "default_provider: gigachat\nfallback_providers: \"OpenRouter, gigachat\"");
    expect(parseAiConfig(yaml, {}).fallbackProviders).toEqual(["openrouter", "gigachat"]);
  });

  it("rejects a fallback provider that is not declared", () => {
    const yaml = minimal().replace("default_provider: gigachat", "default_provider: gigachat\nfallback_providers: [gemini]");
    expect(() => parseAiConfig(yaml, {})).toThrow(ConfigError);
  });

  it("rejects an undeclared default provider", () => {
    expect(() => parseAiConfig(minimal().replace("default_provider: gigachat", "default_provider: ollama"), {})).toThrow(
      /default_provider "ollama"/
    );
  });

  it("rejects unknown provider names", () => {
    expect(() => parseAiConfig(minimal("  mystery:\n    api_key: x\n"), {})).toThrow(/unknown provider "mystery"/);
  });

  it("rejects non-positive timeouts", () => {
    const yaml = minimal().replace('    api_key: test-openrouter-key', "    api_key: test-openrouter-key\n    timeout_seconds: -5");
    expect(() => parseAiConfig(yaml, {})).toThrow(/timeout_seconds must be a positive number/);
  });

  it("reads max_attempts as a whole number of at least one", () => {
    const withAttempts = (value: string) =>
      minimal().replace("    api_key: test-openrouter-key", `    api_key: test-openrouter-key\n    max_attempts: ${value}`);
    expect(parseAiConfig(withAttempts("2.7"), {}).providers.openrouter?.maxAttempts).toBe(2);
    expect(() => parseAiConfig(withAttempts("0.5"), {})).toThrow(
      'providers.openrouter.max_attempts must be at least 1, got "0.5"'
    );
  });

  it("rejects malformed booleans and YAML", () => {
    expect(() => parseAiConfig(`${minimal()}pipeline:\n  enable_reflection: maybe\n`, {})).toThrow(ConfigError);
    expect(() => parseAiConfig("providers: [", {})).toThrow(/not valid YAML/);
  });
});

describe("config/ai.yaml", () => {
  it("loads with every provider and the documented defaults", () => {
    const config = loadAiConfig(undefined, {});
    expect(Object.keys(config.providers).sort()).toEqual(["chatgpt", "gemini", "gigachat", "ollama", "openrouter"]);
    expect(config.defaultProvider).toBe("gigachat");
    expect(config.fallbackProviders).toEqual(["openrouter", "chatgpt", "gemini"]);
    expect(config.providers.ollama?.timeoutSeconds).toBe(600);
    expect(config.providers.openrouter?.maxAttempts).toBe(4);
    expect(config.providers.chatgpt?.model).toBe("gpt-4");
    expect(config.providers.gigachat?.apiKey).toBeUndefined();
    expect(config.prompts.templateDir).toBeUndefined();
  });

  it("takes overrides from the environment", () => {
    const config = loadAiConfig(undefined, {
      AUTO_IMPROVE_SUMMARY: "true",
      DEFAULT_AI_PROVIDER: "OpenRouter",
      ENABLE_CLEANING: "yes",
    });
    expect(config.autoImproveSummary).toBe(true);
    expect(config.enableCleaning).toBe(true);
    expect(config.defaultProvider).toBe("openrouter");
  });
});
