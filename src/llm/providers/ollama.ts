import { logger } from "../../infra/logger";
import { httpFailure, isRecord, parseJsonBody, sendRequest, type ProviderDeps } from "../http";
import {
  fail,
  ok,
  type CallOptions,
  type LlmResult,
  type ModelInfo,
  type ProviderConfig,
  type ProviderInfo,
} from "../types";
import { BaseProvider, type GenerationParams } from "./base";

export const OLLAMA_DEFAULT_BASE_URL = "http://localhost:11434";
export const OLLAMA_DEFAULT_MODEL = "deepseek-r1:8b";
export const OLLAMA_DEFAULT_TIMEOUT_SECONDS = 600;
export const OLLAMA_MIN_TIMEOUT_SECONDS = 300;
const PROBE_TIMEOUT_MS = 10_000;

function readModelNames(data: unknown): string[] {
  if (!isRecord(data) || !Array.isArray(data.models)) return [];
  const names: string[] = [];
  for (const entry of data.models) {
    if (isRecord(entry) && typeof entry.name === "string") names.push(entry.name);
  }
  return names;
}

/** Local models are slow, so the timeout never drops below OLLAMA_MIN_TIMEOUT_SECONDS. */
export function resolveOllamaTimeout(configured: number | undefined): number {
  if (configured === undefined || !Number.isFinite(configured)) return OLLAMA_DEFAULT_TIMEOUT_SECONDS;
  return Math.max(configured, OLLAMA_MIN_TIMEOUT_SECONDS);
}

export class OllamaProvider extends BaseProvider {
  private readonly baseUrl: string;
  private model: string;
  private readonly timeoutSeconds: number;

  constructor(config: ProviderConfig, deps?: ProviderDeps) {
    super("ollama", config, deps);
    this.baseUrl = (config.baseUrl ?? OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.model = config.model ?? OLLAMA_DEFAULT_MODEL;
    this.timeoutSeconds = resolveOllamaTimeout(config.timeoutSeconds);
  }

  validateConfig(): boolean {
    if (!this.baseUrl) {
      logger.error("Ollama base URL is not configured");
      return false;
    }
    if (!this.model) {
      logger.error("Ollama model is not configured");
      return false;
    }
    if (!this.baseUrl.startsWith("http://") && !this.baseUrl.startsWith("https://")) {
      logger.error("Ollama base URL must start with http:// or https://", { baseUrl: this.baseUrl });
      return false;
    }
    return true;
  }

  protected timeoutMs(): number {
    return this.timeoutSeconds * 1000;
  }

  getCurrentModel(): string {
    return this.model;
  }

  setModel(model: string): void {
    this.model = model;
    logger.info("Ollama model set", { model });
  }

  getProviderInfo(): ProviderInfo {
    return {
      name: this.name,
      displayName: this.displayName,
      model: this.model,
      maxTokens: 8000,
      supportsStreaming: true,
      endpoint: this.baseUrl,
    };
  }

  protected responseParams(): GenerationParams {
    return { purpose: "response", temperature: 0.7, maxTokens: 2000 };
  }

  private async listInstalled(options: CallOptions): Promise<LlmResult<string[]>> {
    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/api/tags`, {
      method: "GET",
      timeoutMs: PROBE_TIMEOUT_MS,
      signal: options.signal,
    });
    if (!reply.ok) return reply;
    if (!reply.value.ok) return httpFailure(reply.value, "Ollama");
    const parsed = parseJsonBody(reply.value.body, "Ollama");
    if (!parsed.ok) return parsed;
    return ok(readModelNames(parsed.value));
  }

  protected async probe(options: CallOptions): Promise<LlmResult<void>> {
    if (!this.validateConfig()) {
      return fail("config_invalid", "Ollama is not configured");
    }
    const installed = await this.listInstalled(options);
    if (!installed.ok) return installed;
    if (!installed.value.includes(this.model)) {
      logger.warn("Ollama is reachable but the model is not installed", {
        model: this.model,
        installed: installed.value,
      });
      return fail("configuration_incomplete", `Ollama model ${this.model} is not installed`);
    }
    return ok(undefined);
  }

  async getAvailableModels(options: CallOptions = {}): Promise<ModelInfo[]> {
    const installed = await this.listInstalled(options);
    if (!installed.ok) {
      logger.warn("could not list Ollama models", { error: installed.error.message });
      return [];
    }
    return installed.value.map((name) => ({ id: name, name }));
  }

  protected async callModel(
    prompt: string,
    params: GenerationParams,
    options: CallOptions
  ): Promise<LlmResult<string>> {
    logger.info("sending request to Ollama", { model: this.model, promptChars: prompt.length });
    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: params.temperature,
          top_p: 0.9,
          num_predict: params.maxTokens,
        },
      }),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) {
      logger.error("Ollama request failed", { kind: reply.error.kind, error: reply.error.message });
      return reply;
    }
    if (!reply.value.ok) {
      logger.error("Ollama API error", { status: reply.value.status, body: reply.value.body.slice(0, 300) });
      return httpFailure(reply.value, "Ollama");
    }

    const parsed = parseJsonBody(reply.value.body, "Ollama");
    if (!parsed.ok) return parsed;
    const text = isRecord(parsed.value) ? parsed.value.response : undefined;
    if (typeof text !== "string") {
      return fail("malformed_response", "Неожиданный формат ответа от Ollama");
    }
    return ok(text.trim());
  }
}
