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
import catalog from "./openrouterCatalog.json";
import {
  BaseProvider,
  isPlaceholderKey,
  readChatCompletion,
  type GenerationParams,
} from "./base";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
export const OPENROUTER_DEFAULT_MODEL = "nvidia/nemotron-nano-9b-v2:free";
export const RATE_LIMIT_ATTEMPTS = 4;
export const RATE_LIMIT_DELAY_MS = 5000;
export const MODELS_CACHE_TTL_MS = 60 * 60 * 1000;
export const FALLBACK_MODELS_CACHE_TTL_MS = 5 * 60 * 1000;
export const TOP_MODELS_LIMIT = 10;
const DEFAULT_CONTEXT_LENGTH = 4096;

/** Fixed scores for models known to summarize well; the rest rank by context length. */
export const MODEL_PRIORITY: Record<string, number> = {
  "deepseek/deepseek-chat-v3.1:free": 1000,
  "deepseek/deepseek-r1:free": 950,
  "deepseek/deepseek-v3:free": 900,
  "mistral/mistral-small-3.2:free": 850,
  "meta/llama-3.3-8b-instruct:free": 800,
  "qwen/qwen3-8b:free": 750,
  "google/gemma-3-12b:free": 700,
  "moonshotai/kimi-dev-72b:free": 650,
  "microsoft/mai-ds-r1:free": 600,
  "tng/deepseek-r1t-chimera:free": 550,
};

export const STATIC_CATALOG: ModelInfo[] = catalog.models;

function toModelInfo(raw: unknown): { model: ModelInfo; free: boolean } | undefined {
  if (!isRecord(raw) || typeof raw.id !== "string") return undefined;
  const pricing = isRecord(raw.pricing) ? raw.pricing : {};
  const free = pricing.prompt === "0" && pricing.completion === "0";
  return {
    free,
    model: {
      id: raw.id,
      name: typeof raw.name === "string" ? raw.name : raw.id,
      description: typeof raw.description === "string" ? raw.description : "Нет описания",
      contextLength: typeof raw.context_length === "number" ? raw.context_length : DEFAULT_CONTEXT_LENGTH,
    },
  };
}

/** Priority-table models first, by their score; everything else by context length. */
function compareModels(a: ModelInfo, b: ModelInfo): number {
  const pa = MODEL_PRIORITY[a.id];
  const pb = MODEL_PRIORITY[b.id];
  if (pa !== undefined || pb !== undefined) return (pb ?? -1) - (pa ?? -1);
  return (b.contextLength ?? DEFAULT_CONTEXT_LENGTH) - (a.contextLength ?? DEFAULT_CONTEXT_LENGTH);
}

/** Zero-priced entries of a `/models` payload, best first, capped at TOP_MODELS_LIMIT. */
export function selectTopFreeModels(apiModels: unknown[]): ModelInfo[] {
  const free: ModelInfo[] = [];
  for (const raw of apiModels) {
    const entry = toModelInfo(raw);
    if (entry?.free) free.push(entry.model);
  }
  // stable sort: ties keep API order
  free.sort(compareModels);
  return free.slice(0, TOP_MODELS_LIMIT);
}

export function fallbackModels(): ModelInfo[] {
  const byId = new Map(STATIC_CATALOG.map((m) => [m.id, m]));
  const result: ModelInfo[] = [];
  for (const id of Object.keys(MODEL_PRIORITY)) {
    const model = byId.get(id);
    if (model) result.push(model);
  }
  return result;
}

type ModelsCache = {
  models: ModelInfo[];
  storedAt: number;
  ttlMs: number;
};

export class OpenRouterProvider extends BaseProvider {
  private readonly baseUrl: string;
  private currentModel: string;
  private modelsCache: ModelsCache | undefined;

  constructor(config: ProviderConfig, deps?: ProviderDeps) {
    super("openrouter", config, deps);
    this.baseUrl = config.baseUrl ?? OPENROUTER_BASE_URL;
    this.currentModel = config.model ?? OPENROUTER_DEFAULT_MODEL;
  }

  validateConfig(): boolean {
    const key = this.config.apiKey?.trim() ?? "";
    if (isPlaceholderKey(key, "your_openrouter_key")) {
      logger.error("OpenRouter API key is not configured");
      return false;
    }
    if (key.length < 20) {
      logger.error("OpenRouter API key is too short");
      return false;
    }
    return true;
  }

  getCurrentModel(): string {
    return this.currentModel;
  }

  getCurrentModelInfo(): ModelInfo | undefined {
    return STATIC_CATALOG.find((m) => m.id === this.currentModel);
  }

  /** Always accepted; ids outside the static catalog are logged and used anyway. */
  setModel(model: string): void {
    if (!STATIC_CATALOG.some((m) => m.id === model)) {
      logger.warn("OpenRouter model not in local catalog, using it anyway", { model });
    }
    this.currentModel = model;
    logger.info("OpenRouter model set", { model });
  }

  getProviderInfo(): ProviderInfo {
    return {
      name: this.name,
      displayName: this.displayName,
      model: this.currentModel,
      maxTokens: 4000,
      supportsStreaming: true,
      endpoint: this.baseUrl,
    };
  }

  clearModelsCache(): void {
    this.modelsCache = undefined;
    logger.info("OpenRouter models cache cleared");
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.apiKey ?? ""}`,
      "Content-Type": "application/json",
      "HTTP-Referer": "https://github.com/chat-digest-bot",
      "X-Title": "Chat Digest Bot",
    };
  }

  protected responseParams(): GenerationParams {
    return { purpose: "response", temperature: 0.3, maxTokens: 2000 };
  }

  protected async probe(options: CallOptions): Promise<LlmResult<void>> {
    if (!this.validateConfig()) {
      return fail("config_invalid", "OpenRouter API key is not configured");
    }
    const result = await this.callModel(
      "Hello",
      { purpose: "response", temperature: 0, maxTokens: 5 },
      options
    );
    return result.ok ? ok(undefined) : result;
  }

  protected async callModel(
    prompt: string,
    params: GenerationParams,
    options: CallOptions
  ): Promise<LlmResult<string>> {
    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        model: this.currentModel,
        messages: [{ role: "user", content: prompt }],
        max_tokens: params.maxTokens,
        temperature: params.temperature,
      }),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) return reply;
    if (reply.value.status !== 200) {
      return httpFailure(reply.value, "OpenRouter");
    }

    const parsed = parseJsonBody(reply.value.body, "OpenRouter");
    if (!parsed.ok) return parsed;
    const content = readChatCompletion(parsed.value);
    if (content === undefined || content.trim() === "") {
      logger.warn("OpenRouter returned empty content", { model: this.currentModel });
      return fail("malformed_response", "OpenRouter returned empty content");
    }
    return ok(content);
  }

  /**
   * Retries HTTP 429 with a fixed delay, up to RATE_LIMIT_ATTEMPTS calls in total.
   * Any other failure is returned at once.
   */
  async complete(prompt: string, options: CallOptions = {}): Promise<LlmResult<string>> {
    const attempts = Math.max(1, Math.floor(this.config.maxAttempts ?? RATE_LIMIT_ATTEMPTS));
    let last: LlmResult<string> = fail("rate_limited", "OpenRouter rate limit exceeded", 429);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        logger.info("OpenRouter retry", { attempt, attempts, delayMs: RATE_LIMIT_DELAY_MS });
      }
      last = await this.callModel(prompt, this.responseParams(), options);
      if (last.ok) return last;
      if (last.error.kind !== "rate_limited") {
        logger.error("OpenRouter request failed", {
          kind: last.error.kind,
          status: last.error.status,
          model: this.currentModel,
        });
        return last;
      }

      logger.warn("OpenRouter rate limited", { attempt, attempts });
      if (attempt < attempts) {
        await this.sleep(RATE_LIMIT_DELAY_MS);
        if (options.signal?.aborted) return fail("cancelled", "request cancelled");
      }
    }

    logger.error("OpenRouter rate limit did not clear", { attempts });
    return last;
  }

  /**
   * Live free models, best first. Falls back to the static catalog when the
   * `/models` call fails; that result is cached for a shorter time.
   */
  async getAvailableModels(options: CallOptions = {}): Promise<ModelInfo[]> {
    const now = this.now();
    if (this.modelsCache && now - this.modelsCache.storedAt < this.modelsCache.ttlMs) {
      return this.modelsCache.models;
    }

    const live = await this.fetchModels(options);
    if (live.ok) {
      const models = selectTopFreeModels(live.value);
      this.modelsCache = { models, storedAt: now, ttlMs: MODELS_CACHE_TTL_MS };
      logger.info("OpenRouter models refreshed", { total: live.value.length, selected: models.length });
      return models;
    }

    logger.warn("OpenRouter models unavailable, using local catalog", { error: live.error.message });
    const models = fallbackModels();
    this.modelsCache = { models, storedAt: now, ttlMs: FALLBACK_MODELS_CACHE_TTL_MS };
    return models;
  }

  private async fetchModels(options: CallOptions): Promise<LlmResult<unknown[]>> {
    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/models`, {
      method: "GET",
      headers: this.headers(),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) return reply;
    if (reply.value.status !== 200) return httpFailure(reply.value, "OpenRouter models");

    const parsed = parseJsonBody(reply.value.body, "OpenRouter models");
    if (!parsed.ok) return parsed;
    if (!isRecord(parsed.value) || !Array.isArray(parsed.value.data)) {
      return fail("malformed_response", "OpenRouter models response has no data array");
    }
    return ok(parsed.value.data);
  }
}
