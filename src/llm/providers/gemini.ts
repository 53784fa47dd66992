import { logger } from "../../infra/logger";
import { httpFailure, isRecord, parseJsonBody, sendRequest, type ProviderDeps } from "../http";
import {
  ADVISORY_MARK,
  fail,
  ok,
  type CallOptions,
  type LlmResult,
  type ProviderConfig,
  type ProviderInfo,
} from "../types";
import { BaseProvider, isPlaceholderKey, type GenerationParams } from "./base";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const GEMINI_DEFAULT_MODEL = "gemini-2.5-flash";

type BlockReason = "SAFETY" | "RECITATION" | "OTHER";

const NUMERIC_FINISH_REASONS: Record<number, BlockReason> = {
  2: "SAFETY",
  3: "RECITATION",
  4: "OTHER",
};

const ADVISORIES: Record<BlockReason, string> = {
  SAFETY: `${ADVISORY_MARK} Gemini заблокировал запрос по соображениям безопасности. Рекомендуется использовать GigaChat или OpenRouter.`,
  RECITATION: `${ADVISORY_MARK} Gemini заблокировал запрос из-за нарушения авторских прав. Рекомендуется использовать GigaChat или OpenRouter.`,
  OTHER: `${ADVISORY_MARK} Gemini заблокировал запрос по другим причинам. Рекомендуется использовать GigaChat или OpenRouter.`,
};

/** Finish reasons arrive as enum names over REST and as numbers from older clients. */
export function toBlockReason(value: unknown): BlockReason | undefined {
  if (typeof value === "number") return NUMERIC_FINISH_REASONS[value];
  if (value === "SAFETY" || value === "RECITATION" || value === "OTHER") return value;
  if (value === "PROHIBITED_CONTENT" || value === "BLOCKLIST" || value === "SPII") return "SAFETY";
  return undefined;
}

export function safetyAdvisory(reason: BlockReason): string {
  return ADVISORIES[reason];
}

/**
 * Text of the first candidate, or a `safety_block` failure carrying the
 * advisory when the candidate (or the prompt itself) was blocked.
 */
export function readGeminiResponse(data: unknown): LlmResult<string> {
  if (!isRecord(data)) return fail("malformed_response", "Gemini returned a non-object body");

  const feedback = isRecord(data.promptFeedback) ? data.promptFeedback : undefined;
  const promptBlock = toBlockReason(feedback?.blockReason);
  if (promptBlock) {
    return fail("safety_block", safetyAdvisory(promptBlock));
  }

  const candidates = Array.isArray(data.candidates) ? data.candidates : [];
  const candidate: unknown = candidates[0];
  if (!isRecord(candidate)) {
    return fail("malformed_response", "Gemini returned no candidates");
  }

  const block = toBlockReason(candidate.finishReason);
  if (block) {
    return fail("safety_block", safetyAdvisory(block));
  }

  const content: unknown = candidate.content;
  const parts: unknown[] = isRecord(content) && Array.isArray(content.parts) ? content.parts : [];
  const text = parts
    .map((part) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
    .join("");
  if (text.trim() === "") {
    return fail("malformed_response", "Gemini returned empty content");
  }
  return ok(text);
}

export class GeminiProvider extends BaseProvider {
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(config: ProviderConfig, deps?: ProviderDeps) {
    super("gemini", config, deps);
    this.baseUrl = config.baseUrl ?? GEMINI_BASE_URL;
    this.model = config.model ?? GEMINI_DEFAULT_MODEL;
  }

  validateConfig(): boolean {
    const key = this.config.apiKey?.trim() ?? "";
    if (isPlaceholderKey(key, "your_gemini_key")) {
      logger.error("Gemini API key is not configured");
      return false;
    }
    if (key.length < 20) {
      logger.error("Gemini API key is too short");
      return false;
    }
    return true;
  }

  getCurrentModel(): string {
    return this.model;
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
    return { purpose: "response", temperature: 0.3, maxTokens: 2000 };
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      "x-goog-api-key": this.config.apiKey ?? "",
    };
  }

  protected async probe(options: CallOptions): Promise<LlmResult<void>> {
    if (!this.validateConfig()) {
      return fail("config_invalid", "Gemini API key is not configured");
    }
    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/models/${this.model}`, {
      method: "GET",
      headers: this.headers(),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) return reply;
    return reply.value.ok ? ok(undefined) : httpFailure(reply.value, "Gemini");
  }

  protected async callModel(
    prompt: string,
    params: GenerationParams,
    options: CallOptions
  ): Promise<LlmResult<string>> {
    const reply = await sendRequest(
      this.fetchImpl,
      `${this.baseUrl}/models/${this.model}:generateContent`,
      {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({
          contents: [{ role: "user", parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: params.temperature,
            maxOutputTokens: params.maxTokens,
          },
        }),
        timeoutMs: this.timeoutMs(),
        signal: options.signal,
      }
    );
    if (!reply.ok) return reply;
    if (!reply.value.ok) {
      logger.error("Gemini API error", {
        status: reply.value.status,
        body: reply.value.body.slice(0, 300),
      });
      return httpFailure(reply.value, "Gemini");
    }

    const parsed = parseJsonBody(reply.value.body, "Gemini");
    if (!parsed.ok) return parsed;
    const result = readGeminiResponse(parsed.value);
    if (!result.ok && result.error.kind === "safety_block") {
      logger.warn("Gemini blocked the request", { purpose: params.purpose });
    }
    return result;
  }
}
