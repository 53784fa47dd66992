import { logger } from "../../infra/logger";
import { httpFailure, parseJsonBody, sendRequest, type ProviderDeps } from "../http";
import { fail, ok, type CallOptions, type LlmResult, type ProviderConfig, type ProviderInfo } from "../types";
import {
  BaseProvider,
  isPlaceholderKey,
  readChatCompletion,
  type GenerationParams,
} from "./base";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
export const CHATGPT_DEFAULT_MODEL = "gpt-4";

export class ChatGPTProvider extends BaseProvider {
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(config: ProviderConfig, deps?: ProviderDeps) {
    super("chatgpt", config, deps);
    this.baseUrl = config.baseUrl ?? OPENAI_BASE_URL;
    this.model = config.model ?? CHATGPT_DEFAULT_MODEL;
  }

  validateConfig(): boolean {
    const key = this.config.apiKey?.trim() ?? "";
    if (isPlaceholderKey(key, "your_openai_key")) {
      logger.error("ChatGPT API key is not configured");
      return false;
    }
    if (key.length < 20) {
      logger.error("ChatGPT API key is too short");
      return false;
    }
    if (!key.startsWith("sk-")) {
      logger.warn("ChatGPT API key does not start with 'sk-'");
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
      maxTokens: 4000,
      supportsStreaming: true,
      endpoint: this.baseUrl,
    };
  }

  protected responseParams(): GenerationParams {
    return { purpose: "response", temperature: 0.3, maxTokens: 2000 };
  }

  protected async probe(options: CallOptions): Promise<LlmResult<void>> {
    if (!this.validateConfig()) {
      return fail("config_invalid", "ChatGPT API key is not configured");
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
      headers: {
        Authorization: `Bearer ${this.config.apiKey ?? ""}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: params.maxTokens,
        temperature: params.temperature,
      }),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) {
      logger.error("ChatGPT request failed", { kind: reply.error.kind, error: reply.error.message });
      return reply;
    }

    const { status, body } = reply.value;
    if (status === 429) {
      logger.error("ChatGPT rate limit exceeded", { purpose: params.purpose });
      return httpFailure(reply.value, "ChatGPT");
    }
    if (status === 401 || status === 403) {
      logger.error("ChatGPT authentication failed", { status });
      return httpFailure(reply.value, "ChatGPT");
    }
    if (!reply.value.ok) {
      logger.error("ChatGPT API error", { status, body: body.slice(0, 300) });
      return httpFailure(reply.value, "ChatGPT");
    }

    const parsed = parseJsonBody(body, "ChatGPT");
    if (!parsed.ok) return parsed;
    const content = readChatCompletion(parsed.value);
    if (content === undefined || content.trim() === "") {
      return fail("malformed_response", "ChatGPT returned empty content");
    }
    return ok(content);
  }
}
