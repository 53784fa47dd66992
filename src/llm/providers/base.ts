import { logger } from "../../infra/logger";
import { defaultSleep, isRecord, type FetchLike, type ProviderDeps } from "../http";
import { buildSummaryPrompt, DEFAULT_PROMPTS, type PromptTemplates } from "../prompts";
import { formatMessagesForAnalysis, optimizeText } from "../transcript";
import {
  fail,
  failureText,
  type AIProvider,
  type CallOptions,
  type ChatMessage,
  type LlmResult,
  type OptimizedMessage,
  type ProviderConfig,
  type ProviderInfo,
  type RunRecorder,
  type SummaryContext,
} from "../types";

export const DISPLAY_NAMES: Record<string, string> = {
  gigachat: "GigaChat",
  chatgpt: "ChatGPT",
  openrouter: "OpenRouter",
  gemini: "Gemini",
  ollama: "Ollama (Локальная)",
};

export const DEFAULT_CLOUD_TIMEOUT_SECONDS = 30;

/** Sampling settings for one backend call. */
export type GenerationParams = {
  purpose: "summary" | "response";
  temperature: number;
  maxTokens: number;
};

export const SUMMARY_PARAMS: GenerationParams = { purpose: "summary", temperature: 0.7, maxTokens: 1000 };
export const RESPONSE_PARAMS: GenerationParams = { purpose: "response", temperature: 0.7, maxTokens: 1000 };

export function isPlaceholderKey(key: string | undefined, placeholder: string): boolean {
  return !key || key.trim() === "" || key.trim() === placeholder;
}

/** `choices[0].message.content` of an OpenAI-style chat completion. */
export function readChatCompletion(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const content = first.message.content;
  return typeof content === "string" ? content : undefined;
}

/**
 * Shared behaviour of every backend: transcript preparation, the result/sentinel
 * boundary and run tracing. Variants supply validation, the probe and one model call.
 */
export abstract class BaseProvider implements AIProvider {
  readonly name: string;
  readonly displayName: string;
  protected readonly config: ProviderConfig;
  protected readonly fetchImpl: FetchLike;
  protected readonly now: () => number;
  protected readonly sleep: (ms: number) => Promise<void>;
  protected readonly prompts: PromptTemplates;
  protected readonly timeZone: string | undefined;
  protected runLogger: RunRecorder | undefined;
  protected initialized = false;

  protected constructor(name: string, config: ProviderConfig, deps: ProviderDeps = {}) {
    this.name = name;
    this.displayName = DISPLAY_NAMES[name] ?? name.charAt(0).toUpperCase() + name.slice(1);
    this.config = config;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.prompts = deps.prompts ?? DEFAULT_PROMPTS;
    this.timeZone = deps.timeZone;
  }

  abstract validateConfig(): boolean;
  abstract getProviderInfo(): ProviderInfo;
  abstract getCurrentModel(): string;

  /** Minimal live request; any failure result means unavailable. */
  protected abstract probe(options: CallOptions): Promise<LlmResult<void>>;

  protected abstract callModel(
    prompt: string,
    params: GenerationParams,
    options: CallOptions
  ): Promise<LlmResult<string>>;

  protected responseParams(): GenerationParams {
    return RESPONSE_PARAMS;
  }

  protected timeoutMs(): number {
    return (this.config.timeoutSeconds ?? DEFAULT_CLOUD_TIMEOUT_SECONDS) * 1000;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  setRunLogger(recorder: RunRecorder | undefined): void {
    this.runLogger = recorder;
  }

  async initialize(options: CallOptions = {}): Promise<boolean> {
    try {
      if (!this.validateConfig()) {
        logger.error(`invalid configuration for provider ${this.name}`);
        return false;
      }
      if (!(await this.isAvailable(options))) {
        logger.error(`provider ${this.name} is not available`);
        return false;
      }
      this.initialized = true;
      logger.info(`provider ${this.name} initialized`, { model: this.getCurrentModel() });
      return true;
    } catch (err) {
      logger.error(`provider ${this.name} initialization failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  async isAvailable(options: CallOptions = {}): Promise<boolean> {
    try {
      const result = await this.probe(options);
      if (!result.ok) {
        logger.warn(`provider ${this.name} probe failed`, {
          kind: result.error.kind,
          status: result.error.status,
          error: result.error.message,
        });
        return false;
      }
      return true;
    } catch (err) {
      logger.warn(`provider ${this.name} probe threw`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  optimizeText(messages: ChatMessage[]): OptimizedMessage[] {
    return optimizeText(messages, this.timeZone);
  }

  formatMessagesForAnalysis(messages: OptimizedMessage[]): string {
    return formatMessagesForAnalysis(messages);
  }

  async summarize(
    messages: ChatMessage[],
    context: SummaryContext = {},
    options: CallOptions = {}
  ): Promise<LlmResult<string>> {
    const recorder = this.runLogger;
    const cleaningStarted = this.now();
    await recorder?.logInputMessages(messages);
    const optimized = this.optimizeText(messages);
    const transcript = this.formatMessagesForAnalysis(optimized);
    await recorder?.logOptimizedMessages(optimized, transcript);
    recorder?.recordStageTime("cleaning", (this.now() - cleaningStarted) / 1000);

    if (!transcript) {
      return fail("malformed_response", "Нет сообщений для анализа");
    }

    const prompt = buildSummaryPrompt(this.prompts, transcript, context.date);
    await recorder?.logRequest("summarization", prompt);

    const started = this.now();
    const result = await this.callModel(prompt, SUMMARY_PARAMS, options);
    const durationMs = this.now() - started;
    recorder?.recordStageTime("summarization", durationMs / 1000);

    if (result.ok) {
      await recorder?.logResponse("summarization", result.value, durationMs);
      logger.info(`provider ${this.name} summary received`, {
        chars: result.value.length,
        latencyMs: durationMs,
      });
    } else {
      await recorder?.logStageError("summarization", result.error);
    }
    return result;
  }

  async complete(prompt: string, options: CallOptions = {}): Promise<LlmResult<string>> {
    logger.debug(`provider ${this.name} completion requested`, { promptChars: prompt.length });
    return this.callModel(prompt, this.responseParams(), options);
  }

  async summarizeChat(
    messages: ChatMessage[],
    context?: SummaryContext,
    options?: CallOptions
  ): Promise<string> {
    try {
      const result = await this.summarize(messages, context, options);
      return result.ok ? result.value : failureText(result.error);
    } catch (err) {
      logger.error(`provider ${this.name} summary failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return failureText({ kind: "network", message: `Ошибка при анализе: ${this.displayName}` });
    }
  }

  async generateResponse(prompt: string, options?: CallOptions): Promise<string | undefined> {
    try {
      const result = await this.complete(prompt, options);
      return result.ok ? result.value : undefined;
    } catch (err) {
      logger.error(`provider ${this.name} completion failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }
}
