/**
 * Shared contracts for the AI provider layer.
 */

/** One chat message as loaded from the message store. Timestamps are epoch milliseconds. */
export type ChatMessage = {
  messageId?: string;
  senderId?: string;
  senderName?: string;
  text: string;
  timestamp?: number | null;
};

/** A message after whitespace collapsing and length capping; time is "HH:MM" or "??:??". */
export type OptimizedMessage = {
  time: string;
  sender: string;
  text: string;
};

/** Typed per-provider settings, built once by the config loader. */
export type ProviderConfig = {
  apiKey?: string;
  baseUrl?: string;
  authUrl?: string;
  model?: string;
  timeoutSeconds?: number;
  /** Total calls per completion, first one included. */
  maxAttempts?: number;
  scope?: string;
};

export type ErrorKind =
  | "config_invalid"
  | "provider_unavailable"
  | "configuration_incomplete"
  | "rate_limited"
  | "auth"
  | "safety_block"
  | "malformed_response"
  | "timeout"
  | "network"
  | "http"
  | "cancelled";

export type LlmError = {
  kind: ErrorKind;
  message: string;
  status?: number;
};

export type LlmResult<T> = { ok: true; value: T } | { ok: false; error: LlmError };

export function ok<T>(value: T): LlmResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string, status?: number): LlmResult<T> {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
}

/** Prefix of a summary that failed. `summarizeChat` never throws; it returns text starting with this. */
export const FAILURE_MARK = "❌";
/** Prefix of a backend advisory (e.g. a safety block) returned in place of a summary. */
export const ADVISORY_MARK = "⚠️";

export function isFailureText(text: string): boolean {
  const trimmed = text.trimStart();
  return trimmed.startsWith(FAILURE_MARK) || trimmed.startsWith(ADVISORY_MARK);
}

export function failureText(error: LlmError): string {
  if (error.kind === "safety_block" && error.message.startsWith(ADVISORY_MARK)) {
    return error.message;
  }
  return `${FAILURE_MARK} ${error.message}`;
}

export type ProviderInfo = {
  name: string;
  displayName: string;
  model: string;
  maxTokens: number;
  supportsStreaming: boolean;
  endpoint: string;
};

export type ModelInfo = {
  id: string;
  name: string;
  contextLength?: number;
  description?: string;
};

/** Extra facts about the chat passed along with the messages. */
export type SummaryContext = {
  chatId?: string;
  chatTitle?: string;
  date?: string;
};

export type CallOptions = {
  signal?: AbortSignal;
};

/** Stage names recorded by a run recorder. */
export type RunStage =
  | "cleaning"
  | "summarization"
  | "reflection"
  | "improvement"
  | "classification"
  | "extraction"
  | "parent_summary";

/**
 * Write-only trace of one summarization run. Implementations must not throw.
 */
export interface RunRecorder {
  logInputMessages(messages: ChatMessage[]): Promise<void>;
  logOptimizedMessages(messages: OptimizedMessage[], transcript: string): Promise<void>;
  logRequest(stage: RunStage, prompt: string): Promise<void>;
  logResponse(stage: RunStage, response: string, durationMs?: number): Promise<void>;
  logStageError(stage: RunStage, error: LlmError): Promise<void>;
  recordStageTime(stage: RunStage, seconds: number): void;
}

export interface AIProvider {
  readonly name: string;
  readonly displayName: string;

  /** validateConfig, then a live probe. Never throws. */
  initialize(options?: CallOptions): Promise<boolean>;
  isAvailable(options?: CallOptions): Promise<boolean>;
  validateConfig(): boolean;
  getProviderInfo(): ProviderInfo;
  getCurrentModel(): string;

  /** Result-typed summary call used by the pipeline. */
  summarize(
    messages: ChatMessage[],
    context?: SummaryContext,
    options?: CallOptions
  ): Promise<LlmResult<string>>;
  /** Result-typed free-form completion used by the pipeline. */
  complete(prompt: string, options?: CallOptions): Promise<LlmResult<string>>;

  /** Returns the summary, or a "❌"/"⚠️"-prefixed text on failure. */
  summarizeChat(
    messages: ChatMessage[],
    context?: SummaryContext,
    options?: CallOptions
  ): Promise<string>;
  /** Returns the completion, or undefined on failure. */
  generateResponse(prompt: string, options?: CallOptions): Promise<string | undefined>;

  optimizeText(messages: ChatMessage[]): OptimizedMessage[];
  formatMessagesForAnalysis(messages: OptimizedMessage[]): string;
  setRunLogger(recorder: RunRecorder | undefined): void;

  getAvailableModels?(options?: CallOptions): Promise<ModelInfo[]>;
  setModel?(model: string): void;
}
