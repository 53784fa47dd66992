import { vi } from "vitest";
import type {
  AIProvider,
  CallOptions,
  ChatMessage,
  LlmResult,
  ModelInfo,
  OptimizedMessage,
  ProviderInfo,
  RunRecorder,
} from "../src/llm/types";
import { ok } from "../src/llm/types";
import { formatMessagesForAnalysis, optimizeText } from "../src/llm/transcript";
import type { FetchLike } from "../src/llm/http";
import type { MessageStore, SummaryRecord } from "../src/chats/types";
import type { ArtifactSink, RunRef } from "../src/summary/artifactSink";
import type { SummaryLock } from "../src/summary/lock";
import type { StoredSummary, SummaryListing, SummaryType } from "../src/summary/types";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

export function chatCompletion(content: string): Record<string, unknown> {
  return { choices: [{ message: { role: "assistant", content } }] };
}

/** A fetch stub that answers each call with the next response from the list (the last one repeats). */
export function sequenceFetch(responses: Array<() => Response>) {
  let call = 0;
  return vi.fn<FetchLike>(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call += 1;
    if (!next) throw new Error("no response configured");
    return next();
  });
}

export type FakeBehavior = {
  available?: boolean;
  summary?: LlmResult<string>;
  /** Consumed in order; the last entry repeats. */
  completions?: LlmResult<string>[];
  model?: string;
  supportsModels?: boolean;
  models?: ModelInfo[];
  /** Runs inside initialize(), e.g. to abort a signal mid-run. */
  onInitialize?: () => void;
};

export class FakeProvider implements AIProvider {
  readonly displayName: string;
  initializeCalls = 0;
  readonly completePrompts: string[] = [];
  readonly summarizedWith: ChatMessage[][] = [];
  recorder: RunRecorder | undefined;
  model: string;
  setModel?: (model: string) => void;
  getAvailableModels?: (options?: CallOptions) => Promise<ModelInfo[]>;
  private completionIndex = 0;

  constructor(
    readonly name: string,
    private readonly behavior: FakeBehavior = {}
  ) {
    this.displayName = `${name.charAt(0).toUpperCase()}${name.slice(1)}`;
    this.model = behavior.model ?? `${name}-model`;
    if (behavior.supportsModels) {
      this.setModel = (model: string) => {
        this.model = model;
      };
      this.getAvailableModels = async () => behavior.models ?? [];
    }
  }

  async initialize(): Promise<boolean> {
    this.initializeCalls += 1;
    this.behavior.onInitialize?.();
    return this.behavior.available ?? true;
  }

  async isAvailable(): Promise<boolean> {
    return this.behavior.available ?? true;
  }

  validateConfig(): boolean {
    return true;
  }

  getProviderInfo(): ProviderInfo {
    return {
      name: this.name,
      displayName: this.displayName,
      model: this.model,
      maxTokens: 1000,
      supportsStreaming: false,
      endpoint: "memory://",
    };
  }

  getCurrentModel(): string {
    return this.model;
  }

  async summarize(messages: ChatMessage[] = []): Promise<LlmResult<string>> {
    this.summarizedWith.push(messages);
    return this.behavior.summary ?? ok("Итог дня");
  }

  async complete(prompt: string): Promise<LlmResult<string>> {
    this.completePrompts.push(prompt);
    const list = this.behavior.completions ?? [ok("ответ")];
    const result = list[Math.min(this.completionIndex, list.length - 1)] ?? ok("ответ");
    this.completionIndex += 1;
    return result;
  }

  async summarizeChat(): Promise<string> {
    const result = await this.summarize();
    return result.ok ? result.value : `❌ ${result.error.message}`;
  }

  async generateResponse(prompt: string): Promise<string | undefined> {
    const result = await this.complete(prompt);
    return result.ok ? result.value : undefined;
  }

  optimizeText(messages: ChatMessage[]): OptimizedMessage[] {
    return optimizeText(messages, "UTC");
  }

  formatMessagesForAnalysis(messages: OptimizedMessage[]): string {
    return formatMessagesForAnalysis(messages);
  }

  setRunLogger(recorder: RunRecorder | undefined): void {
    this.recorder = recorder;
  }
}

/** Keeps artifacts in a map keyed by `<run key>/<file>`. */
export class MemorySink implements ArtifactSink {
  readonly files = new Map<string, string>();
  readonly writes: string[] = [];

  async write(run: RunRef, name: string, content: string): Promise<void> {
    const key = `${run.key}/${name}`;
    this.writes.push(key);
    this.files.set(key, content);
  }

  read(run: RunRef, name: string): string | undefined {
    return this.files.get(`${run.key}/${name}`);
  }
}

export class MemoryLock implements SummaryLock {
  readonly held = new Set<string>();

  async acquire(key: string): Promise<boolean> {
    if (this.held.has(key)) return false;
    this.held.add(key);
    return true;
  }

  async release(key: string): Promise<void> {
    this.held.delete(key);
  }
}

/** Messages keyed by chat and date, summaries kept in insertion order. */
export class MemoryStore implements MessageStore {
  readonly messages = new Map<string, ChatMessage[]>();
  readonly summaries: StoredSummary[] = [];
  readonly dateQueries: string[] = [];

  addMessages(chatId: string, date: string, messages: ChatMessage[]): void {
    this.messages.set(`${chatId}|${date}`, [...(this.messages.get(`${chatId}|${date}`) ?? []), ...messages]);
  }

  async getMessagesByDate(chatId: string, date: string): Promise<ChatMessage[]> {
    this.dateQueries.push(`${chatId}|${date}`);
    return this.messages.get(`${chatId}|${date}`) ?? [];
  }

  async saveMessages(): Promise<number> {
    return 0;
  }

  async saveSummary(chatId: string, date: string, record: SummaryRecord, type: SummaryType = "daily"): Promise<void> {
    const stored: StoredSummary = {
      chatId,
      date,
      summaryType: type,
      summaryText: record.summaryText,
      reflectionText: record.reflectionText ?? null,
      improvedSummaryText: record.improvedSummaryText ?? null,
      providerName: record.providerName ?? null,
      modelName: record.modelName ?? null,
      createdAt: new Date(Date.UTC(2025, 9, 15, 20, 0)),
    };
    const index = this.summaries.findIndex((s) => s.chatId === chatId && s.date === date && s.summaryType === type);
    if (index >= 0) this.summaries[index] = stored;
    else this.summaries.push(stored);
  }

  async getAvailableSummaries(chatId: string): Promise<SummaryListing[]> {
    return this.summaries
      .filter((s) => s.chatId === chatId)
      .map((s) => ({ date: s.date, summaryType: s.summaryType, createdAt: s.createdAt }));
  }

  async getSummary(chatId: string, date: string, type: SummaryType = "daily"): Promise<StoredSummary | undefined> {
    return this.summaries.find((s) => s.chatId === chatId && s.date === date && s.summaryType === type);
  }

  async listTrackedChats(): Promise<string[]> {
    return [...new Set([...this.messages.keys()].map((key) => key.split("|")[0] ?? ""))];
  }
}
