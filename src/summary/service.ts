import { logger } from "../infra/logger";
import type { MessageStore } from "../chats/types";
import type { ProviderRegistry } from "../llm/registry";
import type { ProviderSelector } from "../llm/selector";
import type { CallOptions, ChatMessage, ModelInfo, ProviderConfig } from "../llm/types";
import { summaryLockKey, type SummaryLock } from "./lock";
import type { SummarizationPipeline } from "./pipeline";
import type { RunLogger } from "./runLogger";
import { SummaryStageError } from "./stageRunner";
import type { AnalyzeOptions, AnalyzeOutcome, SummaryType } from "./types";

export type ProviderStatus = {
  name: string;
  displayName: string;
  available: boolean;
};

export type DailySummaryInput = {
  chatId: string;
  date: string;
  providerName?: string;
  modelId?: string;
  summaryType?: SummaryType;
  userId?: string;
  signal?: AbortSignal;
};

export type DailySummaryOutcome =
  | { status: "already_running" }
  | { status: "no_messages" }
  | {
      status: "done";
      text: string;
      providerName: string;
      modelName: string;
      messageCount: number;
    };

export type RunLoggerFactory = (run: { chatId: string; date: string }) => RunLogger | undefined;

export type AnalysisServiceDeps = {
  pipeline: SummarizationPipeline;
  registry: ProviderRegistry;
  selector: ProviderSelector;
  configs: Record<string, ProviderConfig>;
  store: MessageStore;
  lock: SummaryLock;
  createRunLogger?: RunLoggerFactory;
};

export class AnalysisService {
  constructor(private readonly deps: AnalysisServiceDeps) {}

  analyze(messages: ChatMessage[], options: AnalyzeOptions = {}): Promise<AnalyzeOutcome> {
    return this.deps.pipeline.run(messages, options);
  }

  async listAvailableProviders(options: CallOptions = {}): Promise<ProviderStatus[]> {
    const report = await this.deps.selector.testAll(options);
    return this.deps.registry.listNames().map((name) => ({
      name,
      displayName: this.deps.registry.create(name, this.deps.configs[name] ?? {})?.displayName ?? name,
      available: report[name] === true,
    }));
  }

  testAllProviders(options: CallOptions = {}): Promise<Record<string, boolean>> {
    return this.deps.selector.testAll(options);
  }

  /** Undefined when the provider is unknown or has no model listing. */
  async listModels(providerName: string, options: CallOptions = {}): Promise<ModelInfo[] | undefined> {
    const name = providerName.trim().toLowerCase();
    const provider = this.deps.registry.create(name, this.deps.configs[name] ?? {});
    if (!provider?.getAvailableModels) return undefined;
    return provider.getAvailableModels(options);
  }

  /**
   * Lock the (chat, date) pair, summarize that day's messages and store the
   * result. Throws SummaryStageError when the pipeline fails.
   */
  async generateDailySummary(input: DailySummaryInput): Promise<DailySummaryOutcome> {
    const { chatId, date } = input;
    const lockKey = summaryLockKey(chatId, date);
    if (!(await this.deps.lock.acquire(lockKey))) {
      logger.info("summary already running", { chatId, date });
      return { status: "already_running" };
    }

    try {
      const messages = await this.deps.store.getMessagesByDate(chatId, date);
      if (messages.length === 0) {
        logger.info("no messages for summary", { chatId, date });
        return { status: "no_messages" };
      }

      const runLogger = this.deps.createRunLogger?.({ chatId, date });
      runLogger?.setSessionInfo({ chatId, userId: input.userId });

      const outcome = await this.analyze(messages, {
        providerName: input.providerName,
        modelId: input.modelId,
        context: { chatId, date },
        signal: input.signal,
        runLogger,
      });
      await runLogger?.flush();

      if (!outcome.ok) {
        throw new SummaryStageError(outcome.error.stage, outcome.error.kind, outcome.error.message);
      }

      await this.deps.store.saveSummary(
        chatId,
        date,
        {
          summaryText: outcome.result.summary,
          reflectionText: outcome.result.reflection ?? null,
          improvedSummaryText: outcome.result.improved ?? null,
          providerName: outcome.providerName,
          modelName: outcome.modelName,
        },
        input.summaryType ?? "daily"
      );
      logger.info("daily summary saved", {
        chatId,
        date,
        provider: outcome.providerName,
        model: outcome.modelName,
        messages: messages.length,
      });

      return {
        status: "done",
        text: outcome.text,
        providerName: outcome.providerName,
        modelName: outcome.modelName,
        messageCount: messages.length,
      };
    } finally {
      await this.deps.lock.release(lockKey);
    }
  }
}
