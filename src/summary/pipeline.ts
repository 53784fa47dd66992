import { logger } from "../infra/logger";
import {
  buildCleaningPrompt,
  buildImprovementPrompt,
  buildReflectionPrompt,
  DEFAULT_PROMPTS,
  type PromptTemplates,
} from "../llm/prompts";
import type { ProviderRegistry } from "../llm/registry";
import type { ProviderSelector } from "../llm/selector";
import {
  isFailureText,
  type AIProvider,
  type CallOptions,
  type ChatMessage,
  type ErrorKind,
  type ProviderConfig,
  type RunRecorder,
} from "../llm/types";
import { assembleResult } from "./assemble";
import { keepMessagesById, parseCleaningIds } from "./cleaning";
import { runTimedStage } from "./stageRunner";
import type {
  AnalyzeOptions,
  AnalyzeOutcome,
  PipelineStage,
  PipelineState,
  SummarizationResult,
} from "./types";

export type PipelineSettings = {
  defaultProvider: string;
  /** Ask the model which messages matter before summarizing. */
  enableCleaning: boolean;
  enableReflection: boolean;
  autoImproveSummary: boolean;
};

export type PipelineDeps = {
  registry: ProviderRegistry;
  selector: ProviderSelector;
  configs: Record<string, ProviderConfig>;
  settings: PipelineSettings;
  prompts?: PromptTemplates;
  now?: () => number;
};

type StageOutput = { cancelled: boolean; text?: string };

type CleaningOutput = { cancelled: boolean; messages: ChatMessage[] };

function isPipelineStage(state: PipelineState): state is PipelineStage {
  return state !== "idle" && state !== "done" && state !== "failed";
}

type Ready = { ok: true; provider: AIProvider } | { ok: false; kind: ErrorKind; message: string };

/** State trace of one run. */
class PipelineRun {
  readonly states: PipelineState[] = ["idle"];

  enter(state: PipelineState): void {
    this.states.push(state);
  }

  get stage(): PipelineStage {
    const last = this.states[this.states.length - 1];
    return last !== undefined && isPipelineStage(last) ? last : "summarizing";
  }
}

/**
 * select → initialize → clean → summarize → reflect → improve → assemble.
 * Cleaning, reflection and improvement are optional and never fail a run unless it was cancelled.
 */
export class SummarizationPipeline {
  private readonly prompts: PromptTemplates;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.prompts = deps.prompts ?? DEFAULT_PROMPTS;
    this.now = deps.now ?? Date.now;
  }

  async run(messages: ChatMessage[], options: AnalyzeOptions = {}): Promise<AnalyzeOutcome> {
    const run = new PipelineRun();
    const runLogger = options.runLogger;
    const call: CallOptions = { signal: options.signal };
    const context = options.context ?? {};

    const failed = async (
      stage: PipelineStage,
      kind: ErrorKind,
      message: string,
      providerName?: string
    ): Promise<AnalyzeOutcome> => {
      run.enter("failed");
      logger.warn("summarization failed", { stage, kind, provider: providerName, error: message });
      await runLogger?.logSessionSummary({ success: false, error: message });
      return { ok: false, error: { stage, kind, message }, providerName, states: run.states };
    };

    if (options.signal?.aborted) {
      return failed("selecting", "cancelled", "Операция отменена");
    }

    let name = options.providerName?.trim().toLowerCase();
    if (!name) {
      run.enter("selecting");
      name = await this.deps.selector.selectBest(this.deps.settings.defaultProvider, call);
      if (options.signal?.aborted) return failed("selecting", "cancelled", "Операция отменена");
      if (!name) return failed("selecting", "provider_unavailable", "Нет доступных AI провайдеров");
    }

    run.enter("initializing");
    let ready = await this.prepare(name, options.modelId, call);
    if (!ready.ok && options.signal?.aborted) {
      return failed("initializing", "cancelled", "Операция отменена", name);
    }
    if (!ready.ok && options.modelId === undefined) {
      logger.warn("provider failed to initialize, looking for a substitute", { name });
      run.enter("selecting");
      const substitute = await this.deps.selector.selectBest(undefined, { ...call, exclude: [name] });
      if (!substitute) {
        return failed("selecting", "provider_unavailable", "Нет доступных AI провайдеров", name);
      }
      name = substitute;
      run.enter("initializing");
      ready = await this.prepare(name, undefined, call);
    }
    if (!ready.ok) {
      return failed("initializing", options.signal?.aborted ? "cancelled" : ready.kind, ready.message, name);
    }

    const provider = ready.provider;
    const providerName = provider.name;
    const modelName = provider.getCurrentModel();
    runLogger?.setSessionInfo({ providerName, modelName, chatId: context.chatId });
    provider.setRunLogger(runLogger);

    try {
      let selected = messages;
      if (this.deps.settings.enableCleaning) {
        run.enter("cleaning");
        const cleaned = await this.cleanMessages(provider, messages, runLogger, call);
        if (cleaned.cancelled) {
          return await failed("cleaning", "cancelled", "Операция отменена", providerName);
        }
        selected = cleaned.messages;
      }

      run.enter("summarizing");
      const summarized = await provider.summarize(selected, context, call);
      if (!summarized.ok) {
        return await failed("summarizing", summarized.error.kind, summarized.error.message, providerName);
      }
      const summary = summarized.value.trim();
      if (!summary) {
        return await failed("summarizing", "malformed_response", "Пустой ответ модели", providerName);
      }
      if (isFailureText(summary)) {
        return await failed("summarizing", "malformed_response", summary, providerName);
      }

      const result: SummarizationResult = { summary };
      const optimized = provider.optimizeText(selected);

      if (this.deps.settings.enableReflection) {
        run.enter("reflecting");
        const reflection = await this.optionalStage(provider, "reflecting", runLogger, call, () =>
          buildReflectionPrompt(this.prompts, { summary, date: context.date, messages: optimized })
        );
        if (reflection.cancelled) {
          return await failed("reflecting", "cancelled", "Операция отменена", providerName);
        }
        result.reflection = reflection.text;
      }

      if (this.deps.settings.autoImproveSummary && result.reflection) {
        const reflectionText = result.reflection;
        run.enter("improving");
        const improved = await this.optionalStage(provider, "improving", runLogger, call, () =>
          buildImprovementPrompt(this.prompts, { summary, reflection: reflectionText, messages: optimized })
        );
        if (improved.cancelled) {
          return await failed("improving", "cancelled", "Операция отменена", providerName);
        }
        result.improved = improved.text;
      }

      const text = assembleResult(result);
      run.enter("done");
      await runLogger?.logSessionSummary({
        success: true,
        summary: result.summary,
        reflection: result.reflection,
        improved: result.improved,
        finalText: text,
      });
      return { ok: true, result, text, providerName, modelName, states: run.states };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("summarization threw", { stage: run.stage, provider: providerName, error: message });
      return await failed(run.stage, "network", message, providerName);
    } finally {
      provider.setRunLogger(undefined);
    }
  }

  /** Builds, pins and initializes one provider. */
  private async prepare(name: string, modelId: string | undefined, call: CallOptions): Promise<Ready> {
    const provider = this.deps.registry.create(name, this.deps.configs[name] ?? {});
    if (!provider) {
      return { ok: false, kind: "provider_unavailable", message: `Провайдер ${name} не найден` };
    }
    if (modelId !== undefined) {
      if (!provider.setModel) {
        return {
          ok: false,
          kind: "config_invalid",
          message: `Провайдер ${provider.displayName} не поддерживает выбор модели`,
        };
      }
      provider.setModel(modelId);
    }
    if (!(await provider.initialize(call))) {
      return {
        ok: false,
        kind: "provider_unavailable",
        message: `Провайдер ${provider.displayName} недоступен`,
      };
    }
    return { ok: true, provider };
  }

  /**
   * Keeps the messages the model picks by id. A failed call or a reply without
   * usable ids leaves the input as it was.
   */
  private async cleanMessages(
    provider: AIProvider,
    messages: ChatMessage[],
    recorder: RunRecorder | undefined,
    call: CallOptions
  ): Promise<CleaningOutput> {
    if (call.signal?.aborted) return { cancelled: true, messages };
    const prompt = buildCleaningPrompt(this.prompts, messages);
    const result = await runTimedStage({
      stage: "cleaning",
      recordAs: "cleaning",
      prompt,
      recorder,
      now: this.now,
      call: () => provider.complete(prompt, call),
    });
    if (!result.ok) {
      if (result.error.kind === "cancelled" || call.signal?.aborted) return { cancelled: true, messages };
      logger.warn("message cleaning skipped", { kind: result.error.kind, error: result.error.message });
      return { cancelled: false, messages };
    }
    const ids = parseCleaningIds(result.value);
    const kept = ids ? keepMessagesById(messages, ids) : [];
    if (kept.length === 0) {
      logger.warn("message cleaning skipped", { reason: "no known message ids in reply" });
      return { cancelled: false, messages };
    }
    logger.info("messages cleaned", { kept: kept.length, total: messages.length });
    return { cancelled: false, messages: kept };
  }

  /**
   * Reflection or improvement. Any failure other than cancellation yields
   * no text and the run carries on without that section.
   */
  private async optionalStage(
    provider: AIProvider,
    stage: "reflecting" | "improving",
    recorder: RunRecorder | undefined,
    call: CallOptions,
    buildPrompt: () => string
  ): Promise<StageOutput> {
    if (call.signal?.aborted) return { cancelled: true };
    const prompt = buildPrompt();
    const result = await runTimedStage({
      stage,
      recordAs: stage === "reflecting" ? "reflection" : "improvement",
      prompt,
      recorder,
      now: this.now,
      call: () => provider.complete(prompt, call),
    });
    if (!result.ok) {
      if (result.error.kind === "cancelled" || call.signal?.aborted) return { cancelled: true };
      logger.warn("optional summary stage skipped", { stage, kind: result.error.kind, error: result.error.message });
      return { cancelled: false };
    }
    const text = result.value.trim();
    if (!text || isFailureText(text)) {
      logger.warn("optional summary stage skipped", { stage, reason: "empty or failure text" });
      return { cancelled: false };
    }
    return { cancelled: false, text };
  }
}
