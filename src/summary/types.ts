import type { RunLogger } from "./runLogger";
import type { ErrorKind, SummaryContext } from "../llm/types";

export type PipelineState =
  | "idle"
  | "selecting"
  | "initializing"
  | "cleaning"
  | "summarizing"
  | "reflecting"
  | "improving"
  | "done"
  | "failed";

/** Pipeline stages that can fail; `failed` and `done` are terminal states, not stages. */
export type PipelineStage = Exclude<PipelineState, "idle" | "done" | "failed">;

export type SummarizationResult = {
  summary: string;
  reflection?: string;
  improved?: string;
};

export type PipelineError = {
  stage: PipelineStage;
  kind: ErrorKind;
  message: string;
};

export type AnalyzeOptions = {
  /** Explicit backend; skips selection. Substituted on init failure unless a model is pinned. */
  providerName?: string;
  /** Pins the backend model; a pinned request never falls back to another provider. */
  modelId?: string;
  context?: SummaryContext;
  signal?: AbortSignal;
  runLogger?: RunLogger;
};

export type AnalyzeOutcome =
  | {
      ok: true;
      result: SummarizationResult;
      text: string;
      providerName: string;
      modelName: string;
      states: PipelineState[];
    }
  | {
      ok: false;
      error: PipelineError;
      providerName?: string;
      states: PipelineState[];
    };

export type SummaryType = "daily" | "custom";

export type StoredSummary = {
  chatId: string;
  date: string;
  summaryType: SummaryType;
  summaryText: string;
  reflectionText: string | null;
  improvedSummaryText: string | null;
  providerName: string | null;
  modelName: string | null;
  createdAt: Date;
};

export type SummaryListing = {
  date: string;
  summaryType: SummaryType;
  createdAt: Date;
};
