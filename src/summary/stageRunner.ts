import { logger } from "../infra/logger";
import type { ErrorKind, LlmResult, RunRecorder, RunStage } from "../llm/types";
import type { PipelineStage } from "./types";

export class SummaryStageError extends Error {
  stage: PipelineStage;
  kind: ErrorKind;
  /** The failure text without the stage prefix. */
  detail: string;
  rawSnippet: string;

  constructor(stage: PipelineStage, kind: ErrorKind, message: string, rawResponse?: string) {
    const snippet = (rawResponse ?? "").slice(0, 400);
    super(`[${stage}] ${message}${snippet ? ` | raw: ${snippet}` : ""}`);
    this.name = "SummaryStageError";
    this.stage = stage;
    this.kind = kind;
    this.detail = message;
    this.rawSnippet = snippet;
  }
}

type RunTimedStageOptions = {
  stage: PipelineStage;
  /** Recorder stage to log request, response and duration under. */
  recordAs?: RunStage;
  prompt?: string;
  recorder?: RunRecorder;
  now?: () => number;
  call: () => Promise<LlmResult<string>>;
};

/**
 * One timed backend call. Never throws: a throwing call becomes a `network` failure.
 */
export async function runTimedStage(options: RunTimedStageOptions): Promise<LlmResult<string>> {
  const now = options.now ?? Date.now;
  const { recorder, recordAs } = options;
  if (recordAs && options.prompt !== undefined) {
    await recorder?.logRequest(recordAs, options.prompt);
  }

  const startedAt = now();
  let result: LlmResult<string>;
  try {
    result = await options.call();
  } catch (err) {
    result = {
      ok: false,
      error: { kind: "network", message: err instanceof Error ? err.message : String(err) },
    };
  }
  const latencyMs = now() - startedAt;

  logger.info("summary stage completed", {
    stage: options.stage,
    latencyMs,
    ok: result.ok,
    kind: result.ok ? undefined : result.error.kind,
  });

  if (recordAs) {
    recorder?.recordStageTime(recordAs, latencyMs / 1000);
    if (result.ok) {
      await recorder?.logResponse(recordAs, result.value, latencyMs);
    } else {
      await recorder?.logStageError(recordAs, result.error);
    }
  }
  return result;
}
