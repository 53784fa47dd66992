import { logger } from "../infra/logger";
import type {
  ChatMessage,
  LlmError,
  OptimizedMessage,
  RunRecorder,
  RunStage,
} from "../llm/types";
import type { ArtifactSink, RunRef } from "./artifactSink";

export const RUN_STAGES: RunStage[] = [
  "cleaning",
  "summarization",
  "reflection",
  "improvement",
  "classification",
  "extraction",
  "parent_summary",
];

const STAGE_TITLES: Record<RunStage, string> = {
  cleaning: "Очистка",
  summarization: "Суммаризация",
  reflection: "Рефлексия",
  improvement: "Улучшение",
  classification: "Классификация",
  extraction: "Извлечение",
  parent_summary: "Сводка для родителей",
};

export type RunLoggerOptions = {
  sink: ArtifactSink;
  /** YYYY-MM-DD; defaults to the local date of `now()`. */
  date?: string;
  /** e.g. `with_reflection`; becomes part of the run directory name. */
  scenario?: string;
  /** Comparison sweeps write to `test_comparison/<model>/<scenario>` instead. */
  comparison?: boolean;
  modelName?: string;
  now?: () => Date;
};

export type SessionInfo = {
  providerName?: string;
  modelName?: string;
  chatId?: string;
  userId?: string;
};

export type ManifestEntry = {
  file: string;
  title: string;
  chars: number;
  writtenAt: string;
};

export type SessionOutcome = {
  success: boolean;
  summary?: string;
  reflection?: string;
  improved?: string;
  finalText?: string;
  error?: string;
};

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function sanitizePathComponent(name: string | undefined): string {
  if (!name) return "unknown";
  return name.replace(/[:/\\<>|*?"]/g, "_");
}

const pad2 = (n: number) => String(n).padStart(2, "0");

function localDate(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

function localTime(d: Date, sep: string): string {
  return `${pad2(d.getHours())}${sep}${pad2(d.getMinutes())}${sep}${pad2(d.getSeconds())}`;
}

/**
 * Write-only trace of one summarization run: numbered artifacts in one run
 * directory plus a manifest. Sink failures are logged and never rethrown.
 */
export class RunLogger implements RunRecorder {
  readonly date: string;
  private readonly sink: ArtifactSink;
  private readonly scenario: string | undefined;
  private readonly comparison: boolean;
  private readonly now: () => Date;
  private readonly startedAt: Date;
  private session: SessionInfo;
  private runRef: RunRef | undefined;
  private seq = 0;
  private readonly manifest: ManifestEntry[] = [];
  private readonly stageTimes: Record<RunStage, number | null> = {
    cleaning: null,
    summarization: null,
    reflection: null,
    improvement: null,
    classification: null,
    extraction: null,
    parent_summary: null,
  };
  private writes: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(options: RunLoggerOptions) {
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    this.date = options.date ?? localDate(this.startedAt);
    this.scenario = options.scenario;
    this.comparison = options.comparison ?? false;
    this.session = { modelName: options.modelName };
  }

  setSessionInfo(info: SessionInfo): void {
    this.session = { ...this.session, ...info };
  }

  /** Run key, fixed on first write so the model name can still be set before that. */
  get run(): RunRef {
    if (!this.runRef) {
      const model = this.session.modelName ? sanitizePathComponent(this.session.modelName) : undefined;
      const stamp = `${localDate(this.startedAt)}_${localTime(this.startedAt, "-")}`;
      let key: string;
      if (this.comparison && this.scenario) {
        key = ["test_comparison", model ?? "unknown", this.scenario].join("/");
      } else if (this.scenario) {
        key = `${this.date}/${[this.scenario, model, stamp].filter(Boolean).join("_")}`;
      } else {
        key = `${this.date}/${stamp}`;
      }
      this.runRef = { key, chatId: this.session.chatId };
    }
    return this.runRef;
  }

  get stageDurations(): Readonly<Record<RunStage, number | null>> {
    return this.stageTimes;
  }

  get writeFailures(): number {
    return this.failures;
  }

  get entries(): readonly ManifestEntry[] {
    return this.manifest;
  }

  /** Adds to the stage's total; cleaning covers both the model filter and transcript preparation. */
  recordStageTime(stage: RunStage, seconds: number): void {
    this.stageTimes[stage] = Math.round(((this.stageTimes[stage] ?? 0) + seconds) * 1000) / 1000;
  }

  private header(title: string, extra: Record<string, string | number> = {}): string {
    const lines = [
      `=== ${title} ===`,
      `Дата: ${this.date}`,
      `Время: ${localTime(this.now(), ":")}`,
      `Провайдер: ${this.session.providerName ?? "неизвестно"}`,
    ];
    if (this.session.modelName) lines.push(`Модель: ${this.session.modelName}`);
    if (this.session.chatId) lines.push(`Чат ID: ${this.session.chatId}`);
    if (this.session.userId) lines.push(`Пользователь ID: ${this.session.userId}`);
    for (const [key, value] of Object.entries(extra)) {
      lines.push(`${key}: ${value}`);
    }
    return lines.join("\n");
  }

  /** Serialized so artifacts and the manifest land in call order. */
  private write(slug: string, ext: "txt" | "json", title: string, content: string): Promise<void> {
    const next = this.writes.then(async () => {
      this.seq += 1;
      const file = `${pad2(this.seq)}_${slug}.${ext}`;
      try {
        await this.sink.write(this.run, file, content);
        this.manifest.push({ file, title, chars: content.length, writtenAt: this.now().toISOString() });
        await this.sink.write(this.run, "manifest.json", JSON.stringify(this.manifest, null, 2));
      } catch (err) {
        this.failures += 1;
        logger.warn("run log write failed", {
          run: this.runRef?.key,
          file,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });
    this.writes = next;
    return next;
  }

  private writeText(slug: string, title: string, body: string, extra?: Record<string, string | number>) {
    return this.write(slug, "txt", title, `${this.header(title, extra)}\n\n${body}`);
  }

  logInputMessages(messages: ChatMessage[]): Promise<void> {
    return this.write("input_messages", "json", "Исходные сообщения", JSON.stringify(messages, null, 2));
  }

  async logOptimizedMessages(messages: OptimizedMessage[], transcript: string): Promise<void> {
    await this.write(
      "optimized_messages",
      "json",
      "Оптимизированные сообщения",
      JSON.stringify(messages, null, 2)
    );
    await this.writeText("formatted_messages", "Форматированный текст", transcript, {
      "Количество сообщений": messages.length,
      "Длина текста": transcript.length,
    });
  }

  logRequest(stage: RunStage, prompt: string): Promise<void> {
    return this.writeText(`${stage}_request`, `Запрос: ${STAGE_TITLES[stage]}`, prompt, {
      Символов: prompt.length,
      "Токенов (оценка)": estimateTokens(prompt),
    });
  }

  logResponse(stage: RunStage, response: string, durationMs?: number): Promise<void> {
    const tokens = estimateTokens(response);
    const extra: Record<string, string | number> = {
      Символов: response.length,
      "Токенов (оценка)": tokens,
    };
    if (durationMs !== undefined && durationMs > 0) {
      const seconds = durationMs / 1000;
      extra["Время ответа (с)"] = seconds.toFixed(2);
      extra["Токенов в секунду"] = (tokens / seconds).toFixed(2);
    }
    return this.writeText(`${stage}_response`, `Ответ: ${STAGE_TITLES[stage]}`, response, extra);
  }

  logStageError(stage: RunStage, error: LlmError): Promise<void> {
    return this.writeText(`${stage}_error`, `Ошибка: ${STAGE_TITLES[stage]}`, error.message, {
      Тип: error.kind,
      ...(error.status !== undefined ? { Статус: error.status } : {}),
    });
  }

  /** Final result plus a summary of which stages ran and how long each took. */
  async logSessionSummary(outcome: SessionOutcome): Promise<void> {
    if (outcome.finalText !== undefined) {
      await this.writeText("final_result", "Итоговый результат", outcome.finalText);
    }
    const finishedAt = this.now();
    const totalSeconds = (finishedAt.getTime() - this.startedAt.getTime()) / 1000;
    const stageLines = RUN_STAGES.map((stage) => {
      const seconds = this.stageTimes[stage];
      return `- ${STAGE_TITLES[stage]}: ${seconds === null ? "не выполнялось" : `${seconds.toFixed(2)}с`}`;
    });
    const mark = (value: string | undefined) => (value ? "✅" : "❌");
    const body = [
      `Результат: ${outcome.success ? "успех" : "ошибка"}`,
      ...(outcome.error ? [`Ошибка: ${outcome.error}`] : []),
      `Общее время: ${totalSeconds.toFixed(2)}с`,
      "",
      "Время этапов:",
      ...stageLines,
      "",
      "Этапы:",
      `- Суммаризация: ${mark(outcome.summary)}`,
      `- Рефлексия: ${mark(outcome.reflection)}`,
      `- Улучшение: ${mark(outcome.improved)}`,
    ].join("\n");
    await this.writeText("session_summary", "Сводка сессии", body);
  }

  /** Resolves once every queued write has finished. */
  flush(): Promise<void> {
    return this.writes;
  }
}
