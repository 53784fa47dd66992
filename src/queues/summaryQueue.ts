import { Queue } from "bullmq";
import { getRedis } from "../infra/redis";

export const SUMMARY_QUEUE_NAME = "summary";
export const JOB_NAME_GENERATE_SUMMARY = "generateSummary";
export const JOB_NAME_DAILY_SUMMARY = "dailySummary";
export const DEFAULT_DAILY_SUMMARY_CRON = "0 20 * * *";

export type GenerateSummaryPayload = {
  chatId: string;
  /** YYYY-MM-DD; today in APP_TIMEZONE when omitted. */
  date?: string;
  providerName?: string;
  modelId?: string;
  /** Telegram chat to post the result to. */
  replyTo?: number;
  requestedBy?: number;
};

export type DailySummaryPayload = Record<string, never>;

export type SummaryJobPayload = GenerateSummaryPayload | DailySummaryPayload;

export const summaryQueue = new Queue<SummaryJobPayload>(SUMMARY_QUEUE_NAME, {
  connection: getRedis(),
  defaultJobOptions: { removeOnComplete: { count: 1000 }, removeOnFail: { count: 1000 } },
});

/** Registers (or replaces) the repeatable daily job. */
export async function scheduleDailySummary(pattern: string, timeZone: string): Promise<void> {
  await summaryQueue.add(
    JOB_NAME_DAILY_SUMMARY,
    {},
    { repeat: { pattern, tz: timeZone }, jobId: JOB_NAME_DAILY_SUMMARY }
  );
}
