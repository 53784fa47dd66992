import "dotenv/config";
import { Worker, type Job } from "bullmq";
import { buildAppContext } from "../app/context";
import { formatDateInZone } from "../chats/dates";
import { closePool } from "../infra/db";
import { logger } from "../infra/logger";
import { closeRedis, getRedis } from "../infra/redis";
import { sendTelegramMessage } from "../infra/telegram";
import {
  noMessagesText,
  summaryAlreadyRunningText,
  summaryFailedText,
  summaryReadyText,
} from "../messages/replies";
import {
  DEFAULT_DAILY_SUMMARY_CRON,
  JOB_NAME_DAILY_SUMMARY,
  JOB_NAME_GENERATE_SUMMARY,
  scheduleDailySummary,
  summaryQueue,
  SUMMARY_QUEUE_NAME,
  type GenerateSummaryPayload,
  type SummaryJobPayload,
} from "../queues/summaryQueue";
import { SummaryStageError } from "../summary/stageRunner";

// Fail fast on startup
if (!process.env.REDIS_URL?.trim()) {
  throw new Error("REDIS_URL is required. Set it in .env");
}
if (!process.env.DATABASE_URL?.trim() && !process.env.DB_HOST?.trim()) {
  throw new Error("DATABASE_URL (or DB_HOST/DB_NAME/DB_USER/DB_PASSWORD) is required. Set it in .env");
}

const app = buildAppContext();
const digestChatRaw = process.env.TELEGRAM_DIGEST_CHAT_ID?.trim();
const dailyDigestChatId =
  digestChatRaw && Number.isSafeInteger(Number(digestChatRaw)) ? Number(digestChatRaw) : undefined;

function isGenerateSummaryPayload(data: SummaryJobPayload): data is GenerateSummaryPayload {
  return "chatId" in data && typeof data.chatId === "string";
}

async function notify(replyTo: number | undefined, text: string): Promise<void> {
  if (replyTo === undefined) return;
  try {
    await sendTelegramMessage(replyTo, text);
  } catch (err) {
    logger.error("failed to deliver summary message", {
      replyTo,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

async function runGenerateSummary(job: Job<SummaryJobPayload>, payload: GenerateSummaryPayload) {
  const date = payload.date ?? formatDateInZone(new Date(), app.timeZone);
  const { chatId, replyTo } = payload;

  try {
    const outcome = await app.service.generateDailySummary({
      chatId,
      date,
      providerName: payload.providerName,
      modelId: payload.modelId,
      summaryType: payload.requestedBy === undefined ? "daily" : "custom",
      userId: payload.requestedBy === undefined ? undefined : String(payload.requestedBy),
    });

    if (outcome.status === "already_running") {
      await notify(replyTo, summaryAlreadyRunningText(chatId, date));
      return;
    }
    if (outcome.status === "no_messages") {
      await notify(replyTo, noMessagesText(chatId, date));
      return;
    }
    await notify(
      replyTo,
      summaryReadyText({
        chatId,
        date,
        providerName: outcome.providerName,
        modelName: outcome.modelName,
        text: outcome.text,
      })
    );
    logger.info("summary job done", { jobId: job.id, chatId, date, messages: outcome.messageCount });
  } catch (err) {
    if (err instanceof SummaryStageError) {
      await notify(replyTo, summaryFailedText(err));
    }
    throw err;
  }
}

async function runDailySummary(): Promise<void> {
  const date = formatDateInZone(new Date(), app.timeZone);
  const chats = await app.store.listTrackedChats();
  for (const chatId of chats) {
    await summaryQueue.add(JOB_NAME_GENERATE_SUMMARY, {
      chatId,
      date,
      replyTo: dailyDigestChatId,
    });
  }
  logger.info("daily summaries enqueued", { date, chats: chats.length });
}

const summaryWorker = new Worker<SummaryJobPayload>(
  SUMMARY_QUEUE_NAME,
  async (job) => {
    if (job.name === JOB_NAME_DAILY_SUMMARY) {
      await runDailySummary();
      return;
    }
    if (job.name !== JOB_NAME_GENERATE_SUMMARY || !isGenerateSummaryPayload(job.data)) {
      logger.warn("summary job ignored: unexpected job", { jobName: job.name, jobId: job.id });
      return;
    }
    await runGenerateSummary(job, job.data);
  },
  { connection: getRedis(), concurrency: 2 }
);

summaryWorker.on("failed", (job, err) => {
  logger.error("summary job failed", {
    jobId: job?.id,
    jobName: job?.name,
    error: err.message,
  });
});

const cron = process.env.DAILY_SUMMARY_CRON?.trim() || DEFAULT_DAILY_SUMMARY_CRON;
scheduleDailySummary(cron, app.timeZone)
  .then(() => logger.info("daily summary scheduled", { cron, timeZone: app.timeZone }))
  .catch((err) => {
    logger.error("failed to schedule daily summary", {
      cron,
      error: err instanceof Error ? err.message : String(err),
    });
  });

async function shutdown() {
  await summaryWorker.close();
  await summaryQueue.close();
  await closePool();
  await closeRedis();
  process.exit(0);
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

logger.info("worker started (summary queue)");
