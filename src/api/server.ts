import "dotenv/config";
import http from "node:http";
import { buildAppContext } from "../app/context";
import { getIncomingCommand, handleCommand } from "../bot/commands";
import { readAdminIds, readPositiveInt } from "../config/env";
import { logger } from "../infra/logger";
import { sendTelegramMessage } from "../infra/telegram";
import {
  JOB_NAME_GENERATE_SUMMARY,
  summaryQueue,
  type GenerateSummaryPayload,
} from "../queues/summaryQueue";

// Fail fast on startup
if (!process.env.REDIS_URL?.trim()) {
  throw new Error("REDIS_URL is required. Set it in .env");
}
if (!process.env.TELEGRAM_BOT_TOKEN?.trim()) {
  throw new Error("TELEGRAM_BOT_TOKEN is required. Set it in .env");
}

const port = readPositiveInt("PORT", 3000);
const webhookSecret = process.env.TELEGRAM_WEBHOOK_SECRET?.trim() ?? "";
const adminIds = readAdminIds();
if (adminIds.size === 0) {
  logger.warn("TELEGRAM_ADMIN_IDS is empty: every command except /start will be refused");
}

const app = buildAppContext();

function sendJSON(res: http.ServerResponse, statusCode: number, body: object) {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

function sendText(res: http.ServerResponse, statusCode: number, body: string) {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "text/plain");
  res.end(body);
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

async function enqueueSummary(payload: GenerateSummaryPayload): Promise<void> {
  await summaryQueue.add(JOB_NAME_GENERATE_SUMMARY, payload);
}

async function processUpdate(update: unknown): Promise<void> {
  const incoming = getIncomingCommand(update);
  if (!incoming) return;

  const reply = await handleCommand(incoming, {
    service: app.service,
    store: app.store,
    enqueueSummary,
    adminIds,
    timeZone: app.timeZone,
  });
  if (reply) {
    await sendTelegramMessage(incoming.chatId, reply);
  }
}

const server = http.createServer(async (req, res) => {
  const url = req.url ?? "";
  const path = url.split("?")[0];

  if (req.method === "GET" && path === "/health") {
    sendText(res, 200, "OK");
    return;
  }

  if (req.method === "POST" && path === "/telegram/webhook") {
    if (webhookSecret && req.headers["x-telegram-bot-api-secret-token"] !== webhookSecret) {
      logger.warn("telegram webhook rejected: bad secret token");
      sendText(res, 401, "Unauthorized");
      return;
    }

    let update: unknown;
    try {
      update = JSON.parse(await readBody(req));
    } catch (err) {
      logger.warn("telegram webhook: invalid JSON body", {
        error: err instanceof Error ? err.message : String(err),
      });
      sendJSON(res, 400, { error: "invalid json" });
      return;
    }

    // Acknowledged before processing.
    sendJSON(res, 200, { ok: true });
    void processUpdate(update).catch((err) => {
      logger.error("telegram update handling failed", {
        error: err instanceof Error ? err.message : String(err),
      });
    });
    return;
  }

  sendText(res, 404, "Not Found");
});

server.listen(port, () => {
  logger.info(`api listening on port ${port}`);
});
