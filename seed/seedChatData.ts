/**
 * Seed chat data script
 *
 * Usage:
 *   tsx seed/seedChatData.ts [file-path] [--chat <chatId>] [--clear]
 *
 * Arguments:
 *   file-path    Path to JSON file (default: seed/chat-data/sample.json)
 *   --chat, -c   Chat ID (default: the file's chatId)
 *   --clear      Delete the chat's stored messages before inserting
 *
 * Each day's `offset` counts days back from today; `time` is local HH:MM.
 */

import "dotenv/config";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { PgMessageStore } from "../src/chats/repository";
import { appTimeZone } from "../src/config/env";
import { closePool, getPool } from "../src/infra/db";
import { isRecord } from "../src/llm/http";
import type { ChatMessage } from "../src/llm/types";

type SeedMessage = {
  senderId: string;
  sender: string;
  time: string;
  text: string;
};

type SeedDay = {
  offset: number;
  messages: SeedMessage[];
};

type SeedFile = {
  chatId: string;
  title?: string;
  days: SeedDay[];
};

function parseArgs(): { filePath: string; chatId?: string; clear: boolean } {
  const args = process.argv.slice(2);
  let filePath = "";
  let chatId: string | undefined;
  let clear = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--clear") {
      clear = true;
    } else if (arg === "--chat" || arg === "-c") {
      chatId = args[++i];
    } else if (arg && !filePath && !arg.startsWith("-")) {
      filePath = arg;
    }
  }

  return {
    filePath: filePath || join(process.cwd(), "seed", "chat-data", "sample.json"),
    chatId,
    clear,
  };
}

function readSeedMessage(raw: unknown): SeedMessage {
  if (
    !isRecord(raw) ||
    typeof raw.senderId !== "string" ||
    typeof raw.sender !== "string" ||
    typeof raw.time !== "string" ||
    typeof raw.text !== "string"
  ) {
    throw new Error(`invalid seed message: ${JSON.stringify(raw)}`);
  }
  return { senderId: raw.senderId, sender: raw.sender, time: raw.time, text: raw.text };
}

function readSeedFile(path: string): SeedFile {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!isRecord(raw) || typeof raw.chatId !== "string" || !Array.isArray(raw.days)) {
    throw new Error(`${path}: expected { chatId, days[] }`);
  }
  const days = raw.days.map((day: unknown): SeedDay => {
    if (!isRecord(day) || typeof day.offset !== "number" || !Array.isArray(day.messages)) {
      throw new Error(`${path}: each day needs { offset, messages[] }`);
    }
    return { offset: day.offset, messages: day.messages.map(readSeedMessage) };
  });
  return { chatId: raw.chatId, title: typeof raw.title === "string" ? raw.title : undefined, days };
}

function toChatMessages(day: SeedDay, dayIndex: number, today: Date): ChatMessage[] {
  return day.messages.map((m, idx) => {
    const [hours = 0, minutes = 0] = m.time.split(":").map(Number);
    const timestamp = new Date(today);
    timestamp.setDate(timestamp.getDate() - day.offset);
    timestamp.setHours(hours, minutes, 0, 0);
    return {
      messageId: `seed-${dayIndex}-${idx}`,
      senderId: m.senderId,
      senderName: m.sender,
      text: m.text,
      timestamp: timestamp.getTime(),
    };
  });
}

async function main() {
  const { filePath, chatId: chatOverride, clear } = parseArgs();
  const seed = readSeedFile(filePath);
  const chatId = chatOverride ?? seed.chatId;
  const pool = getPool();
  const store = new PgMessageStore(pool, appTimeZone());

  console.log(`Seeding chat ${chatId} from ${filePath}`);
  if (clear) {
    const deleted = await pool.query("DELETE FROM chat_messages WHERE chat_id = $1", [chatId]);
    console.log(`Deleted ${deleted.rowCount ?? 0} messages`);
  }

  const today = new Date();
  let total = 0;
  for (const [index, day] of seed.days.entries()) {
    if (day.messages.length === 0) continue;
    total += await store.saveMessages(chatId, toChatMessages(day, index, today), seed.title);
  }
  console.log(`✅ Inserted ${total} messages`);
}

main()
  .catch((err) => {
    console.error("❌ Seeding failed:", err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
