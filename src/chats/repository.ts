import type { Pool } from "pg";
import type { ChatMessage } from "../llm/types";
import type { StoredSummary, SummaryListing, SummaryType } from "../summary/types";
import type { MessageStore, SummaryRecord } from "./types";

type MessageRow = {
  message_id: string | null;
  sender_id: string | null;
  sender_name: string | null;
  text: string;
  sent_at: Date | null;
};

type SummaryRow = {
  chat_id: string;
  date: string;
  summary_type: string;
  summary_text: string;
  reflection_text: string | null;
  improved_summary_text: string | null;
  provider_name: string | null;
  model_name: string | null;
  created_at: Date;
};

function toSummaryType(value: string): SummaryType {
  return value === "custom" ? "custom" : "daily";
}

function toStoredSummary(row: SummaryRow): StoredSummary {
  return {
    chatId: row.chat_id,
    date: row.date,
    summaryType: toSummaryType(row.summary_type),
    summaryText: row.summary_text,
    reflectionText: row.reflection_text,
    improvedSummaryText: row.improved_summary_text,
    providerName: row.provider_name,
    modelName: row.model_name,
    createdAt: row.created_at,
  };
}

/** PostgreSQL store; schema in sql/schema.sql. */
export class PgMessageStore implements MessageStore {
  constructor(
    private readonly pool: Pool,
    private readonly timeZone: string
  ) {}

  async getMessagesByDate(chatId: string, date: string): Promise<ChatMessage[]> {
    const { rows } = await this.pool.query<MessageRow>(
      `SELECT message_id, sender_id, sender_name, text, sent_at
         FROM chat_messages
        WHERE chat_id = $1
          AND (sent_at AT TIME ZONE $3)::date = $2::date
        ORDER BY sent_at ASC, id ASC`,
      [chatId, date, this.timeZone]
    );
    return rows.map((row) => ({
      messageId: row.message_id ?? undefined,
      senderId: row.sender_id ?? undefined,
      senderName: row.sender_name ?? undefined,
      text: row.text,
      timestamp: row.sent_at ? row.sent_at.getTime() : null,
    }));
  }

  async saveMessages(chatId: string, messages: ChatMessage[], chatTitle?: string): Promise<number> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        `INSERT INTO chats (chat_id, title) VALUES ($1, $2)
         ON CONFLICT (chat_id) DO UPDATE SET title = COALESCE(EXCLUDED.title, chats.title)`,
        [chatId, chatTitle ?? null]
      );
      let inserted = 0;
      for (const message of messages) {
        const result = await client.query(
          `INSERT INTO chat_messages (chat_id, message_id, sender_id, sender_name, text, sent_at)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (chat_id, message_id) DO NOTHING`,
          [
            chatId,
            message.messageId ?? null,
            message.senderId ?? null,
            message.senderName ?? null,
            message.text,
            typeof message.timestamp === "number" ? new Date(message.timestamp) : null,
          ]
        );
        inserted += result.rowCount ?? 0;
      }
      await client.query("COMMIT");
      return inserted;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async saveSummary(
    chatId: string,
    date: string,
    record: SummaryRecord,
    type: SummaryType = "daily"
  ): Promise<void> {
    await this.pool.query(
      `INSERT INTO chat_summaries
         (chat_id, date, summary_type, summary_text, reflection_text, improved_summary_text, provider_name, model_name)
       VALUES ($1, $2::date, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (chat_id, date, summary_type) DO UPDATE SET
         summary_text = EXCLUDED.summary_text,
         reflection_text = EXCLUDED.reflection_text,
         improved_summary_text = EXCLUDED.improved_summary_text,
         provider_name = EXCLUDED.provider_name,
         model_name = EXCLUDED.model_name,
         created_at = now()`,
      [
        chatId,
        date,
        type,
        record.summaryText,
        record.reflectionText ?? null,
        record.improvedSummaryText ?? null,
        record.providerName ?? null,
        record.modelName ?? null,
      ]
    );
  }

  async getAvailableSummaries(chatId: string): Promise<SummaryListing[]> {
    const { rows } = await this.pool.query<{ date: string; summary_type: string; created_at: Date }>(
      `SELECT to_char(date, 'YYYY-MM-DD') AS date, summary_type, created_at
         FROM chat_summaries
        WHERE chat_id = $1
        ORDER BY date DESC, summary_type ASC`,
      [chatId]
    );
    return rows.map((row) => ({
      date: row.date,
      summaryType: toSummaryType(row.summary_type),
      createdAt: row.created_at,
    }));
  }

  async getSummary(
    chatId: string,
    date: string,
    type: SummaryType = "daily"
  ): Promise<StoredSummary | undefined> {
    const { rows } = await this.pool.query<SummaryRow>(
      `SELECT chat_id, to_char(date, 'YYYY-MM-DD') AS date, summary_type, summary_text,
              reflection_text, improved_summary_text, provider_name, model_name, created_at
         FROM chat_summaries
        WHERE chat_id = $1 AND date = $2::date AND summary_type = $3`,
      [chatId, date, type]
    );
    const row = rows[0];
    return row ? toStoredSummary(row) : undefined;
  }

  async listTrackedChats(): Promise<string[]> {
    const { rows } = await this.pool.query<{ chat_id: string }>(
      `SELECT DISTINCT chat_id FROM chat_messages ORDER BY chat_id ASC`
    );
    return rows.map((row) => row.chat_id);
  }
}
