import type { ChatMessage } from "../llm/types";
import type { StoredSummary, SummaryListing, SummaryType } from "../summary/types";

export type SummaryRecord = {
  summaryText: string;
  reflectionText?: string | null;
  improvedSummaryText?: string | null;
  providerName?: string | null;
  modelName?: string | null;
};

/**
 * Chat messages and their daily summaries. Dates are YYYY-MM-DD in the
 * store's time zone.
 */
export interface MessageStore {
  getMessagesByDate(chatId: string, date: string): Promise<ChatMessage[]>;
  /** Inserts new messages; ones already stored under the same messageId are skipped. Returns the inserted count. */
  saveMessages(chatId: string, messages: ChatMessage[], chatTitle?: string): Promise<number>;
  /** Upsert on (chatId, date, type): an existing summary is overwritten wholesale. */
  saveSummary(chatId: string, date: string, record: SummaryRecord, type?: SummaryType): Promise<void>;
  getAvailableSummaries(chatId: string): Promise<SummaryListing[]>;
  getSummary(chatId: string, date: string, type?: SummaryType): Promise<StoredSummary | undefined>;
  /** Chats that have at least one stored message. */
  listTrackedChats(): Promise<string[]>;
}
