import type Redis from "ioredis";

export const SUMMARY_LOCK_TTL_SECONDS = 15 * 60;

export function summaryLockKey(chatId: string, date: string): string {
  return `summary:inflight:${chatId}:${date}`;
}

/** Mutual exclusion for one (chat, date) summary at a time. */
export interface SummaryLock {
  /** False when the key is already held. */
  acquire(key: string, ttlSeconds?: number): Promise<boolean>;
  release(key: string): Promise<void>;
}

export class RedisSummaryLock implements SummaryLock {
  constructor(private readonly redis: Redis) {}

  async acquire(key: string, ttlSeconds = SUMMARY_LOCK_TTL_SECONDS): Promise<boolean> {
    const value = JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() });
    const acquired = await this.redis.set(key, value, "EX", ttlSeconds, "NX");
    return acquired === "OK";
  }

  async release(key: string): Promise<void> {
    await this.redis.del(key);
  }
}
