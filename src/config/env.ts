import { isValidTimeZone } from "../chats/dates";
import { logger } from "../infra/logger";

export function getRequiredEnv(key: string): string {
  const value = process.env[key]?.trim();
  if (!value) {
    throw new Error(`${key} is required. Set it in the environment.`);
  }
  return value;
}

export function readPositiveInt(envKey: string, fallback: number): number {
  const raw = process.env[envKey]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 1) {
    logger.warn(`invalid ${envKey}, using default`, { raw, fallback });
    return fallback;
  }
  return Math.floor(parsed);
}

/** Comma-separated Telegram user ids; malformed entries are dropped with a warning. */
export function readAdminIds(envKey = "TELEGRAM_ADMIN_IDS"): Set<number> {
  const ids = new Set<number>();
  for (const part of (process.env[envKey] ?? "").split(",")) {
    const raw = part.trim();
    if (!raw) continue;
    const id = Number(raw);
    if (!Number.isSafeInteger(id)) {
      logger.warn(`invalid id in ${envKey} ignored`, { raw });
      continue;
    }
    ids.add(id);
  }
  return ids;
}

/** IANA zone from APP_TIMEZONE; throws at startup on a name Intl does not know. */
export function appTimeZone(): string {
  const timeZone = process.env.APP_TIMEZONE?.trim() || "Europe/Moscow";
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`APP_TIMEZONE "${timeZone}" is not a valid IANA time zone, e.g. Europe/Moscow`);
  }
  return timeZone;
}
