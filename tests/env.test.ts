import { afterEach, describe, expect, it, vi } from "vitest";
import { appTimeZone, readAdminIds, readPositiveInt } from "../src/config/env";
import { buildPgPoolConfig, resolveDatabaseUrl } from "../src/infra/db";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("environment readers", () => {
  it("parses admin ids and drops malformed entries", () => {
    vi.stubEnv("TELEGRAM_ADMIN_IDS", "1001, 2002,abc,,3003");
    expect([...readAdminIds()]).toEqual([1001, 2002, 3003]);
  });

  it("falls back on a non-positive integer", () => {
    vi.stubEnv("PORT", "0");
    expect(readPositiveInt("PORT", 3000)).toBe(3000);
    vi.stubEnv("PORT", "8080");
    expect(readPositiveInt("PORT", 3000)).toBe(8080);
  });

  it("defaults the time zone to Moscow", () => {
    vi.stubEnv("APP_TIMEZONE", "");
    expect(appTimeZone()).toBe("Europe/Moscow");
    vi.stubEnv("APP_TIMEZONE", "Asia/Yekaterinburg");
    expect(appTimeZone()).toBe("Asia/Yekaterinburg");
  });

  it("rejects a time zone Intl does not know", () => {
    vi.stubEnv("APP_TIMEZONE", "Moscow");
    expect(() => appTimeZone()).toThrow('APP_TIMEZONE "Moscow" is not a valid IANA time zone, e.g. Europe/Moscow');
  });
});

describe("database settings", () => {
  it("builds the connection string from parts", () => {
    vi.stubEnv("DATABASE_URL", "");
    vi.stubEnv("DB_HOST", "db");
    vi.stubEnv("DB_PORT", "");
    vi.stubEnv("DB_NAME", "digest");
    vi.stubEnv("DB_USER", "digest");
    vi.stubEnv("DB_PASSWORD", "p@ss");
    vi.stubEnv("DB_SSLMODE", "");
    expect(resolveDatabaseUrl()).toBe("postgresql://digest:p%40ss@db:5432/digest");
  });

  it("turns on verified TLS only when sslmode asks for it", () => {
    const secure = "postgresql://digest:test-secret@db:5432/digest?sslmode=require";
    expect(buildPgPoolConfig(secure)).toEqual({ connectionString: secure, ssl: { rejectUnauthorized: true } });
    const plain = "postgresql://digest:test-secret@db:5432/digest";
    expect(buildPgPoolConfig(plain)).toEqual({ connectionString: plain });
  });
});
