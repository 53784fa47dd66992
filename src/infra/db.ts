import { Pool, type PoolConfig } from "pg";
import { getRequiredEnv } from "../config/env";

function buildDatabaseUrlFromParts(): string {
  const host = getRequiredEnv("DB_HOST");
  const port = process.env.DB_PORT?.trim() || "5432";
  const dbName = getRequiredEnv("DB_NAME");
  const user = getRequiredEnv("DB_USER");
  const password = getRequiredEnv("DB_PASSWORD");
  const sslMode = process.env.DB_SSLMODE?.trim() || "disable";

  const params = new URLSearchParams();
  if (sslMode.toLowerCase() !== "disable") {
    params.set("sslmode", sslMode);
  }
  const query = params.toString();
  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${encodeURIComponent(dbName)}${query ? `?${query}` : ""}`;
}

export function resolveDatabaseUrl(): string {
  return process.env.DATABASE_URL?.trim() || buildDatabaseUrlFromParts();
}

/**
 * TLS whenever sslmode asks for it. Certificates are always verified; extra
 * roots come from NODE_EXTRA_CA_CERTS.
 */
export function buildPgPoolConfig(connectionString: string): PoolConfig {
  const parsed = new URL(connectionString);
  const sslMode = (parsed.searchParams.get("sslmode") ?? "").toLowerCase();
  const needsTls = sslMode !== "" && sslMode !== "disable";
  return needsTls ? { connectionString, ssl: { rejectUnauthorized: true } } : { connectionString };
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(buildPgPoolConfig(resolveDatabaseUrl()));
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
