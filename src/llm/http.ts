import { fail, ok, type LlmResult } from "./types";
import type { PromptTemplates } from "./prompts";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Injection points shared by every provider; defaults are the real runtime. */
export type ProviderDeps = {
  fetch?: FetchLike;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  prompts?: PromptTemplates;
  timeZone?: string;
};

export type HttpReply = {
  status: number;
  ok: boolean;
  body: string;
};

export type HttpRequest = {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * One HTTP round trip. Resolves to the raw status and body for any HTTP answer;
 * transport problems come back as `timeout`, `cancelled` or `network`.
 */
export async function sendRequest(
  fetchImpl: FetchLike,
  url: string,
  request: HttpRequest
): Promise<LlmResult<HttpReply>> {
  if (request.signal?.aborted) {
    return fail("cancelled", "request cancelled");
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, request.timeoutMs);
  const onAbort = () => controller.abort();
  request.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetchImpl(url, {
      method: request.method ?? "GET",
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const body = await res.text();
    return ok({ status: res.status, ok: res.ok, body });
  } catch (err) {
    if (request.signal?.aborted) {
      return fail("cancelled", "request cancelled");
    }
    if (timedOut) {
      return fail("timeout", `no response within ${Math.round(request.timeoutMs / 1000)}s`);
    }
    return fail("network", err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener("abort", onAbort);
  }
}

/** Maps a non-2xx reply to an error kind. */
export function httpFailure<T>(reply: HttpReply, label: string): LlmResult<T> {
  const snippet = reply.body.slice(0, 300);
  if (reply.status === 429) {
    return fail("rate_limited", `${label} rate limit exceeded`, reply.status);
  }
  if (reply.status === 401 || reply.status === 403) {
    return fail("auth", `${label} rejected credentials (${reply.status})`, reply.status);
  }
  return fail("http", `${label} API error ${reply.status}: ${snippet}`, reply.status);
}

/** JSON.parse that reports a malformed body instead of throwing. */
export function parseJsonBody(body: string, label: string): LlmResult<unknown> {
  try {
    return ok(JSON.parse(body));
  } catch (err) {
    return fail(
      "malformed_response",
      `${label} returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
