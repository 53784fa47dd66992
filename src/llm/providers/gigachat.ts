import { randomUUID } from "node:crypto";
import { logger } from "../../infra/logger";
import { httpFailure, isRecord, parseJsonBody, sendRequest, type ProviderDeps } from "../http";
import { fail, ok, type CallOptions, type LlmResult, type ProviderConfig, type ProviderInfo } from "../types";
import {
  BaseProvider,
  isPlaceholderKey,
  readChatCompletion,
  type GenerationParams,
} from "./base";

export const GIGACHAT_BASE_URL = "https://gigachat.devices.sberbank.ru/api/v1";
export const GIGACHAT_AUTH_URL = "https://ngw.devices.sberbank.ru:9443/api/v2/oauth";
export const GIGACHAT_DEFAULT_MODEL = "GigaChat:latest";
export const GIGACHAT_DEFAULT_SCOPE = "GIGACHAT_API_PERS";
/** Tokens live 30 minutes; refresh five minutes early. */
export const TOKEN_SOFT_TTL_MS = 25 * 60 * 1000;

/**
 * Keys longer than 50 characters are treated as base64 of `client_id:secret`
 * and decoded when they round-trip cleanly; anything else is used as is.
 */
export function decodeAuthKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed.length <= 50) return trimmed;
  const decoded = Buffer.from(trimmed, "base64");
  const strip = (s: string) => s.replace(/=+$/, "");
  if (strip(decoded.toString("base64")) !== strip(trimmed)) return trimmed;
  const text = decoded.toString("utf8");
  if (text.includes("�") || !/^[\x20-\x7E]+$/.test(text)) return trimmed;
  return text;
}

type CachedToken = {
  value: string;
  expiresAt: number;
};

export class GigaChatProvider extends BaseProvider {
  private readonly baseUrl: string;
  private readonly authUrl: string;
  private readonly model: string;
  private token: CachedToken | undefined;
  private tokenRequest: Promise<LlmResult<string>> | undefined;

  constructor(config: ProviderConfig, deps?: ProviderDeps) {
    super("gigachat", config, deps);
    this.baseUrl = config.baseUrl ?? GIGACHAT_BASE_URL;
    this.authUrl = config.authUrl ?? GIGACHAT_AUTH_URL;
    this.model = config.model ?? GIGACHAT_DEFAULT_MODEL;
  }

  validateConfig(): boolean {
    const key = this.config.apiKey;
    if (isPlaceholderKey(key, "your_gigachat_key")) {
      logger.error("GigaChat API key is not configured");
      return false;
    }
    if ((key ?? "").trim().length < 10) {
      logger.error("GigaChat API key is too short");
      return false;
    }
    return true;
  }

  getCurrentModel(): string {
    return this.model;
  }

  getProviderInfo(): ProviderInfo {
    return {
      name: this.name,
      displayName: this.displayName,
      model: this.model,
      maxTokens: 1000,
      supportsStreaming: false,
      endpoint: this.baseUrl,
    };
  }

  protected async probe(options: CallOptions): Promise<LlmResult<void>> {
    if (!this.validateConfig()) {
      return fail("config_invalid", "GigaChat API key is not configured");
    }
    const token = await this.getAccessToken(options);
    return token.ok ? ok(undefined) : token;
  }

  /**
   * Returns the cached token while it is fresh. Concurrent callers share one
   * OAuth request instead of issuing their own.
   */
  async getAccessToken(options: CallOptions = {}): Promise<LlmResult<string>> {
    if (this.token && this.now() < this.token.expiresAt) {
      return ok(this.token.value);
    }
    if (!this.tokenRequest) {
      this.tokenRequest = this.requestToken(options).finally(() => {
        this.tokenRequest = undefined;
      });
    }
    return this.tokenRequest;
  }

  private async requestToken(options: CallOptions): Promise<LlmResult<string>> {
    const credentials = Buffer.from(decodeAuthKey(this.config.apiKey ?? ""), "utf8").toString("base64");
    const scope = this.config.scope ?? GIGACHAT_DEFAULT_SCOPE;

    logger.info("requesting GigaChat access token");
    const reply = await sendRequest(this.fetchImpl, this.authUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
        RqUID: randomUUID(),
        Authorization: `Basic ${credentials}`,
      },
      body: new URLSearchParams({ scope }).toString(),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) return reply;
    if (!reply.value.ok) {
      logger.error("GigaChat token request failed", { status: reply.value.status });
      return httpFailure(reply.value, "GigaChat OAuth");
    }

    const parsed = parseJsonBody(reply.value.body, "GigaChat OAuth");
    if (!parsed.ok) return parsed;
    const accessToken = isRecord(parsed.value) ? parsed.value.access_token : undefined;
    if (typeof accessToken !== "string" || accessToken === "") {
      logger.error("GigaChat token response has no access_token");
      return fail("malformed_response", "GigaChat OAuth response has no access_token");
    }

    this.token = { value: accessToken, expiresAt: this.now() + TOKEN_SOFT_TTL_MS };
    logger.info("GigaChat access token received");
    return ok(accessToken);
  }

  protected async callModel(
    prompt: string,
    params: GenerationParams,
    options: CallOptions
  ): Promise<LlmResult<string>> {
    const token = await this.getAccessToken(options);
    if (!token.ok) return token;

    const reply = await sendRequest(this.fetchImpl, `${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token.value}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: params.temperature,
        max_tokens: params.maxTokens,
      }),
      timeoutMs: this.timeoutMs(),
      signal: options.signal,
    });
    if (!reply.ok) return reply;

    if (!reply.value.ok) {
      if (reply.value.status === 401) {
        // the server dropped our token early; next call fetches a new one
        this.token = undefined;
      }
      logger.error("GigaChat API error", {
        status: reply.value.status,
        body: reply.value.body.slice(0, 300),
      });
      return httpFailure(reply.value, "GigaChat");
    }

    const parsed = parseJsonBody(reply.value.body, "GigaChat");
    if (!parsed.ok) return parsed;
    const content = readChatCompletion(parsed.value);
    if (content === undefined) {
      logger.error("unexpected GigaChat response shape");
      return fail("malformed_response", "Неожиданный формат ответа от GigaChat");
    }
    return ok(content);
  }
}
