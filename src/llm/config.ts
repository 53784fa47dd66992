import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "yaml";
import { isRecord } from "./http";
import type { ProviderConfig } from "./types";

export const KNOWN_PROVIDERS = ["gigachat", "chatgpt", "openrouter", "gemini", "ollama"] as const;

export type RunLogSinkKind = "file" | "redis" | "none";

export type AiConfig = {
  defaultProvider: string;
  fallbackProviders: string[];
  providers: Record<string, ProviderConfig>;
  enableCleaning: boolean;
  enableReflection: boolean;
  autoImproveSummary: boolean;
  probeConcurrency: number;
  runLogs: {
    enabled: boolean;
    sink: RunLogSinkKind;
    dir: string;
  };
  prompts: {
    templateDir?: string;
  };
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Resolve ${VAR} and ${VAR:-default} from the given environment */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_match: string, key: string, def?: string) => {
    const v = env[key];
    return v !== undefined && v !== "" ? v : (def ?? "");
  });
}

export const defaultConfigPath = join(process.cwd(), "config", "ai.yaml");

function readString(raw: unknown, env: NodeJS.ProcessEnv): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== "string" && typeof raw !== "number" && typeof raw !== "boolean") return undefined;
  const resolved = resolveEnv(String(raw), env).trim();
  return resolved === "" ? undefined : resolved;
}

function readBool(raw: unknown, env: NodeJS.ProcessEnv, field: string, fallback: boolean): boolean {
  const value = readString(raw, env)?.toLowerCase();
  if (value === undefined) return fallback;
  if (value === "1" || value === "true" || value === "yes") return true;
  if (value === "0" || value === "false" || value === "no") return false;
  throw new ConfigError(`${field} must be a boolean, got "${value}"`);
}

function readPositiveNumber(raw: unknown, env: NodeJS.ProcessEnv, field: string): number | undefined {
  const value = readString(raw, env);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${field} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function readPositiveInt(raw: unknown, env: NodeJS.ProcessEnv, field: string): number | undefined {
  const value = readPositiveNumber(raw, env, field);
  if (value === undefined) return undefined;
  const floored = Math.floor(value);
  if (floored < 1) {
    throw new ConfigError(`${field} must be at least 1, got "${value}"`);
  }
  return floored;
}

function readList(raw: unknown, env: NodeJS.ProcessEnv): string[] {
  const items = Array.isArray(raw) ? raw : [raw];
  const names: string[] = [];
  for (const item of items) {
    const value = readString(item, env);
    if (!value) continue;
    for (const part of value.split(",")) {
      const name = part.trim().toLowerCase();
      if (name && !names.includes(name)) names.push(name);
    }
  }
  return names;
}

function readProvider(name: string, raw: unknown, env: NodeJS.ProcessEnv): ProviderConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`providers.${name} must be a mapping`);
  }
  const config: ProviderConfig = {};
  const apiKey = readString(raw.api_key, env);
  if (apiKey) config.apiKey = apiKey;
  const baseUrl = readString(raw.base_url, env);
  if (baseUrl) config.baseUrl = baseUrl;
  const authUrl = readString(raw.auth_url, env);
  if (authUrl) config.authUrl = authUrl;
  const model = readString(raw.model, env);
  if (model) config.model = model;
  const scope = readString(raw.scope, env);
  if (scope) config.scope = scope;
  const timeoutSeconds = readPositiveNumber(raw.timeout_seconds, env, `providers.${name}.timeout_seconds`);
  if (timeoutSeconds !== undefined) config.timeoutSeconds = timeoutSeconds;
  const maxAttempts = readPositiveInt(raw.max_attempts, env, `providers.${name}.max_attempts`);
  if (maxAttempts !== undefined) config.maxAttempts = maxAttempts;
  return config;
}

/**
 * Validate a parsed YAML document into one typed record per provider.
 * Throws ConfigError on anything malformed.
 */
export function buildAiConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AiConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("AI config must be a mapping");
  }
  const rawProviders = isRecord(raw.providers) ? raw.providers : {};
  const providers: Record<string, ProviderConfig> = {};
  const known: readonly string[] = KNOWN_PROVIDERS;
  for (const [name, value] of Object.entries(rawProviders)) {
    const key = name.trim().toLowerCase();
    if (!known.includes(key)) {
      throw new ConfigError(`unknown provider "${name}" in providers`);
    }
    providers[key] = readProvider(key, value, env);
  }

  const defaultProvider = readString(raw.default_provider, env)?.toLowerCase() ?? "gigachat";
  if (!providers[defaultProvider]) {
    throw new ConfigError(`default_provider "${defaultProvider}" is not declared under providers`);
  }

  const fallbackProviders = readList(raw.fallback_providers, env);
  for (const name of fallbackProviders) {
    if (!providers[name]) {
      throw new ConfigError(`fallback provider "${name}" is not declared under providers`);
    }
  }

  const pipeline = isRecord(raw.pipeline) ? raw.pipeline : {};
  const runLogs = isRecord(raw.run_logs) ? raw.run_logs : {};
  const prompts = isRecord(raw.prompts) ? raw.prompts : {};

  const sink = readString(runLogs.sink, env)?.toLowerCase() ?? "file";
  if (sink !== "file" && sink !== "redis" && sink !== "none") {
    throw new ConfigError(`run_logs.sink must be file, redis or none, got "${sink}"`);
  }

  return {
    defaultProvider,
    fallbackProviders,
    providers,
    enableCleaning: readBool(pipeline.enable_cleaning, env, "pipeline.enable_cleaning", false),
    enableReflection: readBool(pipeline.enable_reflection, env, "pipeline.enable_reflection", true),
    autoImproveSummary: readBool(pipeline.auto_improve_summary, env, "pipeline.auto_improve_summary", false),
    probeConcurrency: readPositiveInt(pipeline.probe_concurrency, env, "pipeline.probe_concurrency") ?? 3,
    runLogs: {
      enabled: readBool(runLogs.enabled, env, "run_logs.enabled", true),
      sink,
      dir: readString(runLogs.dir, env) ?? "llm_logs",
    },
    prompts: {
      templateDir: readString(prompts.template_dir, env),
    },
  };
}

export function parseAiConfig(content: string, env: NodeJS.ProcessEnv = process.env): AiConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new ConfigError(`AI config is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return buildAiConfig(raw, env);
}

/**
 * Load the AI config from YAML (AI_CONFIG_PATH or config/ai.yaml).
 * api_key and other values are resolved from env (e.g. ${OPENROUTER_API_KEY}).
 */
export function loadAiConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AiConfig {
  const path = configPath ?? (env.AI_CONFIG_PATH?.trim() || defaultConfigPath);
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read AI config at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseAiConfig(content, env);
}
