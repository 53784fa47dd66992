import { logger } from "../infra/logger";
import type { ProviderDeps } from "./http";
import type { AIProvider, ProviderConfig } from "./types";

export type ProviderFactory = (config: ProviderConfig, deps: ProviderDeps) => AIProvider;

const PROVIDER_METHODS = [
  "initialize",
  "isAvailable",
  "validateConfig",
  "getProviderInfo",
  "getCurrentModel",
  "summarize",
  "complete",
  "summarizeChat",
  "generateResponse",
  "optimizeText",
  "formatMessagesForAnalysis",
  "setRunLogger",
] as const;

/** Runtime check that an object carries the whole provider capability set. */
export function isAIProvider(value: unknown): value is AIProvider {
  if (typeof value !== "object" || value === null) return false;
  for (const method of PROVIDER_METHODS) {
    if (typeof Reflect.get(value, method) !== "function") return false;
  }
  return typeof Reflect.get(value, "name") === "string" && typeof Reflect.get(value, "displayName") === "string";
}

/**
 * Name to factory mapping. One instance is built by the composition root and
 * handed to whatever needs to construct providers.
 */
export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();

  constructor(private readonly deps: ProviderDeps = {}) {}

  /** Returns false (and registers nothing) for an empty name or a non-function factory. */
  register(name: string, factory: ProviderFactory): boolean {
    const key = name.trim().toLowerCase();
    if (!key) {
      logger.error("provider registration rejected: empty name");
      return false;
    }
    if (typeof factory !== "function") {
      logger.error("provider registration rejected: factory is not a function", { name: key });
      return false;
    }
    if (this.factories.has(key)) {
      logger.warn("provider re-registered", { name: key });
    }
    this.factories.set(key, factory);
    return true;
  }

  /** Never throws: unknown names, factory errors and non-conforming results all give undefined. */
  create(name: string, config: ProviderConfig): AIProvider | undefined {
    const key = name.trim().toLowerCase();
    const factory = this.factories.get(key);
    if (!factory) {
      logger.error("unknown AI provider", { name, registered: this.listNames() });
      return undefined;
    }
    try {
      const provider: unknown = factory(config, this.deps);
      if (!isAIProvider(provider)) {
        logger.error("factory returned an object that is not a provider", { name: key });
        return undefined;
      }
      return provider;
    } catch (err) {
      logger.error("provider construction failed", {
        name: key,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }

  listNames(): string[] {
    return [...this.factories.keys()];
  }

  isRegistered(name: string): boolean {
    return this.factories.has(name.trim().toLowerCase());
  }

  get size(): number {
    return this.factories.size;
  }

  clear(): void {
    this.factories.clear();
  }
}
