import { PgMessageStore } from "../chats/repository";
import type { MessageStore } from "../chats/types";
import { appTimeZone } from "../config/env";
import { getPool } from "../infra/db";
import { logger } from "../infra/logger";
import { getRedis } from "../infra/redis";
import { loadAiConfig, type AiConfig } from "../llm/config";
import type { ProviderDeps } from "../llm/http";
import { createDefaultRegistry } from "../llm/index";
import { loadPromptTemplates } from "../llm/prompts";
import type { ProviderRegistry } from "../llm/registry";
import { ProviderSelector } from "../llm/selector";
import { FileArtifactSink, RedisArtifactSink, type ArtifactSink } from "../summary/artifactSink";
import { RedisSummaryLock, type SummaryLock } from "../summary/lock";
import { SummarizationPipeline } from "../summary/pipeline";
import { RunLogger } from "../summary/runLogger";
import { AnalysisService, type RunLoggerFactory } from "../summary/service";

export type AppContext = {
  config: AiConfig;
  timeZone: string;
  registry: ProviderRegistry;
  selector: ProviderSelector;
  pipeline: SummarizationPipeline;
  store: MessageStore;
  service: AnalysisService;
};

export type AppContextOverrides = {
  config?: AiConfig;
  store?: MessageStore;
  lock?: SummaryLock;
  providerDeps?: ProviderDeps;
  artifactSink?: ArtifactSink;
};

export function scenarioName(config: AiConfig): string {
  if (!config.enableReflection) return "summary_only";
  return config.autoImproveSummary ? "with_improvement" : "with_reflection";
}

function buildRunLoggerFactory(config: AiConfig, sink: ArtifactSink | undefined): RunLoggerFactory | undefined {
  if (!config.runLogs.enabled || config.runLogs.sink === "none") return undefined;
  const resolvedSink =
    sink ??
    (config.runLogs.sink === "redis"
      ? new RedisArtifactSink(getRedis())
      : new FileArtifactSink(config.runLogs.dir));
  const scenario = scenarioName(config);
  return ({ date }) => new RunLogger({ sink: resolvedSink, date, scenario });
}

/**
 * The one place providers, the registry and the service get wired together.
 * Both the api and the worker build their own context at startup.
 */
export function buildAppContext(overrides: AppContextOverrides = {}): AppContext {
  const config = overrides.config ?? loadAiConfig();
  const timeZone = appTimeZone();
  const prompts = loadPromptTemplates(config.prompts.templateDir);
  const registry = createDefaultRegistry({ prompts, timeZone, ...overrides.providerDeps });
  const selector = new ProviderSelector(registry, config.providers, {
    fallbackOrder: config.fallbackProviders,
    probeConcurrency: config.probeConcurrency,
  });
  const pipeline = new SummarizationPipeline({
    registry,
    selector,
    configs: config.providers,
    prompts,
    settings: {
      defaultProvider: config.defaultProvider,
      enableCleaning: config.enableCleaning,
      enableReflection: config.enableReflection,
      autoImproveSummary: config.autoImproveSummary,
    },
  });
  const store = overrides.store ?? new PgMessageStore(getPool(), timeZone);
  const lock = overrides.lock ?? new RedisSummaryLock(getRedis());
  const service = new AnalysisService({
    pipeline,
    registry,
    selector,
    configs: config.providers,
    store,
    lock,
    createRunLogger: buildRunLoggerFactory(config, overrides.artifactSink),
  });

  logger.info("app context ready", {
    defaultProvider: config.defaultProvider,
    fallbackProviders: config.fallbackProviders,
    providers: registry.listNames(),
    cleaning: config.enableCleaning,
    reflection: config.enableReflection,
    improvement: config.autoImproveSummary,
    timeZone,
  });
  return { config, timeZone, registry, selector, pipeline, store, service };
}
