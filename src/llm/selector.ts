import { logger } from "../infra/logger";
import { runWithConcurrency } from "./concurrency";
import type { ProviderRegistry } from "./registry";
import type { CallOptions, ProviderConfig } from "./types";

export const DEFAULT_PROBE_CONCURRENCY = 3;

export type SelectorOptions = {
  /** Tried first, in this order; the remaining registered providers follow in registration order. */
  fallbackOrder?: string[];
  probeConcurrency?: number;
};

export type SelectOptions = CallOptions & {
  /** Names that must not be returned (e.g. a provider that just failed to initialize). */
  exclude?: string[];
};

/** Index of the first `true` once every earlier slot is known to be `false`. */
function settledWinner(statuses: Array<boolean | undefined>): number | undefined {
  for (let i = 0; i < statuses.length; i++) {
    const status = statuses[i];
    if (status === undefined) return undefined;
    if (status) return i;
  }
  return undefined;
}

export class ProviderSelector {
  private readonly fallbackOrder: string[];
  private readonly probeConcurrency: number;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly configs: Record<string, ProviderConfig>,
    options: SelectorOptions = {}
  ) {
    this.fallbackOrder = (options.fallbackOrder ?? []).map((n) => n.trim().toLowerCase());
    this.probeConcurrency = options.probeConcurrency ?? DEFAULT_PROBE_CONCURRENCY;
  }

  /** Deterministic probe order: fallback list first, then registration order, no duplicates. */
  candidateOrder(exclude: string[] = []): string[] {
    const skip = new Set(exclude.map((n) => n.trim().toLowerCase()));
    const ordered: string[] = [];
    for (const name of [...this.fallbackOrder, ...this.registry.listNames()]) {
      if (skip.has(name) || ordered.includes(name) || !this.registry.isRegistered(name)) continue;
      ordered.push(name);
    }
    return ordered;
  }

  /** Builds the provider and runs initialize(); false on any failure. */
  async probe(name: string, options: CallOptions = {}): Promise<boolean> {
    try {
      const provider = this.registry.create(name, this.configs[name] ?? {});
      if (!provider) return false;
      return await provider.initialize(options);
    } catch (err) {
      logger.warn("provider probe failed", {
        name,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  /**
   * An available `preferred` wins outright. Otherwise the candidates are probed
   * in parallel and the first available one in candidate order is returned.
   */
  async selectBest(preferred?: string, options: SelectOptions = {}): Promise<string | undefined> {
    const exclude = [...(options.exclude ?? [])];
    const preferredKey = preferred?.trim().toLowerCase();

    if (preferredKey && !exclude.includes(preferredKey)) {
      if (await this.probe(preferredKey, options)) {
        logger.info("preferred provider selected", { name: preferredKey });
        return preferredKey;
      }
      logger.warn("preferred provider unavailable, trying fallbacks", { name: preferredKey });
      exclude.push(preferredKey);
    }

    const candidates = this.candidateOrder(exclude);
    if (candidates.length === 0) {
      logger.error("no AI provider candidates left to probe");
      return undefined;
    }

    const statuses: Array<boolean | undefined> = candidates.map(() => undefined);
    await runWithConcurrency(
      candidates.map((name, index) => async () => {
        const available = await this.probe(name, options);
        statuses[index] = available;
        return available;
      }),
      this.probeConcurrency,
      { shouldStop: () => settledWinner(statuses) !== undefined || options.signal?.aborted === true }
    );

    const winner = settledWinner(statuses);
    if (winner === undefined) {
      logger.error("no AI provider available", { probed: candidates });
      return undefined;
    }
    const name = candidates[winner];
    logger.info("fallback provider selected", { name });
    return name;
  }

  /** Probes every registered provider; never throws. */
  async testAll(options: CallOptions = {}): Promise<Record<string, boolean>> {
    const names = this.candidateOrder();
    const results = await runWithConcurrency(
      names.map((name) => () => this.probe(name, options)),
      this.probeConcurrency
    );
    const report: Record<string, boolean> = {};
    names.forEach((name, i) => {
      report[name] = results[i] === true;
    });
    return report;
  }
}
