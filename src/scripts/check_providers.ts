import "dotenv/config";
import { appTimeZone } from "../config/env";
import { loadAiConfig } from "../llm/config";
import { createDefaultRegistry } from "../llm/index";
import { ProviderSelector } from "../llm/selector";

async function main() {
  const config = loadAiConfig();
  const registry = createDefaultRegistry({ timeZone: appTimeZone() });
  const selector = new ProviderSelector(registry, config.providers, {
    fallbackOrder: config.fallbackProviders,
    probeConcurrency: config.probeConcurrency,
  });

  console.log("=== AI Provider Diagnostics ===\n");
  console.log(`Default provider: ${config.defaultProvider}`);
  console.log(`Fallback order: ${config.fallbackProviders.join(", ") || "(none)"}`);
  console.log(`Probe order: ${selector.candidateOrder().join(", ")}`);
  console.log();

  console.log("API keys:");
  for (const name of registry.listNames()) {
    const provider = config.providers[name];
    if (name === "ollama") {
      console.log(`  ${name}: local (${provider?.baseUrl ?? "default url"})`);
      continue;
    }
    console.log(`  ${name}:`, provider?.apiKey ? "✅ Set" : "❌ Missing");
  }
  console.log();

  const report = await selector.testAll();
  console.log("Availability:");
  for (const [name, available] of Object.entries(report)) {
    const model = registry.create(name, config.providers[name] ?? {})?.getCurrentModel() ?? "?";
    console.log(`  ${available ? "✅" : "❌"} ${name} (${model})`);
  }
  console.log();

  const selected = await selector.selectBest(config.defaultProvider);
  console.log(`Selected provider: ${selected ?? "❌ none available"}`);
  if (!selected) process.exitCode = 1;
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
