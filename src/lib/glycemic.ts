import { loadConfig, type GlycemicConfig } from "./config";
import { HttpEmbeddingProvider, type EmbeddingProvider } from "./embeddings";
import { FoodNameResolver } from "./food-resolver";
import { KnowledgeStore } from "./knowledge-store";
import { FoodSafetyEngine } from "./safety-engine";

export interface GlycemicRuntime {
  config: GlycemicConfig;
  store: KnowledgeStore;
  resolver: FoodNameResolver;
  engine: FoodSafetyEngine;
}

export function createEmbeddingProvider(config: GlycemicConfig): EmbeddingProvider | null {
  if (!config.embedding) return null;
  return new HttpEmbeddingProvider(config.embedding);
}

/**
 * Load the knowledge source, embed its names and wire the safety engine.
 * Both steps are one-time startup costs; everything after is read-only.
 */
export async function createRuntime(
  config: GlycemicConfig,
  provider: EmbeddingProvider | null = createEmbeddingProvider(config)
): Promise<GlycemicRuntime> {
  const store = await KnowledgeStore.load(config.dataPath);
  const resolver = await FoodNameResolver.create(store.listNames(), provider, {
    batchSize: config.embeddingBatchSize,
  });
  const engine = new FoodSafetyEngine(store, config.thresholds);
  return { config, store, resolver, engine };
}

// Singleton for hot reload safety in development
const globalForGlycemic = globalThis as unknown as {
  glycemic: Promise<GlycemicRuntime> | undefined;
};

/**
 * Process-wide runtime, built on first use from environment configuration.
 * A failed build is not cached, so the next call retries.
 */
export function getRuntime(): Promise<GlycemicRuntime> {
  if (!globalForGlycemic.glycemic) {
    globalForGlycemic.glycemic = createRuntime(loadConfig()).catch((error: unknown) => {
      globalForGlycemic.glycemic = undefined;
      throw error;
    });
  }
  return globalForGlycemic.glycemic;
}
