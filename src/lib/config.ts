import { z } from "zod";
import { DEFAULT_EMBEDDING_BATCH_SIZE } from "./food-resolver";
import { DEFAULT_THRESHOLDS } from "./safety-rules";
import { SafetyThresholdsSchema, type SafetyThresholds } from "@/types/nutrition";

export const DEFAULT_DATA_PATH = "data/nutrition_data.csv";
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

// Unset and empty variables both fall back to the default
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v?.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NUTRITION_DATA_PATH: optionalString,
  EMBEDDING_API_URL: optionalString.pipe(z.string().url().optional()),
  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_BATCH_SIZE: optionalString.pipe(z.coerce.number().int().min(1).optional()),
  SAFE_GL_THRESHOLD: optionalString.pipe(z.coerce.number().nonnegative().optional()),
  CAUTION_GL_THRESHOLD: optionalString.pipe(z.coerce.number().nonnegative().optional()),
  SAFE_GI_THRESHOLD: optionalString.pipe(z.coerce.number().nonnegative().optional()),
  CAUTION_GI_THRESHOLD: optionalString.pipe(z.coerce.number().nonnegative().optional()),
});

export interface EmbeddingConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
}

export interface GlycemicConfig {
  dataPath: string;
  /** null → no provider, resolver runs in substring mode */
  embedding: EmbeddingConfig | null;
  embeddingBatchSize: number;
  thresholds: SafetyThresholds;
}

/**
 * Read configuration from environment variables. Throws a ZodError on
 * malformed values or on a safe threshold above its caution threshold.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GlycemicConfig {
  const parsed = EnvSchema.parse(env);

  return {
    dataPath: parsed.NUTRITION_DATA_PATH ?? DEFAULT_DATA_PATH,
    embedding: parsed.EMBEDDING_API_URL
      ? {
          baseUrl: parsed.EMBEDDING_API_URL,
          apiKey: parsed.EMBEDDING_API_KEY,
          model: parsed.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL,
        }
      : null,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE ?? DEFAULT_EMBEDDING_BATCH_SIZE,
    thresholds: SafetyThresholdsSchema.parse({
      safeGl: parsed.SAFE_GL_THRESHOLD ?? DEFAULT_THRESHOLDS.safeGl,
      cautionGl: parsed.CAUTION_GL_THRESHOLD ?? DEFAULT_THRESHOLDS.cautionGl,
      safeGi: parsed.SAFE_GI_THRESHOLD ?? DEFAULT_THRESHOLDS.safeGi,
      cautionGi: parsed.CAUTION_GI_THRESHOLD ?? DEFAULT_THRESHOLDS.cautionGi,
    }),
  };
}
