/**
 * Types for the glycemic knowledge source, derived features and verdicts.
 *
 * Public shapes are Zod schemas so route handlers can validate what they return.
 */

import { z } from "zod";

// ============================================================================
// Knowledge source
// ============================================================================

/** Column headers of the nutrition CSV, in file order. */
export const SOURCE_COLUMNS = [
  "name",
  "glycemic_index",
  "carbohydrates",
  "fiber",
  "protein",
  "fat",
  "processing_level",
  "serving_size_grams",
] as const;

export type SourceColumn = (typeof SOURCE_COLUMNS)[number];

/** Raw CSV row as handed back by csv-parse (every cell a string). */
export type SourceRow = Partial<Record<SourceColumn, string>>;

/** Per-100g record, one per canonical name. `null` marks an absent cell. */
export interface FoodRecord {
  canonicalName: string;
  glycemicIndex: number | null;
  carbohydrates: number | null;
  fiber: number | null;
  protein: number | null;
  fat: number | null;
  processingLevel: string | null;
  servingSizeGrams: number | null;
}

/** Record fields that must all be present before features can be derived. */
export const REQUIRED_RECORD_FIELDS = [
  "glycemicIndex",
  "carbohydrates",
  "fiber",
  "protein",
  "fat",
  "processingLevel",
  "servingSizeGrams",
] as const satisfies ReadonlyArray<keyof FoodRecord>;

export type RequiredRecordField = (typeof REQUIRED_RECORD_FIELDS)[number];

// ============================================================================
// Features + verdicts
// ============================================================================

export const NutritionFeaturesSchema = z.object({
  glycemicIndex: z.number().nonnegative(),
  glycemicLoad: z.number().nonnegative(),
  carbohydrates: z.number().nonnegative(),
  fiber: z.number().nonnegative(),
  protein: z.number().nonnegative(),
  fat: z.number().nonnegative(),
  processingLevel: z.string(),
  servingSizeGrams: z.number().nonnegative(),
});
export type NutritionFeatures = z.infer<typeof NutritionFeaturesSchema>;

export const SafetyLabelSchema = z.enum(["safe", "caution", "unsafe"]);
export type SafetyLabel = z.infer<typeof SafetyLabelSchema>;

export const SafetyVerdictSchema = z.object({
  label: SafetyLabelSchema,
  explanation: z.string(),
  glycemicLoadCategory: SafetyLabelSchema,
  glycemicIndexCategory: SafetyLabelSchema,
});
export type SafetyVerdict = z.infer<typeof SafetyVerdictSchema>;

export const SafetyThresholdsSchema = z
  .object({
    safeGl: z.number().nonnegative(),
    cautionGl: z.number().nonnegative(),
    safeGi: z.number().nonnegative(),
    cautionGi: z.number().nonnegative(),
  })
  .refine((t) => t.safeGl <= t.cautionGl, {
    message: "safeGl must not exceed cautionGl",
    path: ["safeGl"],
  })
  .refine((t) => t.safeGi <= t.cautionGi, {
    message: "safeGi must not exceed cautionGi",
    path: ["safeGi"],
  });
export type SafetyThresholds = z.infer<typeof SafetyThresholdsSchema>;

export const SafetyAssessmentSchema = z.object({
  food: z.string(),
  features: NutritionFeaturesSchema,
  verdict: SafetyVerdictSchema,
});
export type SafetyAssessment = z.infer<typeof SafetyAssessmentSchema>;

// ============================================================================
// Name resolution
// ============================================================================

export const CandidateSchema = z.object({
  name: z.string(),
  score: z.number().min(0).max(1),
});
export type Candidate = z.infer<typeof CandidateSchema>;

export const ResolverModeSchema = z.enum(["embedding", "substring"]);
export type ResolverMode = z.infer<typeof ResolverModeSchema>;

// Resolve request/response (for POST /api/foods/resolve)
export const ResolveRequestSchema = z.object({
  query: z.string().min(1).max(200),
  topK: z.number().int().min(1).max(50).optional(),
  offset: z.number().int().min(0).optional(),
});
export type ResolveRequest = z.infer<typeof ResolveRequestSchema>;

export const ResolveResponseSchema = z.object({
  query: z.string(),
  exact: z.string().nullable(),
  mode: ResolverModeSchema,
  candidates: z.array(CandidateSchema),
});
export type ResolveResponse = z.infer<typeof ResolveResponseSchema>;

export const FoodNameItemSchema = z.object({
  name: z.string(),
});
export type FoodNameItem = z.infer<typeof FoodNameItemSchema>;
