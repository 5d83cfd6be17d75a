/**
 * Safety Rules
 *
 * Propositional threshold rules over two independent axes, glycemic load (GL)
 * and glycemic index (GI). Each axis is banded safe / caution / unsafe; the
 * verdict takes the most severe band.
 *
 * Pure functions, no I/O.
 */

import {
  SafetyThresholdsSchema,
  type NutritionFeatures,
  type SafetyLabel,
  type SafetyThresholds,
  type SafetyVerdict,
} from "@/types/nutrition";

export const DEFAULT_THRESHOLDS: Readonly<SafetyThresholds> = Object.freeze({
  safeGl: 10,
  cautionGl: 20,
  safeGi: 55,
  cautionGi: 70,
});

const SEVERITY: Record<SafetyLabel, number> = { safe: 0, caution: 1, unsafe: 2 };

/**
 * Merge overrides onto the defaults. Throws a ZodError when a safe threshold
 * would sit above its caution threshold.
 */
export function resolveThresholds(overrides: Partial<SafetyThresholds> = {}): SafetyThresholds {
  return SafetyThresholdsSchema.parse({ ...DEFAULT_THRESHOLDS, ...overrides });
}

/**
 * Band a value. A value exactly on a threshold belongs to the lower band.
 */
export function categorize(
  value: number,
  safeThreshold: number,
  cautionThreshold: number
): SafetyLabel {
  if (value <= safeThreshold) return "safe";
  if (value <= cautionThreshold) return "caution";
  return "unsafe";
}

/** unsafe > caution > safe */
export function mostSevere(...labels: SafetyLabel[]): SafetyLabel {
  return labels.reduce<SafetyLabel>(
    (worst, label) => (SEVERITY[label] > SEVERITY[worst] ? label : worst),
    "safe"
  );
}

/** At most two decimals, no trailing zeros: 1.2, 15, 18.35 */
export function formatValue(value: number): string {
  return String(Number(value.toFixed(2)));
}

function describeAxis(
  axis: string,
  value: number,
  category: SafetyLabel,
  safeThreshold: number,
  cautionThreshold: number
): string {
  const v = formatValue(value);
  const safe = formatValue(safeThreshold);
  const caution = formatValue(cautionThreshold);
  switch (category) {
    case "safe":
      return `${axis} ${v} is within the safe range (<= ${safe}).`;
    case "caution":
      return `${axis} ${v} exceeds the safe threshold (${safe}) but is within the caution range (<= ${caution}).`;
    case "unsafe":
      return `${axis} ${v} exceeds the caution threshold (${caution}).`;
  }
}

/**
 * Classify per-serving features. Both axes are always explained, GL first,
 * whichever one decided the label.
 */
export function evaluate(
  features: Pick<NutritionFeatures, "glycemicIndex" | "glycemicLoad">,
  thresholds: SafetyThresholds = DEFAULT_THRESHOLDS
): SafetyVerdict {
  const { glycemicLoad, glycemicIndex } = features;
  const glycemicLoadCategory = categorize(glycemicLoad, thresholds.safeGl, thresholds.cautionGl);
  const glycemicIndexCategory = categorize(glycemicIndex, thresholds.safeGi, thresholds.cautionGi);

  const explanation = [
    describeAxis("Glycemic load", glycemicLoad, glycemicLoadCategory, thresholds.safeGl, thresholds.cautionGl),
    describeAxis("Glycemic index", glycemicIndex, glycemicIndexCategory, thresholds.safeGi, thresholds.cautionGi),
  ].join(" ");

  return {
    label: mostSevere(glycemicLoadCategory, glycemicIndexCategory),
    explanation,
    glycemicLoadCategory,
    glycemicIndexCategory,
  };
}
