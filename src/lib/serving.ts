/**
 * Serving-size expressions → grams.
 *
 *   "150g", "150 g"           → 150
 *   "1 serving", "2.5 servings" → count × base serving grams
 *
 * Case-insensitive; surrounding whitespace is ignored.
 */

import { GlycemicError } from "./glycemic-error";

export const DEFAULT_SERVING_SIZE = "100g";

/** Plain decimal: no exponent, hex, binary or octal forms. */
export const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

const SERVINGS_PATTERN = /^(.*?)\s*servings?$/;

function invalid(servingSize: string, reason: string): GlycemicError {
  return new GlycemicError({ kind: "INVALID_SERVING_FORMAT", servingSize, reason });
}

/** Parse the numeric part of an expression; rejects anything but a plain decimal. */
function parseAmount(servingSize: string, amount: string): number {
  if (!DECIMAL_PATTERN.test(amount)) {
    throw invalid(servingSize, amount ? `'${amount}' is not a number` : "missing amount");
  }
  const value = Number(amount);
  if (!Number.isFinite(value)) {
    throw invalid(servingSize, "amount is out of range");
  }
  if (value < 0) {
    throw invalid(servingSize, "amount must not be negative");
  }
  // "-0g" parses as -0
  return value === 0 ? 0 : value;
}

/**
 * Resolve a serving expression to an absolute mass in grams.
 * `baseServingGrams` is what "1 serving" weighs for the food being queried.
 */
export function parseServingSize(servingSize: string, baseServingGrams: number): number {
  const text = servingSize.trim().toLowerCase();
  if (!text) {
    throw invalid(servingSize, "serving size is empty");
  }

  // "1 serving" also ends in "g"; the serving form wins.
  const servings = SERVINGS_PATTERN.exec(text);
  if (servings) {
    const grams = parseAmount(servingSize, servings[1]) * baseServingGrams;
    if (!Number.isFinite(grams)) {
      throw invalid(servingSize, "amount is out of range");
    }
    return grams;
  }

  if (text.endsWith("g")) {
    return parseAmount(servingSize, text.slice(0, -1).trim());
  }

  throw invalid(servingSize, "expected '<number>g' or '<number> serving(s)'");
}
