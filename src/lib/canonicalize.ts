/**
 * Food name canonicalization.
 *
 * Pure function, applied identically when the knowledge source is loaded and
 * when a query is looked up. Canonical keys are never stored twice.
 */

/**
 * Lowercase, trim and collapse internal whitespace runs to a single space.
 * Empty (or whitespace-only) input yields "".
 */
export function normalizeFoodName(name: string): string {
  return name.toLowerCase().trim().replace(/\s+/g, " ");
}
