/**
 * Knowledge-store failure taxonomy.
 */

export type GlycemicErrorDetail =
  | { kind: "SOURCE_UNAVAILABLE"; path: string; reason: string }
  | { kind: "NOT_FOUND"; foodName: string }
  | { kind: "MISSING_DATA"; foodName: string; missingFields: string[] }
  | { kind: "INVALID_SERVING_FORMAT"; servingSize: string; reason: string };

export type GlycemicErrorKind = GlycemicErrorDetail["kind"];

function describe(detail: GlycemicErrorDetail): string {
  switch (detail.kind) {
    case "SOURCE_UNAVAILABLE":
      return `Knowledge source unavailable at ${detail.path}: ${detail.reason}`;
    case "NOT_FOUND":
      return `Food '${detail.foodName}' not found in knowledge base`;
    case "MISSING_DATA":
      return `Food '${detail.foodName}' is missing required data: ${detail.missingFields.join(", ")}`;
    case "INVALID_SERVING_FORMAT":
      return `Invalid serving size '${detail.servingSize}': ${detail.reason}`;
  }
}

/**
 * Single error type for knowledge-store failures. Callers switch on
 * `error.detail.kind` rather than on subclasses.
 */
export class GlycemicError extends Error {
  readonly detail: GlycemicErrorDetail;

  constructor(detail: GlycemicErrorDetail) {
    super(describe(detail));
    this.name = "GlycemicError";
    this.detail = detail;
  }

  get kind(): GlycemicErrorKind {
    return this.detail.kind;
  }
}

export function isGlycemicError(error: unknown): error is GlycemicError {
  return error instanceof GlycemicError;
}
