import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { GlycemicError, isGlycemicError } from "./glycemic-error";

// ============================================================================
// API error envelope
// ============================================================================

export type ErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "UNPROCESSABLE"
  | "INTERNAL";

export interface ApiError {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  UNPROCESSABLE: 422,
  INTERNAL: 500,
};

/**
 * Create a standardized error response
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  status?: number
): NextResponse<ApiError> {
  return NextResponse.json(
    {
      error: {
        code,
        message,
        ...(details && { details }),
      },
    },
    { status: status ?? STATUS_BY_CODE[code] }
  );
}

/**
 * Handle Zod validation errors
 */
export function handleZodError(error: ZodError): NextResponse<ApiError> {
  return errorResponse("BAD_REQUEST", "Validation error", {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/**
 * Map a knowledge-store error onto the API envelope
 */
export function handleGlycemicError(error: GlycemicError): NextResponse<ApiError> {
  const { detail } = error;
  switch (detail.kind) {
    case "NOT_FOUND":
      return errorResponse("NOT_FOUND", error.message, { foodName: detail.foodName });
    case "MISSING_DATA":
      return errorResponse("UNPROCESSABLE", error.message, {
        foodName: detail.foodName,
        missingFields: detail.missingFields,
      });
    case "INVALID_SERVING_FORMAT":
      return errorResponse("BAD_REQUEST", error.message, { servingSize: detail.servingSize });
    case "SOURCE_UNAVAILABLE":
      console.error("API Error:", error);
      return errorResponse("INTERNAL", "Knowledge source unavailable");
  }
}

/**
 * Handle unknown errors
 */
export function handleError(error: unknown): NextResponse<ApiError> {
  if (error instanceof ZodError) {
    return handleZodError(error);
  }

  if (isGlycemicError(error)) {
    return handleGlycemicError(error);
  }

  // request.json() on a malformed body
  if (error instanceof SyntaxError) {
    return errorResponse("BAD_REQUEST", "Invalid JSON body");
  }

  console.error("API Error:", error);

  const message =
    error instanceof Error ? error.message : "An unexpected error occurred";

  return errorResponse("INTERNAL", message);
}
