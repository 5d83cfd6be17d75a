import { z } from "zod";
import { NextResponse } from "next/server";
import { errorResponse, type ApiError } from "./errors";

/**
 * Validate a handler's payload against its response schema before sending it.
 *
 * A payload that fails its own schema is a server bug: the issues are logged
 * and the client gets an INTERNAL error instead of an off-contract body.
 */
export function validatedResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  options?: { status?: number }
): NextResponse<z.infer<T>> | NextResponse<ApiError> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    console.error("[Response Validation Failed]", {
      issues,
      data: JSON.stringify(data).slice(0, 1000),
    });

    return errorResponse("INTERNAL", "Response failed validation", { issues });
  }

  return NextResponse.json(result.data, { status: options?.status ?? 200 });
}
