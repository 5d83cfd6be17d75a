import { NextRequest } from "next/server";
import { resolveFood } from "@/lib/data/foods";
import { handleError } from "@/lib/errors";
import { validatedResponse } from "@/lib/validate-response";
import { ResolveRequestSchema, ResolveResponseSchema } from "@/types/nutrition";

export async function POST(request: NextRequest) {
  try {
    const body: unknown = await request.json();
    const { query, topK, offset } = ResolveRequestSchema.parse(body);

    const result = await resolveFood(query, topK, offset);
    return validatedResponse(ResolveResponseSchema, result);
  } catch (error) {
    return handleError(error);
  }
}
