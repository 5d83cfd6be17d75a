import { NextRequest } from "next/server";
import { z } from "zod";
import { assessFood } from "@/lib/data/foods";
import { handleError } from "@/lib/errors";
import { validatedResponse } from "@/lib/validate-response";
import { SafetyAssessmentSchema } from "@/types/nutrition";

const SafetyQuerySchema = z.object({
  name: z.string().min(1),
  serving: z.string().optional(),
});

export async function GET(request: NextRequest) {
  try {
    const searchParams = request.nextUrl.searchParams;
    const { name, serving } = SafetyQuerySchema.parse({
      name: searchParams.get("name") ?? undefined,
      serving: searchParams.get("serving") ?? undefined,
    });

    const assessment = await assessFood(name, serving);
    return validatedResponse(SafetyAssessmentSchema, assessment);
  } catch (error) {
    return handleError(error);
  }
}
