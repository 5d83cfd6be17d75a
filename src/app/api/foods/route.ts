import { NextRequest } from "next/server";
import { z } from "zod";
import { listFoods } from "@/lib/data/foods";
import { handleError } from "@/lib/errors";
import { PagingSchema, createPaginatedResponseSchema } from "@/lib/paging";
import { validatedResponse } from "@/lib/validate-response";
import { FoodNameItemSchema } from "@/types/nutrition";

const FoodsResponseSchema = createPaginatedResponseSchema(FoodNameItemSchema);

const FoodsQuerySchema = z
  .object({
    q: z.string().optional(),
  })
  .merge(PagingSchema);

export async function GET(request: NextRequest) {
  try {
    const searchParams = request.nextUrl.searchParams;
    const params = FoodsQuerySchema.parse({
      q: searchParams.get("q") ?? undefined,
      page: searchParams.get("page") ?? undefined,
      pageSize: searchParams.get("pageSize") ?? undefined,
    });

    const result = await listFoods(params);
    return validatedResponse(FoodsResponseSchema, result);
  } catch (error) {
    return handleError(error);
  }
}
