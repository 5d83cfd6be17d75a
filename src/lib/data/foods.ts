import { normalizeFoodName } from "@/lib/canonicalize";
import { getRuntime } from "@/lib/glycemic";
import { getOffset, paginate, type PaginatedResponse } from "@/lib/paging";
import type { FoodNameItem, ResolveResponse, SafetyAssessment } from "@/types/nutrition";

export interface FoodListParams {
  q?: string;
  page?: number;
  pageSize?: number;
}

/**
 * Canonical names in load order, optionally filtered to those containing
 * the normalized `q`.
 */
export async function listFoods(
  params: FoodListParams
): Promise<PaginatedResponse<FoodNameItem>> {
  const { q, page = 1, pageSize = 25 } = params;
  const { store } = await getRuntime();

  const needle = q ? normalizeFoodName(q) : "";
  const names = needle
    ? store.listNames().filter((name) => name.includes(needle))
    : store.listNames();

  const offset = getOffset(page, pageSize);
  const items = names.slice(offset, offset + pageSize).map((name) => ({ name }));
  return paginate(items, names.length, page, pageSize);
}

/**
 * Exact match first; only an ambiguous query is searched.
 */
export async function resolveFood(
  query: string,
  topK?: number,
  offset?: number
): Promise<ResolveResponse> {
  const { resolver } = await getRuntime();

  const exact = resolver.resolveExact(query);
  if (exact !== null) {
    return { query, exact, mode: resolver.mode, candidates: [] };
  }

  const candidates = await resolver.findCandidates(query, topK, offset);
  return { query, exact: null, mode: resolver.mode, candidates };
}

export async function assessFood(name: string, serving?: string): Promise<SafetyAssessment> {
  const { engine } = await getRuntime();
  return engine.evaluateFood(name, serving);
}
