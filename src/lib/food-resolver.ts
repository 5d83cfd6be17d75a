/**
 * Food Name Resolver
 *
 * Maps free-text queries onto canonical food names:
 *   1. Exact match on the normalized query (no search at all)
 *   2. Embedding mode: cosine similarity against a corpus embedded once at
 *      construction, partial top-k selection, offset paging
 *   3. Substring mode: used when no embedding provider is available;
 *      score = query length / name length over names containing the query
 *
 * The mode is settled once, in `create()`, and never probed again.
 */

import { normalizeFoodName } from "./canonicalize";
import { dot, embedInBatches, l2Normalize, type EmbeddingProvider } from "./embeddings";
import { CandidatePageSchema, DEFAULT_TOP_K } from "./paging";
import { selectTopK } from "./top-k";
import type { Candidate, ResolverMode } from "@/types/nutrition";

export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

export interface FoodNameResolverOptions {
  batchSize?: number;
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export class FoodNameResolver {
  readonly mode: ResolverMode;
  private readonly names: readonly string[];
  private readonly byNormalized: ReadonlyMap<string, string>;
  private readonly provider: EmbeddingProvider | null;
  private readonly vectors: readonly (readonly number[])[] | null;

  private constructor(
    names: readonly string[],
    provider: EmbeddingProvider | null,
    vectors: readonly (readonly number[])[] | null
  ) {
    this.names = names;
    this.byNormalized = new Map(names.map((name) => [normalizeFoodName(name), name]));
    this.provider = vectors ? provider : null;
    this.vectors = vectors;
    this.mode = vectors ? "embedding" : "substring";
  }

  /**
   * Build a resolver over `names`. With a provider, every name is embedded
   * (batched) and unit-normalized up front; if that fails, or there is no
   * provider, the resolver falls back to substring matching.
   */
  static async create(
    names: readonly string[],
    provider: EmbeddingProvider | null,
    options: FoodNameResolverOptions = {}
  ): Promise<FoodNameResolver> {
    const corpus = [...names];
    if (!provider) {
      console.warn("[FoodNameResolver] No embedding provider configured; using substring matching");
      return new FoodNameResolver(corpus, null, null);
    }

    const batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
    try {
      const raw = await embedInBatches(provider, corpus, batchSize);
      const dimension = raw[0]?.length ?? 0;
      if (raw.some((vector) => vector.length !== dimension)) {
        throw new Error("Corpus embeddings have inconsistent dimensions");
      }
      console.log(`[FoodNameResolver] Embedded ${corpus.length} foods with ${provider.model}`);
      return new FoodNameResolver(corpus, provider, raw.map(l2Normalize));
    } catch (error) {
      console.warn(
        "[FoodNameResolver] Embedding provider unavailable; using substring matching:",
        error instanceof Error ? error.message : error
      );
      return new FoodNameResolver(corpus, null, null);
    }
  }

  get size(): number {
    return this.names.length;
  }

  /** The corpus name the normalized query equals, or null. */
  resolveExact(query: string): string | null {
    return this.byNormalized.get(normalizeFoodName(query)) ?? null;
  }

  /**
   * Ranked candidates for an ambiguous query, best first, sliced to
   * `[offset, offset + topK)`. An empty array means nothing similar.
   */
  async findCandidates(
    query: string,
    topK: number = DEFAULT_TOP_K,
    offset = 0
  ): Promise<Candidate[]> {
    const page = CandidatePageSchema.parse({ topK, offset });
    const normalized = normalizeFoodName(query);
    if (!normalized) return [];

    if (this.provider && this.vectors) {
      try {
        return await this.embeddingCandidates(this.provider, this.vectors, normalized, page.topK, page.offset);
      } catch (error) {
        console.warn(
          "[FoodNameResolver] Query embedding failed; answering from substring matches:",
          error instanceof Error ? error.message : error
        );
      }
    }
    return this.substringCandidates(normalized, page.topK, page.offset);
  }

  private async embeddingCandidates(
    provider: EmbeddingProvider,
    vectors: readonly (readonly number[])[],
    query: string,
    topK: number,
    offset: number
  ): Promise<Candidate[]> {
    const [embedded] = await provider.embed([query]);
    if (!embedded) {
      throw new Error("Provider returned no vector for the query");
    }
    const queryVector = l2Normalize(embedded);

    const similarities = new Float64Array(vectors.length);
    for (let i = 0; i < vectors.length; i++) {
      similarities[i] = dot(vectors[i], queryVector);
    }

    return selectTopK(similarities, topK + offset)
      .slice(offset, offset + topK)
      .map(({ index, score }) => ({ name: this.names[index], score: clampScore(score) }));
  }

  // `query` is already normalized, so inner whitespace runs count as one character
  private substringCandidates(query: string, topK: number, offset: number): Candidate[] {
    const scores = this.names.map((name) => {
      const lower = name.toLowerCase();
      return lower.includes(query) ? query.length / lower.length : Number.NaN;
    });
    const matches = scores.filter((score) => !Number.isNaN(score)).length;

    return selectTopK(scores, Math.min(matches, topK + offset))
      .slice(offset, offset + topK)
      .map(({ index, score }) => ({ name: this.names[index], score: clampScore(score) }));
  }
}
