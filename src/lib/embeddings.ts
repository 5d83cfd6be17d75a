/**
 * Text embeddings for food-name similarity.
 *
 * The model is a fixed black box: a list of strings in, one fixed-length
 * vector per string out. `HttpEmbeddingProvider` talks to any endpoint that
 * speaks the OpenAI `/embeddings` request/response shape.
 */

import { z } from "zod";

export interface EmbeddingProvider {
  /** Model identifier, for logs. */
  readonly model: string;
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

// ---------------------------------------------------------------------------
// HTTP provider
// ---------------------------------------------------------------------------

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

export interface HttpEmbeddingOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEmbeddingOptions, fetchImpl: typeof fetch = fetch) {
    this.model = options.model;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/embeddings`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = fetchImpl;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({ model: this.model, input: texts }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Embedding request failed: ${response.status} ${response.statusText}`);
    }

    const { data } = EmbeddingResponseSchema.parse(await response.json());
    if (data.length !== texts.length) {
      throw new Error(`Embedding response has ${data.length} vectors for ${texts.length} inputs`);
    }

    return [...data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

// ---------------------------------------------------------------------------
// Vector helpers
// ---------------------------------------------------------------------------

/** Scale to unit length. A zero vector stays zero (similarity 0 to everything). */
export function l2Normalize(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const x of vector) sumSquares += x * x;
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return vector.map(() => 0);
  return vector.map((x) => x / norm);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Embed `texts` in consecutive batches of `batchSize`, preserving order.
 */
export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: readonly string[],
  batchSize: number
): Promise<number[][]> {
  const vectors: number[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    const embedded = await provider.embed(batch);
    if (embedded.length !== batch.length) {
      throw new Error(`Provider returned ${embedded.length} vectors for ${batch.length} texts`);
    }
    vectors.push(...embedded);
  }
  return vectors;
}
