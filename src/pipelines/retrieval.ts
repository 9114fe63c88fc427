import type { RetryPolicy } from "../config/env.js";
import { InvalidQueryError, describeError } from "../domain/errors.js";
import type { KnowledgeBase } from "../domain/knowledgeBase.js";
import type { ScoredChunk } from "../domain/types.js";
import type { AiClient } from "../infra/ai/types.js";
import { withRetry } from "../utils/retry.js";

export interface RetrieverOptions {
  defaultTopK: number;
  minSimilarity: number | null;
  retry: RetryPolicy;
}

export class Retriever {
  constructor(
    private readonly knowledgeBase: KnowledgeBase,
    private readonly aiClient: AiClient,
    private readonly options: RetrieverOptions,
  ) {}

  /**
   * Returns at most `k` chunks, most similar first. An empty collection, or
   * one where nothing clears the similarity floor, yields an empty list.
   */
  async retrieve(queryText: string, k?: number): Promise<ScoredChunk[]> {
    const topK = resolveTopK(k, this.options.defaultTopK);
    const query = queryText.trim();
    if (!query) {
      throw new InvalidQueryError("Question must not be empty.");
    }

    const onRetry = ({ attempt, error }: { attempt: number; error: unknown }) => {
      console.warn(`Retrieval retry after attempt ${attempt}: ${describeError(error)}`);
    };

    const vector = await withRetry(() => this.aiClient.embedQuery(query), this.options.retry, {
      onRetry,
    });
    const hits = await withRetry(
      () =>
        this.knowledgeBase.search({
          vector,
          topK,
          minScore: this.options.minSimilarity,
        }),
      this.options.retry,
      { onRetry },
    );

    return [...hits].sort((a, b) => b.score - a.score).slice(0, topK);
  }
}

export function resolveTopK(k: number | undefined, fallback: number): number {
  if (k === undefined) {
    return fallback;
  }
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidQueryError(`k must be a positive integer, got ${k}.`);
  }
  return k;
}
