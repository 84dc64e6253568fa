import type { RerankProvider } from '@/config/schema';

export type { RerankProvider };

export interface ScoreOptions {
  abortSignal?: AbortSignal;
}

/**
 * Relevance scorer used by the reranker.
 *
 * Only relative order matters: scores are compared with each other, never
 * with a fixed threshold, so each provider may use its own scale.
 */
export interface RelevanceScorer {
  /**
   * Score every document against the query.
   * @returns One score per document, in document order (higher = more relevant)
   */
  score(query: string, documents: string[], options?: ScoreOptions): Promise<number[]>;

  readonly modelId: string;
}
