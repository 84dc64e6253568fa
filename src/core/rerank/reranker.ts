/**
 * Reranker
 *
 * Second, more precise relevance pass over a small candidate set. Scores
 * each candidate against the original question and keeps the best `topK`.
 */

import type { RelevanceScorer } from '@/providers/rerank/types';
import type { TextUnit } from '../segmentation/types';

export interface RerankOptions {
  abortSignal?: AbortSignal;
}

export class Reranker {
  constructor(private readonly scorer: RelevanceScorer) {}

  /**
   * @returns At most `min(topK, candidates.length)` units, highest score
   * first; equal scores keep candidate order
   */
  async rerank(
    question: string,
    candidates: readonly TextUnit[],
    topK: number,
    options?: RerankOptions
  ): Promise<TextUnit[]> {
    if (topK <= 0 || candidates.length === 0) return [];

    const scores = await this.scorer.score(question, [...candidates], options);
    if (scores.length !== candidates.length) {
      throw new Error(
        `Relevance scorer returned ${scores.length} scores for ${candidates.length} candidates`
      );
    }

    return candidates
      .map((text, position) => ({ text, position, score: scores[position] ?? Number.NEGATIVE_INFINITY }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, topK)
      .map((entry) => entry.text);
  }
}
