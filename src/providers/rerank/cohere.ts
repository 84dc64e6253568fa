/**
 * Cross-encoder scoring through the AI SDK rerank API.
 */

import { createCohere } from '@ai-sdk/cohere';
import { rerank } from 'ai';
import type { RelevanceScorer, ScoreOptions } from './types';

const DEFAULT_COHERE_RERANK_MODEL = 'rerank-v3.5';

export class CohereRelevanceScorer implements RelevanceScorer {
  readonly modelId: string;
  private readonly cohere: ReturnType<typeof createCohere>;

  constructor(options: { apiKey?: string; model?: string }) {
    this.modelId = options.model ?? DEFAULT_COHERE_RERANK_MODEL;
    this.cohere = createCohere({ apiKey: options.apiKey });
  }

  async score(query: string, documents: string[], options?: ScoreOptions): Promise<number[]> {
    if (documents.length === 0) return [];

    const { ranking } = await rerank({
      model: this.cohere.reranking(this.modelId),
      query,
      documents,
      topN: documents.length,
      maxRetries: 0,
      abortSignal: options?.abortSignal
    });

    // The API returns only ranked entries; anything missing scores lowest
    const scores = new Array<number>(documents.length).fill(Number.NEGATIVE_INFINITY);
    for (const entry of ranking) {
      scores[entry.originalIndex] = entry.score;
    }
    return scores;
  }
}
