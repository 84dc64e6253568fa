/**
 * Bi-encoder scoring: cosine similarity between the query embedding and
 * each document embedding. Needs no service beyond the embedding provider.
 */

import type { EmbeddingClient } from '@/providers/embedding/types';
import { cosineSimilarity } from '@/providers/embedding/utils';
import type { RelevanceScorer, ScoreOptions } from './types';

export class EmbeddingRelevanceScorer implements RelevanceScorer {
  readonly modelId: string;

  constructor(private readonly embeddingClient: EmbeddingClient) {
    this.modelId = embeddingClient.modelId;
  }

  async score(query: string, documents: string[], options?: ScoreOptions): Promise<number[]> {
    if (documents.length === 0) return [];

    const [queryVector, ...documentVectors] = await this.embeddingClient.embedBatch(
      [query, ...documents],
      options
    );
    if (!queryVector) {
      throw new Error('Embedding provider returned no query vector');
    }

    return documentVectors.map((vector) => cosineSimilarity(queryVector, vector));
  }
}
