/**
 * Vercel AI SDK v6 Embedding Client
 *
 * Wraps embedMany. Retries are left to the caller so that a failed batch
 * surfaces immediately and can be replaced by placeholder vectors.
 */

import type { EmbeddingModel } from 'ai';
import { embedMany } from 'ai';
import type { EmbedOptions, EmbeddingClient } from './types';

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;
  readonly dimensions: number;

  constructor(
    private model: EmbeddingModel,
    dimensions: number
  ) {
    this.modelId = typeof model === 'string' ? model : model.modelId;
    this.dimensions = dimensions;
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    for (const text of texts) {
      if (!text.trim()) {
        throw new Error('Cannot embed empty or whitespace-only text');
      }
    }

    const { embeddings } = await embedMany({
      model: this.model,
      values: texts,
      maxRetries: 0,
      abortSignal: options?.abortSignal
    });

    if (embeddings.length !== texts.length) {
      throw new Error(
        `Embedding provider returned ${embeddings.length} vectors for ${texts.length} texts`
      );
    }

    return embeddings;
  }
}
