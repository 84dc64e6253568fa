import type { EmbeddingProvider } from '@/config/schema';

export type { EmbeddingProvider };

export interface EmbedOptions {
  /** Aborts the in-flight provider request */
  abortSignal?: AbortSignal;
}

/**
 * Raw embedding collaborator. One call maps one batch to one provider request;
 * batching across provider limits and failure fallback live in the core embedder.
 */
export interface EmbeddingClient {
  /**
   * Generate embeddings for a batch of texts in a single request.
   * @param texts - Non-empty strings (whitespace-only input is rejected)
   * @returns Vectors in input order, one per text
   */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

  /**
   * Dimensionality of produced vectors.
   * Set from embedding.dimensions in config/quire.json.
   */
  readonly dimensions: number;

  readonly modelId: string;
}
