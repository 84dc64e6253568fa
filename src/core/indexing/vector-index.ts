/**
 * Vector Index
 *
 * Parallel arrays of text units and their embeddings for one document.
 * Built once, never mutated; rebuilding means constructing a new index,
 * so one instance can be shared by concurrent questions.
 */

import { z } from 'zod';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { cosineSimilarity } from '@/providers/embedding/utils';
import type { TextUnit } from '../segmentation/types';
import { embedTexts } from './embed';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScoredUnit {
  text: TextUnit;
  score: number;
  /** Position in the document */
  position: number;
}

export interface BuildOptions {
  /** Content fingerprint of the source document */
  fingerprint: string;
  batchSize?: number;
  abortSignal?: AbortSignal;
}

export interface SearchOptions {
  abortSignal?: AbortSignal;
}

export const SNAPSHOT_VERSION = 1;

const SnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    fingerprint: z.string().min(1),
    modelId: z.string(),
    dimensions: z.number().int().positive(),
    units: z.array(z.string()),
    embeddings: z.array(z.array(z.number()))
  })
  .refine((data) => data.units.length === data.embeddings.length, {
    message: 'units and embeddings must have the same length'
  })
  .refine((data) => data.embeddings.every((vector) => vector.length === data.dimensions), {
    message: 'every embedding must match the declared dimensions'
  });
export type IndexSnapshot = z.infer<typeof SnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Index
// ═══════════════════════════════════════════════════════════════════════════════

export class VectorIndex {
  private constructor(
    readonly fingerprint: string,
    readonly units: readonly TextUnit[],
    readonly embeddings: readonly number[][],
    private readonly embeddingClient: EmbeddingClient
  ) {}

  /**
   * Embed every unit and build an index. Failed embedding batches are
   * stored as zero vectors, so `embeddings.length === units.length` holds.
   */
  static async build(
    units: readonly TextUnit[],
    embeddingClient: EmbeddingClient,
    options: BuildOptions
  ): Promise<VectorIndex> {
    const embeddings = await embedTexts(embeddingClient, units, {
      batchSize: options.batchSize,
      abortSignal: options.abortSignal
    });
    return new VectorIndex(options.fingerprint, [...units], embeddings, embeddingClient);
  }

  /**
   * Restore an index from its serialized snapshot.
   * Returns null when the snapshot is malformed or was built with a
   * different embedding model.
   */
  static fromSnapshot(serialized: string, embeddingClient: EmbeddingClient): VectorIndex | null {
    let data: unknown;
    try {
      data = JSON.parse(serialized);
    } catch {
      return null;
    }

    const result = SnapshotSchema.safeParse(data);
    if (!result.success) return null;

    const snapshot = result.data;
    if (
      snapshot.modelId !== embeddingClient.modelId ||
      snapshot.dimensions !== embeddingClient.dimensions
    ) {
      return null;
    }

    return new VectorIndex(snapshot.fingerprint, snapshot.units, snapshot.embeddings, embeddingClient);
  }

  toSnapshot(): string {
    const snapshot: IndexSnapshot = {
      version: SNAPSHOT_VERSION,
      fingerprint: this.fingerprint,
      modelId: this.embeddingClient.modelId,
      dimensions: this.embeddingClient.dimensions,
      units: [...this.units],
      embeddings: [...this.embeddings]
    };
    return JSON.stringify(snapshot);
  }

  get size(): number {
    return this.units.length;
  }

  /**
   * Embed queries with the index's embedding client, one vector per query.
   */
  async embedQueries(queries: readonly string[], options?: SearchOptions): Promise<number[][]> {
    return embedTexts(this.embeddingClient, queries, { abortSignal: options?.abortSignal });
  }

  /**
   * Top-k units by cosine similarity to a query.
   */
  async search(query: string, topK: number, options?: SearchOptions): Promise<TextUnit[]> {
    const [embedding] = await this.embedQueries([query], options);
    if (!embedding) return [];
    return this.searchByEmbedding(embedding, topK).map((hit) => hit.text);
  }

  /**
   * Top-k units by cosine similarity, highest first; equal scores keep
   * document order.
   */
  searchByEmbedding(queryEmbedding: readonly number[], topK: number): ScoredUnit[] {
    if (topK <= 0) return [];

    const scored = this.units.map((text, position) => ({
      text,
      position,
      score: cosineSimilarity(queryEmbedding, this.embeddings[position] ?? [])
    }));

    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, topK);
  }
}
