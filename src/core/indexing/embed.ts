/**
 * Batched embedding with per-batch fallback.
 *
 * The output is always index-aligned with the input: empty texts and texts
 * in a failed batch get a zero vector of the client's dimensionality.
 */

import type { EmbeddingClient } from '@/providers/embedding/types';
import { zeroVector } from '@/providers/embedding/utils';
import { logWarning } from '@/utils/logger';

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_CONCURRENCY = 2;

export interface EmbedTextsOptions {
  /** Texts per provider call (default: 100) */
  batchSize?: number;
  /** Batches in flight at once (default: 2) */
  concurrency?: number;
  abortSignal?: AbortSignal;
}

export async function embedTexts(
  client: EmbeddingClient,
  texts: readonly string[],
  options: EmbedTextsOptions = {}
): Promise<number[][]> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const vectors = texts.map(() => zeroVector(client.dimensions));

  // Positions of embeddable texts, so results can be written back in place
  const positions: number[] = [];
  texts.forEach((text, i) => {
    if (text.trim().length > 0) positions.push(i);
  });

  const batches: number[][] = [];
  for (let i = 0; i < positions.length; i += batchSize) {
    batches.push(positions.slice(i, i + batchSize));
  }

  const embedBatch = async (batchIndex: number): Promise<void> => {
    const batch = batches[batchIndex] ?? [];
    try {
      const embedded = await client.embedBatch(
        batch.map((position) => texts[position] ?? ''),
        { abortSignal: options.abortSignal }
      );
      batch.forEach((position, i) => {
        const vector = embedded[i];
        if (vector) vectors[position] = vector;
      });
    } catch (error) {
      if (options.abortSignal?.aborted) throw error;
      logWarning(
        `Embedding batch ${batchIndex + 1}/${batches.length} failed, using zero vectors for ${batch.length} texts`,
        error
      );
    }
  };

  // Small worker pool: provider rate limits apply per request
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < batches.length) {
      const batchIndex = next;
      next += 1;
      await embedBatch(batchIndex);
    }
  };

  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, () => worker()));

  return vectors;
}
