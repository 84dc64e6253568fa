/**
 * GATHER Phase
 *
 * Search the index once per query and union the hits:
 * 1. Embed all queries in one batch
 * 2. Take the top-k units for each query that was embedded
 * 3. Deduplicate by exact text, first occurrence wins (query order, then rank)
 * 4. Cap the union to bound reranking cost
 */

import type { VectorIndex } from '../../indexing/vector-index';
import type { TextUnit } from '../../segmentation/types';
import type { AnsweringConfig } from '../config';

export async function gather(
  index: VectorIndex,
  queries: readonly string[],
  config: AnsweringConfig,
  abortSignal?: AbortSignal
): Promise<TextUnit[]> {
  const { topK, maxCandidates } = config.gather;
  const embeddings = await index.embedQueries(queries, { abortSignal });

  const seen = new Set<TextUnit>();
  const candidates: TextUnit[] = [];

  for (const embedding of embeddings) {
    // A query that could not be embedded ranks nothing
    if (embedding.every((value) => value === 0)) continue;

    for (const hit of index.searchByEmbedding(embedding, topK)) {
      if (seen.has(hit.text)) continue;
      seen.add(hit.text);
      candidates.push(hit.text);
    }
  }

  return candidates.slice(0, maxCandidates);
}
