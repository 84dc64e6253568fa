/**
 * RERANK Phase
 *
 * Score candidates against the original question (never the paraphrases).
 * If the scorer fails, the candidates keep their retrieval order.
 */

import { logWarning } from '@/utils/logger';
import type { Reranker } from '../../rerank/reranker';
import type { TextUnit } from '../../segmentation/types';
import type { AnsweringConfig } from '../config';

export async function rerank(
  reranker: Reranker,
  question: string,
  candidates: readonly TextUnit[],
  config: AnsweringConfig,
  abortSignal?: AbortSignal
): Promise<TextUnit[]> {
  const { topK } = config.rerank;

  try {
    return await reranker.rerank(question, candidates, topK, { abortSignal });
  } catch (error) {
    if (abortSignal?.aborted) throw error;
    logWarning('Rerank failed, keeping retrieval order', error);
    return candidates.slice(0, Math.max(0, topK));
  }
}
