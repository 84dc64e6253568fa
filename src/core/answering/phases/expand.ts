/**
 * EXPAND Phase
 *
 * Paraphrase the question and keep the leading queries for retrieval.
 * The expander never fails: on error it yields the original question only.
 */

import type { QueryExpander } from '../../expansion/expander';
import type { AnsweringConfig } from '../config';

export async function expand(
  expander: QueryExpander,
  question: string,
  config: AnsweringConfig,
  abortSignal?: AbortSignal
): Promise<string[]> {
  const queries = await expander.expand(question, { abortSignal });
  return queries.slice(0, Math.max(1, config.expand.queries));
}
