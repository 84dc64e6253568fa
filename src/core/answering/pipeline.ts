/**
 * Answering Pipeline Orchestrator
 *
 * Answers one question against one document:
 * 1. **ROUTE**: Rule table picks a fixed answer, general knowledge or retrieval
 * 2. **LOOKUP**: Answer cache keyed by (path, document, question)
 * 3. **EXPAND**: Paraphrase the question
 * 4. **GATHER**: Multi-query vector search, deduplicated and capped
 * 5. **RERANK**: Precise relevance pass against the original question
 * 6. **ASSEMBLE**: Join units into the context window
 * 7. **GENERATE**: Answer with retry; cache unless it is a sentinel or
 *    retrieval came back empty
 *
 * Without an index (ingestion timed out) every question is answered from
 * general knowledge on the `fallback` path.
 */

import { type AnswerPath, answerCacheKey } from './cache';
import { assemble, expand, gather, generate, rerank } from './phases';
import { routeQuestion } from './rules';
import type { AnswerResult, AnswerTarget, AnsweringDependencies } from './types';

export async function answerQuestion(
  question: string,
  target: AnswerTarget,
  deps: AnsweringDependencies,
  abortSignal?: AbortSignal
): Promise<AnswerResult> {
  const { config } = deps;

  // Phase 1: ROUTE
  const decision = routeQuestion(question, deps.rules);
  if (decision.route === 'answer') {
    return { answer: decision.answer, path: 'rule', cached: false };
  }

  const { index } = target;
  const path: AnswerPath = !index ? 'fallback' : decision.route === 'general' ? 'general' : 'rag';

  // Phase 2: LOOKUP
  const key = answerCacheKey(question, target.documentKey, path);
  const cached = await deps.cache.get(key);
  if (cached !== undefined) {
    return { answer: cached, path, cached: true };
  }

  let context = '';
  if (path === 'rag' && index) {
    // Phase 3: EXPAND
    const queries = await expand(deps.expander, question, config, abortSignal);

    // Phase 4: GATHER
    const candidates = await gather(index, queries, config, abortSignal);

    // Phase 5: RERANK
    const units = await rerank(deps.reranker, question, candidates, config, abortSignal);

    // Phase 6: ASSEMBLE
    context = assemble(units, config);
  }

  // Phase 7: GENERATE
  const answer = await generate(deps.llmClient, deps.llmConfig, { question, context }, config, abortSignal);

  // A retrieval that found nothing (e.g. the query could not be embedded)
  // answered without the document; keep it out of the rag entry
  if (path !== 'rag' || context) {
    await deps.cache.put(key, answer);
  }

  return { answer, path, cached: false };
}
