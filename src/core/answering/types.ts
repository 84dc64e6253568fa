/**
 * Answering Pipeline Types
 */

import type { LLMOperationConfig } from '@/config/schema';
import type { LLMClient } from '@/providers/llm/types';
import type { QueryExpander } from '../expansion/expander';
import type { VectorIndex } from '../indexing/vector-index';
import type { Reranker } from '../rerank/reranker';
import type { AnswerCache, AnswerPath } from './cache';
import type { AnsweringConfig } from './config';
import type { RoutingRule } from './rules';

/**
 * Dependencies shared by every question of every request.
 */
export interface AnsweringDependencies {
  llmClient: LLMClient;
  /** LLM settings for answer generation (config.llm.answering) */
  llmConfig: LLMOperationConfig;
  expander: QueryExpander;
  reranker: Reranker;
  cache: AnswerCache;
  rules: RoutingRule[];
  config: AnsweringConfig;
}

/**
 * What a question is answered against.
 */
export interface AnswerTarget {
  /** Content fingerprint, or a URL-derived key when the content is unknown */
  documentKey: string;
  /** Null when ingestion timed out: every question takes the fallback path */
  index: VectorIndex | null;
}

export interface AnswerResult {
  answer: string;
  /** Path that produced the answer; 'rule' for fixed rule answers */
  path: AnswerPath | 'rule';
  cached: boolean;
}
