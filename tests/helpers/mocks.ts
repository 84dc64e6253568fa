/**
 * Mock Factories for Tests
 *
 * Configurable in-process stand-ins for the embedding, LLM, relevance and
 * document collaborators. Each mock records its calls for assertions.
 */

import type { z } from 'zod';
import { AnswerCache } from '@/core/answering/cache';
import { createConfig } from '@/core/answering/config';
import { compileRules } from '@/core/answering/rules';
import type { AnsweringDependencies } from '@/core/answering/types';
import { QueryExpander } from '@/core/expansion/expander';
import { Reranker } from '@/core/rerank/reranker';
import type { DocumentExtractor, RawBlock } from '@/providers/document/types';
import type { EmbeddingClient } from '@/providers/embedding/types';
import type { CompletionOptions, LLMClient, Message } from '@/providers/llm/types';
import type { RelevanceScorer } from '@/providers/rerank/types';
import { MemoryBlobStore } from '@/providers/store/memory';
import type { BlobStore } from '@/providers/store/types';
import { KEYWORDS, keywordVector } from './fixtures';

// ═══════════════════════════════════════════════════════════════════════════════
// Embedding Client Mock
// ═══════════════════════════════════════════════════════════════════════════════

export interface MockEmbeddingClientConfig {
  /** Embedding dimensions (default: one per fixture keyword) */
  dimensions?: number;
  /** Embedding for one text (default: keyword counts) */
  embed?: (text: string) => number[];
  /** Fail the call with this zero-based index */
  failOnCall?: (callIndex: number, texts: string[]) => boolean;
}

export interface MockEmbeddingClient extends EmbeddingClient {
  /** Texts of every embedBatch call, in call order */
  calls: string[][];
}

export function createMockEmbeddingClient(
  config: MockEmbeddingClientConfig = {}
): MockEmbeddingClient {
  const dimensions = config.dimensions ?? KEYWORDS.length;
  const embed = config.embed ?? keywordVector;
  const calls: string[][] = [];

  return {
    dimensions,
    modelId: 'mock-embedding-model',
    calls,

    embedBatch: async (texts) => {
      const callIndex = calls.length;
      calls.push([...texts]);
      if (config.failOnCall?.(callIndex, texts)) {
        throw new Error('embedding provider unavailable');
      }
      return texts.map(embed);
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// LLM Client Mock
// ═══════════════════════════════════════════════════════════════════════════════

export interface MockLLMClientConfig {
  /** Paraphrases returned by the expansion agent */
  expansions?: string[];
  /** Make every expansion call fail */
  expansionError?: Error;
  /** Answer for complete calls, or a function of the messages */
  answer?: string | ((messages: Message[]) => string);
  /** Number of leading complete calls that throw */
  failures?: number;
  /** Resolve complete calls only when aborted (simulates a hung request) */
  hang?: boolean;
}

export interface MockLLMClient extends LLMClient {
  /** Messages of every complete call */
  completeCalls: Message[][];
  /** Messages of every completeJSON call */
  jsonCalls: Message[][];
}

export function createMockLLMClient(config: MockLLMClientConfig = {}): MockLLMClient {
  const completeCalls: Message[][] = [];
  const jsonCalls: Message[][] = [];
  let failuresLeft = config.failures ?? 0;

  return {
    modelId: 'mock-llm-model',
    completeCalls,
    jsonCalls,

    complete: async (messages: Message[], options?: CompletionOptions) => {
      completeCalls.push(messages);

      if (config.hang) {
        return new Promise<string>((_, reject) => {
          options?.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }
      if (failuresLeft > 0) {
        failuresLeft--;
        throw new Error('rate limited');
      }

      const answer = config.answer ?? 'Mock answer';
      return typeof answer === 'string' ? answer : answer(messages);
    },

    completeJSON: async <T>(messages: Message[], schema: z.ZodType<T>) => {
      jsonCalls.push(messages);
      if (config.expansionError) throw config.expansionError;
      return schema.parse({ questions: config.expansions ?? [] });
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Relevance Scorer Mock
// ═══════════════════════════════════════════════════════════════════════════════

export interface MockRelevanceScorer extends RelevanceScorer {
  calls: { query: string; documents: string[] }[];
}

/**
 * Scores a document by how many of the query's words it contains,
 * unless a scoring function is given.
 */
export function createMockRelevanceScorer(
  score?: (query: string, document: string) => number
): MockRelevanceScorer {
  const calls: { query: string; documents: string[] }[] = [];
  const scoreOne =
    score ??
    ((query: string, document: string) => {
      const words = new Set(query.toLowerCase().match(/[a-z]+/g) ?? []);
      const docWords = document.toLowerCase().match(/[a-z]+/g) ?? [];
      return docWords.filter((word) => words.has(word)).length;
    });

  return {
    modelId: 'mock-rerank-model',
    calls,
    score: async (query, documents) => {
      calls.push({ query, documents });
      return documents.map((document) => scoreOne(query, document));
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Document Extractor Mock
// ═══════════════════════════════════════════════════════════════════════════════

export interface MockExtractorConfig {
  /** Blocks per URL; unknown URLs fail */
  documents: Record<string, RawBlock[]>;
  /** Delay before returning blocks */
  delayMs?: number;
}

export function createMockExtractor(config: MockExtractorConfig): DocumentExtractor & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    extract: async (url) => {
      calls.push(url);
      if (config.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, config.delayMs));
      }
      const blocks = config.documents[url];
      if (!blocks) throw new Error(`not found: ${url}`);
      return blocks;
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stores
// ═══════════════════════════════════════════════════════════════════════════════

export function createMemoryStore(): MemoryBlobStore {
  return new MemoryBlobStore({ maxEntries: 1000, ttlMs: 60_000 });
}

/** Store whose every operation fails */
export function createFailingStore(): BlobStore {
  return {
    get: async () => {
      throw new Error('store offline');
    },
    put: async () => {
      throw new Error('store offline');
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Answering Dependencies
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestAnsweringSetup {
  deps: AnsweringDependencies;
  llmClient: MockLLMClient;
  scorer: MockRelevanceScorer;
  store: BlobStore;
}

/**
 * Answering dependencies wired from mocks, with default rules and no
 * backoff between generation attempts.
 */
export function createTestAnswering(
  llmConfig: MockLLMClientConfig = {},
  store: BlobStore = createMemoryStore()
): TestAnsweringSetup {
  const llmClient = createMockLLMClient(llmConfig);
  const scorer = createMockRelevanceScorer();
  const operation = { model: 'mock-llm-model', temperature: 0 };

  const deps: AnsweringDependencies = {
    llmClient,
    llmConfig: operation,
    expander: new QueryExpander(llmClient, operation, store),
    reranker: new Reranker(scorer),
    cache: new AnswerCache(store),
    rules: compileRules(),
    config: createConfig({ generate: { backoffMs: 0, jitterMs: 0 } })
  };

  return { deps, llmClient, scorer, store };
}
