/**
 * Shared Client Initialization
 *
 * Lazy initialization of the provider clients and the document service.
 * Everything is created once, on first use.
 */

import { getConfig } from '@/config/config';
import type { Config } from '@/config/schema';
import {
  AnswerCache,
  compileRules,
  createConfig,
  createSegmenter,
  DEFAULT_RULES,
  DocumentService,
  QueryExpander,
  Reranker
} from '@/core';
import { HttpDocumentExtractor } from '@/providers/document';
import { createEmbeddingClient } from '@/providers/embedding/factory';
import { createLLMClient } from '@/providers/llm/factory';
import { createRelevanceScorer } from '@/providers/rerank/factory';
import { type BlobStore, FileBlobStore, MemoryBlobStore } from '@/providers/store';

/**
 * Shared clients used by the HTTP endpoints.
 */
export interface Clients {
  documentService: DocumentService;
}

/** Cached clients instance */
let clients: Clients | null = null;

/**
 * Get initialized clients.
 */
export async function getClients(): Promise<Clients> {
  if (!clients) {
    clients = initializeClients(getConfig());
  }
  return clients;
}

/**
 * Build every client from config.
 */
export function initializeClients(config: Config): Clients {
  const embeddingClient = createEmbeddingClient({
    provider: config.embedding.provider,
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    apiKey: config.embedding.apiKey,
    baseUrl: config.embedding.baseUrl,
    providerName: config.embedding.providerName
  });

  const llmSettings = {
    provider: config.llm.provider,
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    providerName: config.llm.providerName
  };
  const llmClient = createLLMClient({ ...llmSettings, model: config.llm.answering.model });
  const expansionClient =
    config.llm.expansion.model === config.llm.answering.model
      ? llmClient
      : createLLMClient({ ...llmSettings, model: config.llm.expansion.model });

  const scorer = createRelevanceScorer(config.rerank, embeddingClient);

  // Answers and expansions share one store; indices persist only on disk
  const ttlMs = config.cache.ttlSeconds * 1000;
  const directory = config.cache.directory;
  const answerStore: BlobStore = directory
    ? new FileBlobStore({ directory, ttlMs })
    : new MemoryBlobStore({ maxEntries: config.cache.maxEntries, ttlMs });
  const indexStore = directory ? new FileBlobStore({ directory, ttlMs }) : null;

  // Generation retries its own attempts; maxRetries sets how many follow the first
  const answeringConfig =
    config.llm.answering.maxRetries === undefined
      ? createConfig()
      : createConfig({ generate: { maxAttempts: config.llm.answering.maxRetries + 1 } });
  const documentService = new DocumentService(
    {
      extractor: new HttpDocumentExtractor(config.deadlines.fetchMs),
      segmenter: createSegmenter(
        { ...config.segmentation, batchSize: config.embedding.batchSize },
        embeddingClient
      ),
      embeddingClient,
      indexStore,
      answering: {
        llmClient,
        llmConfig: config.llm.answering,
        expander: new QueryExpander(expansionClient, config.llm.expansion, answerStore, {
          count: answeringConfig.expand.paraphrases
        }),
        reranker: new Reranker(scorer),
        cache: new AnswerCache(answerStore),
        rules: compileRules(config.routing.rules ?? DEFAULT_RULES),
        config: answeringConfig
      }
    },
    {
      totalMs: config.deadlines.totalMs,
      ingestionMs: config.deadlines.ingestionMs,
      maxDocuments: config.cache.maxDocuments,
      batchSize: config.embedding.batchSize
    }
  );

  return { documentService };
}
