/**
 * Relevance Scorer Factory
 */

import type { EmbeddingClient } from '@/providers/embedding/types';
import { CohereRelevanceScorer } from './cohere';
import { EmbeddingRelevanceScorer } from './embedding';
import type { RelevanceScorer, RerankProvider } from './types';

export interface RerankSettings {
  provider: RerankProvider;
  model?: string;
  apiKey?: string;
}

export function createRelevanceScorer(
  settings: RerankSettings,
  embeddingClient: EmbeddingClient
): RelevanceScorer {
  switch (settings.provider) {
    case 'cohere':
      return new CohereRelevanceScorer({ apiKey: settings.apiKey, model: settings.model });

    case 'embedding':
      return new EmbeddingRelevanceScorer(embeddingClient);

    default: {
      const _exhaustive: never = settings.provider;
      throw new Error(`Unknown rerank provider: ${_exhaustive}`);
    }
  }
}
