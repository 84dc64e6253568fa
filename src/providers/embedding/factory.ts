/**
 * Embedding Client Factory
 *
 * Creates embedding clients using Vercel AI SDK v6 with direct provider packages.
 */

import { createCohere } from '@ai-sdk/cohere';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { EmbeddingProvider } from '@/config/schema';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface EmbeddingSettings {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
  apiKey?: string;
  baseUrl?: string;
  providerName?: string;
}

export function createEmbeddingClient(settings: EmbeddingSettings): EmbeddingClient {
  return new VercelEmbeddingClient(getEmbeddingModel(settings), settings.dimensions);
}

function getEmbeddingModel(settings: EmbeddingSettings): EmbeddingModelV3 {
  const { provider, model, dimensions, apiKey, baseUrl } = settings;

  switch (provider) {
    case 'openai': {
      // text-embedding-3-* can be shortened server-side
      const openai = createOpenAI({ apiKey });
      return withProviderDefaults(openai.embedding(model), 'openai', { dimensions });
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey });
      return withProviderDefaults(google.embedding(model), 'google', {
        outputDimensionality: dimensions
      });
    }

    case 'cohere': {
      const cohere = createCohere({ apiKey });
      return cohere.embedding(model);
    }

    case 'mistral': {
      const mistral = createMistral({ apiKey });
      return mistral.embedding(model);
    }

    case 'ollama': {
      const ollama = createOpenAICompatible({
        name: 'ollama',
        baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama'
      });
      return ollama.embeddingModel(model);
    }

    case 'openai-compatible': {
      if (!baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const compatible = createOpenAICompatible({
        name: settings.providerName ?? 'openai-compatible',
        baseURL: baseUrl,
        apiKey: apiKey ?? ''
      });
      return compatible.embeddingModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown embedding provider: ${_exhaustive}`);
    }
  }
}

/**
 * Bake provider options into the model once instead of passing them per call.
 */
function withProviderDefaults(
  model: EmbeddingModelV3,
  providerKey: string,
  providerOptions: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: {
        providerOptions: {
          [providerKey]: providerOptions
        }
      }
    })
  });
}
