/**
 * LLM Client Factory
 *
 * Creates LLM clients using Vercel AI SDK v6 with direct provider packages.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMProvider } from '@/config/schema';
import { VercelLLMClient } from './client';
import type { LLMClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface LLMSettings {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  providerName?: string;
}

export function createLLMClient(settings: LLMSettings): LLMClient {
  return new VercelLLMClient(getLanguageModel(settings), settings.provider);
}

function getLanguageModel(settings: LLMSettings): LanguageModelV3 {
  const { provider, model, apiKey, baseUrl } = settings;

  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey });
      return openai(model);
    }

    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey });
      return anthropic(model);
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey });
      return google(model);
    }

    case 'ollama': {
      // Ollama serves the OpenAI chat API under /v1
      const ollama = createOpenAICompatible({
        name: 'ollama',
        baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama'
      });
      return ollama.languageModel(model);
    }

    case 'openai-compatible': {
      if (!baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const compatible = createOpenAICompatible({
        name: settings.providerName ?? 'openai-compatible',
        baseURL: baseUrl,
        apiKey: apiKey ?? '',
        supportsStructuredOutputs: true
      });
      return compatible.languageModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
