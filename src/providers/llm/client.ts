/**
 * Vercel AI SDK v6 LLM Client
 *
 * Wraps generateText for internal Core use. No streaming: answers and
 * expansions are consumed whole.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { z } from 'zod';
import { generateStructured } from './structured';
import type { CompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  constructor(
    private model: LanguageModelV3,
    private readonly provider: string
  ) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      messages,
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      maxRetries: options?.maxRetries ?? 0,
      abortSignal: options?.abortSignal,
      providerOptions: options?.options ? { [this.provider]: options.options } : undefined
    });

    return text.trim();
  }

  async completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T> {
    return generateStructured(this.model, this.provider, messages, schema, options);
  }
}
