import type { JSONValue } from '@ai-sdk/provider';
import type { z } from 'zod';
import type { LLMProvider } from '@/config/schema';

export type { LLMProvider };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * If not provided, the provider's API defaults apply.
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature (0-2 for most providers) */
  temperature?: number;
  /** SDK-level retries for transient API errors (default: 0, callers own retry policy) */
  maxRetries?: number;
  /** Provider-specific options (e.g., reasoning_effort) */
  options?: Record<string, JSONValue>;
  /** Cancels the request when the owning task is abandoned */
  abortSignal?: AbortSignal;
}

export interface LLMClient {
  /**
   * Generate a completion from the LLM.
   * @returns The assistant's response content as a string
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /**
   * Generate a structured completion, validated against a Zod schema.
   * Uses native structured output when the provider supports it and falls
   * back to prompt-based JSON extraction otherwise.
   */
  completeJSON<T>(messages: Message[], schema: z.ZodType<T>, options?: CompletionOptions): Promise<T>;

  readonly modelId: string;
}
