/**
 * Agent definitions and execution.
 */

import type { z } from 'zod';
import type { LLMOperationConfig } from '@/config/schema';
import type { LLMClient, Message } from '@/providers/llm/types';

/**
 * Agent definition for LLM-powered structured generation.
 *
 * @template I - Input type for formatInput
 * @template O - Output type validated by outputSchema
 */
export interface Agent<I, O> {
  /** System prompt with IDENTITY, STEPS, OUTPUT sections */
  systemPrompt: string;
  /** Zod schema for validating and parsing LLM output */
  outputSchema: z.ZodType<O>;
  /** Transforms structured input into the user message content */
  formatInput: (input: I) => string;
}

/**
 * Call an agent with retry logic.
 *
 * @returns The validated output from the agent
 */
export async function callAgent<I, O>(
  agent: Agent<I, O>,
  input: I,
  llmClient: LLMClient,
  config: LLMOperationConfig,
  abortSignal?: AbortSignal
): Promise<O> {
  const maxRetries = config.maxRetries ?? 0;

  const messages: Message[] = [
    { role: 'system', content: agent.systemPrompt },
    { role: 'user', content: agent.formatInput(input) }
  ];

  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await llmClient.completeJSON(messages, agent.outputSchema, {
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        options: config.options,
        abortSignal
      });
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (abortSignal?.aborted) break;
    }
  }

  throw new Error(`Agent failed after ${maxRetries + 1} attempts: ${lastError?.message}`);
}
