/**
 * GENERATE Phase
 *
 * Answer the question from the assembled context. Failed attempts are
 * retried with exponential backoff; when every attempt fails the failure
 * sentinel is returned instead of throwing.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { LLMOperationConfig } from '@/config/schema';
import type { LLMClient } from '@/providers/llm/types';
import { logWarning, truncate } from '@/utils/logger';
import type { AnsweringConfig } from '../config';
import { GENERATION_FAILED_ANSWER } from '../errors';
import { buildAnswerMessages } from '../prompts';

export interface GenerateInput {
  question: string;
  /** Empty for general-knowledge answers */
  context: string;
}

/**
 * Delay before retrying after the given (zero-based) failed attempt.
 */
export function backoffDelay(attempt: number, config: AnsweringConfig): number {
  const { backoffMs, jitterMs } = config.generate;
  return backoffMs * 2 ** attempt + Math.random() * jitterMs;
}

export async function generate(
  llmClient: LLMClient,
  llmConfig: LLMOperationConfig,
  input: GenerateInput,
  config: AnsweringConfig,
  abortSignal?: AbortSignal
): Promise<string> {
  const { maxAttempts } = config.generate;
  const messages = buildAnswerMessages(input.question, input.context);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const answer = await llmClient.complete(messages, {
        maxTokens: llmConfig.maxTokens,
        temperature: llmConfig.temperature,
        maxRetries: 0,
        options: llmConfig.options,
        abortSignal
      });
      if (answer) return answer;
      throw new Error('Model returned an empty answer');
    } catch (error) {
      if (abortSignal?.aborted) throw error;
      logWarning(
        `Generation attempt ${attempt + 1}/${maxAttempts} failed for "${truncate(input.question, 40)}"`,
        error
      );
      if (attempt < maxAttempts - 1) {
        await sleep(backoffDelay(attempt, config), undefined, { signal: abortSignal });
      }
    }
  }

  return GENERATION_FAILED_ANSWER;
}
