/**
 * Query Expander
 *
 * Expands one question into itself plus a few paraphrases. Results are
 * cached by question text alone, so they are shared across documents.
 * Any failure falls back to `[question]`, which is not cached.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { LLMOperationConfig } from '@/config/schema';
import type { LLMClient } from '@/providers/llm/types';
import type { BlobStore } from '@/providers/store/types';
import { logWarning } from '@/utils/logger';
import { callAgent } from '../agents';
import { queryExpander } from './agent';

const CachedExpansionSchema = z.array(z.string()).min(1);

export interface ExpandOptions {
  abortSignal?: AbortSignal;
}

export interface QueryExpanderOptions {
  /** Paraphrases to request (default: 3) */
  count?: number;
}

export function expansionCacheKey(question: string): string {
  return `expansion:${createHash('sha256').update(question).digest('hex')}`;
}

export class QueryExpander {
  private readonly count: number;

  constructor(
    private readonly llmClient: LLMClient,
    private readonly llmConfig: LLMOperationConfig,
    private readonly cache: BlobStore,
    options: QueryExpanderOptions = {}
  ) {
    this.count = options.count ?? 3;
  }

  /**
   * @returns A non-empty list whose first element is `question`
   */
  async expand(question: string, options?: ExpandOptions): Promise<string[]> {
    const key = expansionCacheKey(question);

    const cached = await this.readCache(key, question);
    if (cached) return cached;

    let rewrites: string[];
    try {
      const output = await callAgent(
        queryExpander,
        { question, count: this.count },
        this.llmClient,
        this.llmConfig,
        options?.abortSignal
      );
      rewrites = output.questions;
    } catch (error) {
      if (options?.abortSignal?.aborted) throw error;
      logWarning('Query expansion failed, using the original question only', error);
      return [question];
    }

    const questions = [question];
    for (const rewrite of rewrites) {
      const text = rewrite.trim();
      if (text && !questions.includes(text)) questions.push(text);
    }

    try {
      await this.cache.put(key, JSON.stringify(questions));
    } catch (error) {
      logWarning('Failed to cache query expansion', error);
    }

    return questions;
  }

  private async readCache(key: string, question: string): Promise<string[] | null> {
    let raw: string | undefined;
    try {
      raw = await this.cache.get(key);
    } catch (error) {
      logWarning('Failed to read query expansion cache', error);
      return null;
    }
    if (raw === undefined) return null;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = CachedExpansionSchema.safeParse(data);
    return parsed.success && parsed.data[0] === question ? parsed.data : null;
  }
}
