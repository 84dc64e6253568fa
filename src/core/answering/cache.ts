/**
 * Answer Cache
 *
 * Answers are keyed by SHA-256 over (answer path, document key, question),
 * so the same question against two documents, or through two paths, never
 * shares an entry. Sentinel answers are never stored.
 */

import { createHash } from 'node:crypto';
import type { BlobStore } from '@/providers/store/types';
import { logWarning } from '@/utils/logger';
import { isSentinel } from './errors';

/** Code path that produced an answer */
export type AnswerPath = 'general' | 'rag' | 'fallback';

export function answerCacheKey(question: string, documentKey: string, path: AnswerPath): string {
  const digest = createHash('sha256')
    .update(path)
    .update('\u0000')
    .update(documentKey)
    .update('\u0000')
    .update(question)
    .digest('hex');
  return `answer:${digest}`;
}

export class AnswerCache {
  constructor(private readonly store: BlobStore) {}

  async get(key: string): Promise<string | undefined> {
    try {
      return await this.store.get(key);
    } catch (error) {
      logWarning('Failed to read answer cache', error);
      return undefined;
    }
  }

  async put(key: string, answer: string): Promise<void> {
    if (isSentinel(answer)) return;
    try {
      await this.store.put(key, answer);
    } catch (error) {
      logWarning('Failed to write answer cache', error);
    }
  }
}
