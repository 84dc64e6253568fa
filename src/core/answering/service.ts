/**
 * Document Service
 *
 * Runs one request: a document URL plus its questions.
 *
 * 1. Ingest within `ingestionMs`: extract → fingerprint → index from
 *    memory, from the blob store, or built fresh
 * 2. Answer every question concurrently within what is left of `totalMs`
 *
 * If ingestion misses its deadline the questions are answered from general
 * knowledge, while the build keeps running and fills the caches when it
 * completes. Ingestion failures answer every question with the ingestion
 * sentinel.
 */

import { LRUCache } from 'lru-cache';
import { fingerprintBlocks } from '@/providers/document/blocks';
import type { DocumentExtractor, RawBlock } from '@/providers/document/types';
import type { EmbeddingClient } from '@/providers/embedding/types';
import type { BlobStore } from '@/providers/store/types';
import { type IndexSource, logAnswer, logIndex, logRunResult, logRunStart, logWarning } from '@/utils/logger';
import { VectorIndex } from '../indexing/vector-index';
import type { Segmenter } from '../segmentation/types';
import { fanOut, withDeadline } from './deadline';
import {
  INGESTION_FAILED_ANSWER,
  IngestionError,
  TIMEOUT_ANSWER,
  isSentinel
} from './errors';
import { answerQuestion } from './pipeline';
import type { AnsweringDependencies, AnswerTarget } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocumentServiceDependencies {
  extractor: DocumentExtractor;
  segmenter: Segmenter;
  embeddingClient: EmbeddingClient;
  /** Persistent index store; null keeps indices in memory only */
  indexStore: BlobStore | null;
  answering: AnsweringDependencies;
}

export interface DocumentServiceOptions {
  /** Whole-request budget */
  totalMs: number;
  /** Budget for extraction and index build */
  ingestionMs: number;
  /** Indices kept in memory */
  maxDocuments: number;
  /** Texts per embedding call */
  batchSize?: number;
  /** Clock override */
  now?: () => number;
}

interface Ingested {
  index: VectorIndex;
  source: IndexSource;
}

/** Shared between a request and its (possibly outliving) ingestion */
interface IngestionProgress {
  fingerprint?: string;
}

export function indexStoreKey(fingerprint: string): string {
  return `index:${fingerprint}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Service
// ═══════════════════════════════════════════════════════════════════════════════

export class DocumentService {
  private readonly indices: LRUCache<string, VectorIndex>;
  private readonly building = new Map<string, Promise<Ingested>>();
  private readonly now: () => number;

  constructor(
    private readonly deps: DocumentServiceDependencies,
    private readonly options: DocumentServiceOptions
  ) {
    this.indices = new LRUCache<string, VectorIndex>({ max: options.maxDocuments });
    this.now = options.now ?? Date.now;
  }

  /**
   * Answer every question about one document.
   * @returns One answer per question, in question order
   */
  async run(documentUrl: string, questions: string[]): Promise<string[]> {
    const startTime = this.now();
    logRunStart(documentUrl, questions.length);

    const progress: IngestionProgress = {};
    const ingestion = this.ingest(documentUrl, progress);

    let target: AnswerTarget;
    try {
      const result = await withDeadline(ingestion, this.options.ingestionMs);
      if (result.timedOut) {
        // Keep building in the background; failures there only get logged
        ingestion.catch((error: unknown) => logWarning('Background index build failed', error));
        logIndex('timeout', progress.fingerprint);
        target = { documentKey: progress.fingerprint ?? `url:${documentUrl}`, index: null };
      } else {
        const { index, source } = result.value;
        logIndex(source, index.fingerprint, index.size);
        target = { documentKey: index.fingerprint, index };
      }
    } catch (error) {
      logIndex('failed');
      logWarning(`Could not process document ${documentUrl}`, error);
      const answers = questions.map(() => INGESTION_FAILED_ANSWER);
      this.logSummary(answers, startTime);
      return answers;
    }

    const remaining = this.options.totalMs - (this.now() - startTime);
    const answers = await fanOut(
      questions,
      async (question, _i, abortSignal) => {
        const result = await answerQuestion(question, target, this.deps.answering, abortSignal);
        logAnswer({ question, route: result.path, cached: result.cached });
        return result.answer;
      },
      remaining
    );

    this.logSummary(answers, startTime);
    return answers;
  }

  /**
   * Extract, fingerprint and resolve the index, building it when no cache
   * has it. Concurrent requests for the same content share one build.
   */
  private async ingest(documentUrl: string, progress: IngestionProgress): Promise<Ingested> {
    let fingerprint: string;
    let blocks: RawBlock[];
    try {
      blocks = await this.deps.extractor.extract(documentUrl);
      fingerprint = fingerprintBlocks(blocks);
    } catch (error) {
      throw new IngestionError(
        `Could not process document: ${documentUrl}`,
        documentUrl,
        error instanceof Error ? error : undefined
      );
    }
    progress.fingerprint = fingerprint;

    const inMemory = this.indices.get(fingerprint);
    if (inMemory) return { index: inMemory, source: 'memory' };

    const pending = this.building.get(fingerprint);
    if (pending) return pending;

    const build = this.loadOrBuild(fingerprint, blocks);
    this.building.set(fingerprint, build);
    try {
      const ingested = await build;
      this.indices.set(fingerprint, ingested.index);
      return ingested;
    } finally {
      this.building.delete(fingerprint);
    }
  }

  private async loadOrBuild(fingerprint: string, blocks: RawBlock[]): Promise<Ingested> {
    const { indexStore, embeddingClient } = this.deps;
    const key = indexStoreKey(fingerprint);

    if (indexStore) {
      try {
        const stored = await indexStore.get(key);
        const index = stored === undefined ? null : VectorIndex.fromSnapshot(stored, embeddingClient);
        if (index && index.fingerprint === fingerprint) return { index, source: 'disk' };
      } catch (error) {
        logWarning('Failed to read stored index', error);
      }
    }

    const units = await this.deps.segmenter.segment(blocks);
    const index = await VectorIndex.build(units, embeddingClient, {
      fingerprint,
      batchSize: this.options.batchSize
    });

    if (indexStore) {
      try {
        await indexStore.put(key, index.toSnapshot());
      } catch (error) {
        logWarning('Failed to store index', error);
      }
    }

    return { index, source: 'built' };
  }

  private logSummary(answers: readonly string[], startTime: number): void {
    let timedOut = 0;
    let failed = 0;
    for (const answer of answers) {
      if (answer === TIMEOUT_ANSWER) timedOut++;
      else if (isSentinel(answer)) failed++;
    }

    logRunResult({
      answered: answers.length - timedOut - failed,
      timedOut,
      failed,
      durationMs: this.now() - startTime
    });
  }
}
