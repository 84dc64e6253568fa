/**
 * Semantic Segmentation
 *
 * Splits oversized paragraphs at topic shifts:
 * 1. Split into sentences
 * 2. Embed each sentence
 * 3. Measure cosine distance between adjacent sentences
 * 4. Break wherever the distance exceeds the paragraph's own
 *    `percentile`-th distance
 *
 * Groups still longer than `chunkSize` fall back to fixed windows.
 */

import nlp from 'compromise';
import { renderTable } from '@/providers/document/blocks';
import type { RawBlock } from '@/providers/document/types';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { cosineSimilarity } from '@/providers/embedding/utils';
import { embedTexts } from '../indexing/embed';
import { splitWindows } from './fixed';
import type { SegmentOptions, Segmenter, TextUnit } from './types';

export interface SemanticSegmenterOptions {
  chunkSize: number;
  overlap: number;
  /** Distance percentile (0-100) used as the break threshold */
  percentile: number;
  batchSize?: number;
}

/**
 * Split text into sentences.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = nlp(text).sentences().out('array');
  return sentences.map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Percentile with linear interpolation between closest ranks.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const low = sorted[lower] ?? 0;
  const high = sorted[upper] ?? low;
  return low + (high - low) * (rank - lower);
}

/**
 * Group consecutive sentences, starting a new group after every distance
 * above the threshold.
 */
export function groupSentences(
  sentences: readonly string[],
  embeddings: readonly number[][],
  breakPercentile: number
): string[] {
  if (sentences.length <= 1) return [...sentences];

  const distances: number[] = [];
  for (let i = 0; i < sentences.length - 1; i++) {
    distances.push(1 - cosineSimilarity(embeddings[i] ?? [], embeddings[i + 1] ?? []));
  }
  const threshold = percentile(distances, breakPercentile);

  const groups: string[] = [];
  let current: string[] = [];
  sentences.forEach((sentence, i) => {
    current.push(sentence);
    const distance = distances[i];
    if (distance !== undefined && distance > threshold) {
      groups.push(current.join(' '));
      current = [];
    }
  });
  if (current.length > 0) groups.push(current.join(' '));

  return groups;
}

export class SemanticSegmenter implements Segmenter {
  constructor(
    private readonly embeddingClient: EmbeddingClient,
    private readonly options: SemanticSegmenterOptions
  ) {}

  async segment(blocks: RawBlock[], options?: SegmentOptions): Promise<TextUnit[]> {
    const { chunkSize, overlap } = this.options;
    const units: TextUnit[] = [];

    for (const block of blocks) {
      if (block.kind === 'table') {
        const table = renderTable(block.rows);
        if (table) units.push(table);
        continue;
      }

      const text = block.text.trim();
      if (!text) continue;
      if (text.length <= chunkSize) {
        units.push(text);
        continue;
      }

      const sentences = splitSentences(text);
      if (sentences.length <= 1) {
        units.push(text);
        continue;
      }

      const embeddings = await embedTexts(this.embeddingClient, sentences, {
        batchSize: this.options.batchSize,
        abortSignal: options?.abortSignal
      });
      for (const group of groupSentences(sentences, embeddings, this.options.percentile)) {
        units.push(...splitWindows(group, chunkSize, overlap));
      }
    }

    return units;
  }
}
