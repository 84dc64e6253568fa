import type { SegmentationStrategy } from '@/config/schema';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { FixedWindowSegmenter } from './fixed';
import { SemanticSegmenter } from './semantic';
import type { Segmenter } from './types';

export interface SegmentationSettings {
  strategy: SegmentationStrategy;
  chunkSize: number;
  overlap: number;
  percentile: number;
  batchSize?: number;
}

export function createSegmenter(
  settings: SegmentationSettings,
  embeddingClient: EmbeddingClient
): Segmenter {
  switch (settings.strategy) {
    case 'fixed':
      return new FixedWindowSegmenter(settings.chunkSize, settings.overlap);

    case 'semantic':
      return new SemanticSegmenter(embeddingClient, settings);

    default: {
      const _exhaustive: never = settings.strategy;
      throw new Error(`Unknown segmentation strategy: ${_exhaustive}`);
    }
  }
}
