export { createSegmenter, type SegmentationSettings } from './factory';
export { FixedWindowSegmenter, splitWindows } from './fixed';
export {
  groupSentences,
  percentile,
  SemanticSegmenter,
  type SemanticSegmenterOptions,
  splitSentences
} from './semantic';
export type { SegmentOptions, Segmenter, TextUnit } from './types';
