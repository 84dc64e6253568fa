import type { RawBlock } from '@/providers/document/types';

/** A retrievable slice of document text */
export type TextUnit = string;

export interface SegmentOptions {
  abortSignal?: AbortSignal;
}

/**
 * Turns extracted blocks into a flat, ordered list of text units.
 * Tables are always emitted whole; empty blocks are dropped.
 */
export interface Segmenter {
  segment(blocks: RawBlock[], options?: SegmentOptions): Promise<TextUnit[]>;
}
