/**
 * Fixed-window segmentation: a sliding window of `chunkSize` characters,
 * consecutive windows sharing `overlap` characters.
 */

import { renderTable } from '@/providers/document/blocks';
import type { RawBlock } from '@/providers/document/types';
import type { Segmenter, TextUnit } from './types';

/**
 * Split text into windows of at most `chunkSize` characters.
 * The last window ends exactly at the end of the text.
 */
export function splitWindows(text: string, chunkSize: number, overlap: number): TextUnit[] {
  if (text.length <= chunkSize) return [text];

  const step = chunkSize - overlap;
  const windows: TextUnit[] = [];
  for (let start = 0; start < text.length; start += step) {
    windows.push(text.slice(start, start + chunkSize));
    if (start + chunkSize >= text.length) break;
  }
  return windows;
}

export class FixedWindowSegmenter implements Segmenter {
  constructor(
    private readonly chunkSize: number,
    private readonly overlap: number
  ) {
    if (overlap >= chunkSize) {
      throw new Error(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
    }
  }

  async segment(blocks: RawBlock[]): Promise<TextUnit[]> {
    const units: TextUnit[] = [];

    for (const block of blocks) {
      if (block.kind === 'table') {
        const table = renderTable(block.rows);
        if (table) units.push(table);
        continue;
      }

      const text = block.text.trim();
      if (!text) continue;
      units.push(...splitWindows(text, this.chunkSize, this.overlap));
    }

    return units;
  }
}
