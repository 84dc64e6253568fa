/**
 * Block parsing, table rendering and content fingerprinting.
 */

import { createHash } from 'node:crypto';
import type { RawBlock } from './types';

const TABLE_SEPARATOR_CELL = /^:?-{3,}:?$/;

/**
 * Split plain text into blocks on blank lines.
 *
 * A block whose every line starts with `|` is a table; a markdown separator
 * row (`| --- | --- |`) is dropped while parsing.
 */
export function parseBlocks(text: string): RawBlock[] {
  const blocks: RawBlock[] = [];

  for (const chunk of text.replace(/\r\n?/g, '\n').split(/\n\s*\n/)) {
    const trimmed = chunk.trim();
    if (!trimmed) continue;

    const lines = trimmed.split('\n').map((line) => line.trim());
    if (lines.every((line) => line.startsWith('|'))) {
      const rows = lines.map(parseRow).filter((row) => !isSeparatorRow(row));
      if (rows.length > 0) {
        blocks.push({ kind: 'table', rows });
        continue;
      }
    }

    blocks.push({ kind: 'text', text: trimmed });
  }

  return blocks;
}

function parseRow(line: string): string[] {
  let inner = line.slice(1);
  if (inner.endsWith('|')) inner = inner.slice(0, -1);
  return inner.split('|').map((cell) => cell.trim());
}

function isSeparatorRow(row: string[]): boolean {
  return row.length > 0 && row.every((cell) => TABLE_SEPARATOR_CELL.test(cell));
}

/**
 * Render a table as markdown: first row is the header, followed by a
 * `---` separator row.
 */
export function renderTable(rows: string[][]): string {
  const [header, ...body] = rows;
  if (!header) return '';

  const lines = [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...body.map((row) => `| ${row.join(' | ')} |`)
  ];
  return lines.join('\n');
}

/**
 * Rewrite Google Drive share links (`/file/d/<id>/view`) to direct downloads.
 * Other URLs are returned unchanged.
 */
export function resolveDownloadUrl(url: string): string {
  if (!url.includes('drive.google.com') || !url.includes('/view')) return url;

  const match = url.match(/\/d\/([^/]+)/);
  if (!match?.[1]) return url;
  return `https://drive.google.com/uc?export=download&id=${match[1]}`;
}

/**
 * SHA-256 over the block contents. Two documents with the same blocks share
 * a fingerprint regardless of where they were fetched from.
 */
export function fingerprintBlocks(blocks: RawBlock[]): string {
  const hash = createHash('sha256');
  for (const block of blocks) {
    if (block.kind === 'text') {
      hash.update(`text\u0000${block.text}\u0000`);
    } else {
      hash.update(`table\u0000${JSON.stringify(block.rows)}\u0000`);
    }
  }
  return hash.digest('hex');
}
