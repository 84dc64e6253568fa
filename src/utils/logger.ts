/**
 * Logger
 *
 * Semantic logging for quire operations:
 * - RUN: A document request arrives (document + question count)
 * - INDEX: Where the document's index came from
 * - DONE: Per-request summary
 * - WARN: Failures recovered locally (embedding batch, expansion, rerank, ...)
 *
 * Design principles:
 * - One headline per request, indented detail lines below it
 * - Show what matters, hide implementation details
 */

import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

// ═══════════════════════════════════════════════════════════════════════════════
// Request Logging (RUN / INDEX / DONE)
// ═══════════════════════════════════════════════════════════════════════════════

export type IndexSource = 'memory' | 'disk' | 'built' | 'timeout' | 'failed';

/**
 * Log the start of a document request.
 */
export function logRunStart(documentUrl: string, questionCount: number): void {
  const time = c.dim(formatTime());
  const preview = truncate(documentUrl, 60);
  const noun = questionCount === 1 ? 'question' : 'questions';
  console.log(`${time} ${c.cyan('RUN')} "${c.white(preview)}" ${c.dim(`(${questionCount} ${noun})`)}`);
}

/**
 * Log where the index for the current request came from.
 */
export function logIndex(source: IndexSource, fingerprint?: string, units?: number): void {
  const time = c.dim(formatTime());
  const shortId = fingerprint ? c.dim(`[${fingerprint.slice(0, 8)}]`) : '';
  const count = units !== undefined ? c.dim(`${units} units`) : '';

  switch (source) {
    case 'memory':
    case 'disk':
      console.log(`${time} ${c.magenta('INDEX')} ${shortId} ${c.green(`cached (${source})`)} ${count}`);
      break;
    case 'built':
      console.log(`${time} ${c.magenta('INDEX')} ${shortId} ${c.brightGreen('built')} ${count}`);
      break;
    case 'timeout':
      console.log(
        `${time} ${c.magenta('INDEX')} ${shortId} ${c.yellow('timed out')} ${c.dim('(answering from general knowledge)')}`
      );
      break;
    case 'failed':
      console.log(`${time} ${c.magenta('INDEX')} ${c.brightRed('failed')}`);
      break;
  }
}

export interface AnswerLogEntry {
  question: string;
  route: string;
  cached: boolean;
}

/**
 * Log one answered question.
 */
export function logAnswer(entry: AnswerLogEntry): void {
  const preview = truncate(entry.question, 55);
  const tag = entry.cached ? c.dim(`(${entry.route}, cached)`) : c.dim(`(${entry.route})`);
  console.log(`${INDENT}${c.brightGreen('✓')} "${c.white(preview)}" ${tag}`);
}

export interface RunSummary {
  answered: number;
  timedOut: number;
  failed: number;
  durationMs: number;
}

/**
 * Log the end of a document request.
 */
export function logRunResult(summary: RunSummary): void {
  const parts = [c.brightGreen(`${summary.answered} answered`)];
  if (summary.timedOut > 0) parts.push(c.yellow(`${summary.timedOut} timed out`));
  if (summary.failed > 0) parts.push(c.brightRed(`${summary.failed} failed`));

  const seconds = (summary.durationMs / 1000).toFixed(1);
  console.log(`${INDENT}${c.cyan('DONE')} ${parts.join(c.dim(', '))} ${c.dim(`in ${seconds}s`)}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recovered Failures (WARN)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log a failure that was recovered from locally.
 */
export function logWarning(message: string, error?: unknown): void {
  const time = c.dim(formatTime());
  const detail =
    error === undefined ? '' : ` ${c.dim(`(${error instanceof Error ? error.message : String(error)})`)}`;
  console.warn(`${time} ${c.yellow('WARN')} ${message}${detail}`);
}
