/**
 * Document Extraction Types
 *
 * A document arrives as an ordered list of raw blocks. Tables keep their
 * row-major cell grid so they can be rendered as one atomic unit.
 */

export type RawBlock = { kind: 'text'; text: string } | { kind: 'table'; rows: string[][] };

export interface ExtractOptions {
  abortSignal?: AbortSignal;
}

/**
 * Turns a document reference into raw blocks.
 */
export interface DocumentExtractor {
  extract(url: string, options?: ExtractOptions): Promise<RawBlock[]>;
}

export type DocumentErrorType = 'FETCH_ERROR' | 'HTTP_ERROR' | 'EMPTY_DOCUMENT';

/**
 * Error raised by document extractors.
 */
export class DocumentError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: DocumentErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'DocumentError';
    this.cause = cause;
  }
}
