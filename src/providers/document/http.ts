/**
 * HTTP Document Extractor
 *
 * Downloads a text document and splits it into raw blocks.
 */

import { parseBlocks, resolveDownloadUrl } from './blocks';
import { DocumentError, type DocumentExtractor, type ExtractOptions, type RawBlock } from './types';

export class HttpDocumentExtractor implements DocumentExtractor {
  constructor(
    private readonly fetchMs: number,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async extract(url: string, options?: ExtractOptions): Promise<RawBlock[]> {
    const timeout = AbortSignal.timeout(this.fetchMs);
    const signal = options?.abortSignal ? AbortSignal.any([timeout, options.abortSignal]) : timeout;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(resolveDownloadUrl(url), { signal });
      text = response.ok ? await response.text() : '';
    } catch (error) {
      throw new DocumentError(
        `Failed to download document: ${url}`,
        'FETCH_ERROR',
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      throw new DocumentError(
        `Document download returned HTTP ${response.status}: ${url}`,
        'HTTP_ERROR'
      );
    }

    const blocks = parseBlocks(text);
    if (blocks.length === 0) {
      throw new DocumentError(`Document has no readable content: ${url}`, 'EMPTY_DOCUMENT');
    }
    return blocks;
  }
}
