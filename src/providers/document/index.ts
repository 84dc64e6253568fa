export { fingerprintBlocks, parseBlocks, renderTable, resolveDownloadUrl } from './blocks';
export { HttpDocumentExtractor } from './http';
export {
  DocumentError,
  type DocumentErrorType,
  type DocumentExtractor,
  type ExtractOptions,
  type RawBlock
} from './types';
