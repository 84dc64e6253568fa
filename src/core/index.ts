/**
 * Document Answering Core
 *
 * Public API barrel file.
 *
 * @example
 * ```typescript
 * import { DocumentService, VectorIndex } from '@/core';
 * import type { AnsweringDependencies } from '@/core';
 * ```
 */

export * from './answering';
export { type Agent, callAgent } from './agents';
export { QueryExpander } from './expansion';
export { embedTexts, type IndexSnapshot, type ScoredUnit, VectorIndex } from './indexing';
export { Reranker } from './rerank';
export { createSegmenter, type Segmenter, type TextUnit } from './segmentation';
