export { DEFAULT_BATCH_SIZE, DEFAULT_CONCURRENCY, type EmbedTextsOptions, embedTexts } from './embed';
export {
  type BuildOptions,
  type IndexSnapshot,
  SNAPSHOT_VERSION,
  type ScoredUnit,
  type SearchOptions,
  VectorIndex
} from './vector-index';
