export { type RerankOptions, Reranker } from './reranker';
