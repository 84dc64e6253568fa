export { type QueryExpansionInput, type QueryExpansionOutput, queryExpander } from './agent';
export { type ExpandOptions, expansionCacheKey, QueryExpander, type QueryExpanderOptions } from './expander';
