export { AnswerCache, type AnswerPath, answerCacheKey } from './cache';
export { type AnsweringConfig, createConfig, defaults } from './config';
export { type DeadlineResult, type FanOutTask, fanOut, withDeadline } from './deadline';
export {
  GENERATION_FAILED_ANSWER,
  INGESTION_FAILED_ANSWER,
  IngestionError,
  isSentinel,
  TIMEOUT_ANSWER,
  unexpectedErrorAnswer
} from './errors';
export { answerQuestion } from './pipeline';
export { compileRules, DEFAULT_RULES, type RouteDecision, type RoutingRule, routeQuestion } from './rules';
export {
  DocumentService,
  type DocumentServiceDependencies,
  type DocumentServiceOptions,
  indexStoreKey
} from './service';
export type { AnswerResult, AnswerTarget, AnsweringDependencies } from './types';
