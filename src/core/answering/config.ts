/**
 * Answering Pipeline Configuration
 *
 * Tuned defaults for the EXPAND → GATHER → RERANK → ASSEMBLE → GENERATE
 * pipeline. These are internal tuning parameters, not exposed in user-facing
 * config; use createConfig() to override any of them.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

/** Deep partial type for nested overrides */
type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** EXPAND phase config - paraphrase the question to widen recall */
interface ExpandConfig {
  /** Paraphrases requested from the expansion agent */
  readonly paraphrases: number;
  /** Leading expansions (original included) used for retrieval */
  readonly queries: number;
}

/** GATHER phase config - multi-query vector search */
interface GatherConfig {
  /** Units returned per query */
  readonly topK: number;
  /** Ceiling on the deduplicated union passed to the reranker */
  readonly maxCandidates: number;
}

/** RERANK phase config - precise relevance pass */
interface RerankConfig {
  /** Units kept for the context window */
  readonly topK: number;
}

/** ASSEMBLE phase config - build the context window */
interface AssembleConfig {
  /** Placed between units, in rerank order */
  readonly separator: string;
}

/** GENERATE phase config - answer with retry */
interface GenerateConfig {
  /** Total attempts before the failure sentinel is returned */
  readonly maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt */
  readonly backoffMs: number;
  /** Upper bound of the random delay added to each backoff */
  readonly jitterMs: number;
}

/** Complete answering pipeline configuration */
export interface AnsweringConfig {
  readonly expand: ExpandConfig;
  readonly gather: GatherConfig;
  readonly rerank: RerankConfig;
  readonly assemble: AssembleConfig;
  readonly generate: GenerateConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Default Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const expand = {
  paraphrases: 3,
  queries: 3
} as const satisfies ExpandConfig;

const gather = {
  topK: 7,
  maxCandidates: 10
} as const satisfies GatherConfig;

const rerank = {
  topK: 7
} as const satisfies RerankConfig;

const assemble = {
  separator: '\n\n---\n\n'
} as const satisfies AssembleConfig;

/**
 * GENERATE - 1s, 2s, 4s, 8s between five attempts (plus up to 1s jitter)
 */
const generate = {
  maxAttempts: 5,
  backoffMs: 1000,
  jitterMs: 1000
} as const satisfies GenerateConfig;

// ═══════════════════════════════════════════════════════════════════════════════
// Exports
// ═══════════════════════════════════════════════════════════════════════════════

/** Default configuration */
export const defaults = {
  expand,
  gather,
  rerank,
  assemble,
  generate
} as const satisfies AnsweringConfig;

/**
 * Create config with optional overrides.
 *
 * @example
 * // No waiting between generation attempts in tests
 * const testConfig = createConfig({
 *   generate: { backoffMs: 0, jitterMs: 0 }
 * });
 */
export function createConfig(overrides?: DeepPartial<AnsweringConfig>): AnsweringConfig {
  if (!overrides) return defaults;

  return {
    expand: { ...defaults.expand, ...overrides.expand },
    gather: { ...defaults.gather, ...overrides.gather },
    rerank: { ...defaults.rerank, ...overrides.rerank },
    assemble: { ...defaults.assemble, ...overrides.assemble },
    generate: { ...defaults.generate, ...overrides.generate }
  };
}
