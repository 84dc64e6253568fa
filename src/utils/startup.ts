/**
 * Startup Display
 *
 * Lists the configured providers and the server endpoints.
 */

import type { Config } from '@/config/schema';
import { c } from './colors';

export interface StartupInfo {
  llm: { provider: string; model: string };
  embedding: { provider: string; model: string; dimensions: number };
  rerank: { provider: string; model?: string; note?: string };
  segmentation: string;
  cache: string;
  authenticated: boolean;
}

/** Divider line */
const DIVIDER = '━'.repeat(78);

/**
 * Log a configuration line with checkmark, details aligned to column 30.
 */
function logStep(label: string, detail?: string): void {
  const check = c.brightGreen('✓');
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${check} ${c.white(label)}${' '.repeat(padding)}${detail ? c.dim(detail) : ''}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  console.log(`    • ${methodColor(method.padEnd(6))} ${c.cyan(path.padEnd(24))} ${c.dim(description)}`);
}

/**
 * Display configuration and endpoints once the server is listening.
 */
export function displayStartup(info: StartupInfo, port: number): void {
  console.log(`\n  ${c.white('quire')} ${c.dim('document question answering')}\n`);

  logStep('LLM', `${info.llm.provider}/${info.llm.model}`);
  logStep(
    'Embeddings',
    `${info.embedding.provider}/${info.embedding.model} (${info.embedding.dimensions}d)`
  );
  logStep('Reranker', info.rerank.model ? `${info.rerank.provider}/${info.rerank.model}` : info.rerank.provider);
  if (info.rerank.note) {
    console.log(`    ${c.yellow('!')} ${c.dim(info.rerank.note)}`);
  }
  logStep('Segmentation', info.segmentation);
  logStep('Cache', info.cache);
  logStep('Auth', info.authenticated ? 'bearer token' : 'disabled');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(`http://localhost:${port}`)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  displayEndpoint('POST', '/api/v1/run', 'Answer questions about a document');
  displayEndpoint('GET', '/health', 'Health check');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

/** Shown when reranking falls back to the embedding scorer */
export const EMBEDDING_RERANK_NOTE =
  "embedding reranker re-sorts by vector similarity only; set rerank.provider to 'cohere' for a cross-encoder";

/**
 * Build startup info from config.
 */
export function buildStartupInfo(config: Config): StartupInfo {
  const { segmentation, cache } = config;
  return {
    llm: { provider: config.llm.provider, model: config.llm.answering.model },
    embedding: {
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions
    },
    rerank: {
      provider: config.rerank.provider,
      model: config.rerank.model,
      note: config.rerank.provider === 'embedding' ? EMBEDDING_RERANK_NOTE : undefined
    },
    segmentation: `${segmentation.strategy} (${segmentation.chunkSize}/${segmentation.overlap})`,
    cache: cache.directory ? `${cache.directory} (${cache.ttlSeconds}s)` : `memory (${cache.maxEntries} entries)`,
    authenticated: Boolean(config.auth.bearerToken)
  };
}
