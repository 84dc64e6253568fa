/**
 * Answering Pipeline Phases
 *
 * EXPAND → GATHER → RERANK → ASSEMBLE → GENERATE
 */

export { assemble } from './assemble';
export { expand } from './expand';
export { gather } from './gather';
export { backoffDelay, type GenerateInput, generate } from './generate';
export { rerank } from './rerank';
