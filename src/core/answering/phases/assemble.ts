import type { TextUnit } from '../../segmentation/types';
import type { AnsweringConfig } from '../config';

/**
 * ASSEMBLE Phase - join reranked units into the context window.
 */
export function assemble(units: readonly TextUnit[], config: AnsweringConfig): string {
  return units.join(config.assemble.separator);
}
