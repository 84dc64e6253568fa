/**
 * Routing Rules
 *
 * Ordered `(pattern, action)` table evaluated before the retrieval pipeline.
 * The first matching rule wins:
 * - `general`: answer from general knowledge, skipping retrieval
 * - `answer`: return a fixed answer without calling any model
 */

import type { RoutingRuleConfig } from '@/config/schema';

export type RoutingRule = { name: string; pattern: RegExp } & (
  | { action: 'general' }
  | { action: 'answer'; answer: string }
);

export type RouteDecision =
  | { route: 'rag' }
  | { route: 'general'; rule: string }
  | { route: 'answer'; rule: string; answer: string };

export const DEFAULT_RULES: RoutingRuleConfig[] = [
  {
    name: 'code-request',
    pattern:
      '^\\s*(?:(?:please|can you|could you)\\s+)?(?:write|generate|give me|create)\\b.*\\b(?:code(?!\\s+of\\b)|script|snippet)\\b|\\b(?:python|javascript|typescript|java|sql|bash)\\s+(?:code|script|program|function)\\b',
    flags: 'i',
    action: 'answer',
    answer: 'Answer not present in documents.'
  },
  {
    name: 'biographical',
    pattern:
      '^\\s*(?:[Ww]ho\\s+(?:was|is)\\s+[A-Z][\\w.-]*(?:\\s+[A-Z][\\w.-]*){0,3}|[Ww]hen\\s+was\\s+[A-Z][\\w.-]*(?:\\s+[A-Z][\\w.-]*){0,3}\\s+born)\\s*\\??\\s*$',
    flags: '',
    action: 'general'
  }
];

/**
 * Compile rule configs into matchers. Stateful regex flags (g, y) are
 * dropped so `test()` gives the same result on every call.
 */
export function compileRules(configs: readonly RoutingRuleConfig[] = DEFAULT_RULES): RoutingRule[] {
  return configs.map((config): RoutingRule => {
    const flags = (config.flags ?? 'i').replace(/[gy]/g, '');
    const pattern = new RegExp(config.pattern, flags);

    if (config.action === 'answer') {
      if (!config.answer) {
        throw new Error(`Routing rule '${config.name}' needs an answer`);
      }
      return { name: config.name, pattern, action: 'answer', answer: config.answer };
    }
    return { name: config.name, pattern, action: 'general' };
  });
}

export function routeQuestion(question: string, rules: readonly RoutingRule[]): RouteDecision {
  for (const rule of rules) {
    if (!rule.pattern.test(question)) continue;
    return rule.action === 'answer'
      ? { route: 'answer', rule: rule.name, answer: rule.answer }
      : { route: 'general', rule: rule.name };
  }
  return { route: 'rag' };
}
