/**
 * Query Expansion Agent
 *
 * Rephrases a question several ways to widen vector-search recall.
 * Input: The user's question
 * Output: Alternative phrasings (the original is not repeated)
 */

import { z } from 'zod';
import type { Agent } from '../agents';

export interface QueryExpansionInput {
  question: string;
  /** Number of rephrasings to ask for */
  count: number;
}

export const QueryExpansionOutputSchema = z.object({
  questions: z.array(z.string())
});
export type QueryExpansionOutput = z.infer<typeof QueryExpansionOutputSchema>;

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You rewrite questions for a document retrieval system. Each rewrite is embedded and matched against passages of a document, so different wording finds passages that the original wording misses.

# STEPS

1. Identify what the question is actually asking for
2. Write alternative questions that ask for the same thing with different vocabulary: synonyms, the formal term and the everyday term, a more specific and a more general framing

# OUTPUT INSTRUCTIONS

Return JSON:
{
  "questions": ["...", "...", "..."]
}

# CRITICAL RULES

1. Every rewrite must keep the meaning of the original question
2. Do not repeat the original question
3. Do not answer the question
4. One sentence per rewrite

# INPUT

`;

export const queryExpander: Agent<QueryExpansionInput, QueryExpansionOutput> = {
  systemPrompt: SYSTEM_PROMPT,
  outputSchema: QueryExpansionOutputSchema,
  formatInput: (input) =>
    `Write ${input.count} alternative phrasings of this question:\n\n"${input.question}"`
};
