/**
 * Answer generation prompts.
 */

import type { Message } from '@/providers/llm/types';

const DOCUMENT_SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You answer questions about a document using excerpts retrieved from it.

# STEPS

1. Read the excerpts; they are separated by horizontal rules
2. Find the passages that answer the question
3. Answer concisely, keeping the document's terms, numbers and conditions

# CRITICAL RULES

1. Base the answer on the excerpts; when they only partly cover the question, infer from what they do say
2. When the excerpts do not contain the answer, say the answer is not present in the document
3. Requests for code or scripts are not questions about the document: say the answer is not present in the document
4. Keep answers short and to the point, in plain sentences without markdown`;

const GENERAL_SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You answer questions from general knowledge.

# CRITICAL RULES

1. Answer concisely in plain sentences without markdown
2. If you do not know the answer, say so instead of guessing`;

/**
 * Build the generation messages. An empty context selects the
 * general-knowledge prompt.
 */
export function buildAnswerMessages(question: string, context: string): Message[] {
  if (!context) {
    return [
      { role: 'system', content: GENERAL_SYSTEM_PROMPT },
      { role: 'user', content: `Question: ${question}` }
    ];
  }

  return [
    { role: 'system', content: DOCUMENT_SYSTEM_PROMPT },
    { role: 'user', content: `## EXCERPTS\n\n${context}\n\n## QUESTION\n\n${question}` }
  ];
}
