/**
 * Test Fixtures
 *
 * Shared test data for unit and integration tests.
 * Keep these minimal and focused on what each test category needs.
 */

import type { RawBlock } from '@/providers/document/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Vector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Unit vector pointing in positive x direction */
export const UNIT_VECTOR_X = [1, 0, 0];

/** Unit vector pointing in positive y direction */
export const UNIT_VECTOR_Y = [0, 1, 0];

/** Zero vector */
export const ZERO_VECTOR = [0, 0, 0];

/** Non-normalized vector pointing the same way as NORMALIZED_VECTOR */
export const UNNORMALIZED_VECTOR = [3, 4, 0]; // magnitude = 5

/** Already normalized vector (magnitude = 1) */
export const NORMALIZED_VECTOR = [0.6, 0.8, 0]; // 3/5, 4/5, 0

// ═══════════════════════════════════════════════════════════════════════════════
// Keyword Embeddings
// ═══════════════════════════════════════════════════════════════════════════════

/** One embedding dimension per keyword */
export const KEYWORDS = ['grace', 'premium', 'hospital', 'maternity', 'claim', 'room'] as const;

/**
 * Deterministic embedding: occurrences of each keyword in the text.
 * Texts about the same keywords point the same way.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((keyword) => lower.split(keyword).length - 1);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Document Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const DOCUMENT_URL = 'https://docs.example.com/policy.txt';

/** Three paragraphs and one table */
export const POLICY_BLOCKS: RawBlock[] = [
  {
    kind: 'text',
    text: 'A grace period of thirty days is allowed for premium payment after the due date.'
  },
  {
    kind: 'text',
    text: 'Hospital expenses are covered when the insured is admitted for at least 24 hours.'
  },
  {
    kind: 'text',
    text: 'Maternity expenses are covered after 24 months of continuous coverage.'
  },
  {
    kind: 'table',
    rows: [
      ['Plan', 'Room rent limit'],
      ['Silver', '1% of sum insured'],
      ['Gold', 'No limit']
    ]
  }
];

/** The same policy as plain text, the way the HTTP extractor receives it */
export const POLICY_TEXT = `A grace period of thirty days is allowed for premium payment after the due date.

Hospital expenses are covered when the insured is admitted for at least 24 hours.

Maternity expenses are covered after 24 months of continuous coverage.

| Plan | Room rent limit |
| --- | --- |
| Silver | 1% of sum insured |
| Gold | No limit |
`;

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config for testing */
export const VALID_MINIMAL_CONFIG = {
  llm: {
    provider: 'openai' as const,
    apiKey: 'test-secret',
    defaults: {
      model: 'gpt-4.1-mini'
    }
  },
  embedding: {
    provider: 'openai' as const,
    apiKey: 'test-secret',
    model: 'text-embedding-3-small',
    dimensions: 1536
  }
};

/** Valid custom provider config */
export const VALID_CUSTOM_PROVIDER_CONFIG = {
  llm: {
    provider: 'openai-compatible' as const,
    baseUrl: 'https://api.example.com/v1',
    providerName: 'example',
    defaults: {
      model: 'custom-model'
    }
  },
  embedding: {
    provider: 'openai-compatible' as const,
    baseUrl: 'https://api.example.com/v1',
    model: 'custom-embedding',
    dimensions: 768
  }
};
