/**
 * Configuration System Tests
 *
 * Tests for the config loader and schema validation.
 * Focuses on {env:VAR} resolution, section defaults and cross-field rules.
 */

import { describe, expect, test } from 'vitest';
import { parseConfig, resolveEnvVars } from '@/config/config';
import { configSchema } from '@/config/schema';
import { VALID_CUSTOM_PROVIDER_CONFIG, VALID_MINIMAL_CONFIG } from '../helpers/fixtures';

/** Issue messages of a config that is expected to be rejected */
function issuesOf(config: unknown): string[] {
  const result = configSchema.safeParse(config);
  expect(result.success).toBe(false);
  return result.success ? [] : result.error.issues.map((i) => i.message);
}

describe('configSchema', () => {
  describe('valid configurations', () => {
    test('accepts minimal OpenAI config', () => {
      const result = configSchema.safeParse(VALID_MINIMAL_CONFIG);
      expect(result.success).toBe(true);
    });

    test('accepts custom provider config with all required fields', () => {
      const result = configSchema.safeParse(VALID_CUSTOM_PROVIDER_CONFIG);
      expect(result.success).toBe(true);
    });

    test('applies section defaults when not specified', () => {
      const result = configSchema.safeParse(VALID_MINIMAL_CONFIG);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.server.port).toBe(8000);
        expect(result.data.auth.bearerToken).toBeUndefined();
        expect(result.data.rerank.provider).toBe('embedding');
        expect(result.data.segmentation).toEqual({
          strategy: 'fixed',
          chunkSize: 2000,
          overlap: 200,
          percentile: 95
        });
        expect(result.data.deadlines).toEqual({ totalMs: 35_000, ingestionMs: 17_000, fetchMs: 20_000 });
        expect(result.data.cache.directory).toBeUndefined();
        expect(result.data.embedding.batchSize).toBe(100);
        expect(result.data.routing.rules).toBeUndefined();
      }
    });

    test('merges operation configs with the LLM defaults', () => {
      const config = {
        ...VALID_MINIMAL_CONFIG,
        llm: {
          ...VALID_MINIMAL_CONFIG.llm,
          defaults: { model: 'gpt-4.1-mini', temperature: 0.3 },
          expansion: { temperature: 0.7 }
        }
      };
      const result = configSchema.safeParse(config);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.llm.expansion).toEqual({ model: 'gpt-4.1-mini', temperature: 0.7 });
        expect(result.data.llm.answering).toEqual({ model: 'gpt-4.1-mini', temperature: 0.3 });
      }
    });

    test('treats an empty bearer token as no token', () => {
      const result = configSchema.safeParse({ ...VALID_MINIMAL_CONFIG, auth: { bearerToken: '' } });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.auth.bearerToken).toBeUndefined();
      }
    });
  });

  describe('LLM provider validation', () => {
    test('rejects cloud provider without apiKey', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        llm: { provider: 'openai', defaults: { model: 'gpt-4.1-mini' } }
      });
      expect(messages).toContain("apiKey required for provider 'openai'");
    });

    test('rejects cloud provider with baseUrl', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        llm: {
          provider: 'anthropic',
          apiKey: 'test-secret',
          baseUrl: 'https://example.com',
          defaults: { model: 'claude-model' }
        }
      });
      expect(messages).toContain("baseUrl not allowed for provider 'anthropic'");
    });

    test('rejects openai-compatible provider without baseUrl', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        llm: { provider: 'openai-compatible', defaults: { model: 'custom-model' } }
      });
      expect(messages).toContain("baseUrl required for provider 'openai-compatible'");
    });

    test('accepts ollama without apiKey', () => {
      const result = configSchema.safeParse({
        ...VALID_MINIMAL_CONFIG,
        llm: { provider: 'ollama', defaults: { model: 'llama3' } }
      });
      expect(result.success).toBe(true);
    });
  });

  describe('embedding provider validation', () => {
    test('rejects cloud provider without apiKey', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        embedding: { provider: 'mistral', model: 'mistral-embed', dimensions: 1024 }
      });
      expect(messages).toContain("apiKey required for provider 'mistral'");
    });

    test('rejects providerName outside openai-compatible', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        embedding: { ...VALID_MINIMAL_CONFIG.embedding, providerName: 'custom' }
      });
      expect(messages).toContain("providerName only allowed for provider 'openai-compatible'");
    });
  });

  describe('rerank validation', () => {
    test('requires an apiKey for cohere', () => {
      const messages = issuesOf({ ...VALID_MINIMAL_CONFIG, rerank: { provider: 'cohere' } });
      expect(messages).toContain("apiKey required for rerank provider 'cohere'");
    });

    test('rejects model settings for the embedding scorer', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        rerank: { provider: 'embedding', model: 'rerank-v3.5' }
      });
      expect(messages).toContain("model and apiKey not allowed for rerank provider 'embedding'");
    });
  });

  describe('segmentation and deadlines', () => {
    test('requires overlap to be smaller than chunkSize', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        segmentation: { chunkSize: 200, overlap: 200 }
      });
      expect(messages).toContain('overlap must be smaller than chunkSize');
    });

    test('requires the ingestion deadline to fit in the total deadline', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        deadlines: { totalMs: 1000, ingestionMs: 2000 }
      });
      expect(messages).toContain('ingestionMs must not exceed totalMs');
    });
  });

  describe('routing rules', () => {
    test('requires an answer for answer rules', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        routing: { rules: [{ name: 'code', pattern: 'code', action: 'answer' }] }
      });
      expect(messages).toContain("answer required for rule 'code' with action 'answer'");
    });

    test('rejects an invalid regular expression', () => {
      const messages = issuesOf({
        ...VALID_MINIMAL_CONFIG,
        routing: { rules: [{ name: 'broken', pattern: '(unclosed', action: 'general' }] }
      });
      expect(messages).toContain("invalid regular expression for rule 'broken'");
    });
  });
});

describe('resolveEnvVars', () => {
  test('substitutes set variables', () => {
    expect(resolveEnvVars('{"apiKey": "{env:QUIRE_TEST_KEY}"}', { QUIRE_TEST_KEY: 'test-secret' })).toBe(
      '{"apiKey": "test-secret"}'
    );
  });

  test('substitutes unset variables with an empty string', () => {
    expect(resolveEnvVars('key={env:QUIRE_MISSING}', {})).toBe('key=');
  });

  test('leaves lowercase patterns alone', () => {
    expect(resolveEnvVars('{env:lowercase}', { lowercase: 'x' })).toBe('{env:lowercase}');
  });
});

describe('parseConfig', () => {
  test('resolves environment variables before validating', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      auth: { bearerToken: '{env:QUIRE_TEST_TOKEN}' }
    });

    const parsed = parseConfig(text, { QUIRE_TEST_TOKEN: 'test-secret' });

    expect('config' in parsed && parsed.config.auth.bearerToken).toBe('test-secret');
  });

  test('reports invalid JSON', () => {
    expect(parseConfig('{ not json', {})).toEqual({ errors: ['Invalid JSON'] });
  });

  test('reports every problem with its path', () => {
    const parsed = parseConfig(
      JSON.stringify({ ...VALID_MINIMAL_CONFIG, server: { port: 0 }, segmentation: { chunkSize: 10, overlap: 20 } }),
      {}
    );

    expect('errors' in parsed && parsed.errors).toEqual([
      'server.port: Too small: expected number to be >=1',
      'segmentation.overlap: overlap must be smaller than chunkSize'
    ]);
  });
});
