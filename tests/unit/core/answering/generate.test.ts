/**
 * GENERATE Phase Tests
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createMockLLMClient } from '@tests/helpers/mocks';
import { createConfig } from '@/core/answering/config';
import { GENERATION_FAILED_ANSWER } from '@/core/answering/errors';
import { backoffDelay, generate } from '@/core/answering/phases/generate';

const LLM_CONFIG = { model: 'mock-llm-model', temperature: 0 };
const config = createConfig({ generate: { maxAttempts: 3, backoffMs: 0, jitterMs: 0 } });

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('generate', () => {
  test('answers from the excerpts with the document prompt', async () => {
    const llmClient = createMockLLMClient({ answer: 'Thirty days.' });

    const answer = await generate(
      llmClient,
      LLM_CONFIG,
      { question: 'What is the grace period?', context: 'A grace period of thirty days.' },
      config
    );

    expect(answer).toBe('Thirty days.');
    expect(llmClient.completeCalls).toHaveLength(1);
    expect(llmClient.completeCalls[0]?.[1]).toEqual({
      role: 'user',
      content: '## EXCERPTS\n\nA grace period of thirty days.\n\n## QUESTION\n\nWhat is the grace period?'
    });
  });

  test('uses the general-knowledge prompt without context', async () => {
    const llmClient = createMockLLMClient({ answer: 'A physicist.' });

    await generate(llmClient, LLM_CONFIG, { question: 'Who is Marie Curie?', context: '' }, config);

    expect(llmClient.completeCalls[0]?.[1]).toEqual({
      role: 'user',
      content: 'Question: Who is Marie Curie?'
    });
  });

  test('retries after failures', async () => {
    const llmClient = createMockLLMClient({ answer: 'Thirty days.', failures: 2 });

    const answer = await generate(
      llmClient,
      LLM_CONFIG,
      { question: 'What is the grace period?', context: 'x' },
      config
    );

    expect(answer).toBe('Thirty days.');
    expect(llmClient.completeCalls).toHaveLength(3);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  test('returns the failure answer once every attempt failed', async () => {
    const llmClient = createMockLLMClient({ failures: 10 });

    const answer = await generate(
      llmClient,
      LLM_CONFIG,
      { question: 'What is the grace period?', context: 'x' },
      config
    );

    expect(answer).toBe(GENERATION_FAILED_ANSWER);
    expect(llmClient.completeCalls).toHaveLength(3);
  });

  test('treats an empty answer as a failed attempt', async () => {
    const llmClient = createMockLLMClient({ answer: '' });

    const answer = await generate(
      llmClient,
      LLM_CONFIG,
      { question: 'What is the grace period?', context: 'x' },
      config
    );

    expect(answer).toBe(GENERATION_FAILED_ANSWER);
    expect(llmClient.completeCalls).toHaveLength(3);
  });

  test('stops retrying once aborted', async () => {
    const controller = new AbortController();
    const llmClient = createMockLLMClient({ hang: true });

    const pending = generate(
      llmClient,
      LLM_CONFIG,
      { question: 'What is the grace period?', context: 'x' },
      config,
      controller.signal
    );
    controller.abort();

    await expect(pending).rejects.toThrow('aborted');
    expect(llmClient.completeCalls).toHaveLength(1);
  });
});

describe('backoffDelay', () => {
  test('doubles from the base delay', () => {
    const noJitter = createConfig({ generate: { backoffMs: 1000, jitterMs: 0 } });

    expect(backoffDelay(0, noJitter)).toBe(1000);
    expect(backoffDelay(1, noJitter)).toBe(2000);
    expect(backoffDelay(3, noJitter)).toBe(8000);
  });

  test('adds at most the jitter bound', () => {
    const jittered = createConfig({ generate: { backoffMs: 100, jitterMs: 50 } });

    for (let i = 0; i < 20; i++) {
      const delay = backoffDelay(0, jittered);
      expect(delay).toBeGreaterThanOrEqual(100);
      expect(delay).toBeLessThan(150);
    }
  });
});
