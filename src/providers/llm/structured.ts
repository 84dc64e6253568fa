/**
 * Structured Output
 *
 * Two-tier JSON generation:
 * 1. Native structured output (Output.object) where the provider has it
 * 2. Prompt-based: schema described in the prompt, JSON extracted from text
 *
 * A tier that fails validation is retried once with the error fed back
 * before the next tier is tried.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output, zodSchema } from 'ai';
import { z } from 'zod';
import type { CompletionOptions, Message } from './types';

export type StrategyName = 'structured-output' | 'prompt-based';

/** Providers whose APIs accept a JSON schema response format */
const NATIVE_STRUCTURED_OUTPUT = new Set(['openai', 'google', 'openai-compatible']);

export function supportsStructuredOutput(provider: string): boolean {
  return NATIVE_STRUCTURED_OUTPUT.has(provider);
}

/**
 * Extract a JSON document from model text that may wrap it in a markdown
 * fence or surround it with prose.
 */
export function extractJSON(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) {
    return fenced[1].trim();
  }

  const start = text.search(/[[{]/);
  if (start === -1) return text.trim();

  // Walk to the matching close bracket, skipping string contents
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return text.slice(start).trim();
}

function toProviderOptions(provider: string, options?: CompletionOptions) {
  return options?.options ? { [provider]: options.options } : undefined;
}

async function nativeStructured<T>(
  model: LanguageModelV3,
  provider: string,
  messages: Message[],
  schema: z.ZodType<T>,
  options?: CompletionOptions
): Promise<T> {
  const { output } = await generateText({
    model,
    messages,
    output: Output.object({ schema: zodSchema(schema) }),
    maxOutputTokens: options?.maxTokens,
    temperature: options?.temperature,
    maxRetries: options?.maxRetries ?? 0,
    abortSignal: options?.abortSignal,
    providerOptions: toProviderOptions(provider, options)
  });

  return schema.parse(output);
}

async function promptBased<T>(
  model: LanguageModelV3,
  provider: string,
  messages: Message[],
  schema: z.ZodType<T>,
  options?: CompletionOptions
): Promise<T> {
  const last = messages.at(-1);
  if (!last) {
    throw new Error('Prompt-based strategy: No messages provided');
  }

  const jsonSchema = JSON.stringify(z.toJSONSchema(schema), null, 2);
  const enhanced: Message[] = [
    ...messages.slice(0, -1),
    {
      role: last.role,
      content:
        `${last.content}\n\nRespond ONLY with JSON matching this JSON Schema:\n${jsonSchema}\n\n` +
        'Do not include any other text, markdown formatting, or explanation.'
    }
  ];

  const { text } = await generateText({
    model,
    messages: enhanced,
    maxOutputTokens: options?.maxTokens,
    temperature: options?.temperature,
    maxRetries: options?.maxRetries ?? 0,
    abortSignal: options?.abortSignal,
    providerOptions: toProviderOptions(provider, options)
  });

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Prompt-based strategy: Failed to parse JSON (${message})`);
  }
  return schema.parse(parsed);
}

function isValidationError(error: Error): boolean {
  return (
    error.name === 'ZodError' ||
    error.message.includes('parse') ||
    error.message.includes('validation')
  );
}

/**
 * Generate structured output, trying each supported tier in order.
 * Throws an aggregated error if every tier fails.
 */
export async function generateStructured<T>(
  model: LanguageModelV3,
  provider: string,
  messages: Message[],
  schema: z.ZodType<T>,
  options?: CompletionOptions
): Promise<T> {
  const tiers: [StrategyName, typeof promptBased][] = supportsStructuredOutput(provider)
    ? [
        ['structured-output', nativeStructured],
        ['prompt-based', promptBased]
      ]
    : [['prompt-based', promptBased]];

  const failures: string[] = [];

  for (const [name, run] of tiers) {
    let attemptMessages = messages;

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        return await run(model, provider, attemptMessages, schema, options);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        if (options?.abortSignal?.aborted) throw error;

        if (attempt === 1 || !isValidationError(error)) {
          failures.push(`${name}: ${error.message}`);
          break;
        }

        attemptMessages = [
          ...messages,
          {
            role: 'user',
            content:
              `The previous response was invalid. Error: ${error.message}. ` +
              'Please try again with a valid response matching the expected format.'
          }
        ];
      }
    }
  }

  throw new Error(
    `All structured output strategies failed for provider "${provider}".\n${failures.join('\n')}`
  );
}
