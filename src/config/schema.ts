import { z } from 'zod';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const embeddingProviders = [
  'openai',
  'google',
  'cohere',
  'mistral',
  'ollama',
  'openai-compatible'
] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

export const rerankProviders = ['cohere', 'embedding'] as const;
export type RerankProvider = (typeof rerankProviders)[number];

export const segmentationStrategies = ['fixed', 'semantic'] as const;
export type SegmentationStrategy = (typeof segmentationStrategies)[number];

export const ruleActions = ['general', 'answer'] as const;
export type RuleAction = (typeof ruleActions)[number];

// Operation config schema (for expansion, answering)
const llmOperationSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  options: z.record(z.string(), z.json()).optional()
});
export type LLMOperationConfig = z.infer<typeof llmOperationSchema>;

const routingRuleSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().optional(),
    action: z.enum(ruleActions),
    answer: z.string().min(1).optional()
  })
  .superRefine((data, ctx) => {
    try {
      new RegExp(data.pattern, data.flags ?? 'i');
    } catch {
      ctx.addIssue({
        code: 'custom',
        path: ['pattern'],
        message: `invalid regular expression for rule '${data.name}'`
      });
    }
    if (data.action === 'answer' && !data.answer)
      ctx.addIssue({
        code: 'custom',
        path: ['answer'],
        message: `answer required for rule '${data.name}' with action 'answer'`
      });
    if (data.action === 'general' && data.answer)
      ctx.addIssue({
        code: 'custom',
        path: ['answer'],
        message: `answer not allowed for rule '${data.name}' with action 'general'`
      });
  });
export type RoutingRuleConfig = z.infer<typeof routingRuleSchema>;

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(8000)
      })
      .optional(),

    auth: z
      .object({
        bearerToken: z.string().optional()
      })
      .optional(),

    llm: z
      .object({
        provider: z.enum(llmProviders),
        providerName: z.string().min(1).optional(),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional(),
        defaults: llmOperationSchema,
        expansion: llmOperationSchema.partial().optional(),
        answering: llmOperationSchema.partial().optional()
      })
      .superRefine((data, ctx) => {
        const cloudProviders = ['openai', 'anthropic', 'google'];
        if (cloudProviders.includes(data.provider)) {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: `apiKey required for provider '${data.provider}'`
            });
          if (data.baseUrl)
            ctx.addIssue({
              code: 'custom',
              path: ['baseUrl'],
              message: `baseUrl not allowed for provider '${data.provider}'`
            });
        }
        if (data.provider === 'openai-compatible' && !data.baseUrl) {
          ctx.addIssue({
            code: 'custom',
            path: ['baseUrl'],
            message: "baseUrl required for provider 'openai-compatible'"
          });
        }
        if (data.provider !== 'openai-compatible' && data.providerName) {
          ctx.addIssue({
            code: 'custom',
            path: ['providerName'],
            message: "providerName only allowed for provider 'openai-compatible'"
          });
        }
      }),

    embedding: z
      .object({
        provider: z.enum(embeddingProviders),
        providerName: z.string().min(1).optional(),
        model: z.string().min(1),
        dimensions: z.number().int().positive(),
        batchSize: z.number().int().positive().max(2048).default(100),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional()
      })
      .superRefine((data, ctx) => {
        const cloudProviders = ['openai', 'google', 'cohere', 'mistral'];
        if (cloudProviders.includes(data.provider)) {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: `apiKey required for provider '${data.provider}'`
            });
          if (data.baseUrl)
            ctx.addIssue({
              code: 'custom',
              path: ['baseUrl'],
              message: `baseUrl not allowed for provider '${data.provider}'`
            });
        }
        if (data.provider === 'openai-compatible' && !data.baseUrl) {
          ctx.addIssue({
            code: 'custom',
            path: ['baseUrl'],
            message: "baseUrl required for provider 'openai-compatible'"
          });
        }
        if (data.provider !== 'openai-compatible' && data.providerName) {
          ctx.addIssue({
            code: 'custom',
            path: ['providerName'],
            message: "providerName only allowed for provider 'openai-compatible'"
          });
        }
      }),

    rerank: z
      .object({
        provider: z.enum(rerankProviders).default('embedding'),
        model: z.string().min(1).optional(),
        apiKey: z.string().optional()
      })
      .superRefine((data, ctx) => {
        if (data.provider === 'cohere') {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: "apiKey required for rerank provider 'cohere'"
            });
        } else if (data.model || data.apiKey) {
          ctx.addIssue({
            code: 'custom',
            path: ['provider'],
            message: "model and apiKey not allowed for rerank provider 'embedding'"
          });
        }
      })
      .optional(),

    segmentation: z
      .object({
        strategy: z.enum(segmentationStrategies).default('fixed'),
        chunkSize: z.number().int().positive().default(2000),
        overlap: z.number().int().min(0).default(200),
        percentile: z.number().min(0).max(100).default(95)
      })
      .refine((data) => data.overlap < data.chunkSize, {
        path: ['overlap'],
        message: 'overlap must be smaller than chunkSize'
      })
      .optional(),

    cache: z
      .object({
        directory: z.string().min(1).optional(),
        maxEntries: z.number().int().positive().default(10_000),
        ttlSeconds: z.number().int().positive().default(7 * 24 * 60 * 60),
        maxDocuments: z.number().int().positive().default(50)
      })
      .optional(),

    deadlines: z
      .object({
        totalMs: z.number().int().positive().default(35_000),
        ingestionMs: z.number().int().positive().default(17_000),
        fetchMs: z.number().int().positive().default(20_000)
      })
      .refine((data) => data.ingestionMs <= data.totalMs, {
        path: ['ingestionMs'],
        message: 'ingestionMs must not exceed totalMs'
      })
      .optional(),

    routing: z
      .object({
        rules: z.array(routingRuleSchema).optional()
      })
      .optional()
  })
  .transform((data) => {
    // Apply section defaults
    const server = { port: data.server?.port ?? 8000 };
    const auth = { bearerToken: data.auth?.bearerToken || undefined };
    const rerank = data.rerank ?? { provider: 'embedding' as const, model: undefined, apiKey: undefined };
    const segmentation = data.segmentation ?? {
      strategy: 'fixed' as const,
      chunkSize: 2000,
      overlap: 200,
      percentile: 95
    };
    const cache = data.cache ?? {
      directory: undefined,
      maxEntries: 10_000,
      ttlSeconds: 7 * 24 * 60 * 60,
      maxDocuments: 50
    };
    const deadlines = data.deadlines ?? { totalMs: 35_000, ingestionMs: 17_000, fetchMs: 20_000 };
    const routing = { rules: data.routing?.rules };

    // Merge operation configs with defaults
    const { defaults, expansion, answering, ...llmRest } = data.llm;
    const llm = {
      ...llmRest,
      defaults,
      expansion: { ...defaults, ...expansion },
      answering: { ...defaults, ...answering }
    };

    return { ...data, server, auth, llm, rerank, segmentation, cache, deadlines, routing };
  });

export type Config = z.infer<typeof configSchema>;
