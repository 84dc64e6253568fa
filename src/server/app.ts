/**
 * HTTP Application
 *
 * Routes:
 * - POST /api/v1/run   Answer questions about a document
 * - GET  /health       Liveness check
 */

import { Hono } from 'hono';
import { bearerAuth } from 'hono/bearer-auth';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { logWarning } from '@/utils/logger';

export const RunRequestSchema = z.object({
  documents: z.string().url(),
  questions: z.array(z.string().trim().min(1)).min(1)
});
export type RunRequest = z.infer<typeof RunRequestSchema>;

/**
 * Anything that answers questions about a document.
 */
export interface RunHandler {
  run(documentUrl: string, questions: string[]): Promise<string[]>;
}

export interface AppOptions {
  /** Resolved on first request */
  getHandler: () => Promise<RunHandler>;
  /** When set, /api routes require `Authorization: Bearer <token>` */
  bearerToken?: string;
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  if (options.bearerToken) {
    app.use('/api/*', bearerAuth({ token: options.bearerToken }));
  }

  app.post('/api/v1/run', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = RunRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: 'Invalid request',
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        },
        400
      );
    }

    const handler = await options.getHandler();
    const answers = await handler.run(parsed.data.documents, parsed.data.questions);
    return c.json({ answers });
  });

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    logWarning(`Unhandled error on ${c.req.method} ${c.req.path}`, error);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
