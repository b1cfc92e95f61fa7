/**
 * server.ts — HTTP boundary: authenticates callers and maps requests onto
 * `QuizSolver.solve()`.
 *
 *   GET  /      → liveness + operator email
 *   POST /quiz  → {email, secret, url} → {correct, url}
 *
 * Credentials are checked here and never travel further than the answer
 * submitter built alongside the app.
 */

import { timingSafeEqual } from 'node:crypto';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { Logger } from './core/logger';
import type { ServerConfig, SolveResult } from './core/types';
import { toBoundaryResponse } from './quizSolver';

const logger = new Logger('Server');

/** The slice of QuizSolver the boundary calls; tests pass a fake. */
export interface ChainSolver {
  solve(url: string, budgetSeconds?: number): Promise<SolveResult>;
}

export interface AppDeps {
  solver: ChainSolver;
  config: ServerConfig;
}

const quizRequestSchema = z.object({
  email: z.string(),
  secret: z.string(),
  url: z.string().min(1, 'Missing quiz URL'),
});

/** Compare secrets without leaking where they differ. */
export function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createApp({ solver, config }: AppDeps): Hono {
  const app = new Hono();

  // ── Request logging ──────────────────────────────────────
  app.use('*', async (c, next) => {
    const started = Date.now();
    await next();
    logger.info(`${c.req.method} ${c.req.path} → ${c.res.status} (${Date.now() - started}ms)`);
  });

  app.get('/', (c) =>
    c.json({
      status: 'running',
      message: 'Quiz chain solver API',
      email: config.email,
    }),
  );

  app.post(
    '/quiz',
    zValidator('json', quizRequestSchema, (result, c) => {
      if (!result.success) {
        const message = result.error.issues
          .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        return c.json({ error: message }, 400);
      }
    }),
    async (c) => {
      const body = c.req.valid('json');

      if (!secretsMatch(body.secret, config.secret)) {
        logger.warn(`Invalid secret attempt from ${body.email}`);
        return c.json({ error: 'Invalid secret' }, 403);
      }
      if (body.email !== config.email) {
        logger.warn(`Email mismatch: got ${body.email}`);
        return c.json({ error: 'Email mismatch' }, 403);
      }

      logger.info(`Received quiz request for ${body.url}`);
      const result = await solver.solve(body.url);
      return c.json(toBoundaryResponse(result), 200);
    },
  );

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    logger.error('Unhandled error', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
