/**
 * index.ts — HTTP server entry point (`npm start`).
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { buildSolver } from './bootstrap';
import { Logger } from './core/logger';
import { loadServerConfig, loadSolverConfig } from './core/types';
import { createApp } from './server';

const logger = new Logger('Main');

function main(): void {
  const serverConfig = loadServerConfig();
  const solverConfig = loadSolverConfig();

  if (!solverConfig.openaiApiKey) {
    throw new Error('OPENAI_API_KEY must be set in the environment.  See .env.example.');
  }

  const { solver } = buildSolver(solverConfig, {
    email: serverConfig.email,
    secret: serverConfig.secret,
  });
  const app = createApp({ solver, config: serverConfig });

  serve({ fetch: app.fetch, port: serverConfig.port, hostname: '0.0.0.0' }, (info) => {
    logger.info(`Quiz solver listening on http://localhost:${info.port}`);
  });
}

try {
  main();
} catch (err) {
  logger.error('Failed to start server', err);
  process.exit(1);
}
