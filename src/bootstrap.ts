/**
 * bootstrap.ts — Wires the production collaborators into a QuizSolver.
 *
 * Shared by the HTTP entry point and the CLI so both run the same stack:
 * got-scraping static fetches, the BrowserManager pool for rendering, and
 * the OpenAI reasoning adapter.
 */

import { OpenAIReasoningService } from './agents';
import { BrowserManager } from './core/browserManager';
import type { SolverConfig } from './core/types';
import { PageFetcher } from './middleware';
import { QuizSolver } from './quizSolver';
import { HttpAnswerSubmitter } from './services/answerSubmitter';

export interface Credentials {
  email: string;
  secret: string;
}

export interface SolverStack {
  solver: QuizSolver;
  browser: BrowserManager;
}

/**
 * Build a solver. Answers are only submitted when `credentials` are given;
 * they are bound into the submitter and go nowhere else.
 */
export function buildSolver(config: SolverConfig, credentials?: Credentials): SolverStack {
  const browser = BrowserManager.getInstance(config);
  const fetcher = new PageFetcher({ renderer: browser, defaultTimeoutMs: config.fetchTimeoutMs });
  const reasoning = new OpenAIReasoningService(config);
  const submitter = credentials ? new HttpAnswerSubmitter(credentials.email, credentials.secret) : undefined;

  return {
    solver: new QuizSolver({ fetcher, reasoning, submitter, config }),
    browser,
  };
}
