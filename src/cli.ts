/**
 * cli.ts — Solve one chain from the command line.
 *
 *   npm run solve -- <url> [budgetSeconds] [--expect <answer>]
 *
 * Answers are submitted only when QUIZ_EMAIL and QUIZ_SECRET are set.
 */

import 'dotenv/config';
import { buildSolver } from './bootstrap';
import { Logger } from './core/logger';
import { loadSolverConfig, type AnswerValue } from './core/types';

const logger = new Logger('CLI');

interface CliOptions {
  url?: string;
  budgetSeconds?: number;
  expect?: AnswerValue;
}

function printUsage(): void {
  console.error(
    [
      'Usage: npm run solve -- <url> [budgetSeconds] [--expect <answer>]',
      '',
      'Environment:',
      '  OPENAI_API_KEY              Reasoning service key (required)',
      '  QUIZ_EMAIL, QUIZ_SECRET     Submit answers to the pages\' submit endpoints',
    ].join('\n'),
  );
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    if (current === '--expect' && i + 1 < argv.length) {
      const raw = argv[i + 1];
      opts.expect = /^[-+]?\d+(?:\.\d+)?$/.test(raw) ? Number(raw) : raw;
      i += 1;
    } else if (current === '--help') {
      printUsage();
      process.exit(0);
    } else {
      positional.push(current);
    }
  }

  opts.url = positional[0];
  if (positional[1] !== undefined) {
    const budget = Number(positional[1]);
    if (!Number.isFinite(budget) || budget <= 0) {
      throw new Error(`budgetSeconds must be a positive number, got "${positional[1]}"`);
    }
    opts.budgetSeconds = budget;
  }
  return opts;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.url) {
    printUsage();
    return 1;
  }

  const config = loadSolverConfig();
  const email = process.env.QUIZ_EMAIL?.trim();
  const secret = process.env.QUIZ_SECRET?.trim();
  const { solver, browser } = buildSolver(config, email && secret ? { email, secret } : undefined);

  try {
    const result = await solver.solve(
      args.url,
      args.budgetSeconds ?? config.chainBudgetSeconds,
      args.expect === undefined ? {} : { expectedAnswer: args.expect },
    );
    console.log(JSON.stringify(result, null, 2));
    return result.state === 'DONE' && result.correct ? 0 : 2;
  } finally {
    // The exit hooks only cover signals; a normal exit must close Chromium here.
    await browser.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    logger.error('Solve failed', err);
    process.exit(1);
  });
