/**
 * quizSolver.ts — The chain controller that ties every layer together.
 *
 * ARCHITECTURE OVERVIEW
 * ─────────────────────
 * Each step of a chain runs the same pipeline:
 *
 *   1. GUARD    → ChainGuard refuses loops, runaway depth and bad URLs
 *   2. FETCH    → PageFetcher (static first, BrowserManager on demand)
 *   3. EXTRACT  → extractor picked by content kind
 *   4. CLASSIFY → TaskClassifier tags the task; file_parse pulls attachments
 *   5. ANSWER   → AnswerEngine prompts the reasoning service and validates
 *   6. SUBMIT   → AnswerSubmitter, when the page names a submit endpoint
 *   7. ADVANCE  → follow the next URL, or finish
 *
 * The chain is an explicit bounded loop carrying one Deadline. The deadline
 * is consulted before a step starts and before any retry is scheduled; a
 * call already in flight runs to its own (clamped) timeout.
 *
 * `solve()` never throws. Every exit is DONE or FAILED with a verdict.
 */

import { randomUUID } from 'node:crypto';
import { DateTime } from 'luxon';
import { AnswerEngine, classify, evidenceFrom, type ReasoningService } from './agents';
import { type Clock, Deadline } from './core/deadline';
import { ChainGuardError, DeadlineExceeded, FetchError, QuizChainError } from './core/errors';
import { Logger } from './core/logger';
import { defaultSleep, withRetry } from './core/retry';
import type {
  AnswerValue,
  Attachment,
  BoundaryResponse,
  ChainFailure,
  ChainSession,
  ChainState,
  FailureKind,
  FetchedContent,
  QuizTask,
  SolveOptions,
  SolveResult,
  SolverConfig,
  StepSummary,
  SubmissionResult,
} from './core/types';
import { isAbsoluteHttpUrl, sameOrigin } from './core/urls';
import { extractContent } from './extractors';
import { ChainGuard, type PageFetchOptions } from './middleware';
import type { AnswerSubmitter } from './services/answerSubmitter';

const logger = new Logger('QuizSolver');

/** What the controller needs from the fetch layer; PageFetcher satisfies it. */
export interface ContentFetcher {
  fetch(url: string, options?: PageFetchOptions): Promise<FetchedContent>;
}

export interface QuizSolverDeps {
  fetcher: ContentFetcher;
  reasoning: ReasoningService;
  /** Without a submitter, answers are never posted and verdicts are local. */
  submitter?: AnswerSubmitter;
  config: SolverConfig;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/** Per-run mutable state that is not part of the public session shape. */
interface RunContext {
  session: ChainSession;
  guard: ChainGuard;
  log: Logger;
  renderNext: boolean;
}

export class QuizSolver {
  private readonly fetcher: ContentFetcher;
  private readonly submitter?: AnswerSubmitter;
  private readonly config: SolverConfig;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly engine: AnswerEngine;

  constructor(deps: QuizSolverDeps) {
    this.fetcher = deps.fetcher;
    this.submitter = deps.submitter;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => DateTime.now());
    this.sleep = deps.sleep ?? defaultSleep;
    this.engine = new AnswerEngine(deps.reasoning, {
      maxAttempts: this.config.answerRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      reasoningTimeoutMs: this.config.reasoningTimeoutMs,
      minCallTimeoutMs: this.config.minCallTimeoutMs,
      sleep: this.sleep,
    });
  }

  /**
   * Solve the chain that starts at `seedUrl` within `budgetSeconds`.
   *
   * @returns The final verdict and a per-step ledger. Never rejects.
   */
  async solve(
    seedUrl: string,
    budgetSeconds: number = this.config.chainBudgetSeconds,
    options: SolveOptions = {},
  ): Promise<SolveResult> {
    const deadline = Deadline.fromBudget(budgetSeconds, this.clock);
    const session: ChainSession = {
      chainId: randomUUID(),
      startedAt: deadline.startedAt,
      deadline,
      state: 'PENDING',
      steps: [],
      pendingUrl: null,
      finalVerdict: null,
    };
    const run: RunContext = {
      session,
      guard: new ChainGuard(this.config.maxChainSteps),
      log: logger.child(session.chainId.slice(0, 8)),
      renderNext: false,
    };

    run.log.info(`Starting chain at ${seedUrl} with a ${budgetSeconds}s budget`);

    let current: string | null = seedUrl;
    let stepUrl = seedUrl;
    try {
      while (current !== null) {
        stepUrl = current;
        current = await this.runStep(run, current);
      }
      this.finishDone(run, options);
    } catch (err) {
      this.finishFailed(run, err, stepUrl);
    }

    return this.toResult(session, seedUrl);
  }

  // ── One step ───────────────────────────────────────────

  /** Run the step at `url`; returns the next URL, or null when the chain is done. */
  private async runStep(run: RunContext, url: string): Promise<string | null> {
    const { session, log } = run;
    const deadline = session.deadline;

    if (deadline.isExpired()) {
      throw new DeadlineExceeded(
        `Chain budget exhausted before step ${session.steps.length + 1} (${deadline.describe()})`,
      );
    }
    run.guard.admit(url);

    const task = this.newTask(session.steps.length, url);
    session.steps.push(task);
    log.info(`Step ${task.index + 1}: ${url} (${deadline.describe()})`);

    try {
      // ── FETCHING ──
      this.transition(run, 'FETCHING');
      const fetched = await this.fetchWithRetry(url, run.renderNext, deadline);
      task.rawContent = fetched.raw;
      task.contentKind = fetched.contentKind;
      task.fetchMethod = fetched.fetchMethod;

      // ── EXTRACTING ──
      this.transition(run, 'EXTRACTING');
      const extraction = await extractContent(
        fetched.contentKind,
        fetched.raw,
        fetched.finalUrl,
        this.config.maxPromptChars,
      );
      task.extractedData = extraction.data;
      task.contentText = extraction.contentText;
      task.submitUrl =
        extraction.data.variant === 'html-table' || extraction.data.variant === 'html-text'
          ? extraction.data.submitUrl
          : null;

      // ── CLASSIFYING ──
      this.transition(run, 'CLASSIFYING');
      task.taskKind = classify(task.contentText, evidenceFrom(extraction.data));
      if (task.taskKind === 'file_parse') {
        task.attachments = await this.resolveAttachments(task, deadline, log);
      }

      // ── ANSWERING ──
      this.transition(run, 'ANSWERING');
      await this.answerTask(task, deadline);

      if (task.submitUrl && this.submitter) {
        await this.submitWithResubmits(task, deadline, log);
      }

      // ── ADVANCING ──
      this.transition(run, 'ADVANCING');
      const next = task.submission?.url ?? task.nextUrl;
      if (next === null) {
        session.pendingUrl = null;
        return null;
      }
      if (!isAbsoluteHttpUrl(next)) {
        throw new ChainGuardError('InvalidNextUrl', next, `Next URL is not an absolute http(s) URL: ${next}`);
      }

      session.pendingUrl = next;
      run.renderNext = task.fetchMethod === 'browser' && sameOrigin(next, url);
      log.info(`Advancing to ${next}${run.renderNext ? ' (render hint set)' : ''}`);
      return next;
    } finally {
      task.finishedAt = this.clock();
    }
  }

  private async fetchWithRetry(url: string, renderJs: boolean, deadline: Deadline): Promise<FetchedContent> {
    const localTimeout = renderJs ? this.config.renderTimeoutMs : this.config.fetchTimeoutMs;

    return withRetry(
      () =>
        this.fetcher.fetch(url, {
          renderJs,
          timeoutMs: deadline.clampTimeout(localTimeout, this.config.minCallTimeoutMs),
        }),
      {
        maxAttempts: this.config.fetchRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        sleep: this.sleep,
        shouldRetry: isRetryableFetchError,
        canStartAttempt: () => !deadline.isExpired(),
        onRetry: (attempt, err, delayMs) =>
          logger.warn(`Fetch attempt ${attempt} failed (${err.message}) — retrying in ${delayMs}ms`),
      },
    );
  }

  /**
   * Fetch and extract the step's linked data files. A file that fails is
   * logged and left out; the answer is still attempted with what remains.
   */
  private async resolveAttachments(task: QuizTask, deadline: Deadline, log: Logger): Promise<Attachment[]> {
    const data = task.extractedData;
    if (!data || (data.variant !== 'html-table' && data.variant !== 'html-text')) return [];

    const links = data.links.filter((link) => link.isDataFile).slice(0, this.config.maxAttachments);
    const attachments: Attachment[] = [];

    for (const link of links) {
      if (deadline.isExpired()) {
        log.warn(`Deadline reached — skipping remaining attachments from ${link.href}`);
        break;
      }
      try {
        const fetched = await this.fetcher.fetch(link.href, {
          timeoutMs: deadline.clampTimeout(this.config.fetchTimeoutMs, this.config.minCallTimeoutMs),
        });
        const extraction = await extractContent(
          fetched.contentKind,
          fetched.raw,
          fetched.finalUrl,
          this.config.maxPromptChars,
        );
        attachments.push({ url: link.href, contentKind: fetched.contentKind, extraction });
        log.info(`Attached ${link.href} as ${fetched.contentKind}`);
      } catch (err) {
        if (!(err instanceof QuizChainError)) throw err;
        log.warn(`Skipping attachment ${link.href}: ${err.message}`);
      }
    }

    return attachments;
  }

  private async answerTask(
    task: QuizTask,
    deadline: Deadline,
    feedback?: { previousAnswer: AnswerValue; reason: string | null },
  ): Promise<void> {
    if (task.taskKind === null || task.extractedData === null) {
      throw new Error(`Step ${task.index + 1} reached ANSWERING unclassified`);
    }

    const attemptsBefore = task.attemptCount;
    const result = await this.engine.answer(
      {
        taskKind: task.taskKind,
        url: task.url,
        contentText: task.contentText,
        data: task.extractedData,
        attachments: task.attachments,
      },
      {
        currentUrl: task.url,
        deadline,
        feedback,
        onAttempt: (attempt) => {
          task.attemptCount = attemptsBefore + attempt;
        },
      },
    );

    task.answer = result.answer;
    task.nextUrl = result.nextUrl;
  }

  /**
   * Post the answer; while the endpoint says it is wrong and offers no next
   * URL, re-answer with its feedback up to `resubmitAttempts` times.
   */
  private async submitWithResubmits(task: QuizTask, deadline: Deadline, log: Logger): Promise<void> {
    let submission = await this.submitOnce(task, deadline);
    task.submission = submission;

    let resubmits = 0;
    while (
      !submission.correct &&
      submission.url === null &&
      task.answer !== null &&
      resubmits < this.config.resubmitAttempts &&
      !deadline.isExpired()
    ) {
      resubmits++;
      log.info(`Answer judged wrong — re-answering with feedback (${resubmits}/${this.config.resubmitAttempts})`);
      await this.answerTask(task, deadline, { previousAnswer: task.answer, reason: submission.reason });
      submission = await this.submitOnce(task, deadline);
      task.submission = submission;
    }
  }

  private async submitOnce(task: QuizTask, deadline: Deadline): Promise<SubmissionResult> {
    const { submitter } = this;
    const submitUrl = task.submitUrl;
    const answer = task.answer;
    if (!submitter || submitUrl === null || answer === null) {
      throw new Error(`Step ${task.index + 1} has nothing to submit`);
    }

    return withRetry(
      () =>
        submitter.submit({
          submitUrl,
          quizUrl: task.url,
          answer,
          timeoutMs: deadline.clampTimeout(this.config.fetchTimeoutMs, this.config.minCallTimeoutMs),
        }),
      {
        maxAttempts: this.config.fetchRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        sleep: this.sleep,
        shouldRetry: isRetryableFetchError,
        canStartAttempt: () => !deadline.isExpired(),
      },
    );
  }

  // ── Verdicts ───────────────────────────────────────────

  private finishDone(run: RunContext, options: SolveOptions): void {
    const { session } = run;
    const last = session.steps[session.steps.length - 1];
    const answer = last?.answer ?? null;
    if (!last || answer === null) {
      throw new Error('Chain finished without an answer');
    }

    let correct = true;
    if (last.submission) {
      correct = last.submission.correct;
    } else if (options.expectedAnswer !== undefined) {
      correct = answersMatch(answer, options.expectedAnswer);
    }

    session.finalVerdict = { state: 'DONE', answer, correct };
    this.transition(run, 'DONE');
    run.log.info(
      `Chain DONE after ${session.steps.length} step(s): ${JSON.stringify(answer)} ` +
        `(${correct ? 'correct' : 'incorrect'}, ${session.deadline.describe()})`,
    );
  }

  /** `stepUrl` is the URL of the step that was running (or about to start). */
  private finishFailed(run: RunContext, err: unknown, stepUrl: string): void {
    const { session } = run;
    const failure: ChainFailure = {
      kind: failureKindOf(err),
      message: err instanceof Error ? err.message : String(err),
      url: err instanceof ChainGuardError ? err.url : stepUrl,
    };

    if (failure.kind === 'UnexpectedError') {
      run.log.error(`Chain failed unexpectedly at ${failure.url}`, err);
    } else {
      run.log.warn(`Chain FAILED with ${failure.kind} at ${failure.url}: ${failure.message}`);
    }

    session.finalVerdict = { state: 'FAILED', failure, correct: false };
    this.transition(run, 'FAILED');
  }

  private transition(run: RunContext, state: ChainState): void {
    run.log.debug(`${run.session.state} → ${state}`);
    run.session.state = state;
  }

  // ── Ledger ─────────────────────────────────────────────

  private newTask(index: number, url: string): QuizTask {
    return {
      index,
      url,
      rawContent: null,
      contentKind: null,
      fetchMethod: null,
      taskKind: null,
      extractedData: null,
      contentText: '',
      attachments: [],
      submitUrl: null,
      answer: null,
      nextUrl: null,
      submission: null,
      attemptCount: 0,
      startedAt: this.clock(),
      finishedAt: null,
    };
  }

  private toResult(session: ChainSession, seedUrl: string): SolveResult {
    const verdict = session.finalVerdict;
    const steps: StepSummary[] = session.steps.map((task) => ({
      index: task.index,
      url: task.url,
      contentKind: task.contentKind,
      taskKind: task.taskKind,
      answer: task.answer,
      nextUrl: task.nextUrl,
      correct: task.submission?.correct ?? null,
      attempts: task.attemptCount,
      durationMs: (task.finishedAt ?? this.clock()).diff(task.startedAt).as('milliseconds'),
    }));
    const lastUrl = session.steps[session.steps.length - 1]?.url ?? seedUrl;

    if (verdict?.state === 'DONE') {
      return {
        chainId: session.chainId,
        state: 'DONE',
        answer: verdict.answer,
        correct: verdict.correct,
        finalUrl: lastUrl,
        pendingUrl: null,
        failure: null,
        steps,
        elapsedMs: session.deadline.elapsedMs(),
      };
    }

    const failure: ChainFailure =
      verdict?.state === 'FAILED'
        ? verdict.failure
        : { kind: 'UnexpectedError', message: 'Chain ended without a verdict', url: lastUrl };

    return {
      chainId: session.chainId,
      state: 'FAILED',
      answer: [...session.steps].reverse().find((task) => task.answer !== null)?.answer ?? null,
      correct: false,
      finalUrl: lastUrl,
      pendingUrl: session.pendingUrl,
      failure,
      steps,
      elapsedMs: session.deadline.elapsedMs(),
    };
  }
}

// ─── Helpers ────────────────────────────────────────────────

/** The boundary's `{correct, url}` for a finished chain. */
export function toBoundaryResponse(result: SolveResult): BoundaryResponse {
  return { correct: result.correct, url: result.pendingUrl };
}

/** Client errors other than 408 and 429 will not change on a retry. */
function isRetryableFetchError(err: Error): boolean {
  if (!(err instanceof FetchError)) return false;
  const status = err.statusCode;
  if (status !== undefined && status >= 400 && status < 500) {
    return status === 408 || status === 429;
  }
  return true;
}

function failureKindOf(err: unknown): FailureKind {
  if (err instanceof QuizChainError && err.kind !== 'ClassificationAmbiguity') {
    return err.kind;
  }
  return 'UnexpectedError';
}

/**
 * Loose equality for the local verdict: numbers (or numeric strings) within
 * 1e-9, strings case- and whitespace-insensitive, everything else by JSON.
 */
export function answersMatch(actual: AnswerValue, expected: AnswerValue): boolean {
  const a = asNumber(actual);
  const b = asNumber(expected);
  if (a !== null && b !== null) return Math.abs(a - b) < 1e-9;

  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual.trim().toLowerCase() === expected.trim().toLowerCase();
  }
  return JSON.stringify(actual) === JSON.stringify(expected);
}

function asNumber(value: AnswerValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && /^[-+]?\d+(?:\.\d+)?$/.test(value.trim())) return Number(value.trim());
  return null;
}
