/**
 * types.ts — Shared type definitions for the quiz-solving pipeline.
 *
 * Every layer (fetcher, extractors, classifier, answer engine, the chain
 * controller) agrees on the shapes defined here. Content and task kinds are
 * closed unions so that dispatch over them can be checked for exhaustiveness.
 */

import type { DateTime } from 'luxon';
import type { Deadline } from './deadline';

// ─── Kinds ─────────────────────────────────────────────────

/** What a fetched resource turned out to be. */
export type ContentKind = 'html' | 'pdf' | 'csv' | 'xlsx' | 'json';

/** The inferred category of a quiz step; drives prompt selection. */
export type TaskKind = 'scrape' | 'statistic' | 'file_parse' | 'lookup' | 'unknown';

/** Which fetch path produced the content. */
export type FetchMethod = 'light' | 'browser';

// ─── Fetch result ──────────────────────────────────────────

export interface FetchedContent {
  /** The URL that was requested. */
  url: string;
  /** The URL after redirects. */
  finalUrl: string;
  contentKind: ContentKind;
  raw: Buffer;
  contentType?: string;
  statusCode: number;
  fetchMethod: FetchMethod;
}

// ─── Extraction ────────────────────────────────────────────

export interface PageLink {
  /** Absolute URL, resolved against the page URL. */
  href: string;
  text: string;
  /** Points at a .csv / .xlsx / .pdf / .json resource. */
  isDataFile: boolean;
}

export interface HtmlTable {
  caption?: string;
  headers: string[];
  rows: string[][];
}

interface HtmlPayload {
  paragraphs: string[];
  /** The literal question text, when the page states one. */
  question: string | null;
  links: PageLink[];
  /** Where the page asks answers to be POSTed, if anywhere. */
  submitUrl: string | null;
}

export type ExtractedData =
  | ({ variant: 'html-table'; tables: HtmlTable[] } & HtmlPayload)
  | ({ variant: 'html-text' } & HtmlPayload)
  | { variant: 'pdf-text'; pageCount: number; text: string }
  | {
      variant: 'spreadsheet-rows';
      source: 'csv' | 'xlsx';
      headers: string[];
      rows: string[][];
    }
  | { variant: 'json-object'; value: unknown };

export type ExtractionVariant = ExtractedData['variant'];

export interface Extraction {
  data: ExtractedData;
  /** Human-readable summary used in prompts (already truncated). */
  contentText: string;
}

/** A linked data file fetched and extracted for a `file_parse` task. */
export interface Attachment {
  url: string;
  contentKind: ContentKind;
  extraction: Extraction;
}

// ─── Answers ───────────────────────────────────────────────

export type AnswerValue =
  | string
  | number
  | boolean
  | unknown[]
  | { [key: string]: unknown };

export interface AnswerResult {
  answer: AnswerValue;
  nextUrl: string | null;
  /** Reasoning-service calls used, including reformulations. */
  attempts: number;
}

/** Reply from a quiz submit endpoint. */
export interface SubmissionResult {
  correct: boolean;
  url: string | null;
  reason: string | null;
}

// ─── Chain state ───────────────────────────────────────────

export type ChainState =
  | 'PENDING'
  | 'FETCHING'
  | 'EXTRACTING'
  | 'CLASSIFYING'
  | 'ANSWERING'
  | 'ADVANCING'
  | 'DONE'
  | 'FAILED';

export type FailureKind =
  | 'FetchError'
  | 'ExtractionError'
  | 'ResponseFormatError'
  | 'ReasoningServiceError'
  | 'DeadlineExceeded'
  | 'ChainLoop'
  | 'MaxStepsExceeded'
  | 'InvalidNextUrl'
  | 'UnexpectedError';

export interface ChainFailure {
  kind: FailureKind;
  message: string;
  /** URL of the step that failed (or was refused). */
  url: string;
}

/**
 * One step of a chain. Created when the controller begins the step and
 * filled in place as each component finishes; never shared between chains.
 */
export interface QuizTask {
  index: number;
  url: string;
  rawContent: Buffer | null;
  contentKind: ContentKind | null;
  fetchMethod: FetchMethod | null;
  taskKind: TaskKind | null;
  extractedData: ExtractedData | null;
  contentText: string;
  attachments: Attachment[];
  submitUrl: string | null;
  answer: AnswerValue | null;
  nextUrl: string | null;
  submission: SubmissionResult | null;
  /** Reasoning-service calls spent on this step. */
  attemptCount: number;
  startedAt: DateTime;
  finishedAt: DateTime | null;
}

export type ChainVerdict =
  | { state: 'DONE'; answer: AnswerValue; correct: boolean }
  | { state: 'FAILED'; failure: ChainFailure; correct: false };

export interface ChainSession {
  chainId: string;
  startedAt: DateTime;
  deadline: Deadline;
  state: ChainState;
  steps: QuizTask[];
  /** Next URL decided but not yet started. */
  pendingUrl: string | null;
  finalVerdict: ChainVerdict | null;
}

// ─── Solve result ──────────────────────────────────────────

export interface StepSummary {
  index: number;
  url: string;
  contentKind: ContentKind | null;
  taskKind: TaskKind | null;
  answer: AnswerValue | null;
  nextUrl: string | null;
  correct: boolean | null;
  attempts: number;
  durationMs: number;
}

export interface SolveOptions {
  /** When given and no submit endpoint judges the answer, the verdict compares against it. */
  expectedAnswer?: AnswerValue;
}

export interface SolveResult {
  chainId: string;
  state: 'DONE' | 'FAILED';
  answer: AnswerValue | null;
  correct: boolean;
  /** URL of the last step the chain started. */
  finalUrl: string;
  pendingUrl: string | null;
  failure: ChainFailure | null;
  steps: StepSummary[];
  elapsedMs: number;
}

/** Shape handed back to the HTTP boundary. */
export interface BoundaryResponse {
  correct: boolean;
  url: string | null;
}

// ─── Configuration ─────────────────────────────────────────

/**
 * Settings for the chain controller and its collaborators.
 * Quiz endpoint credentials live in ServerConfig, never here.
 */
export interface SolverConfig {
  // Reasoning service
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  reasoningModel: string;
  llmBudgetCents: number;

  // Budget and timeouts
  chainBudgetSeconds: number;
  fetchTimeoutMs: number;
  renderTimeoutMs: number;
  reasoningTimeoutMs: number;
  minCallTimeoutMs: number;

  // Retries
  fetchRetries: number;
  answerRetries: number;
  retryBaseDelayMs: number;
  resubmitAttempts: number;

  // Chain shape
  maxChainSteps: number;
  maxPromptChars: number;
  maxAttachments: number;

  // Rendering
  browserPoolSize: number;
  renderSettleMs: number;
  chromeExecutablePath?: string;
}

/** Boundary-only settings: who we are and the shared secret callers must present. */
export interface ServerConfig {
  email: string;
  secret: string;
  port: number;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

function optionalString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/** Build a SolverConfig from process.env with defaults. */
export function loadSolverConfig(env: Env = process.env): SolverConfig {
  return {
    openaiApiKey: optionalString(env, 'OPENAI_API_KEY'),
    openaiBaseUrl: optionalString(env, 'OPENAI_BASE_URL'),
    reasoningModel: optionalString(env, 'REASONING_MODEL') ?? 'gpt-4o-mini',
    llmBudgetCents: intFromEnv(env, 'LLM_BUDGET_CENTS', 100),

    chainBudgetSeconds: intFromEnv(env, 'CHAIN_BUDGET_SECONDS', 170),
    fetchTimeoutMs: intFromEnv(env, 'FETCH_TIMEOUT_MS', 30_000),
    renderTimeoutMs: intFromEnv(env, 'RENDER_TIMEOUT_MS', 30_000),
    reasoningTimeoutMs: intFromEnv(env, 'REASONING_TIMEOUT_MS', 60_000),
    minCallTimeoutMs: intFromEnv(env, 'MIN_CALL_TIMEOUT_MS', 2_000),

    fetchRetries: Math.max(1, intFromEnv(env, 'FETCH_RETRIES', 3)),
    answerRetries: Math.max(1, intFromEnv(env, 'ANSWER_RETRIES', 3)),
    retryBaseDelayMs: intFromEnv(env, 'RETRY_BASE_DELAY_MS', 500),
    resubmitAttempts: intFromEnv(env, 'RESUBMIT_ATTEMPTS', 1),

    maxChainSteps: Math.max(1, intFromEnv(env, 'MAX_CHAIN_STEPS', 25)),
    maxPromptChars: intFromEnv(env, 'MAX_PROMPT_CHARS', 24_000),
    maxAttachments: intFromEnv(env, 'MAX_ATTACHMENTS', 3),

    browserPoolSize: Math.max(1, intFromEnv(env, 'BROWSER_POOL_SIZE', 2)),
    renderSettleMs: intFromEnv(env, 'RENDER_SETTLE_MS', 1_000),
    chromeExecutablePath: optionalString(env, 'CHROME_EXECUTABLE_PATH'),
  };
}

/** Build the boundary config; both credentials are required. */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const email = optionalString(env, 'QUIZ_EMAIL');
  const secret = optionalString(env, 'QUIZ_SECRET');
  if (!email || !secret) {
    throw new Error('QUIZ_EMAIL and QUIZ_SECRET must be set in the environment.  See .env.example.');
  }
  return {
    email,
    secret,
    port: intFromEnv(env, 'PORT', 5000),
  };
}
