/**
 * answerEngine.ts — Prompt → reasoning service → validated answer.
 *
 * VALIDATION
 * ──────────
 * The reply must be a JSON object `{"answer": <value>, "next_url": <string|null>}`.
 * Markdown code fences and stray prose around the object are tolerated. A
 * missing or null `answer`, unparseable JSON, or a `next_url` pointing back at
 * the current page is a ResponseFormatError.
 *
 * RETRIES
 * ───────
 * Format errors are re-prompted with the problem and the offending reply
 * quoted back, up to `maxAttempts` calls. Retryable transport errors share
 * the same budget. No new attempt starts once the chain deadline has passed.
 */

import { z } from 'zod';
import type { Deadline } from '../core/deadline';
import { ReasoningServiceError, ResponseFormatError } from '../core/errors';
import { Logger } from '../core/logger';
import { withRetry, withTimeout } from '../core/retry';
import type { AnswerResult, AnswerValue } from '../core/types';
import { sameUrl } from '../core/urls';
import { ANSWER_SCHEMA_HINT, buildPrompt, feedbackNote, reformulationNote, type PromptInput } from './prompts';
import type { ReasoningService } from './reasoningService';

const logger = new Logger('AnswerEngine');

const answerReplySchema = z.object({
  answer: z.union([z.string(), z.number(), z.boolean(), z.array(z.unknown()), z.record(z.unknown())]),
  next_url: z.string().nullish(),
});

const NUMERIC_STRING = /^[-+]?\d+(?:\.\d+)?$/;

export interface AnswerEngineOptions {
  maxAttempts: number;
  baseDelayMs: number;
  reasoningTimeoutMs: number;
  minCallTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface AnswerContext {
  currentUrl: string;
  deadline: Deadline;
  /** Set when re-answering after a submit endpoint rejected an answer. */
  feedback?: { previousAnswer: AnswerValue; reason: string | null };
  /** Called with the 1-based attempt number before each reasoning call. */
  onAttempt?: (attempt: number) => void;
}

export class AnswerEngine {
  private readonly reasoning: ReasoningService;
  private readonly options: AnswerEngineOptions;

  constructor(reasoning: ReasoningService, options: AnswerEngineOptions) {
    this.reasoning = reasoning;
    this.options = options;
  }

  /**
   * Produce an answer (and optional chain pointer) for one step.
   *
   * @throws ResponseFormatError when every attempt produced an unusable reply.
   * @throws ReasoningServiceError when the service fails and cannot be retried.
   */
  async answer(input: PromptInput, context: AnswerContext): Promise<AnswerResult> {
    const basePrompt = buildPrompt(input);
    const feedback = context.feedback
      ? feedbackNote(context.feedback.previousAnswer, context.feedback.reason)
      : null;
    let attempts = 0;

    const parsed = await withRetry(
      async (attempt, previousError) => {
        attempts = attempt;
        context.onAttempt?.(attempt);

        const parts = [basePrompt];
        if (feedback) parts.push(feedback);
        if (previousError instanceof ResponseFormatError) {
          parts.push(reformulationNote(previousError.message, previousError.rawReply));
        }

        const timeoutMs = context.deadline.clampTimeout(
          this.options.reasoningTimeoutMs,
          this.options.minCallTimeoutMs,
        );
        logger.debug(`Attempt ${attempt}: calling reasoning service (timeout ${timeoutMs}ms)`);

        const raw = await withTimeout(
          this.reasoning.complete(parts.join('\n\n'), ANSWER_SCHEMA_HINT, { timeoutMs }),
          timeoutMs,
          () => new ReasoningServiceError(`Reasoning call timed out after ${timeoutMs}ms`, { retryable: true }),
        );

        return parseAnswerReply(raw, context.currentUrl);
      },
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        sleep: this.options.sleep,
        shouldRetry: (err) =>
          err instanceof ResponseFormatError || (err instanceof ReasoningServiceError && err.retryable),
        canStartAttempt: () => !context.deadline.isExpired(),
        onRetry: (attempt, err, delayMs) =>
          logger.warn(`Attempt ${attempt} failed (${err.message}) — retrying in ${delayMs}ms`),
      },
    );

    logger.info(
      `Answer after ${attempts} attempt(s): ${JSON.stringify(parsed.answer)}` +
        (parsed.nextUrl ? ` → next ${parsed.nextUrl}` : ''),
    );

    return { ...parsed, attempts };
  }
}

// ─── Reply parsing ──────────────────────────────────────────

/** Pull the JSON object out of a reply that may carry fences or prose. */
function unwrapJson(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) return fenced[1];
  if (trimmed.startsWith('{')) return trimmed;

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  return start >= 0 && end > start ? trimmed.slice(start, end + 1) : trimmed;
}

function coerceAnswer(value: AnswerValue): AnswerValue {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!NUMERIC_STRING.test(trimmed)) return trimmed;
    const parsed = Number(trimmed);
    // Integers past 2^53 do not round-trip through a double.
    return Number.isInteger(parsed) && !Number.isSafeInteger(parsed) ? trimmed : parsed;
  }
  return value;
}

/**
 * Validate a raw reply against the answer schema.
 * @throws ResponseFormatError
 */
export function parseAnswerReply(raw: string, currentUrl: string): Omit<AnswerResult, 'attempts'> {
  if (raw.trim() === '') {
    throw new ResponseFormatError('Reply was empty', raw);
  }

  let json: unknown;
  try {
    json = JSON.parse(unwrapJson(raw));
  } catch (err) {
    throw new ResponseFormatError('Reply is not valid JSON', raw, { cause: err });
  }

  const result = answerReplySchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ResponseFormatError(`Reply does not match the answer schema (${issues.join('; ')})`, raw);
  }

  const nextUrl = result.data.next_url?.trim() || null;
  if (nextUrl && sameUrl(nextUrl, currentUrl)) {
    throw new ResponseFormatError(`next_url points back at the current page (${currentUrl})`, raw);
  }

  return { answer: coerceAnswer(result.data.answer), nextUrl };
}
