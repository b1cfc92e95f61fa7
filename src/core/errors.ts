/**
 * errors.ts — Error taxonomy for the chain.
 *
 * Every error the controller reasons about extends QuizChainError and carries
 * a stable `kind`, which becomes the FAILED verdict's failure kind. Retry
 * policy reads `retryable`; nothing else inspects messages.
 */

import type { FailureKind } from './types';

export abstract class QuizChainError extends Error {
  abstract readonly kind: FailureKind | 'ClassificationAmbiguity';
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options?.retryable ?? false;
  }
}

/** Network error, non-2xx status, or render timeout. */
export class FetchError extends QuizChainError {
  readonly kind = 'FetchError' as const;
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(`${message} (${url})`, { cause: options?.cause, retryable: true });
    this.url = url;
    this.statusCode = options?.statusCode;
  }
}

/** Bytes that do not parse as the content kind they claim to be. Never retried. */
export class ExtractionError extends QuizChainError {
  readonly kind = 'ExtractionError' as const;
  readonly contentKind: string;

  constructor(contentKind: string, message: string, options?: { cause?: unknown }) {
    super(`Could not extract ${contentKind}: ${message}`, { cause: options?.cause });
    this.contentKind = contentKind;
  }
}

/** No classification rule matched. Degrades to the `unknown` task kind. */
export class ClassificationAmbiguity extends QuizChainError {
  readonly kind = 'ClassificationAmbiguity' as const;
}

/** The reasoning service replied with something that is not the answer schema. */
export class ResponseFormatError extends QuizChainError {
  readonly kind = 'ResponseFormatError' as const;
  /** The raw reply, kept for the reformulation prompt. */
  readonly rawReply: string;

  constructor(message: string, rawReply: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.rawReply = rawReply;
  }
}

/** Transport-level failure talking to the reasoning service. */
export class ReasoningServiceError extends QuizChainError {
  readonly kind = 'ReasoningServiceError' as const;
}

/** The chain budget ran out before a new step or call could start. */
export class DeadlineExceeded extends QuizChainError {
  readonly kind = 'DeadlineExceeded' as const;
}

/** The chain pointer was refused: revisited, too deep, or not a usable URL. */
export class ChainGuardError extends QuizChainError {
  readonly kind: 'ChainLoop' | 'MaxStepsExceeded' | 'InvalidNextUrl';
  readonly url: string;

  constructor(kind: 'ChainLoop' | 'MaxStepsExceeded' | 'InvalidNextUrl', url: string, message: string) {
    super(message);
    this.kind = kind;
    this.url = url;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
