/**
 * answerSubmitter.ts — Posts answers to a quiz page's submit endpoint.
 *
 * The operator's email and shared secret are bound at construction by the
 * boundary layer; the chain controller only ever sees the AnswerSubmitter
 * interface and never handles credentials itself.
 */

import { z } from 'zod';
import { FetchError } from '../core/errors';
import { Logger } from '../core/logger';
import type { AnswerValue, SubmissionResult } from '../core/types';
import { lightFetch, type LightFetchResult, type StaticFetch } from '../middleware/lightFetcher';

const logger = new Logger('AnswerSubmitter');

export interface SubmitRequest {
  submitUrl: string;
  /** The quiz page the answer belongs to. */
  quizUrl: string;
  answer: AnswerValue;
  timeoutMs?: number;
}

export interface AnswerSubmitter {
  /** @throws FetchError on transport failure, non-2xx status, or an unparseable reply. */
  submit(request: SubmitRequest): Promise<SubmissionResult>;
}

const submitReplySchema = z.object({
  correct: z.boolean(),
  url: z.string().nullish(),
  reason: z.string().nullish(),
});

export class HttpAnswerSubmitter implements AnswerSubmitter {
  private readonly email: string;
  private readonly secret: string;
  private readonly staticFetch: StaticFetch;

  constructor(email: string, secret: string, staticFetch: StaticFetch = lightFetch) {
    this.email = email;
    this.secret = secret;
    this.staticFetch = staticFetch;
  }

  async submit(request: SubmitRequest): Promise<SubmissionResult> {
    const { submitUrl, quizUrl, answer, timeoutMs } = request;
    logger.info(`Submitting answer ${JSON.stringify(answer)} for ${quizUrl} to ${submitUrl}`);

    let response: LightFetchResult;
    try {
      response = await this.staticFetch(submitUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({ email: this.email, secret: this.secret, url: quizUrl, answer }),
        timeout: timeoutMs,
      });
    } catch (err) {
      throw new FetchError(submitUrl, `Submit failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new FetchError(submitUrl, `Submit endpoint returned HTTP ${response.statusCode}`, {
        statusCode: response.statusCode,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body.toString('utf8'));
    } catch (err) {
      throw new FetchError(submitUrl, 'Submit endpoint replied with invalid JSON', { cause: err });
    }

    const parsed = submitReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(submitUrl, 'Submit endpoint reply is missing a boolean "correct"', {
        cause: parsed.error,
      });
    }

    const result: SubmissionResult = {
      correct: parsed.data.correct,
      url: parsed.data.url?.trim() || null,
      reason: parsed.data.reason ?? null,
    };
    logger.info(
      `Submission judged ${result.correct ? 'correct' : 'incorrect'}` +
        (result.reason ? ` (${result.reason})` : '') +
        (result.url ? ` → next ${result.url}` : ''),
    );
    return result;
  }
}
