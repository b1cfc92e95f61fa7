/**
 * reasoningService.ts — The language-model boundary.
 *
 * The answer engine only ever sees the `ReasoningService` interface, so tests
 * swap in a scripted fake and deployments can point the OpenAI adapter at any
 * OpenAI-compatible proxy via OPENAI_BASE_URL.
 *
 * COST CONTROL
 * ────────────
 * Every completion's token usage is priced and added to a cumulative spend.
 * Once it reaches LLM_BUDGET_CENTS the adapter refuses further calls with a
 * non-retryable ReasoningServiceError.
 */

import OpenAI from 'openai';
import { ReasoningServiceError } from '../core/errors';
import { Logger } from '../core/logger';
import type { SolverConfig } from '../core/types';

const logger = new Logger('ReasoningService');

export interface CompleteOptions {
  /** Local timeout for this call (already clamped to the chain budget). */
  timeoutMs?: number;
}

export interface ReasoningService {
  /**
   * Send `prompt` and return the model's raw text reply. `schemaHint`
   * describes the JSON the reply must match.
   */
  complete(prompt: string, schemaHint: string, options?: CompleteOptions): Promise<string>;
}

// gpt-4o-mini pricing (approximate).
const INPUT_COST_PER_TOKEN = 0.15 / 1_000_000;
const OUTPUT_COST_PER_TOKEN = 0.6 / 1_000_000;

const SYSTEM_PROMPT = `You solve short data quiz tasks: reading tables, computing simple statistics, parsing files, and answering factual questions about a page.

Reply with ONLY a JSON object. Do NOT wrap it in markdown code fences. Do not add commentary outside the JSON.`;

type ReasoningConfig = Pick<
  SolverConfig,
  'openaiApiKey' | 'openaiBaseUrl' | 'reasoningModel' | 'llmBudgetCents' | 'reasoningTimeoutMs'
>;

export class OpenAIReasoningService implements ReasoningService {
  private client: OpenAI | null = null;
  private cumulativeSpendCents = 0;
  private readonly config: ReasoningConfig;

  constructor(config: ReasoningConfig) {
    this.config = config;
  }

  get spendCents(): number {
    return this.cumulativeSpendCents;
  }

  async complete(prompt: string, schemaHint: string, options?: CompleteOptions): Promise<string> {
    if (this.cumulativeSpendCents >= this.config.llmBudgetCents) {
      throw new ReasoningServiceError(
        `LLM budget exhausted (${this.cumulativeSpendCents.toFixed(2)}¢ / ${this.config.llmBudgetCents}¢)`,
        { retryable: false },
      );
    }

    const client = this.getClient();
    const timeout = options?.timeoutMs ?? this.config.reasoningTimeoutMs;

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await client.chat.completions.create(
        {
          model: this.config.reasoningModel,
          messages: [
            { role: 'system', content: `${SYSTEM_PROMPT}\n\nRequired schema:\n${schemaHint}` },
            { role: 'user', content: prompt },
          ],
          response_format: { type: 'json_object' },
          temperature: 0.1,
          max_tokens: 800,
        },
        { timeout, maxRetries: 0 },
      );
    } catch (err) {
      throw toReasoningError(err);
    }

    this.trackSpend(response.usage);

    const content = response.choices[0]?.message?.content;
    // An empty reply is a format problem the engine can re-prompt for.
    return content ?? '';
  }

  // ── Internals ──────────────────────────────────────────

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.openaiApiKey) {
        throw new ReasoningServiceError(
          'OPENAI_API_KEY is not set.  The reasoning service requires an OpenAI API key.  Set it in your .env file.',
          { retryable: false },
        );
      }
      this.client = new OpenAI({
        apiKey: this.config.openaiApiKey,
        baseURL: this.config.openaiBaseUrl,
      });
    }
    return this.client;
  }

  private trackSpend(usage: OpenAI.Chat.Completions.ChatCompletion['usage']): void {
    if (!usage) return;
    const costCents =
      (usage.prompt_tokens * INPUT_COST_PER_TOKEN + usage.completion_tokens * OUTPUT_COST_PER_TOKEN) * 100;
    this.cumulativeSpendCents += costCents;
    logger.info(
      `LLM cost: ${costCents.toFixed(4)}¢ ` +
        `(cumulative: ${this.cumulativeSpendCents.toFixed(2)}¢ / ${this.config.llmBudgetCents}¢)`,
    );
  }
}

/** Timeouts, connection failures, 429 and 5xx are worth another attempt. */
function toReasoningError(err: unknown): ReasoningServiceError {
  if (err instanceof OpenAI.APIConnectionError) {
    // APIConnectionTimeoutError extends APIConnectionError.
    return new ReasoningServiceError(`Reasoning service unreachable: ${err.message}`, {
      cause: err,
      retryable: true,
    });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? 0;
    const retryable = status === 429 || status >= 500;
    return new ReasoningServiceError(`Reasoning service returned ${status}: ${err.message}`, {
      cause: err,
      retryable,
    });
  }
  return new ReasoningServiceError(`Reasoning call failed: ${err instanceof Error ? err.message : String(err)}`, {
    cause: err,
    retryable: false,
  });
}
