/**
 * Shared fakes for unit tests: a hand-cranked clock, a scripted fetcher and a
 * scripted reasoning service. Nothing here touches the network.
 */

import { DateTime } from 'luxon';
import type { CompleteOptions, ReasoningService } from '../src/agents/reasoningService';
import type { ContentKind, FetchedContent, SolverConfig } from '../src/core/types';
import { loadSolverConfig } from '../src/core/types';
import type { PageFetchOptions } from '../src/middleware/pageFetcher';
import type { ContentFetcher } from '../src/quizSolver';

export class FakeClock {
  private current = DateTime.fromISO('2026-01-01T00:00:00.000Z', { zone: 'utc' });

  readonly now = (): DateTime => this.current;

  advance(ms: number): void {
    this.current = this.current.plus({ milliseconds: ms });
  }

  /** A sleep that moves the clock instead of waiting. */
  readonly sleep = async (ms: number): Promise<void> => {
    this.advance(ms);
  };
}

export function testConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
  return { ...loadSolverConfig({}), ...overrides };
}

export function htmlContent(url: string, html: string, fetchMethod: 'light' | 'browser' = 'light'): FetchedContent {
  return content(url, 'html', html, fetchMethod);
}

export function content(
  url: string,
  contentKind: ContentKind,
  body: string,
  fetchMethod: 'light' | 'browser' = 'light',
): FetchedContent {
  return {
    url,
    finalUrl: url,
    contentKind,
    raw: Buffer.from(body, 'utf8'),
    statusCode: 200,
    fetchMethod,
  };
}

type Route = FetchedContent | Error | (() => FetchedContent | Promise<FetchedContent>);

/** Serves canned content per URL and records every call. */
export class FakeFetcher implements ContentFetcher {
  readonly calls: Array<{ url: string; options?: PageFetchOptions }> = [];
  private readonly routes = new Map<string, Route>();

  constructor(private readonly onFetch?: (url: string) => void) {}

  route(url: string, response: Route): this {
    this.routes.set(url, response);
    return this;
  }

  async fetch(url: string, options?: PageFetchOptions): Promise<FetchedContent> {
    this.calls.push({ url, options });
    this.onFetch?.(url);
    const route = this.routes.get(url);
    if (route === undefined) throw new Error(`No route for ${url}`);
    if (route instanceof Error) throw route;
    if (typeof route === 'function') return route();
    return route;
  }
}

/** Replies from a script: a fixed list, or a function of the prompt. */
export class FakeReasoning implements ReasoningService {
  readonly prompts: string[] = [];
  readonly options: Array<CompleteOptions | undefined> = [];
  private readonly reply: (prompt: string, call: number) => string | Promise<string>;

  constructor(
    replies: string[] | ((prompt: string, call: number) => string | Promise<string>),
    private readonly onCall?: () => void,
  ) {
    if (Array.isArray(replies)) {
      // The last scripted reply repeats once the others are used up.
      const queue = [...replies];
      this.reply = () => {
        const next = queue.length > 1 ? queue.shift() : queue[0];
        if (next === undefined) throw new Error('FakeReasoning has no replies');
        return next;
      };
    } else {
      this.reply = replies;
    }
  }

  async complete(prompt: string, _schemaHint: string, options?: CompleteOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    this.onCall?.();
    return this.reply(prompt, this.prompts.length);
  }
}

/** The `Page URL:` line every answer prompt carries. */
export function pageUrlOf(prompt: string): string {
  const match = prompt.match(/Page URL: (\S+)/);
  if (!match) throw new Error('Prompt has no Page URL line');
  return match[1];
}
