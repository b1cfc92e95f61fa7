import { describe, it, expect, vi } from 'vitest';
import { FetchError } from '../../src/core/errors';
import { QuizSolver, answersMatch, toBoundaryResponse } from '../../src/quizSolver';
import type { AnswerSubmitter } from '../../src/services/answerSubmitter';
import type { SolverConfig } from '../../src/core/types';
import { FakeClock, FakeFetcher, FakeReasoning, content, htmlContent, pageUrlOf, testConfig } from '../helpers';

const SEED = 'https://quiz.example/q1';
const q = (n: number) => `https://quiz.example/q${n}`;

const TABLE_PAGE = `<html><body>
<h1>Quiz 1</h1>
<p>sum column B</p>
<table>
<tr><th>A</th><th>B</th></tr>
<tr><td>x</td><td>10</td></tr>
<tr><td>y</td><td>12</td></tr>
<tr><td>z</td><td>20</td></tr>
</table>
</body></html>`;

const lookupPage = (n: number) =>
  `<html><body><p>Question: what is the code word for step ${n}?</p></body></html>`;

/** Reasoning that answers step n and points at step n+1 until `last`. */
function chainReasoning(last: number): FakeReasoning {
  return new FakeReasoning((prompt) => {
    const n = Number(pageUrlOf(prompt).replace('https://quiz.example/q', ''));
    return n < last
      ? JSON.stringify({ answer: `word${n}`, next_url: q(n + 1) })
      : JSON.stringify({ answer: `word${n}` });
  });
}

function makeSolver(
  fetcher: FakeFetcher,
  reasoning: FakeReasoning,
  clock: FakeClock,
  overrides: Partial<SolverConfig> = {},
  submitter?: AnswerSubmitter,
): QuizSolver {
  return new QuizSolver({
    fetcher,
    reasoning,
    submitter,
    config: testConfig(overrides),
    clock: clock.now,
    sleep: clock.sleep,
  });
}

describe('QuizSolver', () => {
  describe('single-step chains', () => {
    it('sums a table column, classifies it as statistic and reports correct', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, TABLE_PAGE));
      const reasoning = new FakeReasoning(['{"answer": 42}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60, { expectedAnswer: 42 });

      expect(result.state).toBe('DONE');
      expect(result.answer).toBe(42);
      expect(result.steps).toHaveLength(1);
      expect(result.steps[0].taskKind).toBe('statistic');
      expect(result.steps[0].contentKind).toBe('html');
      expect(toBoundaryResponse(result)).toEqual({ correct: true, url: null });
      expect(reasoning.prompts[0]).toContain('B: count=3 sum=42 mean=14 min=10 max=20');
    });

    it('reports incorrect when the answer differs from the expected one', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, TABLE_PAGE));
      const reasoning = new FakeReasoning(['{"answer": 42}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60, { expectedAnswer: 41 });

      expect(result.state).toBe('DONE');
      expect(result.correct).toBe(false);
    });

    it('returns the answer a fixed-schema reasoning service gives', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, lookupPage(1)));
      const reasoning = new FakeReasoning(['{"answer": {"city": "Paris"}, "next_url": null}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('DONE');
      expect(result.answer).toEqual({ city: 'Paris' });
      expect(result.correct).toBe(true);
      expect(result.steps[0].taskKind).toBe('lookup');
    });
  });

  describe('multi-step chains', () => {
    it('follows N distinct tasks and finishes after exactly N steps', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher();
      for (let n = 1; n <= 4; n++) fetcher.route(q(n), htmlContent(q(n), lookupPage(n)));

      const result = await makeSolver(fetcher, chainReasoning(4), clock).solve(SEED, 60);

      expect(result.state).toBe('DONE');
      expect(result.steps.map((s) => s.url)).toEqual([q(1), q(2), q(3), q(4)]);
      expect(result.answer).toBe('word4');
      expect(result.finalUrl).toBe(q(4));
      expect(toBoundaryResponse(result)).toEqual({ correct: true, url: null });
    });

    it('sets the render hint for a same-origin step after a rendered one', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher()
        .route(q(1), htmlContent(q(1), lookupPage(1), 'browser'))
        .route(q(2), htmlContent(q(2), lookupPage(2)));

      await makeSolver(fetcher, chainReasoning(2), clock).solve(SEED, 60);

      expect(fetcher.calls[0].options).toEqual({ renderJs: false, timeoutMs: 30_000 });
      expect(fetcher.calls[1].options).toEqual({ renderJs: true, timeoutMs: 30_000 });
    });

    it('refuses a chain that revisits a URL', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher()
        .route(q(1), htmlContent(q(1), lookupPage(1)))
        .route(q(2), htmlContent(q(2), lookupPage(2)));
      const reasoning = new FakeReasoning((prompt) =>
        pageUrlOf(prompt) === q(1) ? `{"answer": "a", "next_url": "${q(2)}"}` : `{"answer": "b", "next_url": "${q(1)}"}`,
      );

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.failure).toMatchObject({ kind: 'ChainLoop', url: q(1) });
      expect(result.steps).toHaveLength(2);
      expect(toBoundaryResponse(result)).toEqual({ correct: false, url: q(1) });
    });

    it('stops at the configured depth', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher();
      for (let n = 1; n <= 3; n++) fetcher.route(q(n), htmlContent(q(n), lookupPage(n)));

      const result = await makeSolver(fetcher, chainReasoning(3), clock, { maxChainSteps: 2 }).solve(SEED, 60);

      expect(result.failure?.kind).toBe('MaxStepsExceeded');
      expect(result.steps).toHaveLength(2);
      expect(fetcher.calls).toHaveLength(2);
    });

    it('fails with InvalidNextUrl for a relative chain pointer', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, lookupPage(1)));
      const reasoning = new FakeReasoning(['{"answer": "ok", "next_url": "/q2"}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.failure).toMatchObject({ kind: 'InvalidNextUrl', url: '/q2' });
      expect(toBoundaryResponse(result)).toEqual({ correct: false, url: null });
    });
  });

  describe('reply validation', () => {
    it('terminates FAILED when next_url always equals the current URL', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, lookupPage(1)));
      const reasoning = new FakeReasoning([`{"answer": 1, "next_url": "${SEED}"}`]);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.failure?.kind).toBe('ResponseFormatError');
      expect(reasoning.prompts).toHaveLength(3);
      expect(result.steps).toHaveLength(1);
    });

    it('ends FAILED rather than throwing when every reply lacks an answer', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, lookupPage(1)));
      const reasoning = new FakeReasoning(['{"next_url": null}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.correct).toBe(false);
      expect(result.failure?.kind).toBe('ResponseFormatError');
      expect(result.steps[0].attempts).toBe(3);
    });
  });

  describe('fetch failures', () => {
    it('reports FetchError after the seed fetch times out on every retry', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, new FetchError(SEED, 'Render timed out'));
      const reasoning = new FakeReasoning(['{"answer": 1}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.failure?.kind).toBe('FetchError');
      expect(fetcher.calls).toHaveLength(3);
      expect(reasoning.prompts).toHaveLength(0);
      expect(toBoundaryResponse(result)).toEqual({ correct: false, url: null });
    });

    it('does not retry a 404', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, new FetchError(SEED, 'HTTP 404', { statusCode: 404 }));

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": 1}']), clock).solve(SEED, 60);

      expect(result.failure?.kind).toBe('FetchError');
      expect(fetcher.calls).toHaveLength(1);
    });

    it('does not retry malformed content', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, content(SEED, 'json', '{oops'));

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": 1}']), clock).solve(SEED, 60);

      expect(result.failure?.kind).toBe('ExtractionError');
      expect(fetcher.calls).toHaveLength(1);
    });

    it('reports an unexpected error as FAILED instead of rejecting', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, new Error('socket exploded'));

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": 1}']), clock).solve(SEED, 60);

      expect(result.state).toBe('FAILED');
      expect(result.failure).toEqual({ kind: 'UnexpectedError', message: 'socket exploded', url: SEED });
      expect(fetcher.calls).toHaveLength(1);
    });
  });

  describe('deadline', () => {
    it('never starts a step once the budget is spent', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher(() => clock.advance(6_000));
      for (let n = 1; n <= 3; n++) fetcher.route(q(n), htmlContent(q(n), lookupPage(n)));

      const result = await makeSolver(fetcher, chainReasoning(3), clock).solve(SEED, 10);

      expect(result.state).toBe('FAILED');
      expect(result.failure).toMatchObject({ kind: 'DeadlineExceeded', url: q(3) });
      expect(result.steps).toHaveLength(2);
      // The second step started with 4s left, so its fetch was clamped to that.
      expect(fetcher.calls[1].options?.timeoutMs).toBe(4_000);
      // Overrun is bounded by the one step that was already in flight.
      expect(result.elapsedMs).toBe(12_000);
      expect(toBoundaryResponse(result)).toEqual({ correct: false, url: q(3) });
    });

    it('fails immediately with a zero budget', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, lookupPage(1)));

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": 1}']), clock).solve(SEED, 0);

      expect(result.failure).toMatchObject({ kind: 'DeadlineExceeded', url: SEED });
      expect(fetcher.calls).toHaveLength(0);
      expect(toBoundaryResponse(result)).toEqual({ correct: false, url: null });
    });

    it('stops scheduling fetch retries after the deadline', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher(() => clock.advance(6_000)).route(SEED, new FetchError(SEED, 'timeout'));

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": 1}']), clock).solve(SEED, 10);

      expect(result.failure?.kind).toBe('FetchError');
      expect(fetcher.calls).toHaveLength(2);
    });
  });

  describe('attachments', () => {
    it('fetches linked data files for file_parse tasks and skips ones that fail', async () => {
      const page = `<html><body>
<p>Question: which city is listed first in the linked file?</p>
<p><a href="/files/cities.csv">cities</a> <a href="/files/missing.csv">backup</a></p>
</body></html>`;
      const clock = new FakeClock();
      const fetcher = new FakeFetcher()
        .route(SEED, htmlContent(SEED, page))
        .route(
          'https://quiz.example/files/cities.csv',
          content('https://quiz.example/files/cities.csv', 'csv', 'city,population\nOslo,700\nBergen,290\n'),
        )
        .route(
          'https://quiz.example/files/missing.csv',
          new FetchError('https://quiz.example/files/missing.csv', 'HTTP 404', { statusCode: 404 }),
        );
      const reasoning = new FakeReasoning(['{"answer": "Oslo"}']);

      const result = await makeSolver(fetcher, reasoning, clock).solve(SEED, 60);

      expect(result.state).toBe('DONE');
      expect(result.answer).toBe('Oslo');
      expect(result.steps[0].taskKind).toBe('file_parse');
      expect(fetcher.calls.map((c) => c.url)).toEqual([
        SEED,
        'https://quiz.example/files/cities.csv',
        'https://quiz.example/files/missing.csv',
      ]);
      expect(reasoning.prompts[0]).toContain('Linked file https://quiz.example/files/cities.csv (csv):');
      expect(reasoning.prompts[0]).toContain('Oslo | 700');
      expect(reasoning.prompts[0]).not.toContain('Linked file https://quiz.example/files/missing.csv');
    });
  });

  describe('submission', () => {
    const SUBMIT_PAGE = `<html><body>
<p>Question: what is the secret code?</p>
<p>Post your answer to https://quiz.example/submit</p>
</body></html>`;

    it('re-answers with the endpoint feedback after a wrong submission', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, SUBMIT_PAGE));
      const reasoning = new FakeReasoning(['{"answer": "alpha"}', '{"answer": 7}']);
      const submit = vi.fn<AnswerSubmitter['submit']>();
      submit
        .mockResolvedValueOnce({ correct: false, url: null, reason: 'Expected a number' })
        .mockResolvedValueOnce({ correct: true, url: null, reason: null });

      const result = await makeSolver(fetcher, reasoning, clock, {}, { submit }).solve(SEED, 60);

      expect(result.state).toBe('DONE');
      expect(result.answer).toBe(7);
      expect(result.correct).toBe(true);
      expect(submit).toHaveBeenCalledTimes(2);
      expect(submit.mock.calls[0][0]).toEqual({
        submitUrl: 'https://quiz.example/submit',
        quizUrl: SEED,
        answer: 'alpha',
        timeoutMs: 30_000,
      });
      expect(reasoning.prompts[1]).toContain(
        'A previous answer, "alpha", was judged incorrect with this feedback: Expected a number',
      );
      expect(result.steps[0].attempts).toBe(2);
      expect(result.steps[0].correct).toBe(true);
    });

    it("follows the endpoint's next URL over the model's", async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher()
        .route(q(1), htmlContent(q(1), SUBMIT_PAGE))
        .route(q(2), htmlContent(q(2), lookupPage(2)));
      const reasoning = new FakeReasoning((prompt) =>
        pageUrlOf(prompt) === q(1)
          ? '{"answer": 1, "next_url": "https://quiz.example/elsewhere"}'
          : '{"answer": 2}',
      );
      const submit = vi.fn<AnswerSubmitter['submit']>();
      submit.mockResolvedValueOnce({ correct: true, url: q(2), reason: null });

      const result = await makeSolver(fetcher, reasoning, clock, {}, { submit }).solve(SEED, 60);

      expect(result.state).toBe('DONE');
      expect(fetcher.calls.map((c) => c.url)).toEqual([q(1), q(2)]);
      expect(result.answer).toBe(2);
      expect(result.steps[0].correct).toBe(true);
      expect(result.steps[1].correct).toBeNull();
    });

    it('uses the last submission as the verdict', async () => {
      const clock = new FakeClock();
      const fetcher = new FakeFetcher().route(SEED, htmlContent(SEED, SUBMIT_PAGE));
      const submit = vi.fn<AnswerSubmitter['submit']>();
      submit.mockResolvedValue({ correct: false, url: null, reason: null });

      const result = await makeSolver(fetcher, new FakeReasoning(['{"answer": "x"}']), clock, { resubmitAttempts: 0 }, {
        submit,
      }).solve(SEED, 60, { expectedAnswer: 'x' });

      expect(result.state).toBe('DONE');
      expect(result.correct).toBe(false);
      expect(submit).toHaveBeenCalledTimes(1);
    });
  });
});

describe('answersMatch', () => {
  it('compares numbers and numeric strings numerically', () => {
    expect(answersMatch(42, '42')).toBe(true);
    expect(answersMatch('3.50', 3.5)).toBe(true);
    expect(answersMatch(42, 41)).toBe(false);
  });

  it('compares strings ignoring case and surrounding space', () => {
    expect(answersMatch(' Paris ', 'paris')).toBe(true);
  });

  it('compares structured answers by value', () => {
    expect(answersMatch([1, 2], [1, 2])).toBe(true);
    expect(answersMatch({ a: 1 }, { a: 2 })).toBe(false);
  });
});
