import { describe, it, expect } from 'vitest';
import { ANSWER_SCHEMA_HINT, buildPrompt } from '../../src/agents/prompts';

describe('buildPrompt', () => {
  it('lays out task type, page, precomputed statistics and the schema', () => {
    const prompt = buildPrompt({
      taskKind: 'statistic',
      url: 'https://quiz.example/q1',
      contentText: 'Question: sum of B?',
      data: {
        variant: 'html-table',
        tables: [{ headers: ['A', 'B'], rows: [['x', '1'], ['y', '2']] }],
        paragraphs: [],
        question: 'sum of B?',
        links: [],
        submitUrl: null,
      },
      attachments: [],
    });

    const parts = prompt.split('\n\n');
    expect(parts[0]).toBe('Task type: statistic');
    expect(parts[1]).toMatch(/^This task asks for a statistic over tabular data\./);
    expect(parts[2]).toBe('Page URL: https://quiz.example/q1');
    expect(parts[3]).toBe('Page content:\nQuestion: sum of B?');
    expect(parts[4]).toBe('Column statistics:\nTable 1:\nB: count=2 sum=3 mean=1.5 min=1 max=2');
    expect(prompt.endsWith(`Reply with JSON matching:\n${ANSWER_SCHEMA_HINT}`)).toBe(true);
  });

  it('appends each attachment under its URL', () => {
    const prompt = buildPrompt({
      taskKind: 'file_parse',
      url: 'https://quiz.example/q1',
      contentText: 'See the file.',
      data: { variant: 'html-text', paragraphs: [], question: null, links: [], submitUrl: null },
      attachments: [
        {
          url: 'https://quiz.example/f.json',
          contentKind: 'json',
          extraction: { data: { variant: 'json-object', value: 1 }, contentText: 'JSON document:\n1' },
        },
      ],
    });

    expect(prompt).toContain('Linked file https://quiz.example/f.json (json):\nJSON document:\n1');
  });
});
