/**
 * prompts.ts — Task-kind-specific prompt templates for the answer engine.
 */

import { computeColumnStats, formatColumnStats } from '../extractors/tableStats';
import type { Attachment, ExtractedData, TaskKind } from '../core/types';

export const ANSWER_SCHEMA_HINT = `{
  "answer": <the answer: number, string, boolean, array or object; never null>,
  "next_url": <absolute URL of the next task if the page names one, otherwise null>
}`;

export interface PromptInput {
  taskKind: TaskKind;
  url: string;
  contentText: string;
  data: ExtractedData;
  attachments: Attachment[];
}

/** Per-kind instruction placed ahead of the page content. */
function instructionFor(kind: TaskKind): string {
  switch (kind) {
    case 'statistic':
      return (
        'This task asks for a statistic over tabular data. Compute it exactly over every row. ' +
        'Precomputed column statistics are included below; prefer them when they answer the question. ' +
        'Answer with a bare number unless the question asks for another format.'
      );
    case 'file_parse':
      return (
        'This task refers to one or more linked data files. Their parsed contents follow the page. ' +
        'Answer the question from the file contents.'
      );
    case 'scrape':
      return (
        'This page presents tabular data without an explicit question. ' +
        'Extract the value the page asks for (or the key table content) as the answer.'
      );
    case 'lookup':
      return 'Answer the question using only the information on the page. Keep the answer short.';
    case 'unknown':
      return (
        'The task type could not be determined. Read the page carefully, work out what is being asked, ' +
        'and give your best answer.'
      );
    default: {
      const unreachable: never = kind;
      throw new Error(`No prompt template for task kind ${String(unreachable)}`);
    }
  }
}

function tableStatsSection(data: ExtractedData): string | null {
  if (data.variant !== 'html-table') return null;

  const sections = data.tables
    .map((table, i) => {
      const stats = computeColumnStats(table.headers, table.rows);
      return stats.length > 0 ? `Table ${i + 1}:\n${formatColumnStats(stats)}` : null;
    })
    .filter((section): section is string => section !== null);

  return sections.length > 0 ? `Column statistics:\n${sections.join('\n')}` : null;
}

export function buildPrompt(input: PromptInput): string {
  const parts = [
    `Task type: ${input.taskKind}`,
    instructionFor(input.taskKind),
    `Page URL: ${input.url}`,
    `Page content:\n${input.contentText}`,
  ];

  const stats = tableStatsSection(input.data);
  if (stats) parts.push(stats);

  for (const attachment of input.attachments) {
    parts.push(`Linked file ${attachment.url} (${attachment.contentKind}):\n${attachment.extraction.contentText}`);
  }

  parts.push(
    'If the page names a follow-up task URL to visit after answering, put it in "next_url"; ' +
      'never repeat the page URL itself.',
  );
  parts.push(`Reply with JSON matching:\n${ANSWER_SCHEMA_HINT}`);

  return parts.join('\n\n');
}

/** Appended on a reformulation attempt after an unusable reply. */
export function reformulationNote(problem: string, rawReply: string): string {
  const excerpt = rawReply.length > 500 ? `${rawReply.slice(0, 500)}…` : rawReply;
  return (
    `Your previous reply could not be used: ${problem}\n` +
    `Previous reply: ${excerpt || '(empty)'}\n` +
    `Reply again with ONLY a JSON object exactly matching:\n${ANSWER_SCHEMA_HINT}`
  );
}

/** Appended when a submit endpoint judged the previous answer wrong. */
export function feedbackNote(previousAnswer: unknown, reason: string | null): string {
  return (
    `A previous answer, ${JSON.stringify(previousAnswer)}, was judged incorrect` +
    (reason ? ` with this feedback: ${reason}` : '') +
    '. Reconsider and give a corrected answer.'
  );
}
