/**
 * taskClassifier.ts — Evidence-based task-kind tagging.
 *
 * Rules, first match wins:
 *   1. A statistical phrase in the question          → statistic
 *      (a bare instruction like "sum column B" counts as the question)
 *   2. A link to a data file (.csv/.xlsx/.pdf/.json)  → file_parse
 *   3. A table and no explicit question              → scrape
 *   4. An explicit question and no table             → lookup
 *   5. Anything else                                  → unknown
 *
 * `unknown` is a legal classification; the answer engine still produces a
 * best-effort answer for it. No outcome here is fatal.
 */

import { ClassificationAmbiguity } from '../core/errors';
import { Logger } from '../core/logger';
import type { ExtractedData, TaskKind } from '../core/types';

const logger = new Logger('TaskClassifier');

const STATISTIC_PHRASE =
  /\b(?:sum|total|average|mean|median|mode|count|how many|maximum|minimum|max|min|highest|lowest|largest|smallest|std|standard deviation|variance|percent(?:age)?|ratio|difference)\b/i;

const DATA_FILE_URL = /https?:\/\/\S+\.(?:csv|xlsx?|pdf|json)(?:[?#]\S*)?(?=\s|$)/i;
const QUESTION_LINE = /^(?:q(?:uestion)?\s*\d*\s*[:.)-]|question\b).*|^.*\?$/im;
const INSTRUCTION_LINE = /^(?:sum|add up|total|count|average|compute|calculate|find|determine|report)\b.*$/im;
const TABLE_LINE = /^[^\n|]+(?: \| [^\n|]*)+$/m;

/** Structured signals lifted from an extraction; preferred over text sniffing. */
export interface ClassificationEvidence {
  hasTable: boolean;
  hasDataLink: boolean;
  question: string | null;
}

export function evidenceFrom(data: ExtractedData): ClassificationEvidence {
  switch (data.variant) {
    case 'html-table':
    case 'html-text':
      return {
        hasTable: data.variant === 'html-table',
        hasDataLink: data.links.some((link) => link.isDataFile),
        question: data.question,
      };
    case 'spreadsheet-rows':
      return { hasTable: true, hasDataLink: false, question: null };
    case 'pdf-text':
    case 'json-object':
      return { hasTable: false, hasDataLink: false, question: null };
    default: {
      const unreachable: never = data;
      throw new Error(`Unhandled extraction variant: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Evidence recovered from the prompt text alone. */
function evidenceFromText(contentText: string): ClassificationEvidence {
  const questionMatch = contentText.match(QUESTION_LINE) ?? contentText.match(INSTRUCTION_LINE);
  return {
    hasTable: TABLE_LINE.test(contentText),
    hasDataLink: DATA_FILE_URL.test(contentText),
    question: questionMatch ? questionMatch[0].trim() : null,
  };
}

function decide(evidence: ClassificationEvidence): TaskKind {
  if (evidence.question && STATISTIC_PHRASE.test(evidence.question)) return 'statistic';
  if (evidence.hasDataLink) return 'file_parse';
  if (evidence.hasTable && !evidence.question) return 'scrape';
  if (evidence.question && !evidence.hasTable) return 'lookup';
  throw new ClassificationAmbiguity(
    evidence.question
      ? `Question "${evidence.question.slice(0, 80)}" over a table matched no rule`
      : 'No question, table or data link found',
  );
}

/**
 * Tag a step with its task kind. `evidence` comes from the structured
 * extraction when available; otherwise it is recovered from `contentText`.
 */
export function classify(contentText: string, evidence?: ClassificationEvidence): TaskKind {
  try {
    const kind = decide(evidence ?? evidenceFromText(contentText));
    logger.info(`Classified as ${kind}`);
    return kind;
  } catch (err) {
    if (err instanceof ClassificationAmbiguity) {
      logger.warn(`${err.message} — degrading to unknown`);
      return 'unknown';
    }
    throw err;
  }
}
