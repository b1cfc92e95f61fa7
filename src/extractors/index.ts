/**
 * extractors/index.ts — Extractor factory keyed on content kind.
 *
 * Dispatch is an exhaustive switch over ContentKind: adding a kind to the
 * union without an extractor here fails to compile.
 */

import type { ContentKind, Extraction } from '../core/types';
import type { BaseExtractor } from './baseExtractor';
import { HtmlExtractor } from './htmlExtractor';
import { JsonExtractor } from './jsonExtractor';
import { PdfExtractor } from './pdfExtractor';
import { SpreadsheetExtractor } from './spreadsheetExtractor';

export function getExtractorFor(contentKind: ContentKind, maxChars: number): BaseExtractor {
  switch (contentKind) {
    case 'html':
      return new HtmlExtractor(maxChars);
    case 'pdf':
      return new PdfExtractor(maxChars);
    case 'csv':
    case 'xlsx':
      return new SpreadsheetExtractor(contentKind, maxChars);
    case 'json':
      return new JsonExtractor(maxChars);
    default: {
      const unreachable: never = contentKind;
      throw new Error(`No extractor for content kind ${String(unreachable)}`);
    }
  }
}

/**
 * Normalize fetched bytes into a structured payload and prompt text.
 * Throws ExtractionError for malformed input.
 */
export async function extractContent(
  contentKind: ContentKind,
  raw: Buffer,
  baseUrl: string,
  maxChars: number,
): Promise<Extraction> {
  return getExtractorFor(contentKind, maxChars).extract(raw, baseUrl);
}

export { BaseExtractor } from './baseExtractor';
export { parseCsv } from './spreadsheetExtractor';
export { computeColumnStats, formatColumnStats, parseNumericCell } from './tableStats';
export type { ColumnStats } from './tableStats';
