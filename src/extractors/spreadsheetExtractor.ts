/**
 * spreadsheetExtractor.ts — CSV and XLSX resources as header + rows.
 *
 * CSV is parsed directly (quoted fields, doubled quotes, CRLF, and a
 * comma / semicolon / tab delimiter guessed from the first line). XLSX goes
 * through officeparser, whose output is plain text; rows are recovered from
 * its lines, splitting cells on tabs or runs of spaces.
 */

import { parseOfficeAsync } from 'officeparser';
import { ExtractionError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Extraction } from '../core/types';
import { BaseExtractor } from './baseExtractor';
import { computeColumnStats, formatColumnStats, parseNumericCell } from './tableStats';

const logger = new Logger('SpreadsheetExtractor');

/** Rows listed verbatim in the prompt summary; the stats cover all rows. */
const SUMMARY_ROWS = 200;

export class SpreadsheetExtractor extends BaseExtractor {
  readonly contentKind: 'csv' | 'xlsx';

  constructor(contentKind: 'csv' | 'xlsx', maxChars: number) {
    super(maxChars);
    this.contentKind = contentKind;
  }

  async extract(raw: Buffer): Promise<Extraction> {
    const grid = this.contentKind === 'csv' ? this.parseCsvBytes(raw) : await this.parseXlsxBytes(raw);

    if (grid.length === 0) {
      throw new ExtractionError(this.contentKind, 'no rows');
    }

    const firstRowIsHeader = grid.length > 1 && grid[0].some((cell) => cell !== '' && parseNumericCell(cell) === null);
    const headers = firstRowIsHeader ? grid[0] : [];
    const rows = firstRowIsHeader ? grid.slice(1) : grid;

    logger.debug(`Parsed ${this.contentKind}: ${headers.length} header(s), ${rows.length} row(s)`);

    const listed = rows.slice(0, SUMMARY_ROWS);
    const parts = [
      this.formatTable(headers, listed, `${this.contentKind.toUpperCase()} data (${rows.length} rows):`),
    ];
    if (rows.length > listed.length) {
      parts.push(`…${rows.length - listed.length} more rows not shown`);
    }
    const stats = computeColumnStats(headers, rows);
    if (stats.length > 0) {
      parts.push(`Column statistics:\n${formatColumnStats(stats)}`);
    }

    return {
      data: { variant: 'spreadsheet-rows', source: this.contentKind, headers, rows },
      contentText: this.truncate(parts.join('\n\n')),
    };
  }

  private parseCsvBytes(raw: Buffer): string[][] {
    const text = this.decodeUtf8(raw);
    if (text.includes('\u0000')) {
      throw new ExtractionError('csv', 'binary content');
    }
    return parseCsv(text);
  }

  private async parseXlsxBytes(raw: Buffer): Promise<string[][]> {
    let text: string;
    try {
      text = await parseOfficeAsync(raw);
    } catch (err) {
      throw new ExtractionError('xlsx', err instanceof Error ? err.message : String(err), { cause: err });
    }

    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((line) => line.split(/\t| {2,}/).map((cell) => cell.trim()));
  }
}

// ─── CSV ────────────────────────────────────────────────────

function guessDelimiter(firstLine: string): string {
  const counts = [',', ';', '\t'].map((d) => ({ d, n: firstLine.split(d).length - 1 }));
  counts.sort((a, b) => b.n - a.n);
  return counts[0].n > 0 ? counts[0].d : ',';
}

/**
 * Parse CSV text into rows of trimmed cells. Blank lines are dropped.
 * Throws ExtractionError on an unterminated quoted field.
 */
export function parseCsv(text: string): string[][] {
  const delimiter = guessDelimiter(text.split(/\r?\n/, 1)[0] ?? '');
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endField = () => {
    row.push(field.trim());
    field = '';
  };
  const endRow = () => {
    endField();
    if (row.some((cell) => cell !== '')) rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field.trim() === '') {
      field = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\n') {
      endRow();
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new ExtractionError('csv', 'unterminated quoted field');
  }
  if (field !== '' || row.length > 0) endRow();

  return rows;
}
