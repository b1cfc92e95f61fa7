/**
 * baseExtractor.ts — Abstract base class + formatting helpers for extractors.
 *
 * Each content kind gets a concrete extractor that turns raw bytes into a
 * structured payload and a prompt-ready text summary. The helpers here keep
 * those summaries uniform: tables render the same way whether they came from
 * an HTML page, a CSV file or a spreadsheet.
 */

import type { ContentKind, Extraction } from '../core/types';

export abstract class BaseExtractor {
  abstract readonly contentKind: ContentKind;

  /** Longest `contentText` this extractor will produce. */
  protected readonly maxChars: number;

  constructor(maxChars: number) {
    this.maxChars = maxChars;
  }

  /**
   * Parse `raw` and return the structured payload plus its text summary.
   * `baseUrl` is the resource's own URL, used to resolve relative links.
   *
   * Throws ExtractionError when the bytes are not valid for the content kind.
   */
  abstract extract(raw: Buffer, baseUrl: string): Promise<Extraction>;

  // ── Shared helpers ─────────────────────────────────────

  /** Cut `text` to `maxChars`, marking the cut so the model knows data is missing. */
  protected truncate(text: string): string {
    if (text.length <= this.maxChars) return text;
    const marker = `\n…[truncated ${text.length - this.maxChars} chars]`;
    return text.slice(0, Math.max(0, this.maxChars - marker.length)) + marker;
  }

  /** Render a table as pipe-separated lines, header first. */
  protected formatTable(headers: string[], rows: string[][], title?: string): string {
    const lines: string[] = [];
    if (title) lines.push(title);
    if (headers.length > 0) lines.push(headers.join(' | '));
    for (const row of rows) {
      lines.push(row.join(' | '));
    }
    return lines.join('\n');
  }

  protected decodeUtf8(raw: Buffer): string {
    const text = raw.toString('utf8');
    // Strip a UTF-8 BOM, which spreadsheet exports like to prepend.
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  }
}

/** Collapse runs of whitespace into single spaces. */
export function squashWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
