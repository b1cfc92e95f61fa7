/**
 * htmlExtractor.ts — Extractor for quiz pages (static or rendered HTML).
 *
 * Quiz pages have no standard markup, so everything is heuristic:
 *   • **Question:**  an element whose id/class mentions "question", else the
 *     first text block that starts with "Q:" / "Question" or ends with "?".
 *   • **Tables:**  every `<table>`, headers from `<th>` cells (or the first
 *     row when it is not numeric).
 *   • **Submit endpoint:**  an absolute URL in the text ending in `/submit`,
 *     else a form action or link whose path ends in `/submit`.
 *   • **Links:**  every anchor, resolved against the page URL, with data
 *     files (.csv / .xlsx / .pdf / .json) flagged.
 *
 * A page with at least one table becomes `html-table`; otherwise `html-text`.
 */

import * as cheerio from 'cheerio';
import { ExtractionError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Extraction, ExtractedData, HtmlTable, PageLink } from '../core/types';
import { isDataFileUrl, resolveUrl } from '../core/urls';
import { BaseExtractor, squashWhitespace } from './baseExtractor';
import { parseNumericCell } from './tableStats';

const logger = new Logger('HtmlExtractor');

const TEXT_BLOCKS = 'h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, label, dt, dd';
const QUESTION_PREFIX = /^(?:q(?:uestion)?\s*\d*\s*[:.)-]|question\b)/i;
/** A bare instruction such as "sum column B" or "Count the rows". */
const INSTRUCTION_PREFIX = /^(?:sum|add up|total|count|average|compute|calculate|find|determine|report)\b/i;
const SUBMIT_IN_TEXT = /https?:\/\/[^\s"'<>]+\/submit\b/i;

export class HtmlExtractor extends BaseExtractor {
  readonly contentKind = 'html' as const;

  async extract(raw: Buffer, baseUrl: string): Promise<Extraction> {
    const html = this.decodeUtf8(raw);
    if (html.trim() === '') {
      throw new ExtractionError('html', 'document is empty');
    }

    const $ = cheerio.load(html);
    $('script, style, noscript, template').remove();

    const tables = this.findTables($);
    const paragraphs = this.findParagraphs($);
    const question = this.findQuestion($, paragraphs);
    const links = this.findLinks($, baseUrl);
    const submitUrl = this.findSubmitUrl($, baseUrl);

    if (paragraphs.length === 0 && tables.length === 0) {
      throw new ExtractionError('html', 'no visible text or tables');
    }

    const payload = { paragraphs, question, links, submitUrl };
    const data: ExtractedData =
      tables.length > 0 ? { variant: 'html-table', tables, ...payload } : { variant: 'html-text', ...payload };

    logger.debug(
      `Extracted ${data.variant}: ${tables.length} table(s), ${paragraphs.length} block(s), ` +
        `${links.length} link(s), submit=${submitUrl ?? 'none'}`,
    );

    return { data, contentText: this.truncate(this.summarize(question, paragraphs, tables, links, submitUrl)) };
  }

  // ── Page heuristics ────────────────────────────────────

  private findTables($: cheerio.CheerioAPI): HtmlTable[] {
    const tables: HtmlTable[] = [];

    $('table').each((_, tableEl) => {
      const table = $(tableEl);
      const caption = squashWhitespace(table.find('caption').first().text()) || undefined;

      const allRows = table
        .find('tr')
        .toArray()
        .map((tr) => ({
          isHeader: $(tr).children('td').length === 0 && $(tr).children('th').length > 0,
          cells: $(tr)
            .children('th, td')
            .toArray()
            .map((cell) => squashWhitespace($(cell).text())),
        }))
        .filter((row) => row.cells.length > 0);

      if (allRows.length === 0) return;

      let headers: string[] = [];
      let bodyRows = allRows;
      const headerIndex = allRows.findIndex((row) => row.isHeader);

      if (headerIndex >= 0) {
        headers = allRows[headerIndex].cells;
        bodyRows = allRows.filter((_, i) => i !== headerIndex);
      } else if (allRows.length > 1 && allRows[0].cells.every((cell) => parseNumericCell(cell) === null)) {
        headers = allRows[0].cells;
        bodyRows = allRows.slice(1);
      }

      tables.push({ caption, headers, rows: bodyRows.map((row) => row.cells) });
    });

    return tables;
  }

  private findParagraphs($: cheerio.CheerioAPI): string[] {
    const seen = new Set<string>();
    const blocks: string[] = [];

    $(TEXT_BLOCKS).each((_, el) => {
      // Nested blocks (a <p> inside an <li>) would otherwise repeat text.
      if ($(el).find(TEXT_BLOCKS).length > 0) return;
      const text = squashWhitespace($(el).text());
      if (text && !seen.has(text)) {
        seen.add(text);
        blocks.push(text);
      }
    });

    if (blocks.length === 0) {
      const bodyClone = $('body').clone();
      bodyClone.find('table').remove();
      const bodyText = bodyClone.text();
      for (const line of bodyText.split(/\n+/)) {
        const text = squashWhitespace(line);
        if (text && !seen.has(text)) {
          seen.add(text);
          blocks.push(text);
        }
      }
    }

    return blocks;
  }

  private findQuestion($: cheerio.CheerioAPI, paragraphs: string[]): string | null {
    const marked = $('[id*="question" i], [class*="question" i]')
      .toArray()
      .map((el) => squashWhitespace($(el).text()))
      .find((text) => text.length > 0);
    if (marked) return marked;

    return (
      paragraphs.find((text) => QUESTION_PREFIX.test(text)) ??
      paragraphs.find((text) => text.endsWith('?')) ??
      paragraphs.find((text) => INSTRUCTION_PREFIX.test(text)) ??
      null
    );
  }

  private findLinks($: cheerio.CheerioAPI, baseUrl: string): PageLink[] {
    const byHref = new Map<string, PageLink>();

    $('a[href]').each((_, el) => {
      const href = resolveUrl($(el).attr('href') ?? '', baseUrl);
      if (!href || byHref.has(href)) return;
      byHref.set(href, {
        href,
        text: squashWhitespace($(el).text()),
        isDataFile: isDataFileUrl(href),
      });
    });

    return [...byHref.values()];
  }

  private findSubmitUrl($: cheerio.CheerioAPI, baseUrl: string): string | null {
    const inText = $('body').text().match(SUBMIT_IN_TEXT);
    if (inText) return inText[0];

    const candidates = [
      ...$('form[action]')
        .toArray()
        .map((el) => $(el).attr('action') ?? ''),
      ...$('a[href]')
        .toArray()
        .map((el) => $(el).attr('href') ?? ''),
    ];

    for (const candidate of candidates) {
      const resolved = resolveUrl(candidate, baseUrl);
      if (resolved && new URL(resolved).pathname.replace(/\/$/, '').endsWith('/submit')) {
        return resolved;
      }
    }
    return null;
  }

  // ── Prompt summary ─────────────────────────────────────

  private summarize(
    question: string | null,
    paragraphs: string[],
    tables: HtmlTable[],
    links: PageLink[],
    submitUrl: string | null,
  ): string {
    const sections: string[] = [];

    if (question) sections.push(`Question: ${question}`);
    if (paragraphs.length > 0) sections.push(paragraphs.join('\n'));

    tables.forEach((table, i) => {
      const title = table.caption ? `Table ${i + 1}: ${table.caption}` : `Table ${i + 1}:`;
      sections.push(this.formatTable(table.headers, table.rows, title));
    });

    if (links.length > 0) {
      sections.push(['Links:', ...links.map((link) => `- ${link.text || '(no text)'}: ${link.href}`)].join('\n'));
    }

    if (submitUrl) sections.push(`Submit endpoint: ${submitUrl}`);

    return sections.join('\n\n');
  }
}
