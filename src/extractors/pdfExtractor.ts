/**
 * pdfExtractor.ts — Text extraction for PDF quiz resources via unpdf.
 */

import { extractText } from 'unpdf';
import { ExtractionError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Extraction } from '../core/types';
import { BaseExtractor } from './baseExtractor';

const logger = new Logger('PdfExtractor');

export class PdfExtractor extends BaseExtractor {
  readonly contentKind = 'pdf' as const;

  async extract(raw: Buffer): Promise<Extraction> {
    let pageTexts: string[];
    let pageCount: number;

    try {
      const result = await extractText(new Uint8Array(raw));
      pageTexts = Array.isArray(result.text) ? result.text : [result.text];
      pageCount = result.totalPages;
    } catch (err) {
      throw new ExtractionError('pdf', err instanceof Error ? err.message : String(err), { cause: err });
    }

    const text = pageTexts.map((page) => page.trim()).join('\n\n--- page break ---\n\n').trim();
    if (!text) {
      throw new ExtractionError('pdf', 'no text layer (scanned or empty document)');
    }

    logger.debug(`Extracted ${pageCount} page(s), ${text.length} chars`);

    return {
      data: { variant: 'pdf-text', pageCount, text },
      contentText: this.truncate(`PDF document (${pageCount} page${pageCount === 1 ? '' : 's'}):\n${text}`),
    };
  }
}
