/**
 * pageFetcher.ts — Fetch layer with static-first, render-on-demand strategy.
 *
 * FETCH STRATEGY
 * ──────────────
 * 1. **URL gate:**  Only absolute http(s) URLs are fetched.
 * 2. **Static path first:**  got-scraping GET, unless the caller hints that
 *    the page needs JavaScript.
 * 3. **Placeholder check:**  HTML whose visible text is missing, or that is
 *    filled in by inline script (atob / document.write / innerHTML), is
 *    escalated to the rendering service.
 * 4. **Kind detection:**  Content-Type header, then URL extension, then
 *    leading bytes.
 *
 * Every failure leaves as a FetchError; retrying is the caller's decision.
 */

import * as cheerio from 'cheerio';
import type { RenderingService } from '../core/browserManager';
import { FetchError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ContentKind, FetchedContent } from '../core/types';
import { isAbsoluteHttpUrl, kindFromExtension } from '../core/urls';
import { lightFetch, type LightFetchResult, type StaticFetch } from './lightFetcher';

const logger = new Logger('PageFetcher');

export interface PageFetchOptions {
  /** Skip the static path and render straight away. Ignored for data-file URLs. */
  renderJs?: boolean;
  /** Local timeout for this call (already clamped to the chain budget). */
  timeoutMs?: number;
}

export interface PageFetcherDeps {
  staticFetch?: StaticFetch;
  /** Without a renderer, placeholder pages are returned as fetched. */
  renderer?: RenderingService;
  defaultTimeoutMs?: number;
}

export class PageFetcher {
  private readonly staticFetch: StaticFetch;
  private readonly renderer?: RenderingService;
  private readonly defaultTimeoutMs: number;

  constructor(deps: PageFetcherDeps = {}) {
    this.staticFetch = deps.staticFetch ?? lightFetch;
    this.renderer = deps.renderer;
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? 30_000;
  }

  async fetch(url: string, options: PageFetchOptions = {}): Promise<FetchedContent> {
    if (!isAbsoluteHttpUrl(url)) {
      throw new FetchError(url, 'Not an absolute http(s) URL');
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const extensionKind = kindFromExtension(url);
    const isDataFile = extensionKind !== null && extensionKind !== 'html';

    if (options.renderJs && !isDataFile && this.renderer) {
      logger.info(`Render hint set — skipping static fetch for ${url}`);
      return this.renderPage(url, timeoutMs);
    }

    // ── Static fetch ─────────────────────────────────────
    let result: LightFetchResult;
    try {
      result = await this.staticFetch(url, { timeout: timeoutMs });
    } catch (err) {
      throw new FetchError(url, `Static fetch failed: ${describe(err)}`, { cause: err });
    }

    if (result.statusCode < 200 || result.statusCode >= 300) {
      throw new FetchError(url, `HTTP ${result.statusCode}`, { statusCode: result.statusCode });
    }

    const contentKind = detectContentKind(result.contentType, result.url || url, result.body);

    if (contentKind === 'html' && this.renderer) {
      const html = result.body.toString('utf8');
      if (looksLikePlaceholder(html)) {
        logger.info(`Static HTML for ${url} looks like a script-filled shell — rendering`);
        return this.renderPage(url, timeoutMs);
      }
    }

    logger.info(`Fetched ${url} as ${contentKind} (${result.body.length} bytes, static)`);

    return {
      url,
      finalUrl: result.url || url,
      contentKind,
      raw: result.body,
      contentType: result.contentType,
      statusCode: result.statusCode,
      fetchMethod: 'light',
    };
  }

  private async renderPage(url: string, timeoutMs: number): Promise<FetchedContent> {
    if (!this.renderer) {
      throw new FetchError(url, 'No rendering service configured');
    }

    let html: string;
    try {
      html = await this.renderer.render(url, { timeoutMs });
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(url, `Render failed: ${describe(err)}`, { cause: err });
    }

    return {
      url,
      finalUrl: url,
      contentKind: 'html',
      raw: Buffer.from(html, 'utf8'),
      contentType: 'text/html; charset=utf-8',
      statusCode: 200,
      fetchMethod: 'browser',
    };
  }
}

// ─── Helpers ────────────────────────────────────────────────

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Content-Type first, then the URL's extension, then the leading bytes. */
export function detectContentKind(contentType: string | undefined, url: string, raw: Buffer): ContentKind {
  const mime = contentType?.split(';')[0].trim().toLowerCase() ?? '';

  if (mime === 'application/pdf') return 'pdf';
  if (mime.includes('spreadsheetml') || mime === 'application/vnd.ms-excel') return 'xlsx';
  if (mime === 'text/csv' || mime === 'application/csv') return 'csv';
  if (mime === 'application/json' || mime.endsWith('+json')) return 'json';
  if (mime === 'text/html' || mime === 'application/xhtml+xml') return 'html';

  const byExtension = kindFromExtension(url);
  if (byExtension) return byExtension;

  return sniffContentKind(raw);
}

function sniffContentKind(raw: Buffer): ContentKind {
  if (raw.subarray(0, 5).toString('latin1') === '%PDF-') return 'pdf';
  if (raw[0] === 0x50 && raw[1] === 0x4b && raw[2] === 0x03 && raw[3] === 0x04) return 'xlsx';

  const head = raw.subarray(0, 2048).toString('utf8').trimStart();
  if (head.startsWith('{') || head.startsWith('[')) {
    return parsesAsJson(raw.toString('utf8')) ? 'json' : 'html';
  }
  return 'html';
}

function parsesAsJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/** Inline-script idioms quiz pages use to inject their content after load. */
const SCRIPT_INJECTION = /\batob\s*\(|document\.write\s*\(|\.innerHTML\s*=|\.textContent\s*=|fetch\s*\(/;

/**
 * Does this HTML need a browser before it says anything?
 *
 * True when the visible text is (nearly) empty, when an SPA mount point is
 * empty, or when the body is short and an inline script writes content in.
 */
export function looksLikePlaceholder(html: string): boolean {
  const $ = cheerio.load(html);
  const scripts = $('script')
    .map((_, el) => $(el).html() ?? '')
    .get()
    .join('\n');

  $('script, style, noscript, template').remove();
  const visibleText = $('body').text().replace(/\s+/g, ' ').trim();

  if (visibleText.length < 40) return true;

  const emptyMount = ['#root', '#app', '#__next']
    .map((selector) => $(selector))
    .some((el) => el.length > 0 && el.text().trim() === '');
  if (emptyMount) return true;

  return visibleText.length < 400 && SCRIPT_INJECTION.test(scripts);
}
