/**
 * browserManager.ts — Shared headless browser plus a bounded session pool.
 *
 * One Chromium process is launched lazily and reused; every render borrows an
 * incognito context from it and closes that context before returning. The
 * Bottleneck limiter caps how many contexts exist at once across all chains,
 * so concurrent solve requests queue for a session instead of each spawning
 * their own browser.
 *
 * puppeteer-core is used (no bundled Chromium download); point
 * CHROME_EXECUTABLE_PATH at a Chrome/Chromium binary, or leave it unset to use
 * the installed stable Chrome channel.
 */

import Bottleneck from 'bottleneck';
import puppeteer, { TimeoutError } from 'puppeteer-core';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import { FetchError } from './errors';
import { Logger } from './logger';
import { defaultSleep, withTimeout } from './retry';
import type { SolverConfig } from './types';
import { loadSolverConfig } from './types';

const logger = new Logger('BrowserManager');

export interface RenderOptions {
  timeoutMs?: number;
}

/** Opaque "give me the rendered HTML of this URL" capability. */
export interface RenderingService {
  render(url: string, options?: RenderOptions): Promise<string>;
}

export class BrowserManager implements RenderingService {
  // ── Singleton plumbing ─────────────────────────────────

  private static instance: BrowserManager | null = null;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly config: SolverConfig;
  /** Session pool: at most `browserPoolSize` live contexts process-wide. */
  private readonly pool: Bottleneck;
  private exitHooksRegistered = false;

  constructor(config: SolverConfig = loadSolverConfig()) {
    this.config = config;
    this.pool = new Bottleneck({ maxConcurrent: config.browserPoolSize });
  }

  /** The process-wide instance, created on first access. No browser is launched until a render. */
  static getInstance(config?: SolverConfig): BrowserManager {
    if (!BrowserManager.instance) {
      BrowserManager.instance = new BrowserManager(config);
    }
    return BrowserManager.instance;
  }

  // ── Core API ───────────────────────────────────────────

  /**
   * Run `fn` with a fresh page in its own incognito context. The context is
   * closed when `fn` settles, so no session outlives the call. When
   * `isCancelled` reports true by the time a pool slot frees up, no context is
   * opened at all.
   */
  async withPage<T>(fn: (page: Page) => Promise<T>, isCancelled?: () => boolean): Promise<T> {
    return this.pool.schedule(async () => {
      if (isCancelled?.()) {
        throw new Error('Cancelled while waiting for a browser session');
      }
      const browser = await this.ensureBrowser();
      const context: BrowserContext = await browser.createBrowserContext();
      try {
        const page = await context.newPage();
        await page.setViewport({ width: 1366, height: 900 });
        return await fn(page);
      } finally {
        await context.close().catch((err: unknown) => {
          logger.warn(`Could not close browser context: ${String(err)}`);
        });
      }
    });
  }

  /**
   * Navigate, let late scripts settle, and return the serialised DOM.
   * `timeoutMs` bounds the whole call, queueing for a pool slot included.
   */
  async render(url: string, options?: RenderOptions): Promise<string> {
    const timeoutMs = options?.timeoutMs ?? this.config.renderTimeoutMs;
    const expiresAt = Date.now() + timeoutMs;
    let expired = false;
    logger.info(`Rendering ${url} (timeout ${timeoutMs} ms)…`);

    const job = this.withPage(async (page) => {
      const remainingMs = Math.max(1, expiresAt - Date.now());
      page.setDefaultTimeout(remainingMs);
      const response = await page.goto(url, { waitUntil: 'networkidle2', timeout: remainingMs });
      const statusCode = response?.status() ?? 0;

      if (statusCode >= 400) {
        throw new FetchError(url, `Render navigation returned HTTP ${statusCode}`, { statusCode });
      }

      if (this.config.renderSettleMs > 0) {
        await defaultSleep(Math.min(this.config.renderSettleMs, Math.max(0, expiresAt - Date.now())));
      }

      const html = await page.content();
      logger.info(`Render complete — HTTP ${statusCode}, ${html.length} chars for ${url}`);
      return html;
    }, () => expired);

    try {
      return await withTimeout(job, timeoutMs, () => {
        expired = true;
        return new FetchError(url, `Render timed out after ${timeoutMs} ms`);
      });
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (err instanceof TimeoutError) {
        throw new FetchError(url, `Render timed out after ${timeoutMs} ms`, { cause: err });
      }
      throw new FetchError(url, `Render failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  /** Gracefully shut down the browser. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close().catch((err: unknown) => {
        logger.warn(`Browser did not close cleanly: ${String(err)}`);
      });
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;

    // Two pool slots may race here on first use; share one launch.
    if (!this.launching) {
      this.launching = puppeteer
        .launch({
          headless: true,
          executablePath: this.config.chromeExecutablePath,
          channel: this.config.chromeExecutablePath ? undefined : 'chrome',
          args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
        })
        .finally(() => {
          this.launching = null;
        });
    }

    this.browser = await this.launching;
    logger.info('Headless browser launched');
    this.registerExitHooks();
    return this.browser;
  }

  private registerExitHooks(): void {
    if (this.exitHooksRegistered) return;
    this.exitHooksRegistered = true;

    const cleanup = async () => {
      await this.close();
      process.exit(0);
    };

    process.once('SIGINT', cleanup);
    process.once('SIGTERM', cleanup);
  }
}
