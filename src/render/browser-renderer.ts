/**
 * Headless Chromium renderer (playwright-core). Runs page scripts before links are read.
 */
import { chromium, type Browser, type BrowserContext, type Response } from 'playwright-core';
import { logger } from '../logger.js';
import { extractPageLinks } from '../crawl/link-extractor.js';
import { resolveBaseUrl } from '../crawl/link-normalizer.js';
import type { PageRenderer, RenderResult } from '../crawl/types.js';

export const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

export interface BrowserRendererOptions {
  /** Sent with every request the page makes. */
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Settle delay after load, before links are read. */
  waitMs?: number;
  /** Capture a full-page PNG of each page. */
  screenshot?: boolean;
  viewport?: { width: number; height: number };
  /** Chromium binary; defaults to the one playwright installed. */
  executablePath?: string;
}

/** Chromium aborts navigation to a URL it hands to the download manager. */
function isDownloadAbort(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return /Download is starting|net::ERR_ABORTED/.test(message);
}

export class BrowserRenderer implements PageRenderer {
  private browser: Browser | null = null;
  private context: Promise<BrowserContext> | null = null;

  constructor(private readonly options: BrowserRendererOptions = {}) {}

  /** Launch the browser. Idempotent; render() calls it too. */
  launch(): Promise<BrowserContext> {
    if (!this.context) {
      this.context = this.createContext();
    }
    return this.context;
  }

  private async createContext(): Promise<BrowserContext> {
    logger.debug({ executablePath: this.options.executablePath }, 'Launching Chromium');
    this.browser = await chromium.launch({
      headless: true,
      ...(this.options.executablePath ? { executablePath: this.options.executablePath } : {}),
    });
    return this.browser.newContext({
      viewport: this.options.viewport ?? DEFAULT_VIEWPORT,
      extraHTTPHeaders: this.options.headers,
    });
  }

  async render(url: string): Promise<RenderResult> {
    const context = await this.launch();
    const page = await context.newPage();

    try {
      let response: Response | null;
      try {
        response = await page.goto(url, { waitUntil: 'load', timeout: this.options.timeoutMs });
      } catch (error) {
        if (!isDownloadAbort(error)) throw error;
        logger.debug({ url, error: String(error) }, 'Navigation became a download');
        return await this.fetchStatus(context, url);
      }
      if (!response) throw new Error(`No response for ${url}`);

      if (this.options.waitMs && this.options.waitMs > 0) {
        await page.waitForTimeout(this.options.waitMs);
      }

      const body = await page.content();
      const { links, images, base } = extractPageLinks(body);
      const baseUrl = resolveBaseUrl(page.url(), base);
      const screenshot = this.options.screenshot
        ? await page.screenshot({ fullPage: true, timeout: this.options.timeoutMs })
        : undefined;

      return { statusCode: response.status(), links, images, baseUrl, body, screenshot };
    } finally {
      await page.close();
    }
  }

  /** Status of a URL the browser will not display, through the context's request client. */
  private async fetchStatus(context: BrowserContext, url: string): Promise<RenderResult> {
    const response = await context.request.get(url, {
      timeout: this.options.timeoutMs,
      failOnStatusCode: false,
    });
    try {
      return {
        statusCode: response.status(),
        links: [],
        images: [],
        baseUrl: response.url(),
        body: '',
      };
    } finally {
      await response.dispose();
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser) await browser.close();
  }
}
