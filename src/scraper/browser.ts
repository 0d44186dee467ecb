/**
 * Playwright Page Fetcher
 *
 * One browser context per session; every load opens its own page and closes it
 * afterwards, so listing and article visits never share DOM state.
 */

import { chromium, errors } from 'playwright-core';
import type { Browser, BrowserContext, Page } from 'playwright-core';
import { NavigationError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../types/index.js';
import type { LoadOptions, LoadedPage, PageFetcher } from './types.js';

const log = componentLogger('browser');

export interface BrowserFetcherOptions {
  userAgent: string;
  navigationTimeoutMs: number;
  rateLimitMs: number;
  retry: Partial<RetryConfig>;
  headless?: boolean;
  executablePath?: string;
  channel?: string;
}

const BLOCKED_RESOURCE_TYPES = new Set(['media', 'font', 'image']);

export class BrowserFetcher implements PageFetcher {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private launching: Promise<BrowserContext> | null = null;
  private readonly limiter: RateLimiter;

  constructor(private readonly options: BrowserFetcherOptions) {
    this.limiter = new RateLimiter(options.rateLimitMs);
  }

  async load(url: string, { readySelector, timeoutMs }: LoadOptions): Promise<LoadedPage> {
    const context = await this.ensureContext();
    await this.limiter.waitForSlot();

    const page = await context.newPage();
    try {
      await page.route('**/*', (route) =>
        BLOCKED_RESOURCE_TYPES.has(route.request().resourceType()) ? route.abort() : route.continue()
      );

      await this.navigate(page, url);

      let ready = true;
      try {
        await page.waitForSelector(readySelector, { state: 'attached', timeout: timeoutMs });
      } catch (error) {
        if (!(error instanceof errors.TimeoutError)) {
          throw new NavigationError(url, `Waiting for ${readySelector} failed: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        ready = false;
      }

      return { url: page.url(), html: await page.content(), ready };
    } finally {
      await closePage(page);
    }
  }

  async close(): Promise<void> {
    if (this.context) {
      try {
        await this.context.close();
      } catch (error) {
        log.warn({ error }, 'Error closing context');
      }
      this.context = null;
    }

    if (this.browser) {
      try {
        await this.browser.close();
        log.info('Browser closed');
      } catch (error) {
        log.warn({ error }, 'Error closing browser');
      }
      this.browser = null;
    }

    this.launching = null;
  }

  private async navigate(page: Page, url: string): Promise<void> {
    log.debug({ url }, 'Navigating to URL');

    try {
      const response = await withRetry(
        () => page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeoutMs }),
        this.options.retry
      );
      const status = response?.status() ?? 200;
      if (status >= 400) {
        throw new NavigationError(url, `HTTP ${status} for ${url}`);
      }
    } catch (error) {
      if (error instanceof NavigationError) throw error;
      throw new NavigationError(url, `Navigation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private ensureContext(): Promise<BrowserContext> {
    if (this.context) {
      return Promise.resolve(this.context);
    }
    if (!this.launching) {
      this.launching = this.launch();
    }
    return this.launching;
  }

  private async launch(): Promise<BrowserContext> {
    const headless = this.options.headless ?? true;
    log.info({ headless, channel: this.options.channel }, 'Launching browser');

    this.browser = await chromium.launch({
      headless,
      executablePath: this.options.executablePath,
      channel: this.options.channel,
      // Required for Docker/containerized environments
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });

    this.context = await this.browser.newContext({
      userAgent: this.options.userAgent,
      viewport: { width: 1920, height: 1080 },
      locale: 'ko-KR',
      timezoneId: 'Asia/Seoul',
      javaScriptEnabled: true,
      extraHTTPHeaders: {
        'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
      },
    });
    this.context.setDefaultTimeout(this.options.navigationTimeoutMs);

    log.info('Browser initialized successfully');
    return this.context;
  }
}

async function closePage(page: Page): Promise<void> {
  try {
    await page.close();
  } catch (error) {
    log.warn({ error }, 'Error closing page');
  }
}
