/**
 * Scraper Module
 *
 * Page fetchers (plain HTTP or a headless browser), the listing walker and the
 * article extractor, all driven by a site profile.
 */

import type { Config } from '../config/index.js';
import { BrowserFetcher } from './browser.js';
import { HttpFetcher } from './http.js';
import type { PageFetcher } from './types.js';

export function createFetcher(scraper: Config['scraper'], retry: Config['retry']): PageFetcher {
  const common = {
    userAgent: scraper.userAgent,
    navigationTimeoutMs: scraper.navigationTimeoutMs,
    rateLimitMs: scraper.rateLimitMs,
    retry,
  };

  if (scraper.driver === 'browser') {
    return new BrowserFetcher({
      ...common,
      executablePath: scraper.browserExecutablePath,
      channel: scraper.browserChannel,
    });
  }

  return new HttpFetcher(common);
}

export { BrowserFetcher, type BrowserFetcherOptions } from './browser.js';
export { HttpFetcher, decodeBody, type HttpFetcherOptions } from './http.js';
export { ListingWalker, type ListingWalkerOptions } from './listing.js';
export { ArticleExtractor, extractBody, extractRawDate, extractTitle } from './extractor.js';
export { NAVER_NEWS_PROFILE, isExcludedUrl } from './profile.js';
export { normalizePublishedAt, isCanonicalTimestamp } from './published-at.js';
export type {
  DateStrategy,
  ExtractFailure,
  ExtractFailureKind,
  ExtractResult,
  ListingPage,
  ListingStatus,
  LoadOptions,
  LoadedPage,
  PageFetcher,
  SiteProfile,
} from './types.js';
