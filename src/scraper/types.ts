/**
 * Scraper Types
 */

import type { ArticleRecord, ArticleReference, CalendarDate } from '../types/index.js';

export interface LoadOptions {
  /** Selector whose presence marks the page as rendered */
  readySelector: string;
  /**
   * Bounded wait for `readySelector` to render. Drivers that receive the
   * complete document in one response check the selector once and ignore it.
   */
  timeoutMs: number;
}

/**
 * Snapshot of a page after navigation
 */
export interface LoadedPage {
  /** Final URL after redirects */
  url: string;
  html: string;
  /** False when `readySelector` did not appear in time */
  ready: boolean;
}

/**
 * Navigation layer used by the listing walker and the extractor.
 * `load` throws NavigationError when the page cannot be fetched at all.
 */
export interface PageFetcher {
  load(url: string, options: LoadOptions): Promise<LoadedPage>;
  close(): Promise<void>;
}

export type DateStrategy =
  | { kind: 'text'; selector: string }
  | { kind: 'attribute'; selector: string; attribute: string };

/**
 * Site-specific layout knowledge; the walker and extractor hold none of their own
 */
export interface SiteProfile {
  name: string;
  listingUrl(sourceId: string, date: CalendarDate, page: number): string;
  listing: {
    readySelector: string;
    referenceSelectors: readonly string[];
    pagingSelector: string;
    nextGroupSelector: string;
  };
  /** URLs of content verticals that are never ingested */
  excludedUrlPatterns: readonly RegExp[];
  article: {
    readySelector: string;
    titleSelector: string;
    bodySelector: string;
    bodyNoiseSelectors: readonly string[];
    dateStrategies: readonly DateStrategy[];
  };
  sentinels: {
    title: string;
    body: string;
    publishedAt: string;
  };
}

export type ListingStatus = 'ok' | 'unavailable';

export interface ListingPage {
  status: ListingStatus;
  references: ArticleReference[];
  hasNextPage: boolean;
}

export type ExtractFailureKind = 'excluded' | 'not-an-article' | 'load-failed';

export interface ExtractFailure {
  kind: ExtractFailureKind;
  url: string;
  message?: string;
}

export type ExtractResult =
  | { ok: true; record: ArticleRecord }
  | { ok: false; failure: ExtractFailure };
