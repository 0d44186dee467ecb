/**
 * Listing Walker
 *
 * Reads one page of a source's daily listing and decides whether another page follows.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ArticleReference, CalendarDate } from '../types/index.js';
import { isExcludedUrl } from './profile.js';
import type { ListingPage, LoadedPage, PageFetcher, SiteProfile } from './types.js';

const log = componentLogger('listing');

export interface ListingWalkerOptions {
  /** Bounded wait for the listing container */
  waitMs: number;
}

export class ListingWalker {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly profile: SiteProfile,
    private readonly options: ListingWalkerOptions
  ) {}

  /**
   * Fetch page `pageNumber` (1-based) of the listing for `sourceId` on `date`.
   * A container that never renders, or a page that cannot be fetched, yields
   * `status: 'unavailable'` with no references.
   */
  async listPage(sourceId: string, date: CalendarDate, pageNumber: number): Promise<ListingPage> {
    const url = this.profile.listingUrl(sourceId, date, pageNumber);

    let page: LoadedPage;
    try {
      page = await this.fetcher.load(url, {
        readySelector: this.profile.listing.readySelector,
        timeoutMs: this.options.waitMs,
      });
    } catch (error) {
      log.warn({ sourceId, date, page: pageNumber, error: errorMessage(error) }, 'Listing fetch failed');
      return { status: 'unavailable', references: [], hasNextPage: false };
    }

    if (!page.ready) {
      log.info({ sourceId, date, page: pageNumber }, 'Listing container not available');
      return { status: 'unavailable', references: [], hasNextPage: false };
    }

    const $ = cheerio.load(page.html);
    const references = this.collectReferences($, page.url, sourceId);

    // An empty page ends the walk whatever the paging controls say
    const hasNextPage = references.length > 0 && this.hasNextPage($, pageNumber);

    log.debug(
      { sourceId, date, page: pageNumber, count: references.length, hasNextPage },
      'Listing page parsed'
    );

    return { status: 'ok', references, hasNextPage };
  }

  isExcluded(url: string): boolean {
    return isExcludedUrl(this.profile, url);
  }

  private collectReferences($: CheerioAPI, baseUrl: string, sourceId: string): ArticleReference[] {
    const references: ArticleReference[] = [];

    for (const selector of this.profile.listing.referenceSelectors) {
      $(selector).each((_, element) => {
        const href = $(element).attr('href')?.trim();
        if (!href) return;

        const url = resolveUrl(href, baseUrl);
        if (!url || this.isExcluded(url)) return;

        references.push({ url, sourceId });
      });
    }

    return references;
  }

  /**
   * Numbered link to `pageNumber + 1`, otherwise the next-group control
   */
  private hasNextPage($: CheerioAPI, pageNumber: number): boolean {
    const paging = $(this.profile.listing.pagingSelector).first();
    if (paging.length === 0) {
      return false;
    }

    const nextLabel = String(pageNumber + 1);
    const numbered = paging.find('a').filter((_, anchor) => $(anchor).text().trim() === nextLabel);
    if (numbered.length > 0) {
      return true;
    }

    return paging.find(this.profile.listing.nextGroupSelector).length > 0;
  }
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}
