/**
 * Article Field Extractor
 *
 * Loads one article page and reads title, body and publication date through
 * ordered selector chains. A missing field degrades to the profile's sentinel;
 * only a page that cannot be loaded (or is not an article at all) fails.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ArticleReference } from '../types/index.js';
import { isExcludedUrl } from './profile.js';
import { normalizePublishedAt } from './published-at.js';
import type { DateStrategy, ExtractResult, LoadedPage, PageFetcher, SiteProfile } from './types.js';

const log = componentLogger('extractor');

export interface ArticleExtractorOptions {
  /** Bounded wait for the article title region */
  waitMs: number;
}

export class ArticleExtractor {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly profile: SiteProfile,
    private readonly options: ArticleExtractorOptions
  ) {}

  async extract(reference: ArticleReference): Promise<ExtractResult> {
    const { url, sourceId } = reference;

    if (isExcludedUrl(this.profile, url)) {
      return { ok: false, failure: { kind: 'excluded', url } };
    }

    let page: LoadedPage;
    try {
      page = await this.fetcher.load(url, {
        readySelector: this.profile.article.readySelector,
        timeoutMs: this.options.waitMs,
      });
    } catch (error) {
      const message = errorMessage(error);
      log.warn({ url, error: message }, 'Article page failed to load');
      return { ok: false, failure: { kind: 'load-failed', url, message } };
    }

    // Redirects can land on an excluded vertical
    if (isExcludedUrl(this.profile, page.url)) {
      return { ok: false, failure: { kind: 'excluded', url, message: `Redirected to ${page.url}` } };
    }

    if (!page.ready) {
      return { ok: false, failure: { kind: 'not-an-article', url } };
    }

    const $ = cheerio.load(page.html);
    const { sentinels } = this.profile;

    const title = extractTitle($, this.profile.article.titleSelector) ?? sentinels.title;
    const body =
      extractBody($, this.profile.article.bodySelector, this.profile.article.bodyNoiseSelectors) ??
      sentinels.body;
    const rawDate = extractRawDate($, this.profile.article.dateStrategies);
    const publishedAt = rawDate === null ? sentinels.publishedAt : normalizePublishedAt(rawDate);

    log.debug({ url, title: title.slice(0, 30), publishedAt }, 'Article extracted');

    return {
      ok: true,
      record: {
        url,
        publishedAt,
        title,
        body,
        sourceId,
        industry: null,
        sentimentScore: null,
      },
    };
  }
}

export function extractTitle($: CheerioAPI, selector: string): string | null {
  const text = $(selector).first().text().trim();
  return text || null;
}

/**
 * Main content text with captions and summary boxes removed and line breaks folded
 */
export function extractBody(
  $: CheerioAPI,
  selector: string,
  noiseSelectors: readonly string[]
): string | null {
  const region = $(selector).first();
  if (region.length === 0) {
    return null;
  }

  const content = region.clone();
  for (const noise of noiseSelectors) {
    content.find(noise).remove();
  }
  content.find('br').replaceWith('\n');

  const text = content
    .text()
    .replace(/[^\S\r\n]*[\r\n]+\s*/g, ' ')
    .trim();

  return text || null;
}

/**
 * First non-empty raw value among the strategies, in order
 */
export function extractRawDate($: CheerioAPI, strategies: readonly DateStrategy[]): string | null {
  for (const strategy of strategies) {
    const element = $(strategy.selector).first();
    if (element.length === 0) continue;

    const value =
      strategy.kind === 'text' ? element.text().trim() : (element.attr(strategy.attribute) ?? '').trim();

    if (value) {
      return value;
    }
  }

  return null;
}
