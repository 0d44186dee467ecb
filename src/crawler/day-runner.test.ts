import { describe, it, expect } from 'vitest';
import { DedupIndex } from '../dedup/index.js';
import { ArticleExtractor } from '../scraper/extractor.js';
import { ListingWalker } from '../scraper/listing.js';
import { NAVER_NEWS_PROFILE } from '../scraper/profile.js';
import { FakeSite, articleUrl } from '../testing/fake-site.js';
import { MemoryStore, makeRecord } from '../testing/memory-store.js';
import type { CrawlMode, SourceTarget } from '../types/index.js';
import { DayRunner } from './day-runner.js';

const SOURCE: SourceTarget = { displayName: '매일경제', sourceId: '009' };
const DATE = '2025-12-15';
const U1 = articleUrl(SOURCE.sourceId, 1);
const U2 = articleUrl(SOURCE.sourceId, 2);
const U3 = articleUrl(SOURCE.sourceId, 3);
const U4 = articleUrl(SOURCE.sourceId, 4);
const U5 = articleUrl(SOURCE.sourceId, 5);

function setup(site: FakeSite, store: MemoryStore, mode: CrawlMode, dedup = new DedupIndex(store.urls())) {
  const runner = new DayRunner(
    {
      walker: new ListingWalker(site, NAVER_NEWS_PROFILE, { waitMs: 50 }),
      extractor: new ArticleExtractor(site, NAVER_NEWS_PROFILE, { waitMs: 50 }),
      dedup,
      sink: store,
    },
    { sinkTimeoutMs: 50 }
  );
  const runDay = (signal?: AbortSignal) => runner.runDay(SOURCE, DATE, { mode, signal });
  return { runDay, dedup };
}

describe('DayRunner', () => {
  describe('incremental mode', () => {
    it('stops at the first known article without evaluating later references', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2, U3, U4, U5]]).addArticles([U1, U2, U3, U4, U5]);
      const store = new MemoryStore([makeRecord(U3)]);
      const { runDay } = setup(site, store, 'incremental');

      const report = await runDay();

      expect(report.insertedCount).toBe(2);
      expect(report.stopped).toBe(true);
      expect(report.stopReason).toBe('duplicate');
      expect(store.writes).toEqual([U1, U2]);
      expect(site.requestCount(U3)).toBe(0);
      expect(site.requestCount(U4)).toBe(0);
      expect(site.requestCount(U5)).toBe(0);
    });

    it('does not treat a reference repeated across pages as the frontier', async () => {
      const site = new FakeSite()
        .setListing(SOURCE.sourceId, DATE, [
          [U1, U2],
          [U2, U3],
        ])
        .addArticles([U1, U2, U3]);
      const store = new MemoryStore();
      const { runDay } = setup(site, store, 'incremental');

      const report = await runDay();

      expect(report.insertedCount).toBe(3);
      expect(report.stopped).toBe(false);
      expect(site.requestCount(U2)).toBe(1);
    });
  });

  describe('gap-fill mode', () => {
    it('skips known articles and keeps going', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2, U3, U4, U5]]).addArticles([U1, U2, U3, U4, U5]);
      const store = new MemoryStore([makeRecord(U3)]);
      const { runDay } = setup(site, store, 'gap-fill');

      const report = await runDay();

      expect(report.insertedCount).toBe(4);
      expect(report.stopped).toBe(false);
      expect(report.duplicatesSkipped).toBe(1);
      expect(store.writes).toEqual([U1, U2, U4, U5]);
    });
  });

  describe('pagination', () => {
    it('walks every page until no next page remains', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2], [U3]]).addArticles([U1, U2, U3]);
      const { runDay } = setup(site, new MemoryStore(), 'incremental');

      const report = await runDay();

      expect(report.insertedCount).toBe(3);
      expect(report.pagesVisited).toBe(2);
      expect(site.listingRequests(SOURCE.sourceId, DATE)).toEqual([1, 2]);
    });

    it('ends the day on an empty page with exactly the earlier records', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2], []]).addArticles([U1, U2]);
      const store = new MemoryStore();
      const { runDay } = setup(site, store, 'incremental');

      const report = await runDay();

      expect(report.stopped).toBe(false);
      expect(report.insertedCount).toBe(2);
      expect(store.urls()).toEqual([U1, U2]);
      expect(site.listingRequests(SOURCE.sourceId, DATE)).toEqual([1, 2]);
    });

    it('ends the walk without stopping when a later page is unavailable', async () => {
      const site = new FakeSite()
        .setListing(SOURCE.sourceId, DATE, [[U1], [U2]])
        .addArticles([U1, U2])
        .failOn(NAVER_NEWS_PROFILE.listingUrl(SOURCE.sourceId, DATE, 2));
      const { runDay } = setup(site, new MemoryStore(), 'incremental');

      const report = await runDay();

      expect(report.stopped).toBe(false);
      expect(report.stopReason).toBeNull();
      expect(report.insertedCount).toBe(1);
    });
  });

  it('stops the source when the first listing page is unavailable', async () => {
    const site = new FakeSite().setUnavailable(SOURCE.sourceId, DATE);
    const { runDay } = setup(site, new MemoryStore(), 'incremental');

    const report = await runDay();

    expect(report.stopped).toBe(true);
    expect(report.stopReason).toBe('listing-unavailable');
    expect(report.insertedCount).toBe(0);
    expect(report.pagesVisited).toBe(0);
  });

  it('counts extraction failures and skips and moves on', async () => {
    // U3 is not registered, so it renders as a non-article page
    const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2, U3]]).addArticles([U1, U2]).failOn(U2);
    const store = new MemoryStore();
    const { runDay } = setup(site, store, 'incremental');

    const report = await runDay();

    expect(report.insertedCount).toBe(1);
    expect(report.extractFailed).toBe(1);
    expect(report.extractSkipped).toBe(1);
    expect(store.urls()).toEqual([U1]);
  });

  describe('sink failures', () => {
    it('continues past a failed write without recording the URL', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2, U3]]).addArticles([U1, U2, U3]);
      const store = new MemoryStore().failOn(U1);
      const { runDay, dedup } = setup(site, store, 'incremental');

      const report = await runDay();

      expect(report.insertedCount).toBe(2);
      expect(report.sinkErrors).toEqual([`${U1}: disk full`]);
      expect(dedup.has(U1)).toBe(false);
      expect(dedup.has(U2)).toBe(true);
    });

    it('retries the failed URL on the next run', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2, U3]]).addArticles([U1, U2, U3]);
      const store = new MemoryStore().failOn(U1);
      await setup(site, store, 'incremental').runDay();

      store.heal();
      const report = await setup(site, store, 'incremental').runDay();

      expect(report.insertedCount).toBe(1);
      expect(report.stopped).toBe(true);
      expect(store.urls().sort()).toEqual([U1, U2, U3].sort());
      expect(site.requestCount(U1)).toBe(2);
    });

    it('bounds a write that never settles', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2]]).addArticles([U1, U2]);
      const store = new MemoryStore().hangOn(U1);
      const { runDay, dedup } = setup(site, store, 'incremental');

      const report = await runDay();

      expect(report.sinkErrors).toEqual([`${U1}: Sink write for ${U1} timed out after 50ms`]);
      expect(report.insertedCount).toBe(1);
      expect(dedup.has(U1)).toBe(false);
    });

    it('records a URL the sink already held without counting it as inserted', async () => {
      const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1, U2]]).addArticles([U1, U2]);
      const store = new MemoryStore([makeRecord(U1)]);
      const { runDay, dedup } = setup(site, store, 'incremental', new DedupIndex());

      const report = await runDay();

      expect(report.insertedCount).toBe(1);
      expect(report.stopped).toBe(false);
      expect(dedup.has(U1)).toBe(true);
    });
  });

  it('returns at once when cancelled before starting', async () => {
    const site = new FakeSite().setListing(SOURCE.sourceId, DATE, [[U1]]).addArticles([U1]);
    const { runDay } = setup(site, new MemoryStore(), 'incremental');
    const controller = new AbortController();
    controller.abort();

    const report = await runDay(controller.signal);

    expect(report.cancelled).toBe(true);
    expect(report.insertedCount).toBe(0);
    expect(site.requests).toEqual([]);
  });
});
