import { describe, it, expect, vi } from 'vitest';
import type { IndustryClassifier, SentimentScorer } from './enrichment/index.js';
import { runPipeline } from './pipeline.js';
import { FakeSite, articleUrl } from './testing/fake-site.js';
import { MemoryStore, makeRecord } from './testing/memory-store.js';
import type { SourceTarget } from './types/index.js';
import { ConfigError } from './utils/errors.js';

const SOURCE: SourceTarget = { displayName: '매일경제', sourceId: '009' };
const START = '2025-12-15';

const automotive: IndustryClassifier = {
  classify: async (texts) => texts.map(() => ({ label: '자동차', confidence: 0.9 })),
};

const positive: SentimentScorer = {
  score: async (texts) => texts.map(() => 0.5),
};

describe('runPipeline', () => {
  it('crawls until the first stored article, then enriches every record', async () => {
    const fresh = [articleUrl(SOURCE.sourceId, 1), articleUrl(SOURCE.sourceId, 2)];
    const known = articleUrl(SOURCE.sourceId, 3);
    const site = new FakeSite().setListing(SOURCE.sourceId, START, [[...fresh, known]]).addArticles(fresh);
    const store = new MemoryStore([makeRecord(known)]);

    const result = await runPipeline(
      { mode: 'incremental', floorDate: null, startDate: START, sources: [SOURCE] },
      { store, fetcher: site, classifier: automotive, scorer: positive }
    );

    expect(result.crawl?.totalInserted).toBe(2);
    expect(result.crawl?.sources[0]?.status).toBe('caught-up');
    expect(result.crawl?.terminatedBy).toBe('sources-exhausted');
    expect(result.labeled).toBe(3);
    expect(result.scored).toBe(3);
    expect(result.errors).toBe(0);
    expect(store.urls().sort()).toEqual([...fresh, known].sort());
    expect(store.records.get(fresh[0] ?? '')?.sentimentScore).toBe(0.5);
    expect(site.closed).toBe(true);
    expect(store.closed).toBe(true);
  });

  it('counts rejected sink writes as errors', async () => {
    const fresh = [articleUrl(SOURCE.sourceId, 1), articleUrl(SOURCE.sourceId, 2)];
    const known = articleUrl(SOURCE.sourceId, 3);
    const site = new FakeSite().setListing(SOURCE.sourceId, START, [[...fresh, known]]).addArticles(fresh);
    const store = new MemoryStore([makeRecord(known)]).failOn(articleUrl(SOURCE.sourceId, 1));

    const result = await runPipeline(
      { mode: 'incremental', floorDate: null, startDate: START, sources: [SOURCE], skipEnrich: true },
      { store, fetcher: site }
    );

    expect(result.crawl?.totalInserted).toBe(1);
    expect(result.crawl?.sources[0]?.sinkErrors).toBe(1);
    expect(result.errors).toBe(1);
  });

  it('refuses to gap-fill without a floor date before touching the store', async () => {
    const store = new MemoryStore();

    await expect(
      runPipeline({ mode: 'gap-fill', floorDate: null, startDate: START, sources: [SOURCE] }, { store })
    ).rejects.toThrow(ConfigError);
    expect(store.opened).toBe(false);
  });

  it('skips enrichment when no collaborators are available', async () => {
    const store = new MemoryStore([makeRecord('https://a.example/1')]);

    const result = await runPipeline({ skipCrawl: true }, { store, classifier: null, scorer: null });

    expect(result.crawl).toBeNull();
    expect(result.labeled).toBe(0);
    expect(store.opened).toBe(true);
    expect(store.closed).toBe(true);
  });

  it('still scores when labeling fails', async () => {
    const store = new MemoryStore([
      makeRecord('https://a.example/1', { industry: '건설' }),
      makeRecord('https://a.example/2'),
    ]);
    const failing: IndustryClassifier = { classify: vi.fn().mockRejectedValue(new Error('rate limited')) };

    const result = await runPipeline({ skipCrawl: true }, { store, classifier: failing, scorer: positive });

    expect(result.errors).toBe(1);
    expect(result.scored).toBe(1);
  });

  it('closes the store when the crawl cannot start', async () => {
    const store = new MemoryStore();
    vi.spyOn(store, 'loadKnownUrls').mockRejectedValue(new Error('sink offline'));

    await expect(
      runPipeline({ startDate: START, sources: [SOURCE], skipEnrich: true }, { store, fetcher: new FakeSite() })
    ).rejects.toThrow('sink offline');
    expect(store.closed).toBe(true);
  });
});
