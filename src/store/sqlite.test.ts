import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { makeRecord } from '../testing/memory-store.js';
import { SqliteArticleStore } from './sqlite.js';

describe('SqliteArticleStore', () => {
  let store: SqliteArticleStore;

  beforeEach(async () => {
    store = new SqliteArticleStore(':memory:');
    await store.open();
  });

  afterEach(async () => {
    await store.close();
  });

  it('inserts a record and reports a repeated URL as a duplicate', async () => {
    const record = makeRecord('https://n.news.naver.com/mnews/article/009/0000000001');

    expect(await store.write(record)).toBe('inserted');
    expect(await store.write(record)).toBe('duplicate');
    expect(await store.loadKnownUrls()).toEqual([record.url]);
  });

  it('round-trips every field', async () => {
    const record = makeRecord('https://n.news.naver.com/mnews/article/015/0000000002', {
      publishedAt: '날짜 없음',
      sourceId: '015',
    });
    await store.write(record);

    expect(await store.findUnlabeled(10)).toEqual([record]);
  });

  it('finds unscored records only within the requested industries', async () => {
    await store.write(makeRecord('https://a.example/1', { industry: '자동차' }));
    await store.write(makeRecord('https://a.example/2', { industry: '금융' }));
    await store.write(makeRecord('https://a.example/3', { industry: '건설', sentimentScore: 0.4 }));

    const found = await store.findUnscored(['자동차', '건설'], 10);

    expect(found.map((r) => r.url)).toEqual(['https://a.example/1']);
    expect(await store.findUnscored([], 10)).toEqual([]);
  });

  it('saves industry labels and sentiment scores', async () => {
    await store.write(makeRecord('https://a.example/1'));
    await store.write(makeRecord('https://a.example/2'));

    await store.saveIndustries([
      { url: 'https://a.example/1', industry: '헬스케어' },
      { url: 'https://a.example/2', industry: '분류 불가' },
    ]);
    await store.saveSentiments([{ url: 'https://a.example/1', score: -0.25 }]);

    expect(await store.findUnlabeled(10)).toEqual([]);
    expect(await store.findUnscored(['헬스케어'], 10)).toEqual([]);
    expect(await store.findUnscored(['분류 불가'], 10)).toHaveLength(1);
  });

  it('filters enrichment queries by publication day', async () => {
    await store.write(makeRecord('https://a.example/1', { publishedAt: '2025-12-01 08:00:00', industry: '자동차' }));
    await store.write(makeRecord('https://a.example/2', { publishedAt: '2025-12-02 23:59:59', industry: '자동차' }));
    await store.write(makeRecord('https://a.example/3', { publishedAt: '2025-12-03 00:00:00', industry: '자동차' }));
    await store.write(makeRecord('https://a.example/4', { publishedAt: '날짜 없음' }));

    const found = await store.findUnscored(['자동차'], 10, { from: '2025-12-02', to: '2025-12-02' });

    expect(found.map((r) => r.url)).toEqual(['https://a.example/2']);
    expect(await store.findUnlabeled(10, { from: '2025-12-01' })).toEqual([]);
    expect((await store.findUnlabeled(10)).map((r) => r.url)).toEqual(['https://a.example/4']);
  });

  it('refuses to work before open', async () => {
    const closed = new SqliteArticleStore(':memory:');

    await expect(closed.loadKnownUrls()).rejects.toThrow('Store not opened');
  });
});
