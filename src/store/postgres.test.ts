import { describe, it, expect } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';
import type { SqlExecutor } from '../db/index.js';
import { makeRecord } from '../testing/memory-store.js';
import { SinkError } from '../utils/errors.js';
import { PostgresArticleStore } from './postgres.js';

interface Call {
  text: string;
  params: unknown[] | undefined;
}

type Handler = (call: Call) => QueryResultRow[] | { rowCount: number } | Error;

class FakeExecutor implements SqlExecutor {
  readonly calls: Call[] = [];
  closed = false;

  constructor(private readonly handler: Handler = () => []) {}

  async execute(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    const call = { text, params };
    this.calls.push(call);
    const outcome = this.handler(call);
    if (outcome instanceof Error) {
      throw outcome;
    }
    if (Array.isArray(outcome)) {
      return { command: 'SELECT', rowCount: outcome.length, oid: 0, fields: [], rows: outcome };
    }
    return { command: 'INSERT', rowCount: outcome.rowCount, oid: 0, fields: [], rows: [] };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class PgError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
  }
}

describe('PostgresArticleStore', () => {
  it('creates the schema on open', async () => {
    let connected = false;
    const executor = new FakeExecutor();
    const store = new PostgresArticleStore(executor, async () => {
      connected = true;
    });

    await store.open();

    expect(connected).toBe(true);
    expect(executor.calls[0]?.text).toContain('CREATE TABLE IF NOT EXISTS news');
  });

  it('loads known links', async () => {
    const store = new PostgresArticleStore(new FakeExecutor(() => [{ link: 'https://a.example/1' }, { link: 'https://a.example/2' }]));

    expect(await store.loadKnownUrls()).toEqual(['https://a.example/1', 'https://a.example/2']);
  });

  it('inserts with a parsed timestamp column for canonical dates', async () => {
    const executor = new FakeExecutor(() => ({ rowCount: 1 }));
    const store = new PostgresArticleStore(executor);
    const record = makeRecord('https://a.example/1');

    expect(await store.write(record)).toBe('inserted');
    expect(executor.calls[0]?.params).toEqual([
      'https://a.example/1',
      '2025-12-15 13:23:00',
      '2025-12-15 13:23:00',
      '테스트 기사',
      '테스트 본문',
      '009',
      null,
      null,
    ]);
  });

  it('leaves the timestamp column empty for raw dates', async () => {
    const executor = new FakeExecutor(() => ({ rowCount: 1 }));
    const store = new PostgresArticleStore(executor);

    await store.write(makeRecord('https://a.example/1', { publishedAt: '날짜 없음' }));

    expect(executor.calls[0]?.params?.[2]).toBeNull();
  });

  it('reports a skipped conflict as a duplicate', async () => {
    const store = new PostgresArticleStore(new FakeExecutor(() => ({ rowCount: 0 })));

    expect(await store.write(makeRecord('https://a.example/1'))).toBe('duplicate');
  });

  it('swallows unique violations as duplicates', async () => {
    const store = new PostgresArticleStore(
      new FakeExecutor(() => new PgError('duplicate key value violates unique constraint "news_pkey"', '23505'))
    );

    expect(await store.write(makeRecord('https://a.example/1'))).toBe('duplicate');
  });

  it('raises other insert errors as sink errors', async () => {
    const store = new PostgresArticleStore(new FakeExecutor(() => new PgError('relation "news" does not exist', '42P01')));

    const write = store.write(makeRecord('https://a.example/1'));

    await expect(write).rejects.toBeInstanceOf(SinkError);
    await expect(write).rejects.toThrow('Postgres insert failed: relation "news" does not exist');
  });

  it('maps rows back to records', async () => {
    const store = new PostgresArticleStore(
      new FakeExecutor(() => [
        {
          link: 'https://a.example/1',
          published_at: '2025-12-15 13:23:00',
          title: '제목',
          content: '본문',
          oid: '015',
          industry: '자동차',
          sent_score: null,
        },
      ])
    );

    expect(await store.findUnscored(['자동차'], 5)).toEqual([
      makeRecord('https://a.example/1', { title: '제목', body: '본문', sourceId: '015', industry: '자동차' }),
    ]);
  });

  it('passes the publication window as date parameters', async () => {
    const executor = new FakeExecutor(() => []);
    const store = new PostgresArticleStore(executor);

    await store.findUnlabeled(50, { from: '2025-12-01' });
    await store.findUnscored(['건설'], 20, { from: '2025-12-01', to: '2025-12-07' });

    expect(executor.calls.map((call) => call.params)).toEqual([
      [50, '2025-12-01', null],
      [['건설'], 20, '2025-12-01', '2025-12-07'],
    ]);
    expect(executor.calls[1]?.text).toContain('published_ts < $4::date + 1');
  });

  it('sends batched updates as parallel arrays', async () => {
    const executor = new FakeExecutor(() => ({ rowCount: 2 }));
    const store = new PostgresArticleStore(executor);

    await store.saveSentiments([
      { url: 'https://a.example/1', score: 0.5 },
      { url: 'https://a.example/2', score: -0.1 },
    ]);
    await store.saveIndustries([]);

    expect(executor.calls).toHaveLength(1);
    expect(executor.calls[0]?.params).toEqual([
      ['https://a.example/1', 'https://a.example/2'],
      [0.5, -0.1],
    ]);
  });

  it('closes the executor', async () => {
    const executor = new FakeExecutor();

    await new PostgresArticleStore(executor).close();

    expect(executor.closed).toBe(true);
  });
});
