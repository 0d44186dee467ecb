/**
 * PostgreSQL article store
 */

import { z } from 'zod';
import { POSTGRES_SCHEMA } from '../db/schema.js';
import type { SqlExecutor } from '../db/index.js';
import { isCanonicalTimestamp } from '../scraper/published-at.js';
import { SinkError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';
import type { ArticleStore, IndustryLabel, PublishedRange, SentimentScore, WriteOutcome } from './types.js';
import { fromNewsRow } from './rows.js';

const log = componentLogger('postgres-store');

const UNIQUE_VIOLATION = '23505';

const newsRowSchema = z.object({
  link: z.string(),
  published_at: z.string(),
  title: z.string(),
  content: z.string(),
  oid: z.string(),
  industry: z.string().nullable(),
  sent_score: z.number().nullable(),
});

const linkRowSchema = newsRowSchema.pick({ link: true });

export class PostgresArticleStore implements ArticleStore {
  readonly kind = 'postgres';

  constructor(
    private readonly executor: SqlExecutor,
    private readonly connect: () => Promise<void> = async () => {}
  ) {}

  async open(): Promise<void> {
    await this.connect();
    await this.executor.execute(POSTGRES_SCHEMA);
    log.info('Postgres store ready');
  }

  async loadKnownUrls(): Promise<string[]> {
    const result = await this.executor.execute('SELECT link FROM news');
    return result.rows.map((row) => linkRowSchema.parse(row).link);
  }

  async write(record: ArticleRecord): Promise<WriteOutcome> {
    // Sentinel and unparsed dates stay text-only
    const publishedTs = isCanonicalTimestamp(record.publishedAt) ? record.publishedAt : null;

    try {
      const result = await this.executor.execute(
        `INSERT INTO news (link, published_at, published_ts, title, content, oid, industry, sent_score)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (link) DO NOTHING`,
        [
          record.url,
          record.publishedAt,
          publishedTs,
          record.title,
          record.body,
          record.sourceId,
          record.industry,
          record.sentimentScore,
        ]
      );
      return (result.rowCount ?? 0) > 0 ? 'inserted' : 'duplicate';
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        return 'duplicate';
      }
      throw new SinkError(record.url, `Postgres insert failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async findUnlabeled(limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    const result = await this.executor.execute(
      `SELECT link, published_at, title, content, oid, industry, sent_score
       FROM news
       WHERE (industry IS NULL OR industry = '')
         AND ($2::date IS NULL OR published_ts >= $2::date)
         AND ($3::date IS NULL OR published_ts < $3::date + 1)
       ORDER BY published_at DESC
       LIMIT $1`,
      [limit, range.from ?? null, range.to ?? null]
    );
    return result.rows.map((row) => fromNewsRow(newsRowSchema.parse(row)));
  }

  async findUnscored(industries: readonly string[], limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    if (industries.length === 0) return [];

    // published_ts is NULL for raw dates, so they drop out of any bounded range
    const result = await this.executor.execute(
      `SELECT link, published_at, title, content, oid, industry, sent_score
       FROM news
       WHERE industry = ANY($1) AND sent_score IS NULL
         AND ($3::date IS NULL OR published_ts >= $3::date)
         AND ($4::date IS NULL OR published_ts < $4::date + 1)
       ORDER BY published_at DESC
       LIMIT $2`,
      [[...industries], limit, range.from ?? null, range.to ?? null]
    );
    return result.rows.map((row) => fromNewsRow(newsRowSchema.parse(row)));
  }

  async saveIndustries(labels: readonly IndustryLabel[]): Promise<void> {
    if (labels.length === 0) return;
    await this.executor.execute(
      `UPDATE news AS n SET industry = u.industry
       FROM unnest($1::text[], $2::text[]) AS u(link, industry)
       WHERE n.link = u.link`,
      [labels.map((l) => l.url), labels.map((l) => l.industry)]
    );
  }

  async saveSentiments(scores: readonly SentimentScore[]): Promise<void> {
    if (scores.length === 0) return;
    await this.executor.execute(
      `UPDATE news AS n SET sent_score = u.score
       FROM unnest($1::text[], $2::float8[]) AS u(link, score)
       WHERE n.link = u.link`,
      [scores.map((s) => s.url), scores.map((s) => s.score)]
    );
  }

  async close(): Promise<void> {
    await this.executor.close();
  }
}

function pgErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
