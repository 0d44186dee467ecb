/**
 * SQLite article store
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { SQLITE_SCHEMA, type NewsRow } from '../db/schema.js';
import { SinkError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';
import type { ArticleStore, IndustryLabel, PublishedRange, SentimentScore, WriteOutcome } from './types.js';
import { fromNewsRow, isBounded } from './rows.js';

const log = componentLogger('sqlite');

export class SqliteArticleStore implements ArticleStore {
  readonly kind = 'sqlite';
  private db: Database.Database | null = null;

  constructor(private readonly path: string) {}

  async open(): Promise<void> {
    if (this.db) return;

    if (this.path !== ':memory:') {
      mkdirSync(dirname(this.path), { recursive: true });
    }

    this.db = new Database(this.path);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SQLITE_SCHEMA);
    log.info({ path: this.path }, 'SQLite store ready');
  }

  async loadKnownUrls(): Promise<string[]> {
    const rows = this.database.prepare<[], Pick<NewsRow, 'link'>>('SELECT link FROM news').all();
    return rows.map((row) => row.link);
  }

  async write(record: ArticleRecord): Promise<WriteOutcome> {
    try {
      const result = this.database
        .prepare(
          `INSERT INTO news (link, published_at, title, content, oid, industry, sent_score)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(link) DO NOTHING`
        )
        .run(
          record.url,
          record.publishedAt,
          record.title,
          record.body,
          record.sourceId,
          record.industry,
          record.sentimentScore
        );
      return result.changes > 0 ? 'inserted' : 'duplicate';
    } catch (error) {
      throw new SinkError(record.url, `SQLite insert failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async findUnlabeled(limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    const clause = rangeClause(range);
    const rows = this.database
      .prepare<Array<string | number>, NewsRow>(
        `SELECT * FROM news
         WHERE (industry IS NULL OR industry = '')${clause.sql}
         ORDER BY published_at DESC
         LIMIT ?`
      )
      .all(...clause.params, limit);
    return rows.map(fromNewsRow);
  }

  async findUnscored(industries: readonly string[], limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    if (industries.length === 0) return [];

    const placeholders = industries.map(() => '?').join(', ');
    const clause = rangeClause(range);
    const rows = this.database
      .prepare<Array<string | number>, NewsRow>(
        `SELECT * FROM news
         WHERE industry IN (${placeholders}) AND sent_score IS NULL${clause.sql}
         ORDER BY published_at DESC
         LIMIT ?`
      )
      .all(...industries, ...clause.params, limit);
    return rows.map(fromNewsRow);
  }

  async saveIndustries(labels: readonly IndustryLabel[]): Promise<void> {
    const db = this.database;
    const update = db.prepare<[string, string]>('UPDATE news SET industry = ? WHERE link = ?');
    db.transaction((items: readonly IndustryLabel[]) => {
      for (const item of items) update.run(item.industry, item.url);
    })(labels);
  }

  async saveSentiments(scores: readonly SentimentScore[]): Promise<void> {
    const db = this.database;
    const update = db.prepare<[number, string]>('UPDATE news SET sent_score = ? WHERE link = ?');
    db.transaction((items: readonly SentimentScore[]) => {
      for (const item of items) update.run(item.score, item.url);
    })(scores);
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.info('SQLite store closed');
    }
  }

  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('Store not opened. Call open() first.');
    }
    return this.db;
  }
}

const CANONICAL_GLOB = '[0-9][0-9][0-9][0-9]-[0-9][0-9]-[0-9][0-9] [0-9][0-9]:[0-9][0-9]:[0-9][0-9]';

function rangeClause(range: PublishedRange): { sql: string; params: string[] } {
  if (!isBounded(range)) return { sql: '', params: [] };

  let sql = ` AND published_at GLOB '${CANONICAL_GLOB}'`;
  const params: string[] = [];
  if (range.from !== undefined) {
    sql += ' AND substr(published_at, 1, 10) >= ?';
    params.push(range.from);
  }
  if (range.to !== undefined) {
    sql += ' AND substr(published_at, 1, 10) <= ?';
    params.push(range.to);
  }
  return { sql, params };
}
