/**
 * CSV article store
 *
 * One file with a UTF-8 BOM and the header row written at creation.
 * Appends are serialized; enrichment updates rewrite the whole file.
 */

import { existsSync, mkdirSync } from 'fs';
import { appendFile, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { SinkError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';
import type { ArticleStore, IndustryLabel, PublishedRange, SentimentScore, WriteOutcome } from './types.js';
import { inPublishedRange } from './rows.js';

const log = componentLogger('csv-store');

const BOM = '\uFEFF';

export const CSV_COLUMNS = ['NDATE', 'TITLE', 'CONTENT', 'LINK', 'OID', 'INDUSTRY', 'SENT_SCORE'] as const;

const csvRowSchema = z.object({
  NDATE: z.string(),
  TITLE: z.string(),
  CONTENT: z.string(),
  LINK: z.string().min(1),
  OID: z.string(),
  INDUSTRY: z.string(),
  SENT_SCORE: z.string(),
});

type CsvRow = z.infer<typeof csvRowSchema>;

export class CsvArticleStore implements ArticleStore {
  readonly kind = 'csv';
  private known = new Set<string>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly path: string) {}

  async open(): Promise<void> {
    mkdirSync(dirname(this.path), { recursive: true });

    if (!existsSync(this.path)) {
      await writeFile(this.path, BOM + stringify([[...CSV_COLUMNS]]), 'utf8');
      log.info({ path: this.path }, 'CSV store created');
    }

    const records = await this.readAll();
    this.known = new Set(records.map((record) => record.url));
    log.info({ path: this.path, rows: records.length }, 'CSV store ready');
  }

  async loadKnownUrls(): Promise<string[]> {
    return [...this.known];
  }

  async write(record: ArticleRecord): Promise<WriteOutcome> {
    return this.serialize(async () => {
      if (this.known.has(record.url)) {
        return 'duplicate';
      }

      try {
        await appendFile(this.path, stringify([toCsvRow(record)], { columns: [...CSV_COLUMNS] }), 'utf8');
      } catch (error) {
        throw new SinkError(record.url, `CSV append failed: ${errorMessage(error)}`, { cause: error });
      }

      this.known.add(record.url);
      return 'inserted';
    });
  }

  async findUnlabeled(limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    const records = await this.serialize(() => this.readAll());
    return records
      .filter((record) => !record.industry && inPublishedRange(record.publishedAt, range))
      .slice(0, limit);
  }

  async findUnscored(industries: readonly string[], limit: number, range: PublishedRange = {}): Promise<ArticleRecord[]> {
    const wanted = new Set(industries);
    const records = await this.serialize(() => this.readAll());
    return records
      .filter((record) => record.industry !== null && wanted.has(record.industry) && record.sentimentScore === null)
      .filter((record) => inPublishedRange(record.publishedAt, range))
      .slice(0, limit);
  }

  async saveIndustries(labels: readonly IndustryLabel[]): Promise<void> {
    const byUrl = new Map(labels.map((label) => [label.url, label.industry]));
    await this.rewrite((record) => {
      const industry = byUrl.get(record.url);
      return industry === undefined ? record : { ...record, industry };
    });
  }

  async saveSentiments(scores: readonly SentimentScore[]): Promise<void> {
    const byUrl = new Map(scores.map((score) => [score.url, score.score]));
    await this.rewrite((record) => {
      const sentimentScore = byUrl.get(record.url);
      return sentimentScore === undefined ? record : { ...record, sentimentScore };
    });
  }

  async close(): Promise<void> {
    await this.queue;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task, task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async readAll(): Promise<ArticleRecord[]> {
    const text = await readFile(this.path, 'utf8');
    const rows: unknown = parse(text, { columns: true, bom: true, skip_empty_lines: true });
    return z.array(csvRowSchema).parse(rows).map(fromCsvRow);
  }

  private async rewrite(update: (record: ArticleRecord) => ArticleRecord): Promise<void> {
    await this.serialize(async () => {
      const records = (await this.readAll()).map(update);
      const tmpPath = `${this.path}.tmp`;
      await writeFile(
        tmpPath,
        BOM + stringify(records.map(toCsvRow), { header: true, columns: [...CSV_COLUMNS] }),
        'utf8'
      );
      await rename(tmpPath, this.path);
      log.debug({ path: this.path, rows: records.length }, 'CSV store rewritten');
    });
  }
}

function toCsvRow(record: ArticleRecord): CsvRow {
  return {
    NDATE: record.publishedAt,
    TITLE: record.title,
    CONTENT: record.body,
    LINK: record.url,
    OID: record.sourceId,
    INDUSTRY: record.industry ?? '',
    SENT_SCORE: record.sentimentScore === null ? '' : String(record.sentimentScore),
  };
}

function fromCsvRow(row: CsvRow): ArticleRecord {
  const score = row.SENT_SCORE === '' ? null : Number(row.SENT_SCORE);
  return {
    url: row.LINK,
    publishedAt: row.NDATE,
    title: row.TITLE,
    body: row.CONTENT,
    sourceId: row.OID,
    industry: row.INDUSTRY || null,
    sentimentScore: score !== null && Number.isFinite(score) ? score : null,
  };
}
