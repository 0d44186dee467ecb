import type { NewsRow } from '../db/schema.js';
import { isCanonicalTimestamp } from '../scraper/published-at.js';
import type { ArticleRecord } from '../types/index.js';
import type { PublishedRange } from './types.js';

export function fromNewsRow(row: NewsRow): ArticleRecord {
  return {
    url: row.link,
    publishedAt: row.published_at,
    title: row.title,
    body: row.content,
    sourceId: row.oid,
    industry: row.industry,
    sentimentScore: row.sent_score,
  };
}

export function isBounded(range: PublishedRange): boolean {
  return range.from !== undefined || range.to !== undefined;
}

export function inPublishedRange(publishedAt: string, range: PublishedRange): boolean {
  if (!isBounded(range)) return true;
  if (!isCanonicalTimestamp(publishedAt)) return false;

  const day = publishedAt.slice(0, 10);
  return (range.from === undefined || day >= range.from) && (range.to === undefined || day <= range.to);
}
