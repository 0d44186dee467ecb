/**
 * Article store contracts
 */

import type { ArticleRecord, CalendarDate } from '../types/index.js';
import type { KnownUrlSource } from '../dedup/index.js';

export type WriteOutcome = 'inserted' | 'duplicate';

/**
 * Append-only destination for extracted records
 */
export interface ArticleSink extends KnownUrlSource {
  readonly kind: string;
  open(): Promise<void>;
  /** Resolves once the record is durable; a duplicate key is not an error */
  write(record: ArticleRecord): Promise<WriteOutcome>;
  close(): Promise<void>;
}

export interface IndustryLabel {
  url: string;
  industry: string;
}

export interface SentimentScore {
  url: string;
  score: number;
}

/**
 * Inclusive bounds on the publication day. Records whose `publishedAt` is not
 * a canonical timestamp fall outside every bounded range.
 */
export interface PublishedRange {
  from?: CalendarDate;
  to?: CalendarDate;
}

/**
 * Read/update access used by the enrichment pass
 */
export interface EnrichmentStore {
  findUnlabeled(limit: number, range?: PublishedRange): Promise<ArticleRecord[]>;
  findUnscored(industries: readonly string[], limit: number, range?: PublishedRange): Promise<ArticleRecord[]>;
  saveIndustries(labels: readonly IndustryLabel[]): Promise<void>;
  saveSentiments(scores: readonly SentimentScore[]): Promise<void>;
}

export type ArticleStore = ArticleSink & EnrichmentStore;
