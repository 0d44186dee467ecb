/**
 * Core types for the press crawler
 */

/**
 * Calendar day in `YYYY-MM-DD` form, no time component
 */
export type CalendarDate = string;

export interface SourceTarget {
  displayName: string;
  sourceId: string;
}

export type CrawlMode = 'incremental' | 'gap-fill';

export interface ArticleReference {
  url: string;
  sourceId: string;
}

export interface ArticleRecord {
  url: string;
  /** Canonical `YYYY-MM-DD HH:MM:SS`, or the raw/sentinel string when it could not be parsed */
  publishedAt: string;
  title: string;
  body: string;
  sourceId: string;
  industry: string | null;
  sentimentScore: number | null;
}

export interface RunVerdict {
  stopped: boolean;
  insertedCount: number;
}

export type DayStopReason = 'duplicate' | 'listing-unavailable';

/**
 * Outcome of one (source, date) pair
 */
export interface DayReport extends RunVerdict {
  stopReason: DayStopReason | null;
  pagesVisited: number;
  duplicatesSkipped: number;
  extractSkipped: number;
  extractFailed: number;
  sinkErrors: string[];
  cancelled: boolean;
}

export type SourceStatus = 'active' | 'caught-up' | 'listing-unavailable' | 'failed';

export interface SourceReport {
  source: SourceTarget;
  inserted: number;
  /** Writes the sink rejected; those URLs are retried next run */
  sinkErrors: number;
  daysVisited: number;
  status: SourceStatus;
  lastDate: CalendarDate | null;
  error?: string;
}

export interface IterationReport {
  date: CalendarDate;
  activeSourceIds: string[];
  inserted: number;
}

export type TerminationReason = 'sources-exhausted' | 'floor-date' | 'cancelled';

export interface CrawlReport {
  mode: CrawlMode;
  startDate: CalendarDate;
  floorDate: CalendarDate | null;
  iterations: IterationReport[];
  sources: SourceReport[];
  totalInserted: number;
  terminatedBy: TerminationReason;
  durationMs: number;
}

export interface PipelineResult {
  crawl: CrawlReport | null;
  labeled: number;
  scored: number;
  errors: number;
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
