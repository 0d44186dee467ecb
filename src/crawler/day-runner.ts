/**
 * Per-Source Day Runner
 *
 * Drives one source for one calendar date: walks the listing pages in order,
 * filters references, consults the dedup index, extracts and writes records.
 * Everything inside one (source, date) run is sequential.
 */

import type { DedupIndex } from '../dedup/index.js';
import type { ArticleExtractor } from '../scraper/extractor.js';
import type { ListingWalker } from '../scraper/listing.js';
import type { ArticleSink } from '../store/types.js';
import { errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import type { ArticleReference, CalendarDate, CrawlMode, DayReport, SourceTarget } from '../types/index.js';

const log = componentLogger('day-runner');

export interface DayRunnerDeps {
  walker: ListingWalker;
  extractor: ArticleExtractor;
  dedup: DedupIndex;
  sink: ArticleSink;
}

export interface DayRunnerOptions {
  /** Bound on a single sink write */
  sinkTimeoutMs: number;
  /** Hard stop for a listing whose paging controls never end */
  maxPages?: number;
}

/**
 * Per-call settings owned by the orchestrator
 */
export interface DayContext {
  mode: CrawlMode;
  signal?: AbortSignal;
}

const DEFAULT_MAX_PAGES = 1000;

type ReferenceOutcome = 'continue' | 'stop';

export class DayRunner {
  private readonly maxPages: number;

  constructor(
    private readonly deps: DayRunnerDeps,
    private readonly options: DayRunnerOptions
  ) {
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  async runDay(source: SourceTarget, date: CalendarDate, { mode, signal }: DayContext): Promise<DayReport> {
    const dayLog = log.child({ sourceId: source.sourceId, date });
    const session = new Set<string>();
    const report: DayReport = {
      stopped: false,
      insertedCount: 0,
      stopReason: null,
      pagesVisited: 0,
      duplicatesSkipped: 0,
      extractSkipped: 0,
      extractFailed: 0,
      sinkErrors: [],
      cancelled: false,
    };

    for (let pageNumber = 1; pageNumber <= this.maxPages; pageNumber++) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      const listing = await this.deps.walker.listPage(source.sourceId, date, pageNumber);

      if (listing.status === 'unavailable') {
        if (pageNumber === 1) {
          // Indistinguishable from "caught up": the source is retired for this run
          dayLog.info('Listing unavailable, stopping source');
          report.stopped = true;
          report.stopReason = 'listing-unavailable';
        } else {
          dayLog.warn({ page: pageNumber }, 'Listing page unavailable, ending walk');
        }
        break;
      }

      report.pagesVisited++;

      if (listing.references.length === 0) {
        break;
      }

      for (const reference of listing.references) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }

        const outcome = await this.processReference(reference, mode, session, report, dayLog);
        if (outcome === 'stop') {
          dayLog.info({ url: reference.url, inserted: report.insertedCount }, 'Reached known article, stopping source');
          return report;
        }
      }

      if (report.cancelled || !listing.hasNextPage) {
        break;
      }
    }

    dayLog.info(
      {
        inserted: report.insertedCount,
        pages: report.pagesVisited,
        duplicates: report.duplicatesSkipped,
        skipped: report.extractSkipped,
        failed: report.extractFailed,
        sinkErrors: report.sinkErrors.length,
        stopped: report.stopped,
      },
      'Day complete'
    );

    return report;
  }

  private async processReference(
    reference: ArticleReference,
    mode: CrawlMode,
    session: Set<string>,
    report: DayReport,
    dayLog: Logger
  ): Promise<ReferenceOutcome> {
    const { url } = reference;

    if (this.deps.walker.isExcluded(url)) {
      report.extractSkipped++;
      return 'continue';
    }

    if (session.has(url)) {
      return 'continue';
    }

    if (this.deps.dedup.has(url)) {
      if (mode === 'incremental') {
        report.stopped = true;
        report.stopReason = 'duplicate';
        return 'stop';
      }
      report.duplicatesSkipped++;
      return 'continue';
    }

    const result = await this.deps.extractor.extract(reference);
    if (!result.ok) {
      if (result.failure.kind === 'load-failed') {
        report.extractFailed++;
      } else {
        report.extractSkipped++;
      }
      dayLog.debug({ url, kind: result.failure.kind }, 'Reference skipped');
      return 'continue';
    }

    try {
      const outcome = await withTimeout(
        this.deps.sink.write(result.record),
        this.options.sinkTimeoutMs,
        `Sink write for ${url}`
      );

      // Recorded only once the sink has accepted the record
      this.deps.dedup.record(url);
      session.add(url);
      if (outcome === 'inserted') {
        report.insertedCount++;
      }
    } catch (error) {
      const message = errorMessage(error);
      report.sinkErrors.push(`${url}: ${message}`);
      dayLog.error({ url, error: message }, 'Sink write failed');
    }

    return 'continue';
  }
}
