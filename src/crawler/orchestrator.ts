/**
 * Crawl Orchestrator
 *
 * Walks a shared date cursor backward one day per iteration, running every
 * still-active source for that day and retiring the ones that signal stop.
 */

import pLimit from 'p-limit';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { componentLogger } from '../utils/logger.js';
import { isBefore, previousDay } from '../utils/calendar.js';
import type { DayContext } from './day-runner.js';
import type {
  CalendarDate,
  CrawlMode,
  CrawlReport,
  DayReport,
  IterationReport,
  SourceReport,
  SourceTarget,
  TerminationReason,
} from '../types/index.js';

const log = componentLogger('orchestrator');

/**
 * The day runner as seen by the orchestrator
 */
export interface DayRunnerLike {
  runDay(source: SourceTarget, date: CalendarDate, context: DayContext): Promise<DayReport>;
}

export interface CrawlRunOptions {
  /** First date visited */
  startDate: CalendarDate;
  signal?: AbortSignal;
  /** Sources processed in parallel; work within one source stays sequential */
  concurrency?: number;
}

type DayOutcome = { ok: true; report: DayReport } | { ok: false; error: string };

export class CrawlOrchestrator {
  constructor(private readonly runner: DayRunnerLike) {}

  async run(
    sources: readonly SourceTarget[],
    mode: CrawlMode,
    floorDate: CalendarDate | null,
    options: CrawlRunOptions
  ): Promise<CrawlReport> {
    // Gap-filling never retires a source, so only the floor date ends it
    if (mode === 'gap-fill' && floorDate === null) {
      throw new ConfigError('Gap-fill mode requires a floor date');
    }

    const startedAt = Date.now();
    const limit = pLimit(Math.max(1, options.concurrency ?? 1));

    const reports = new Map<string, SourceReport>(
      sources.map((source) => [
        source.sourceId,
        { source, inserted: 0, sinkErrors: 0, daysVisited: 0, status: 'active', lastDate: null },
      ])
    );
    let active = [...sources];
    let cursor = options.startDate;
    const iterations: IterationReport[] = [];
    let terminatedBy: TerminationReason = 'sources-exhausted';

    log.info(
      { mode, startDate: cursor, floorDate, sources: sources.length },
      'Crawl started'
    );

    while (active.length > 0) {
      if (options.signal?.aborted) {
        terminatedBy = 'cancelled';
        break;
      }

      if (floorDate !== null && isBefore(cursor, floorDate)) {
        terminatedBy = 'floor-date';
        break;
      }

      const date = cursor;
      const outcomes = await Promise.all(
        active.map((source) => limit(() => this.runSource(source, date, { mode, signal: options.signal })))
      );

      const iteration: IterationReport = {
        date,
        activeSourceIds: active.map((source) => source.sourceId),
        inserted: 0,
      };
      const retired = new Set<string>();

      // Applied in configured source order, whatever order the workers finished in
      active.forEach((source, index) => {
        const outcome = outcomes[index];
        const report = reports.get(source.sourceId);
        if (!outcome || !report) return;

        report.daysVisited++;
        report.lastDate = date;

        if (!outcome.ok) {
          report.status = 'failed';
          report.error = outcome.error;
          retired.add(source.sourceId);
          return;
        }

        const day = outcome.report;
        report.inserted += day.insertedCount;
        report.sinkErrors += day.sinkErrors.length;
        iteration.inserted += day.insertedCount;

        if (!day.stopped) return;

        if (day.stopReason === 'listing-unavailable') {
          // Gap-filling keeps the source until the floor date
          if (mode === 'gap-fill') return;
          report.status = 'listing-unavailable';
        } else {
          report.status = 'caught-up';
        }
        retired.add(source.sourceId);
      });

      iterations.push(iteration);
      log.info(
        { date, active: iteration.activeSourceIds.length, inserted: iteration.inserted, retired: [...retired] },
        'Iteration complete'
      );

      active = active.filter((source) => !retired.has(source.sourceId));
      cursor = previousDay(cursor);

      if (outcomes.some((outcome) => outcome.ok && outcome.report.cancelled)) {
        terminatedBy = 'cancelled';
        break;
      }
    }

    const sourceReports = [...reports.values()];
    const report: CrawlReport = {
      mode,
      startDate: options.startDate,
      floorDate,
      iterations,
      sources: sourceReports,
      totalInserted: sourceReports.reduce((sum, source) => sum + source.inserted, 0),
      terminatedBy,
      durationMs: Date.now() - startedAt,
    };

    log.info(
      {
        totalInserted: report.totalInserted,
        iterations: iterations.length,
        terminatedBy,
        durationMs: report.durationMs,
      },
      'Crawl finished'
    );

    return report;
  }

  /**
   * Fatal errors stop only the failing source
   */
  private async runSource(source: SourceTarget, date: CalendarDate, context: DayContext): Promise<DayOutcome> {
    try {
      return { ok: true, report: await this.runner.runDay(source, date, context) };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ sourceId: source.sourceId, source: source.displayName, date, error: message }, 'Source failed');
      return { ok: false, error: message };
    }
  }
}
