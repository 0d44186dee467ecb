/**
 * Press Crawler
 *
 * Backward-incremental crawl of business press listings, followed by
 * industry labeling and sentiment scoring of the stored articles.
 *
 * Usage:
 *   node dist/index.js --service                 - Run as service (cron scheduler)
 *   node dist/index.js --run                     - Run pipeline once and exit
 *   node dist/index.js --run --until=2024-01-01  - Gap-fill back to a floor date
 *   node dist/index.js --run --from=2024-03-31   - Start from a given date instead of today
 *   node dist/index.js --run --skip-crawl --enrich-from=2024-03-01 --enrich-to=2024-03-31
 *                                                - Enrich only records published in that window
 *   node dist/index.js                           - Default: service mode
 */

import { parseCliArgs } from './cli.js';
import { config } from './config/index.js';
import { runPipeline, type PipelineOptions } from './pipeline.js';
import { runService, stopScheduler } from './scheduler.js';
import { logger } from './utils/logger.js';

async function executePipeline(options: PipelineOptions): Promise<void> {
  const result = await runPipeline(options);
  const crawl = result.crawl;

  logger.info('');
  logger.info('Pipeline Complete:');
  if (crawl) {
    logger.info(`  Mode:       ${crawl.mode} (${crawl.startDate} → ${crawl.floorDate ?? 'frontier'})`);
    logger.info(`  Days:       ${crawl.iterations.length}`);
    logger.info(`  Inserted:   ${crawl.totalInserted} articles`);
    logger.info(`  Ended by:   ${crawl.terminatedBy}`);
    for (const source of crawl.sources) {
      logger.info(
        `    ${source.source.displayName} (${source.source.sourceId}): ${source.inserted} inserted, ` +
          `${source.sinkErrors} sink errors, ${source.daysVisited} days, ${source.status}` +
          `${source.error ? ` - ${source.error}` : ''}`
      );
    }
  }
  logger.info(`  Labeled:    ${result.labeled} articles`);
  logger.info(`  Scored:     ${result.scored} articles`);
  if (result.errors > 0) {
    logger.info(`  Errors:     ${result.errors}`);
  }
  logger.info(`  Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));

  logger.info(
    { env: config.app.env, mode: cli.runOnce ? 'run-once' : 'service', sink: config.sink.kind },
    'Starting application'
  );

  const controller = new AbortController();

  // First signal cancels cleanly, a second one exits at once
  const shutdown = (signal: string): void => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, exiting`);
      process.exit(130);
    }
    logger.info(`Received ${signal}, shutting down...`);
    stopScheduler();
    controller.abort();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  if (cli.runOnce) {
    await executePipeline({ ...cli.pipeline, signal: controller.signal });
    process.exit(0);
  }

  await runService(controller.signal);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
