/**
 * Scheduler
 *
 * Runs the incremental crawl pipeline on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { runPipeline } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let isRunning = false;
let shutdownSignal: AbortSignal | undefined;

/**
 * Execute pipeline with lock to prevent overlapping runs
 */
export async function executeScheduledPipeline(): Promise<void> {
  if (isRunning) {
    logger.warn('Pipeline already running, skipping this execution');
    return;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled pipeline starting');

  try {
    const result = await runPipeline({ mode: 'incremental', floorDate: null, signal: shutdownSignal });

    logger.info(
      {
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        inserted: result.crawl?.totalInserted ?? 0,
        labeled: result.labeled,
        scored: result.scored,
        errors: result.errors,
      },
      'Scheduled pipeline completed'
    );
  } catch (error) {
    logger.error({ error }, 'Scheduled pipeline failed');
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler; `signal` cancels an in-flight crawl on shutdown
 */
export function startScheduler(signal?: AbortSignal): void {
  const cronExpression = config.scheduler.cronExpression;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  shutdownSignal = signal;

  logger.info(
    {
      cronExpression,
      timezone: config.scheduler.timezone,
    },
    'Starting scheduler'
  );

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      executeScheduledPipeline().catch((error: unknown) => {
        logger.error({ error }, 'Pipeline execution failed');
      });
    },
    {
      timezone: config.scheduler.timezone,
    }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

/**
 * One immediate run, then the cron schedule
 */
export async function runService(signal?: AbortSignal): Promise<void> {
  logger.info(
    { cron: config.scheduler.cronExpression, timezone: config.scheduler.timezone },
    'Press crawler scheduler'
  );

  shutdownSignal = signal;
  logger.info('Running initial pipeline...');
  await executeScheduledPipeline();

  if (signal?.aborted) return;

  startScheduler(signal);
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

// Run if called directly
if (process.argv[1]?.endsWith('scheduler.ts') || process.argv[1]?.endsWith('scheduler.js')) {
  const controller = new AbortController();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    stopScheduler();
    controller.abort();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  runService(controller.signal).catch((error: unknown) => {
    logger.fatal({ error }, 'Scheduler failed');
    process.exit(1);
  });
}
