/**
 * Application configuration
 */

import { env } from './env.js';
import { DEFAULT_SOURCES, parseSourceList } from './sources.js';

export const config = {
  app: {
    name: 'press-crawler',
    env: env.NODE_ENV,
  },

  crawl: {
    mode: env.CRAWL_MODE,
    floorDate: env.CRAWL_FLOOR_DATE ?? null,
    startDate: env.CRAWL_START_DATE ?? null,
    sources: env.CRAWL_SOURCES ? parseSourceList(env.CRAWL_SOURCES) : [...DEFAULT_SOURCES],
    concurrency: env.CRAWL_CONCURRENCY,
    timezone: env.TZ,
  },

  scraper: {
    driver: env.SCRAPER_DRIVER,
    rateLimitMs: env.SCRAPE_RATE_LIMIT_MS,
    userAgent: env.USER_AGENT,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    listingWaitMs: env.LISTING_WAIT_MS,
    articleWaitMs: env.ARTICLE_WAIT_MS,
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH,
    browserChannel: env.BROWSER_CHANNEL,
  },

  sink: {
    kind: env.SINK_KIND,
    sqlitePath: env.DB_PATH,
    databaseUrl: env.DATABASE_URL,
    csvPath: env.CSV_PATH,
    writeTimeoutMs: env.SINK_TIMEOUT_MS,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
  },

  enrichment: {
    industryLabels: env.INDUSTRY_LABELS,
    sentimentIndustries: env.SENTIMENT_INDUSTRIES,
    confidenceThreshold: env.INDUSTRY_CONFIDENCE_THRESHOLD,
    batchSize: env.ENRICH_BATCH_SIZE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  retry: {
    maxAttempts: 2,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { DEFAULT_SOURCES, parseSourceList } from './sources.js';
