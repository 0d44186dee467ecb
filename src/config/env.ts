/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { isCalendarDate } from '../utils/calendar.js';
import { ConfigError } from '../utils/errors.js';

const isoDate = z.string().refine(isCalendarDate, 'Expected an existing day as YYYY-MM-DD');

const csvList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

export const envSchema = z
  .object({
    // Crawl
    CRAWL_MODE: z.enum(['incremental', 'gap-fill']).default('incremental'),
    CRAWL_FLOOR_DATE: isoDate.optional(),
    CRAWL_START_DATE: isoDate.optional(),
    CRAWL_SOURCES: z.string().optional(),
    CRAWL_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),

    // Scraping
    SCRAPER_DRIVER: z.enum(['http', 'browser']).default('http'),
    SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(300),
    USER_AGENT: z
      .string()
      .default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
      ),
    NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LISTING_WAIT_MS: z.coerce.number().int().positive().default(8000),
    ARTICLE_WAIT_MS: z.coerce.number().int().positive().default(3000),
    BROWSER_EXECUTABLE_PATH: z.string().optional(),
    BROWSER_CHANNEL: z.string().optional(),

    // Storage
    SINK_KIND: z.enum(['sqlite', 'postgres', 'csv']).default('sqlite'),
    DB_PATH: z.string().default('./data/news.db'),
    DATABASE_URL: z.string().optional(),
    CSV_PATH: z.string().default('./data/news.csv'),
    SINK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

    // Enrichment
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    INDUSTRY_LABELS: csvList('자동차,건설,헬스케어,반도체,금융,유통,에너지,IT,기타'),
    SENTIMENT_INDUSTRIES: csvList('자동차,건설,헬스케어'),
    INDUSTRY_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    ENRICH_BATCH_SIZE: z.coerce.number().int().positive().default(32),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_FILE: z.string().optional(),

    // Scheduling
    CRON_SCHEDULE: z.string().default('*/10 * * * *'),
    TZ: z.string().default('Asia/Seoul'),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((value, ctx) => {
    if (value.CRAWL_MODE === 'gap-fill' && !value.CRAWL_FLOOR_DATE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CRAWL_FLOOR_DATE'],
        message: 'CRAWL_FLOOR_DATE is required in gap-fill mode',
      });
    }
    if (value.SINK_KIND === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when SINK_KIND=postgres',
      });
    }
    if (
      value.CRAWL_START_DATE &&
      value.CRAWL_FLOOR_DATE &&
      value.CRAWL_START_DATE < value.CRAWL_FLOOR_DATE
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CRAWL_START_DATE'],
        message: 'CRAWL_START_DATE must not be earlier than CRAWL_FLOOR_DATE',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new ConfigError(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
