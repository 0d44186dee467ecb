/**
 * Main Pipeline
 *
 * 1. Open the sink and load the dedup index from it
 * 2. Crawl every configured source backward from the start date
 * 3. Fill missing industry labels and sentiment scores
 */

import { config } from './config/index.js';
import { CrawlOrchestrator, DayRunner } from './crawler/index.js';
import { DedupIndex } from './dedup/index.js';
import {
  OpenAIIndustryClassifier,
  OpenAISentimentScorer,
  fillMissingIndustry,
  fillMissingSentiment,
  type IndustryClassifier,
  type SentimentScorer,
} from './enrichment/index.js';
import {
  ArticleExtractor,
  ListingWalker,
  NAVER_NEWS_PROFILE,
  createFetcher,
  type PageFetcher,
  type SiteProfile,
} from './scraper/index.js';
import { createStore, type ArticleStore, type PublishedRange } from './store/index.js';
import { today } from './utils/calendar.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import type { CalendarDate, CrawlMode, PipelineResult, SourceTarget } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  mode?: CrawlMode;
  floorDate?: CalendarDate | null;
  /** Defaults to today in the configured zone */
  startDate?: CalendarDate | null;
  sources?: readonly SourceTarget[];
  skipCrawl?: boolean;
  skipEnrich?: boolean;
  /** Limits enrichment to records published within these days */
  enrichRange?: PublishedRange;
  signal?: AbortSignal;
}

/**
 * Collaborators; anything left out is built from config
 */
export interface PipelineDeps {
  store?: ArticleStore;
  fetcher?: PageFetcher;
  profile?: SiteProfile;
  /** `null` disables the pass */
  classifier?: IndustryClassifier | null;
  scorer?: SentimentScorer | null;
  now?: Date;
}

/**
 * Run the full pipeline
 */
export async function runPipeline(options: PipelineOptions = {}, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const mode = options.mode ?? config.crawl.mode;
  const floorDate = options.floorDate !== undefined ? options.floorDate : config.crawl.floorDate;
  const startDate = options.startDate ?? config.crawl.startDate ?? today(config.crawl.timezone, deps.now);
  const sources = options.sources ?? config.crawl.sources;

  if (!options.skipCrawl && mode === 'gap-fill' && floorDate === null) {
    throw new ConfigError('Gap-fill mode requires a floor date');
  }

  const startTime = Date.now();
  const result: PipelineResult = {
    crawl: null,
    labeled: 0,
    scored: 0,
    errors: 0,
    durationMs: 0,
  };

  logger.info(
    { mode, floorDate, startDate, sources: sources.length, skipCrawl: options.skipCrawl, skipEnrich: options.skipEnrich },
    'Starting pipeline'
  );

  const store = deps.store ?? createStore(config.sink);
  let fetcher: PageFetcher | null = null;

  try {
    await store.open();

    // Step 1: Crawl
    if (!options.skipCrawl) {
      const profile = deps.profile ?? NAVER_NEWS_PROFILE;
      fetcher = deps.fetcher ?? createFetcher(config.scraper, config.retry);

      const dedup = await DedupIndex.load(store);
      const runner = new DayRunner(
        {
          walker: new ListingWalker(fetcher, profile, { waitMs: config.scraper.listingWaitMs }),
          extractor: new ArticleExtractor(fetcher, profile, { waitMs: config.scraper.articleWaitMs }),
          dedup,
          sink: store,
        },
        { sinkTimeoutMs: config.sink.writeTimeoutMs }
      );

      const crawl = await new CrawlOrchestrator(runner).run(sources, mode, floorDate, {
        startDate,
        signal: options.signal,
        concurrency: config.crawl.concurrency,
      });
      result.crawl = crawl;
      for (const source of crawl.sources) {
        result.errors += source.sinkErrors + (source.status === 'failed' ? 1 : 0);
      }
    }

    // Step 2: Enrichment
    if (!options.skipEnrich && !options.signal?.aborted) {
      const enrichment = await enrich(store, deps, options.enrichRange);
      result.labeled = enrichment.labeled;
      result.scored = enrichment.scored;
      result.errors += enrichment.failed;
    }

    result.durationMs = Date.now() - startTime;
    logger.info(
      {
        inserted: result.crawl?.totalInserted ?? 0,
        labeled: result.labeled,
        scored: result.scored,
        errors: result.errors,
        durationMs: result.durationMs,
      },
      'Pipeline complete'
    );

    return result;
  } catch (error) {
    logger.error({ error }, 'Pipeline failed');
    throw error;
  } finally {
    if (fetcher) {
      await fetcher.close();
    }
    await store.close();
  }
}

interface EnrichmentOutcome {
  labeled: number;
  scored: number;
  failed: number;
}

/**
 * Each pass fails on its own; a failed labeling pass does not block scoring
 */
async function enrich(store: ArticleStore, deps: PipelineDeps, range?: PublishedRange): Promise<EnrichmentOutcome> {
  const outcome: EnrichmentOutcome = { labeled: 0, scored: 0, failed: 0 };
  const { classifier, scorer } = enrichmentCollaborators(deps);

  if (!classifier && !scorer) {
    logger.warn('OpenAI API key not configured, skipping enrichment');
    return outcome;
  }

  if (classifier) {
    try {
      outcome.labeled = await fillMissingIndustry(store, classifier, {
        batchSize: config.enrichment.batchSize,
        confidenceThreshold: config.enrichment.confidenceThreshold,
        range,
      });
    } catch (error) {
      outcome.failed++;
      logger.error({ error: errorMessage(error) }, 'Industry labeling failed');
    }
  }

  if (scorer) {
    try {
      outcome.scored = await fillMissingSentiment(store, scorer, {
        batchSize: config.enrichment.batchSize,
        industries: config.enrichment.sentimentIndustries,
        range,
      });
    } catch (error) {
      outcome.failed++;
      logger.error({ error: errorMessage(error) }, 'Sentiment scoring failed');
    }
  }

  return outcome;
}

function enrichmentCollaborators(deps: PipelineDeps): {
  classifier: IndustryClassifier | null;
  scorer: SentimentScorer | null;
} {
  const apiKey = config.openai.apiKey;
  const options = apiKey ? { apiKey, model: config.openai.model } : null;

  return {
    classifier:
      deps.classifier !== undefined
        ? deps.classifier
        : options && new OpenAIIndustryClassifier(options, config.enrichment.industryLabels),
    scorer: deps.scorer !== undefined ? deps.scorer : options && new OpenAISentimentScorer(options),
  };
}
