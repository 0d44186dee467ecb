/**
 * Enrichment passes
 *
 * Fill empty industry labels and sentiment scores on records the crawl has
 * already persisted. Both run in batches and never touch the crawl state.
 */

import type { EnrichmentStore, PublishedRange } from '../store/types.js';
import { componentLogger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';
import { UNCLASSIFIABLE_LABEL, type IndustryClassifier, type SentimentScorer } from './types.js';

const log = componentLogger('enrichment');

/** Body prefix appended to the title for sentiment scoring */
const SENTIMENT_BODY_CHARS = 200;

export interface IndustryPassOptions {
  batchSize: number;
  /** Predictions below this confidence are stored as unclassifiable */
  confidenceThreshold: number;
  /** Upper bound on records handled in one pass */
  maxRecords?: number;
  /** Only records published within these days */
  range?: PublishedRange;
}

export interface SentimentPassOptions {
  batchSize: number;
  industries: readonly string[];
  maxRecords?: number;
  range?: PublishedRange;
}

const DEFAULT_MAX_RECORDS = 5000;

export async function fillMissingIndustry(
  store: EnrichmentStore,
  classifier: IndustryClassifier,
  options: IndustryPassOptions
): Promise<number> {
  const records = await store.findUnlabeled(options.maxRecords ?? DEFAULT_MAX_RECORDS, options.range);
  if (records.length === 0) {
    log.info('No unlabeled records');
    return 0;
  }

  let labeled = 0;
  for (const batch of chunk(records, options.batchSize)) {
    const predictions = await classifier.classify(batch.map((record) => record.title));
    if (predictions.length !== batch.length) {
      throw new Error(`Classifier returned ${predictions.length} predictions for ${batch.length} texts`);
    }

    const labels = batch.map((record, index) => {
      const prediction = predictions[index];
      const industry =
        prediction && prediction.confidence >= options.confidenceThreshold ? prediction.label : UNCLASSIFIABLE_LABEL;
      return { url: record.url, industry };
    });

    await store.saveIndustries(labels);
    labeled += labels.length;
    log.debug({ batch: batch.length, labeled }, 'Industry batch saved');
  }

  log.info({ labeled }, 'Industry labeling complete');
  return labeled;
}

export async function fillMissingSentiment(
  store: EnrichmentStore,
  scorer: SentimentScorer,
  options: SentimentPassOptions
): Promise<number> {
  const records = await store.findUnscored(options.industries, options.maxRecords ?? DEFAULT_MAX_RECORDS, options.range);
  if (records.length === 0) {
    log.info('No unscored records');
    return 0;
  }

  let scored = 0;
  for (const batch of chunk(records, options.batchSize)) {
    const scores = await scorer.score(batch.map(sentimentText));
    if (scores.length !== batch.length) {
      throw new Error(`Scorer returned ${scores.length} scores for ${batch.length} texts`);
    }

    await store.saveSentiments(
      batch.map((record, index) => ({ url: record.url, score: clampScore(scores[index] ?? 0) }))
    );
    scored += batch.length;
    log.debug({ batch: batch.length, scored }, 'Sentiment batch saved');
  }

  log.info({ scored }, 'Sentiment scoring complete');
  return scored;
}

export function sentimentText(record: ArticleRecord): string {
  return `${record.title} ${record.body.slice(0, SENTIMENT_BODY_CHARS)}`;
}

function clampScore(score: number): number {
  return Math.max(-1, Math.min(1, score));
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, size);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    batches.push(items.slice(i, i + step));
  }
  return batches;
}
