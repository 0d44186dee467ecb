/**
 * Enrichment Module
 */

export { fillMissingIndustry, fillMissingSentiment, sentimentText } from './enrich.js';
export type { IndustryPassOptions, SentimentPassOptions } from './enrich.js';
export {
  OpenAIIndustryClassifier,
  OpenAISentimentScorer,
  parseIndustryResponse,
  parseSentimentResponse,
} from './openai.js';
export type { OpenAIEnrichmentOptions } from './openai.js';
export { UNCLASSIFIABLE_LABEL } from './types.js';
export type { IndustryClassifier, IndustryPrediction, SentimentScorer } from './types.js';
