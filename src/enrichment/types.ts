/**
 * Enrichment collaborators
 */

export interface IndustryPrediction {
  label: string;
  /** 0..1 */
  confidence: number;
}

/**
 * Batch industry classifier; one prediction per input text, in order
 */
export interface IndustryClassifier {
  classify(texts: readonly string[]): Promise<IndustryPrediction[]>;
}

/**
 * Batch sentiment scorer; one score in -1..1 per input text, in order
 */
export interface SentimentScorer {
  score(texts: readonly string[]): Promise<number[]>;
}

export const UNCLASSIFIABLE_LABEL = '분류 불가';
