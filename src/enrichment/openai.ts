/**
 * OpenAI-backed classifier and scorer
 *
 * Both send one chat completion per batch and expect a JSON object back.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { componentLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { IndustryClassifier, IndustryPrediction, SentimentScorer } from './types.js';

const log = componentLogger('openai');

const RETRY = { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 10000, factor: 2 };

export interface OpenAIEnrichmentOptions {
  apiKey: string;
  model: string;
}

const industryResponseSchema = z.object({
  results: z.array(
    z.object({
      label: z.string(),
      confidence: z.number().min(0).max(1),
    })
  ),
});

const sentimentResponseSchema = z.object({
  scores: z.array(z.number().min(-1).max(1)),
});

function industryPrompt(labels: readonly string[]): string {
  return `너는 한국 경제 뉴스의 산업 분류기다.
각 기사 제목을 다음 산업 중 하나로 분류하라: ${labels.join(', ')}.
입력은 번호가 붙은 제목 목록이다. 같은 순서로 결과를 반환하라.

다음 JSON 형식으로만 응답하라:
{ "results": [ { "label": "산업명", "confidence": 0.0 } ] }

confidence는 0과 1 사이의 확신도다.`;
}

const SENTIMENT_PROMPT = `너는 한국 경제 뉴스의 감성 분석기다.
각 기사(제목과 본문 앞부분)에 대해 -1.0(매우 부정)부터 1.0(매우 긍정)까지의 점수를 매겨라.
입력은 번호가 붙은 기사 목록이다. 같은 순서로 결과를 반환하라.

다음 JSON 형식으로만 응답하라:
{ "scores": [0.0] }`;

function numbered(texts: readonly string[]): string {
  return texts.map((text, index) => `${index + 1}. ${text.replace(/\s+/g, ' ')}`).join('\n');
}

export function parseIndustryResponse(
  content: string,
  labels: readonly string[],
  expected: number
): IndustryPrediction[] {
  const parsed = industryResponseSchema.parse(JSON.parse(content));
  if (parsed.results.length !== expected) {
    throw new Error(`Expected ${expected} industry results, got ${parsed.results.length}`);
  }

  const known = new Set(labels);
  // Labels outside the configured set count as no prediction
  return parsed.results.map((result) =>
    known.has(result.label) ? result : { label: result.label, confidence: 0 }
  );
}

export function parseSentimentResponse(content: string, expected: number): number[] {
  const parsed = sentimentResponseSchema.parse(JSON.parse(content));
  if (parsed.scores.length !== expected) {
    throw new Error(`Expected ${expected} sentiment scores, got ${parsed.scores.length}`);
  }
  return parsed.scores;
}

abstract class OpenAIBatchClient {
  protected readonly client: OpenAI;

  constructor(protected readonly options: OpenAIEnrichmentOptions, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: options.apiKey });
  }

  protected async complete(system: string, user: string): Promise<string> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.options.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          temperature: 0,
          response_format: { type: 'json_object' },
        }),
      RETRY
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    log.debug({ tokensUsed: response.usage?.total_tokens ?? 0 }, 'Completion received');
    return content;
  }
}

export class OpenAIIndustryClassifier extends OpenAIBatchClient implements IndustryClassifier {
  constructor(
    options: OpenAIEnrichmentOptions,
    private readonly labels: readonly string[],
    client?: OpenAI
  ) {
    super(options, client);
  }

  async classify(texts: readonly string[]): Promise<IndustryPrediction[]> {
    if (texts.length === 0) return [];
    const content = await this.complete(industryPrompt(this.labels), numbered(texts));
    return parseIndustryResponse(content, this.labels, texts.length);
  }
}

export class OpenAISentimentScorer extends OpenAIBatchClient implements SentimentScorer {
  async score(texts: readonly string[]): Promise<number[]> {
    if (texts.length === 0) return [];
    const content = await this.complete(SENTIMENT_PROMPT, numbered(texts));
    return parseSentimentResponse(content, texts.length);
  }
}
