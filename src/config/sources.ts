/**
 * Crawl targets
 */

import type { SourceTarget } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Business presses crawled when CRAWL_SOURCES is not set
 */
export const DEFAULT_SOURCES: readonly SourceTarget[] = [
  { displayName: '매일경제', sourceId: '009' },
  { displayName: '한국경제', sourceId: '015' },
  { displayName: '머니투데이', sourceId: '008' },
  { displayName: '서울경제', sourceId: '011' },
  { displayName: '파이낸셜뉴스', sourceId: '014' },
  { displayName: '헤럴드경제', sourceId: '016' },
  { displayName: '아시아경제', sourceId: '277' },
  { displayName: '이데일리', sourceId: '018' },
  { displayName: '조세일보', sourceId: '123' },
  { displayName: '조선비즈', sourceId: '366' },
  { displayName: '비즈워치', sourceId: '648' },
];

/**
 * Parse `name:id,name:id` into source targets
 */
export function parseSourceList(value: string): SourceTarget[] {
  const targets: SourceTarget[] = [];
  const seen = new Set<string>();

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.lastIndexOf(':');
    const displayName = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const sourceId = separator > 0 ? trimmed.slice(separator + 1).trim() : '';

    if (!displayName || !sourceId) {
      throw new ConfigError(`Invalid source entry "${trimmed}" (expected name:id)`);
    }
    if (seen.has(sourceId)) {
      throw new ConfigError(`Duplicate source id "${sourceId}"`);
    }

    seen.add(sourceId);
    targets.push({ displayName, sourceId });
  }

  if (targets.length === 0) {
    throw new ConfigError('Source list is empty');
  }

  return targets;
}
