import { describe, it, expect } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_SOURCES, parseSourceList } from './sources.js';

describe('parseSourceList', () => {
  it('parses name:id pairs and ignores blank entries', () => {
    expect(parseSourceList(' 매일경제:009 , ,한국경제:015')).toEqual([
      { displayName: '매일경제', sourceId: '009' },
      { displayName: '한국경제', sourceId: '015' },
    ]);
  });

  it('splits on the last colon', () => {
    expect(parseSourceList('Biz:Watch:648')).toEqual([{ displayName: 'Biz:Watch', sourceId: '648' }]);
  });

  it('rejects malformed, duplicate and empty lists', () => {
    expect(() => parseSourceList('매일경제')).toThrow('Invalid source entry "매일경제" (expected name:id)');
    expect(() => parseSourceList('a:009,b:009')).toThrow('Duplicate source id "009"');
    expect(() => parseSourceList(' , ')).toThrow(ConfigError);
  });

  it('ships unique default source ids', () => {
    const ids = DEFAULT_SOURCES.map((source) => source.sourceId);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
