/**
 * Deduplication index
 *
 * Every URL already ingested, loaded once from the sink at run start. The sink's
 * rows are the durable copy: a URL is recorded here only after the sink has
 * accepted its record, so the two never disagree.
 */

import { componentLogger } from '../utils/logger.js';

const log = componentLogger('dedup');

export interface KnownUrlSource {
  loadKnownUrls(): Promise<Iterable<string>>;
}

export class DedupIndex {
  private readonly urls: Set<string>;

  constructor(urls: Iterable<string> = []) {
    this.urls = new Set(urls);
  }

  static async load(source: KnownUrlSource): Promise<DedupIndex> {
    const index = new DedupIndex(await source.loadKnownUrls());
    log.info({ known: index.size }, 'Dedup index loaded');
    return index;
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  record(url: string): void {
    this.urls.add(url);
  }

  get size(): number {
    return this.urls.size;
  }
}
