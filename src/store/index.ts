/**
 * Store Module
 */

import type { Config } from '../config/index.js';
import { PgDatabase } from '../db/index.js';
import { ConfigError } from '../utils/errors.js';
import { CsvArticleStore } from './csv.js';
import { PostgresArticleStore } from './postgres.js';
import { SqliteArticleStore } from './sqlite.js';
import type { ArticleStore } from './types.js';

export function createStore(sink: Config['sink']): ArticleStore {
  switch (sink.kind) {
    case 'sqlite':
      return new SqliteArticleStore(sink.sqlitePath);
    case 'csv':
      return new CsvArticleStore(sink.csvPath);
    case 'postgres': {
      if (!sink.databaseUrl) {
        throw new ConfigError('DATABASE_URL is required when SINK_KIND=postgres');
      }
      const database = new PgDatabase({
        connectionString: sink.databaseUrl,
        queryTimeoutMs: sink.writeTimeoutMs,
      });
      return new PostgresArticleStore(database, () => database.connect());
    }
  }
}

export { SqliteArticleStore } from './sqlite.js';
export { PostgresArticleStore } from './postgres.js';
export { CsvArticleStore, CSV_COLUMNS } from './csv.js';
export type {
  ArticleSink,
  ArticleStore,
  EnrichmentStore,
  IndustryLabel,
  PublishedRange,
  SentimentScore,
  WriteOutcome,
} from './types.js';
