/**
 * News table schema
 */

export const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS news (
  link TEXT PRIMARY KEY,
  published_at TEXT NOT NULL,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  oid TEXT NOT NULL,
  industry TEXT,
  sent_score REAL,
  crawled_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_news_oid_published ON news(oid, published_at DESC);
CREATE INDEX IF NOT EXISTS idx_news_industry ON news(industry);
`;

export const POSTGRES_SCHEMA = `
CREATE TABLE IF NOT EXISTS news (
  link TEXT PRIMARY KEY,
  published_at TEXT NOT NULL,
  published_ts TIMESTAMP,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  oid TEXT NOT NULL,
  industry TEXT,
  sent_score DOUBLE PRECISION,
  crawled_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_news_oid_published ON news(oid, published_ts DESC);
CREATE INDEX IF NOT EXISTS idx_news_industry ON news(industry);
`;

export interface NewsRow {
  link: string;
  published_at: string;
  title: string;
  content: string;
  oid: string;
  industry: string | null;
  sent_score: number | null;
}
