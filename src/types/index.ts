import type { FastifyBaseLogger } from 'fastify';

export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface NewsItem {
  id: number;
  source: string;
  title: string;
  link: string;
  published: string | null;
  summary: string | null;
  addedAt: string;
}

export interface NewNewsItem {
  source: string;
  title: string;
  link: string;
  published?: string | null;
  summary?: string | null;
  hash?: string;
}

export interface SourceCount {
  source: string;
  count: number;
}

export interface StoredPage {
  rows: NewsItem[];
  total: number;
}

export type SearchPath = 'index' | 'fallback' | 'none';

export interface SearchResult extends StoredPage {
  path: SearchPath;
}

export type RebuildMode = 'incremental' | 'full';

export interface ArchiveReport {
  moved: number;
  bySource: Record<string, number>;
}
