import type { FallbackPredicate } from '../search/compiler';
import type { ArchiveReport, NewNewsItem, NewsItem, RebuildMode, SourceCount, StoredPage } from './index';

export interface FullTextIndex {
  /**
   * Runs a native match expression. Rows come back newest id first and
   * `total` is the count for the whole expression. When `exclude` is given the
   * implementation may drop matching rows before counting.
   */
  search(matchExpr: string, limit: number, offset: number, exclude?: FallbackPredicate | null): Promise<StoredPage>;
}

export interface IndexRebuildCapability {
  rebuildIndex(): Promise<RebuildMode>;
}

export interface ArchiveCapability {
  archiveNow(): Promise<ArchiveReport>;
  listMonths(): Promise<string[]>;
}

export interface StoreCapabilities {
  indexRebuild?: IndexRebuildCapability;
  archive?: ArchiveCapability;
}

export interface NewsStore {
  readonly capabilities: StoreCapabilities;

  /** The native full-text index, or null when the store has none. */
  fullTextIndex(): FullTextIndex | null;
  substringSearch(predicate: FallbackPredicate, limit: number, offset: number): Promise<StoredPage>;

  insertMany(items: NewNewsItem[]): Promise<number>;
  latestPage(offset: number, limit: number): Promise<NewsItem[]>;
  total(): Promise<number>;
  countBySource(): Promise<SourceCount[]>;
  totalBySource(source: string): Promise<number>;
  sourcePage(source: string, limit: number, offset: number): Promise<NewsItem[]>;
  ping(): Promise<boolean>;
}
