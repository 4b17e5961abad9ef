import { astToDebug, Term } from '../search/ast';
import { parseQuery } from '../search/parser';
import { buildExclusionPredicate, compileQuery, splitPositiveNegative } from '../search/compiler';
import { Logger, NewsItem, SearchResult, StoredPage } from '../types';
import { NewsStore } from '../types/store';
import { SEARCH_LIMITS } from '../config/search/constants';
import { config } from '../config/env';

const EMPTY: SearchResult = { rows: [], total: 0, path: 'none' };

export function excludeNegatives(rows: NewsItem[], negatives: Term[]): NewsItem[] {
  const needles = negatives.map((t) => t.original.toLowerCase());
  return rows.filter((row) => {
    const title = row.title.toLowerCase();
    const summary = (row.summary ?? '').toLowerCase();
    return !needles.some((n) => title.includes(n) || summary.includes(n));
  });
}

export class SearchEngine {
  constructor(
    private readonly store: NewsStore,
    private readonly log?: Logger,
    private readonly debugPlans: boolean = config.DEBUG_SEARCH
  ) {}

  async search(rawQuery: string, limit: number, offset: number): Promise<SearchResult> {
    const raw = rawQuery.trim();
    if (!raw) return EMPTY;

    const ast = parseQuery(raw);
    if (!ast) return EMPTY;

    const pageLimit = Math.min(Math.max(1, limit), SEARCH_LIMITS.max);
    const pageOffset = Math.max(0, offset);

    const compiled = compileQuery(ast);
    const { positives, negatives } = splitPositiveNegative(ast);
    const negativeOnly = positives.length === 0 && negatives.length > 0;
    const index = this.store.fullTextIndex();

    if (this.debugPlans) {
      this.log?.debug({ ast: astToDebug(ast), negativeOnly, indexed: index !== null }, 'search plan');
    }

    if (index && !negativeOnly) {
      let page: StoredPage = { rows: [], total: 0 };
      if (compiled.indexMatchExpr.trim()) {
        page = await index.search(compiled.indexMatchExpr, pageLimit, pageOffset, buildExclusionPredicate(negatives));
      }

      if (negatives.length > 0 && page.rows.length > 0) {
        const kept = excludeNegatives(page.rows, negatives);
        const removed = page.rows.length - kept.length;
        // Only this page's removals are known here.
        page = { rows: kept, total: Math.max(0, page.total - removed) };
      }

      if (page.rows.length > 0) return { ...page, path: 'index' };
    }

    const fallback = await this.store.substringSearch(compiled.fallbackPredicate, pageLimit, pageOffset);
    return { ...fallback, path: 'fallback' };
  }
}
