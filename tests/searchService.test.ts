import { describe, expect, it, vi } from 'vitest';
import { SearchEngine, excludeNegatives } from '../src/services/searchService';
import { parseQuery } from '../src/search/parser';
import { splitPositiveNegative } from '../src/search/compiler';
import { FullTextIndex } from '../src/types/store';
import { MemoryNewsStore } from './helpers/memoryNewsStore';
import { seededStore } from './helpers/fixtures';

function requireIndex(store: MemoryNewsStore): FullTextIndex {
  const index = store.fullTextIndex();
  if (!index) throw new Error('store has no index');
  return index;
}

const ids = (rows: Array<{ id: number }>) => rows.map((r) => r.id);

describe('SearchEngine', () => {
  it('returns an empty result for blank or unparseable queries without touching the store', async () => {
    const store = await seededStore();
    const indexSpy = vi.spyOn(requireIndex(store), 'search');
    const substringSpy = vi.spyOn(store, 'substringSearch');
    const engine = new SearchEngine(store);

    for (const q of ['', '   ', '""', 'AND OR', 'NOT']) {
      expect(await engine.search(q, 10, 0)).toEqual({ rows: [], total: 0, path: 'none' });
    }
    expect(indexSpy).not.toHaveBeenCalled();
    expect(substringSpy).not.toHaveBeenCalled();
  });

  it('serves phrase queries from the index and excludes negatives', async () => {
    const engine = new SearchEngine(await seededStore());
    const result = await engine.search('"мировой кризис" -санкции', 10, 0);
    expect(result.path).toBe('index');
    expect(ids(result.rows)).toEqual([2]);
    expect(result.total).toBe(1);
  });

  it('post-filters negatives when the index ignores exclusions', async () => {
    const engine = new SearchEngine(await seededStore({ honorExclusion: false }));
    const result = await engine.search('"мировой кризис" -санкции', 10, 0);
    expect(ids(result.rows)).toEqual([2]);
    expect(result.total).toBe(1);
  });

  it('subtracts only the removals visible on the current page', async () => {
    const engine = new SearchEngine(await seededStore({ honorExclusion: false }));
    const result = await engine.search('"мировой кризис" -санкции', 1, 0);
    expect(ids(result.rows)).toEqual([2]);
    expect(result.total).toBe(2);
  });

  it('finds hyphenated and spaced spellings of a compound through the index', async () => {
    const store = await seededStore();
    await store.insertMany([
      { source: 'BBC', title: 'Another F 16 story', link: 'https://news.example/6' },
      { source: 'BBC', title: 'F-35 order', link: 'https://news.example/7' }
    ]);
    const engine = new SearchEngine(store);

    for (const q of ['F-16', '"F 16"']) {
      const result = await engine.search(q, 10, 0);
      expect(result.path).toBe('index');
      expect(ids(result.rows)).toEqual([6, 3]);
      expect(result.total).toBe(2);
    }
  });

  it('falls back to substring search with an exact count when the index finds nothing', async () => {
    const engine = new SearchEngine(await seededStore());
    const result = await engine.search('jets tomorrow', 10, 0);
    expect(result).toMatchObject({ path: 'fallback', total: 2 });
    expect(ids(result.rows)).toEqual([5, 3]);
  });

  it('uses substring search when no index is available', async () => {
    const store = await seededStore({ withIndex: false });
    const engine = new SearchEngine(store);
    const result = await engine.search('рынки', 10, 0);
    expect(result.path).toBe('fallback');
    expect(ids(result.rows)).toEqual([2, 1]);
    expect(result.total).toBe(2);
  });

  it('never consults the index for negative-only queries', async () => {
    const store = await seededStore();
    const indexSpy = vi.spyOn(requireIndex(store), 'search');
    const substringSpy = vi.spyOn(store, 'substringSearch');
    const engine = new SearchEngine(store);

    const result = await engine.search('-spam', 10, 0);
    expect(indexSpy).not.toHaveBeenCalled();
    expect(substringSpy).toHaveBeenCalledWith(
      {
        kind: 'all',
        clauses: [{ kind: 'always' }, { kind: 'not', clause: { kind: 'any', clauses: [{ kind: 'contains', needle: 'spam' }] } }]
      },
      10,
      0
    );
    expect(ids(result.rows)).toEqual([5, 3, 2, 1]);
    expect(result.total).toBe(4);
  });

  it('recovers OR semantics through the fallback when the index AND finds nothing', async () => {
    const engine = new SearchEngine(await seededStore());
    const result = await engine.search('jets OR weather', 10, 0);
    expect(result.path).toBe('fallback');
    expect(ids(result.rows)).toEqual([5, 3]);
  });

  it('returns an empty page with the real total past the end', async () => {
    const engine = new SearchEngine(await seededStore());
    const result = await engine.search('кризис', 10, 50);
    expect(result.rows).toEqual([]);
    expect(result.total).toBe(2);
  });

  it('clamps limit and offset before querying', async () => {
    const store = await seededStore();
    const indexSpy = vi.spyOn(requireIndex(store), 'search');
    await new SearchEngine(store).search('кризис', 500, -3);
    expect(indexSpy).toHaveBeenCalledWith('кризис', 50, 0, null);
  });

  it('logs the query plan when debugging is enabled', async () => {
    const debug = vi.fn();
    const log = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await new SearchEngine(await seededStore(), log, true).search('a -b', 10, 0);
    expect(debug).toHaveBeenCalledWith(
      {
        ast: "AND(TERM(phrase=false, value='a', original='a'), NOT(TERM(phrase=false, value='b', original='b')))",
        negativeOnly: false,
        indexed: true
      },
      'search plan'
    );
  });

  it('stays quiet without debugging', async () => {
    const debug = vi.fn();
    const log = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await new SearchEngine(await seededStore(), log, false).search('a -b', 10, 0);
    expect(debug).not.toHaveBeenCalled();
  });
});

describe('excludeNegatives', () => {
  it('drops rows whose title or summary contains a negative', () => {
    const { negatives } = splitPositiveNegative(parseQuery('x -Rain'));
    const rows = [
      { id: 1, source: 's', title: 'Sunny', link: 'https://news.example/a', published: null, summary: 'No rain today', addedAt: '' },
      { id: 2, source: 's', title: 'Sunny', link: 'https://news.example/b', published: null, summary: null, addedAt: '' }
    ];
    expect(ids(excludeNegatives(rows, negatives))).toEqual([2]);
  });
});
