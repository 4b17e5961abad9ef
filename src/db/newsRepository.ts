import { createHash } from 'crypto';
import { query, withTransaction } from './db';
import { IndexRebuildError } from '../errors';
import { BASE_SCHEMA, TSV_INDEX, fullTextSchema, phraseQueryExpression, tsvExpression } from './schema';
import { FallbackPredicate, parseMatchExpression, predicateToSql } from '../search/compiler';
import { ArchiveReport, Logger, NewNewsItem, NewsItem, RebuildMode, SourceCount, StoredPage } from '../types';
import { ArchiveCapability, FullTextIndex, IndexRebuildCapability, NewsStore, StoreCapabilities } from '../types/store';

interface NewsRow {
  id: string;
  source: string;
  title: string;
  link: string;
  published: Date | null;
  summary: string | null;
  added_at: Date;
}

interface CountRow {
  total: number;
}

const NEWS_COLUMNS = 'n.id, n.source, n.title, n.link, n.published, n.summary, n.added_at';
const RECENCY_ORDER = 'ORDER BY n.published DESC NULLS LAST, n.id DESC';
const ALIASED = { title: 'n.title', summary: 'n.summary' };

function toNewsItem(row: NewsRow): NewsItem {
  return {
    id: Number(row.id),
    source: row.source,
    title: row.title,
    link: row.link,
    published: row.published ? row.published.toISOString() : null,
    summary: row.summary,
    addedAt: row.added_at.toISOString()
  };
}

export function itemHash(item: NewNewsItem): string {
  return item.hash ?? createHash('sha1').update(item.link, 'utf8').digest('hex');
}

export interface PgNewsStoreOptions {
  tsConfig: string;
  archiveAfterDays: number;
  log?: Logger;
}

export class PgNewsStore implements NewsStore {
  readonly capabilities: StoreCapabilities;
  private indexReady = false;
  private readonly index: FullTextIndex;

  constructor(private readonly options: PgNewsStoreOptions) {
    this.index = { search: (expr, limit, offset, exclude) => this.indexSearch(expr, limit, offset, exclude) };
    const indexRebuild: IndexRebuildCapability = { rebuildIndex: () => this.rebuildIndex() };
    const archive: ArchiveCapability = {
      archiveNow: () => this.archiveNow(),
      listMonths: () => this.listArchiveMonths()
    };
    this.capabilities = { indexRebuild, archive };
  }

  /** Applies the schema and decides, once, whether the full-text index is usable. */
  async init(): Promise<void> {
    await query(BASE_SCHEMA);
    try {
      await query(fullTextSchema(this.options.tsConfig));
    } catch (err) {
      this.options.log?.warn({ err }, 'full-text index setup failed; substring search only');
    }
    this.indexReady = await this.detectIndex();
    if (!this.indexReady) {
      this.options.log?.warn('full-text index unavailable; substring search only');
    }
  }

  fullTextIndex(): FullTextIndex | null {
    return this.indexReady ? this.index : null;
  }

  async ping(): Promise<boolean> {
    try {
      await query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private async detectIndex(): Promise<boolean> {
    const { rows } = await query<{ present: boolean }>('SELECT to_regclass($1) IS NOT NULL AS present', [TSV_INDEX]);
    return rows[0]?.present ?? false;
  }

  private async indexSearch(
    matchExpr: string,
    limit: number,
    offset: number,
    exclude?: FallbackPredicate | null
  ): Promise<StoredPage> {
    const units = parseMatchExpression(matchExpr);
    if (units.length === 0) return { rows: [], total: 0 };

    const values: unknown[] = [...units];
    const tsQuery = phraseQueryExpression(this.options.tsConfig, units.map((_, i) => `$${i + 1}`));
    const exclusionSql = exclude ? ` AND NOT ${predicateToSql(exclude, values, ALIASED)}` : '';
    const from = `
      FROM news n, (SELECT ${tsQuery} AS q_ts) q
      WHERE q.q_ts <> '' AND n.tsv @@ q.q_ts${exclusionSql}`;

    const countResult = await query<CountRow>(`SELECT count(*)::int AS total ${from};`, values);
    const pageValues = [...values, limit, offset];
    const { rows } = await query<NewsRow>(
      `SELECT ${NEWS_COLUMNS} ${from}
       ORDER BY n.id DESC
       LIMIT $${pageValues.length - 1} OFFSET $${pageValues.length};`,
      pageValues
    );
    return { rows: rows.map(toNewsItem), total: countResult.rows[0]?.total ?? 0 };
  }

  async substringSearch(predicate: FallbackPredicate, limit: number, offset: number): Promise<StoredPage> {
    const values: unknown[] = [];
    const where = predicateToSql(predicate, values, ALIASED);

    const countResult = await query<CountRow>(`SELECT count(*)::int AS total FROM news n WHERE ${where};`, values);
    const pageValues = [...values, limit, offset];
    const { rows } = await query<NewsRow>(
      `SELECT ${NEWS_COLUMNS} FROM news n
       WHERE ${where}
       ORDER BY n.id DESC
       LIMIT $${pageValues.length - 1} OFFSET $${pageValues.length};`,
      pageValues
    );
    return { rows: rows.map(toNewsItem), total: countResult.rows[0]?.total ?? 0 };
  }

  async insertMany(items: NewNewsItem[]): Promise<number> {
    if (items.length === 0) return 0;
    const tsvColumn = this.indexReady ? ', tsv' : '';
    const tsvValue = this.indexReady ? `, ${tsvExpression(this.options.tsConfig, { title: '$2', summary: '$5' })}` : '';

    return withTransaction(async (client) => {
      let inserted = 0;
      for (const item of items) {
        const result = await client.query(
          `INSERT INTO news (source, title, link, published, summary, hash${tsvColumn})
           VALUES ($1, $2, $3, $4, $5, $6${tsvValue})
           ON CONFLICT (hash) DO NOTHING
           RETURNING id;`,
          [item.source, item.title, item.link, item.published ?? null, item.summary ?? null, itemHash(item)]
        );
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    });
  }

  async latestPage(offset: number, limit: number): Promise<NewsItem[]> {
    const { rows } = await query<NewsRow>(
      `SELECT ${NEWS_COLUMNS} FROM news n ${RECENCY_ORDER} LIMIT $1 OFFSET $2;`,
      [limit, offset]
    );
    return rows.map(toNewsItem);
  }

  async total(): Promise<number> {
    const { rows } = await query<CountRow>('SELECT count(*)::int AS total FROM news;');
    return rows[0]?.total ?? 0;
  }

  async countBySource(): Promise<SourceCount[]> {
    const { rows } = await query<SourceCount>(
      'SELECT source, count(*)::int AS count FROM news GROUP BY source ORDER BY count(*) DESC, source;'
    );
    return rows;
  }

  async totalBySource(source: string): Promise<number> {
    const { rows } = await query<CountRow>('SELECT count(*)::int AS total FROM news WHERE lower(source) = lower($1);', [
      source
    ]);
    return rows[0]?.total ?? 0;
  }

  async sourcePage(source: string, limit: number, offset: number): Promise<NewsItem[]> {
    const { rows } = await query<NewsRow>(
      `SELECT ${NEWS_COLUMNS} FROM news n
       WHERE lower(n.source) = lower($1)
       ${RECENCY_ORDER}
       LIMIT $2 OFFSET $3;`,
      [source, limit, offset]
    );
    return rows.map(toNewsItem);
  }

  /**
   * Recomputes every tsvector and reindexes in place; when that fails the
   * column and index are dropped, recreated and backfilled in one transaction.
   */
  async rebuildIndex(): Promise<RebuildMode> {
    if (!this.indexReady) {
      throw new IndexRebuildError('full-text index is not available on this database');
    }
    const expr = tsvExpression(this.options.tsConfig);

    try {
      await withTransaction(async (client) => {
        await client.query(`UPDATE news SET tsv = ${expr};`);
      });
      await query(`REINDEX INDEX ${TSV_INDEX};`);
      this.options.log?.info('full-text index incremental rebuild completed');
      return 'incremental';
    } catch (err) {
      this.options.log?.warn({ err }, 'incremental index rebuild failed; performing full rebuild');
    }

    try {
      await withTransaction(async (client) => {
        await client.query(`DROP INDEX IF EXISTS ${TSV_INDEX};`);
        await client.query('ALTER TABLE news DROP COLUMN IF EXISTS tsv;');
        await client.query('ALTER TABLE news ADD COLUMN tsv tsvector;');
        await client.query(`UPDATE news SET tsv = ${expr};`);
        await client.query(`CREATE INDEX ${TSV_INDEX} ON news USING GIN (tsv);`);
      });
    } catch (err) {
      this.options.log?.error({ err }, 'full index rebuild failed');
      throw new IndexRebuildError('full-text index rebuild failed', { cause: err });
    }
    this.options.log?.info('full-text index full rebuild completed');
    return 'full';
  }

  async archiveNow(): Promise<ArchiveReport> {
    const { rows } = await query<SourceCount>(
      `WITH moved AS (
         DELETE FROM news
         WHERE added_at < now() - make_interval(days => $1)
         RETURNING id, source, title, link, published, summary, hash, added_at
       ), archived AS (
         INSERT INTO news_archive (id, source, title, link, published, summary, hash, added_at)
         SELECT id, source, title, link, published, summary, hash, added_at FROM moved
         RETURNING id
       )
       SELECT source, count(*)::int AS count FROM moved GROUP BY source ORDER BY count(*) DESC, source;`,
      [this.options.archiveAfterDays]
    );
    const bySource: Record<string, number> = {};
    let moved = 0;
    for (const row of rows) {
      bySource[row.source] = row.count;
      moved += row.count;
    }
    this.options.log?.info({ moved }, 'archive completed');
    return { moved, bySource };
  }

  async listArchiveMonths(): Promise<string[]> {
    const { rows } = await query<{ month: string }>(
      `SELECT DISTINCT to_char(coalesce(published, added_at), 'YYYY-MM') AS month
       FROM news_archive
       ORDER BY month
       LIMIT 200;`
    );
    return rows.map((r) => r.month);
  }
}
