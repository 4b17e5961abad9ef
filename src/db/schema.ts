import { ALNUM } from '../search/tokenizer';

export const TSV_INDEX = 'news_tsv_idx';

export const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS news (
    id BIGSERIAL PRIMARY KEY,
    source TEXT NOT NULL,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    published TIMESTAMPTZ,
    summary TEXT,
    hash TEXT NOT NULL UNIQUE,
    added_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE INDEX IF NOT EXISTS news_published_idx ON news (published);
  CREATE INDEX IF NOT EXISTS news_source_idx ON news (lower(source));

  CREATE TABLE IF NOT EXISTS news_archive (
    id BIGINT PRIMARY KEY,
    source TEXT NOT NULL,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    published TIMESTAMPTZ,
    summary TEXT,
    hash TEXT NOT NULL,
    added_at TIMESTAMPTZ NOT NULL,
    archived_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
`;

const INNER_HYPHEN = `([${ALNUM}])-(?=[${ALNUM}])`;

/**
 * Replaces hyphens between letters or digits with spaces, so `F-16` is
 * parsed as `f` and `16` instead of `f` and the signed integer `-16`.
 */
export function splitInnerHyphens(sqlExpr: string): string {
  return `regexp_replace(${sqlExpr}, '${INNER_HYPHEN}', '\\1 ', 'g')`;
}

/** tsvector expression over title and summary for a given text search configuration. */
export function tsvExpression(
  tsConfig: string,
  columns: { title: string; summary: string } = { title: 'title', summary: 'summary' }
): string {
  const text = `coalesce(${columns.title}, '') || ' ' || coalesce(${columns.summary}, '')`;
  return `to_tsvector('${tsConfig}', ${splitInnerHyphens(text)})`;
}

/** One literal phrase query per unit, ANDed; user text never reaches tsquery operators. */
export function phraseQueryExpression(tsConfig: string, params: string[]): string {
  return params.map((param) => `phraseto_tsquery('${tsConfig}', ${splitInnerHyphens(param)})`).join(' && ');
}

export function fullTextSchema(tsConfig: string): string {
  return `
    ALTER TABLE news ADD COLUMN IF NOT EXISTS tsv tsvector;
    UPDATE news SET tsv = ${tsvExpression(tsConfig)} WHERE tsv IS NULL;
    CREATE INDEX IF NOT EXISTS ${TSV_INDEX} ON news USING GIN (tsv);
  `;
}
