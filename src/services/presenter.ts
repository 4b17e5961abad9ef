import { decodeHTML } from 'entities';
import { highlight, snippet } from '../search/highlight';
import { NewsItem } from '../types';

const TAG_RE = /<[^>]+>/g;
const BRACKET_ENTITY_RE = /\[&#\d+;?\]/g;
const NBSP_RE = /\u00A0/g;
const MULTISPACE_RE = /[ \t\r\f\v]+/g;
const NEWLINES_RE = /\n{3,}/g;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/** Feed markup → plain escaped text safe to embed in the emphasis markup. */
export function cleanText(raw: string | null | undefined): string {
  if (!raw) return '';
  const text = decodeHTML(raw.replace(BRACKET_ENTITY_RE, '…'))
    .replace(TAG_RE, '')
    .replace(NBSP_RE, ' ')
    .replace(MULTISPACE_RE, ' ')
    .replace(NEWLINES_RE, '\n\n')
    .trim();
  return escapeHtml(text);
}

export interface PageLink {
  offset: number;
  limit: number;
}

export interface PageNavigation {
  prev: PageLink | null;
  next: PageLink | null;
  close: true;
}

export interface ItemNavigation {
  first: number | null;
  prev: number | null;
  next: number | null;
  last: number | null;
  close: true;
}

export interface PageItem {
  position: number;
  link: string;
  line: string;
}

export interface PageView {
  text: string;
  items: PageItem[];
  page: number;
  totalPages: number;
  total: number;
  navigation: PageNavigation;
}

export interface ItemView {
  text: string;
  index: number;
  total: number;
  link: string;
  navigation: ItemNavigation;
}

export interface PageInput {
  rows: NewsItem[];
  offset: number;
  limit: number;
  total: number;
  header: string;
}

export function pageNavigation(offset: number, limit: number, total: number): PageNavigation {
  return {
    prev: offset > 0 ? { offset: Math.max(0, offset - limit), limit } : null,
    next: offset + limit < total ? { offset: offset + limit, limit } : null,
    close: true
  };
}

export function itemNavigation(index: number, total: number): ItemNavigation {
  const hasPrev = index > 0;
  const hasNext = index < total - 1;
  return {
    first: hasPrev ? 0 : null,
    prev: hasPrev ? index - 1 : null,
    next: hasNext ? index + 1 : null,
    last: hasNext ? total - 1 : null,
    close: true
  };
}

export function pageNumbers(offset: number, limit: number, total: number): { page: number; totalPages: number } {
  return {
    page: Math.floor(offset / limit) + 1,
    totalPages: Math.max(1, Math.ceil(total / limit))
  };
}

export function formatItemLine(item: NewsItem, position: number, patterns: string[] = [], includeSummary = false): string {
  let title = cleanText(item.title);
  if (patterns.length > 0) title = highlight(title, patterns);
  const source = cleanText(item.source);
  const published = cleanText(item.published);

  let line = `${position}. [${source}] ${title}`;
  if (published) line += `\n${published}`;
  if (includeSummary) {
    const excerpt = snippet(cleanText(item.summary), patterns);
    if (excerpt) line += `\n${excerpt}`;
  }
  return line;
}

function toItems(rows: NewsItem[], offset: number, format: (row: NewsItem, position: number) => string): PageItem[] {
  return rows.map((row, i) => ({ position: offset + i + 1, link: row.link, line: format(row, offset + i + 1) }));
}

export function buildSearchPage(input: PageInput & { patterns: string[] }): PageView {
  const { rows, offset, limit, total, patterns } = input;
  const header = cleanText(input.header);
  const { page, totalPages } = pageNumbers(offset, limit, total);
  const items = toItems(rows, offset, (row, position) => formatItemLine(row, position, patterns, true));

  let text: string;
  if (items.length === 0) {
    text = total === 0 ? `${header}\nNo results.` : `${header}\nPage ${page}/${totalPages} is empty.`;
  } else {
    const range = `Results ${offset + 1}–${offset + items.length} of ${total} (page ${page}/${totalPages})`;
    text = [`${header}\n${range}`, ...items.map((it) => it.line)].join('\n\n');
  }

  return { text, items, page, totalPages, total, navigation: pageNavigation(offset, limit, total) };
}

export function buildListPage(input: PageInput): PageView {
  const { rows, offset, limit, total } = input;
  const header = cleanText(input.header);
  const { page, totalPages } = pageNumbers(offset, limit, total);
  const items = toItems(rows, offset, (row, position) => formatItemLine(row, position));

  let text: string;
  if (items.length === 0) {
    text = total === 0 ? `${header}\nNo data.` : `${header}\nThis page is empty.`;
  } else {
    text = [`${header}\nItems ${offset + 1}–${offset + items.length} of ${total}`, ...items.map((it) => it.line)].join(
      '\n\n'
    );
  }

  return { text, items, page, totalPages, total, navigation: pageNavigation(offset, limit, total) };
}

/** Single item view; `source` switches to the per-source heading. */
export function buildItemView(item: NewsItem, index: number, total: number, source?: string): ItemView {
  const title = cleanText(item.title);
  const published = cleanText(item.published);
  const summary = cleanText(item.summary);
  const parts = source
    ? [`Source: [${cleanText(source)}] — item ${index + 1} of ${total}`, title, published, summary]
    : [`Item ${index + 1} of ${total}`, `[${cleanText(item.source)}] ${title}`, published, summary];

  return {
    text: parts.filter(Boolean).join('\n\n'),
    index,
    total,
    link: item.link,
    navigation: itemNavigation(index, total)
  };
}

/** Splits a trailing `|N` page selector off a query: `crisis |2` → page 2. */
export function splitPageSuffix(text: string): { query: string; page: number } {
  const bar = text.lastIndexOf('|');
  if (bar === -1) return { query: text, page: 1 };
  const pagePart = text.slice(bar + 1).trim();
  if (!/^\d+$/.test(pagePart)) return { query: text, page: 1 };
  const page = Number.parseInt(pagePart, 10);
  if (page <= 0) return { query: text, page: 1 };
  return { query: text.slice(0, bar).trim(), page };
}

export function clampIndex(index: number, total: number): number {
  if (total <= 0) return 0;
  return Math.min(Math.max(0, index), total - 1);
}
