import { parseQuery } from './parser';
import { splitPositiveNegative } from './compiler';
import { SNIPPET } from '../config/search/constants';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Literal patterns to emphasize for a query: the surface form of every
 * positive term plus its hyphen/space twin, longest first. Returns an empty
 * list when the query has nothing to highlight.
 */
export function extractPatterns(rawQuery: string): string[] {
  const { positives } = splitPositiveNegative(parseQuery(rawQuery));
  const patterns = new Set<string>();

  for (const term of positives) {
    const original = term.original.trim();
    if (!original) continue;
    patterns.add(original);
    if (original.includes(' ') && !original.includes('-')) patterns.add(original.replace(/ /g, '-'));
    if (original.includes('-')) patterns.add(original.replace(/-/g, ' '));
  }

  return [...patterns].sort((a, b) => b.length - a.length);
}

export function highlight(text: string, patterns: string[]): string {
  if (!text || patterns.length === 0) return text;
  let out = text;
  for (const pattern of patterns) {
    if (!pattern) continue;
    out = out.replace(new RegExp(`(${escapeRegExp(pattern)})`, 'gi'), '<b>$1</b>');
  }
  return out;
}

/**
 * Excerpt of `summary` around the earliest pattern occurrence, or '' when no
 * pattern occurs in it.
 */
export function snippet(summary: string, patterns: string[], maxLen: number = SNIPPET.maxLength): string {
  if (!summary || patterns.length === 0) return '';

  const lower = summary.toLowerCase();
  let first = -1;
  for (const pattern of patterns) {
    if (!pattern) continue;
    const idx = lower.indexOf(pattern.toLowerCase());
    if (idx !== -1 && (first === -1 || idx < first)) first = idx;
  }
  if (first === -1) return '';

  const start = Math.max(0, first - SNIPPET.leadingContext);
  const end = start + maxLen;
  let excerpt = summary.slice(start, end);
  if (start > 0) excerpt = `…${excerpt}`;
  if (end < summary.length) excerpt = `${excerpt}…`;
  return highlight(excerpt, patterns);
}
