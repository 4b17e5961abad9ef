import { QueryNode, Term, assertNever } from './ast';
import { COMPOUND_RE } from './tokenizer';

/**
 * Substring predicate over a document's title and summary. `contains` is true
 * when either field contains the (lowercased) needle.
 */
export type FallbackPredicate =
  | { kind: 'always' }
  | { kind: 'never' }
  | { kind: 'contains'; needle: string }
  | { kind: 'any'; clauses: FallbackPredicate[] }
  | { kind: 'all'; clauses: FallbackPredicate[] }
  | { kind: 'not'; clause: FallbackPredicate };

export interface CompiledQuery {
  indexMatchExpr: string;
  fallbackPredicate: FallbackPredicate;
}

export interface SplitTerms {
  positives: Term[];
  negatives: Term[];
}

export function splitPositiveNegative(node: QueryNode | null): SplitTerms {
  const positives: Term[] = [];
  const negatives: Term[] = [];

  const walk = (n: QueryNode): void => {
    switch (n.type) {
      case 'term':
        positives.push(n.term);
        return;
      case 'not':
        negatives.push(n.child.term);
        return;
      case 'and':
      case 'or':
        n.children.forEach(walk);
        return;
      default:
        assertNever(n);
    }
  };

  if (node) walk(node);
  return { positives, negatives };
}

export function buildMatchFromPositives(positives: Term[]): string {
  return positives
    .map((t) => (t.isPhrase ? `"${t.value.replace(/"/g, '""')}"` : t.value))
    .join(' ');
}

/** Splits a match expression back into its literal units: quoted phrases and bare terms. */
export function parseMatchExpression(matchExpr: string): string[] {
  const units: string[] = [];
  const re = /"((?:[^"]|"")*)"|(\S+)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(matchExpr))) {
    const unit = m[1] !== undefined ? m[1].replace(/""/g, '"') : m[2];
    if (unit && unit.trim()) units.push(unit);
  }
  return units;
}

/**
 * Positive terms only, joined as an implicit AND. OR branches are flattened
 * too, so `a OR b` compiles exactly like `a b`.
 */
export function buildIndexMatchExpression(node: QueryNode | null): string {
  return buildMatchFromPositives(splitPositiveNegative(node).positives);
}

/** Surface forms a term should match: itself plus its hyphen/space twin. */
export function termVariants(original: string): string[] {
  const variants = [original];
  if (original.includes(' ') && !original.includes('-')) {
    const hyphenated = original.split(/\s+/).join('-');
    if (COMPOUND_RE.test(hyphenated)) variants.push(hyphenated);
  } else if (COMPOUND_RE.test(original)) {
    variants.push(original.split('-').join(' '));
  }
  return variants;
}

function termPredicate(term: Term): FallbackPredicate[] {
  return termVariants(term.original).map((v): FallbackPredicate => ({ kind: 'contains', needle: v.toLowerCase() }));
}

export function buildFallbackPredicate(node: QueryNode | null): FallbackPredicate {
  if (!node) return { kind: 'never' };
  const { positives, negatives } = splitPositiveNegative(node);

  if (positives.length === 0 && negatives.length === 0) return { kind: 'never' };

  const base: FallbackPredicate =
    positives.length > 0 ? { kind: 'any', clauses: positives.flatMap(termPredicate) } : { kind: 'always' };

  if (negatives.length === 0) return base;

  return {
    kind: 'all',
    clauses: [
      base,
      ...negatives.map((t): FallbackPredicate => ({ kind: 'not', clause: { kind: 'any', clauses: termPredicate(t) } }))
    ]
  };
}

/** Exclusion predicate for terms that must not appear; null when there are none. */
export function buildExclusionPredicate(negatives: Term[]): FallbackPredicate | null {
  if (negatives.length === 0) return null;
  return {
    kind: 'any',
    clauses: negatives.map((t): FallbackPredicate => ({ kind: 'contains', needle: t.original.toLowerCase() }))
  };
}

export function compileQuery(node: QueryNode | null): CompiledQuery {
  return {
    indexMatchExpr: buildIndexMatchExpression(node),
    fallbackPredicate: buildFallbackPredicate(node)
  };
}

export interface Haystack {
  title: string | null;
  summary: string | null;
}

export function matchesPredicate(predicate: FallbackPredicate, doc: Haystack): boolean {
  switch (predicate.kind) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'contains':
      return (
        (doc.title ?? '').toLowerCase().includes(predicate.needle) ||
        (doc.summary ?? '').toLowerCase().includes(predicate.needle)
      );
    case 'any':
      return predicate.clauses.some((c) => matchesPredicate(c, doc));
    case 'all':
      return predicate.clauses.every((c) => matchesPredicate(c, doc));
    case 'not':
      return !matchesPredicate(predicate.clause, doc);
    default:
      return assertNever(predicate);
  }
}

/**
 * Renders a predicate as a SQL boolean expression, pushing needles onto
 * `values` as positional parameters.
 */
export function predicateToSql(
  predicate: FallbackPredicate,
  values: unknown[],
  columns: { title: string; summary: string } = { title: 'title', summary: 'summary' }
): string {
  switch (predicate.kind) {
    case 'always':
      return 'TRUE';
    case 'never':
      return 'FALSE';
    case 'contains': {
      values.push(predicate.needle);
      const ref = `$${values.length}`;
      return `(strpos(lower(coalesce(${columns.title}, '')), ${ref}) > 0 OR strpos(lower(coalesce(${columns.summary}, '')), ${ref}) > 0)`;
    }
    case 'any':
      return predicate.clauses.length
        ? `(${predicate.clauses.map((c) => predicateToSql(c, values, columns)).join(' OR ')})`
        : 'FALSE';
    case 'all':
      return predicate.clauses.length
        ? `(${predicate.clauses.map((c) => predicateToSql(c, values, columns)).join(' AND ')})`
        : 'TRUE';
    case 'not':
      return `NOT ${predicateToSql(predicate.clause, values, columns)}`;
    default:
      return assertNever(predicate);
  }
}
