export type Operator = 'AND' | 'OR' | 'NOT';

export type Token =
  | { kind: 'op'; op: Operator }
  | { kind: 'phrase'; text: string }
  | { kind: 'compound'; value: string; original: string }
  | { kind: 'term'; text: string };

const DASHES = new Set([
  '\u2010',
  '\u2011',
  '\u2012',
  '\u2013',
  '\u2014',
  '\u2015',
  '\u2212',
  '\u2043',
  '\uFE63',
  '\uFF0D',
  '\u00AD'
]);

const QUOTES = new Set(['\u201C', '\u201D', '\u00AB', '\u00BB', '\u201E', '\u201F', '\u2039', '\u203A']);

export const ALNUM = 'A-Za-zЁёА-я0-9';
export const COMPOUND_RE = new RegExp(`^[${ALNUM}]+(?:-[${ALNUM}]+)+$`);
const ALNUM_RE = new RegExp(`^[${ALNUM}]+$`);
const WHITESPACE_RE = /\s/;

export function normalizeInput(input: string): string {
  let out = '';
  for (const ch of input) {
    if (DASHES.has(ch)) out += '-';
    else if (QUOTES.has(ch)) out += '"';
    else out += ch;
  }
  return out;
}

function toOperator(word: string): Operator | null {
  const upper = word.toUpperCase();
  return upper === 'AND' || upper === 'OR' || upper === 'NOT' ? upper : null;
}

export function tokenize(raw: string): Token[] {
  const q = normalizeInput(raw);
  const tokens: Token[] = [];
  const n = q.length;
  let i = 0;

  while (i < n) {
    if (WHITESPACE_RE.test(q[i])) {
      i += 1;
      continue;
    }

    if (q[i] === '"') {
      const close = q.indexOf('"', i + 1);
      const phrase = (close === -1 ? q.slice(i + 1) : q.slice(i + 1, close)).trim();
      i = close === -1 ? n : close + 1;
      if (phrase) tokens.push({ kind: 'phrase', text: phrase });
      continue;
    }

    let j = i;
    while (j < n && !WHITESPACE_RE.test(q[j]) && q[j] !== '"') j += 1;
    const word = q.slice(i, j);
    i = j;

    const op = toOperator(word);
    if (op) {
      tokens.push({ kind: 'op', op });
      continue;
    }

    if (word.length > 1 && word.startsWith('-') && ALNUM_RE.test(word.slice(1))) {
      tokens.push({ kind: 'op', op: 'NOT' }, { kind: 'term', text: word.slice(1) });
      continue;
    }

    if (COMPOUND_RE.test(word)) {
      tokens.push({ kind: 'compound', value: word.split('-').join(' '), original: word });
      continue;
    }

    tokens.push({ kind: 'term', text: word });
  }

  return tokens;
}
