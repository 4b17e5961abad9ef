import { QueryNode, NotNode, TermNode, termNode } from './ast';
import { Operator, Token, tokenize } from './tokenizer';

type SeqItem = Operator | TermNode;
type Operand = TermNode | NotNode;

export function toSequence(tokens: Token[]): SeqItem[] {
  return tokens.map((t): SeqItem => {
    switch (t.kind) {
      case 'op':
        return t.op;
      case 'phrase':
        return termNode(t.text, true, t.text);
      case 'compound':
        return termNode(t.value, true, t.original);
      case 'term':
        return termNode(t.text, false, t.text);
    }
  });
}

function foldNot(seq: SeqItem[]): Array<Operand | 'AND' | 'OR'> {
  const out: Array<Operand | 'AND' | 'OR'> = [];
  for (let i = 0; i < seq.length; i += 1) {
    const item = seq[i];
    if (item !== 'NOT') {
      out.push(item);
      continue;
    }
    const next = seq[i + 1];
    // A NOT with no term after it is dropped.
    if (next !== undefined && typeof next !== 'string') {
      out.push({ type: 'not', child: next });
      i += 1;
    }
  }
  return out;
}

export function buildAst(seq: SeqItem[]): QueryNode | null {
  const groups: Operand[][] = [[]];
  for (const item of foldNot(seq)) {
    if (item === 'OR') groups.push([]);
    else if (item !== 'AND') groups[groups.length - 1].push(item);
  }

  const branches: QueryNode[] = [];
  for (const group of groups) {
    const [first, ...rest] = group;
    if (!first) continue;
    branches.push(rest.length === 0 ? first : { type: 'and', children: [first, ...rest] });
  }

  const [head, ...tail] = branches;
  if (!head) return null;
  return tail.length === 0 ? head : { type: 'or', children: [head, ...tail] };
}

/**
 * Parses a user query into a boolean tree. Never throws: malformed input
 * yields fewer nodes, and input with no searchable term yields null.
 */
export function parseQuery(raw: string): QueryNode | null {
  return buildAst(toSequence(tokenize(raw)));
}
