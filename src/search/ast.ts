export interface Term {
  /** Form sent to the full-text index; multi-word phrases are space-joined. */
  value: string;
  isPhrase: boolean;
  /** Literal surface form the user typed, used for substring matching and highlighting. */
  original: string;
}

export interface TermNode {
  type: 'term';
  term: Term;
}

export interface NotNode {
  type: 'not';
  child: TermNode;
}

export interface AndNode {
  type: 'and';
  children: [QueryNode, ...QueryNode[]];
}

export interface OrNode {
  type: 'or';
  children: [QueryNode, ...QueryNode[]];
}

export type QueryNode = TermNode | NotNode | AndNode | OrNode;

export function termNode(value: string, isPhrase: boolean, original: string): TermNode {
  return { type: 'term', term: { value, isPhrase, original } };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected query node: ${JSON.stringify(value)}`);
}

export function astToDebug(node: QueryNode | null): string {
  if (!node) return '<EMPTY>';
  switch (node.type) {
    case 'term': {
      const { value, isPhrase, original } = node.term;
      return `TERM(phrase=${isPhrase}, value='${value}', original='${original}')`;
    }
    case 'not':
      return `NOT(${astToDebug(node.child)})`;
    case 'and':
      return `AND(${node.children.map(astToDebug).join(', ')})`;
    case 'or':
      return `OR(${node.children.map(astToDebug).join(', ')})`;
    default:
      return assertNever(node);
  }
}
