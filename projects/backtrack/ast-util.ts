import { NodeKind, type RegexNode } from './ast.js';

export function children(node: RegexNode): RegexNode[] {
  switch (node.kind) {
    case NodeKind.LITERAL:
    case NodeKind.DOT:
    case NodeKind.CHAR_CLASS:
    case NodeKind.START:
    case NodeKind.END:
      return [];
    case NodeKind.SEQUENCE:
      return [...node.props.nodes];
    case NodeKind.ALTERNATION:
      return [node.props.left, node.props.right];
    case NodeKind.STAR:
    case NodeKind.PLUS:
    case NodeKind.QUESTION:
    case NodeKind.LAZY_STAR:
    case NodeKind.LAZY_PLUS:
    case NodeKind.LAZY_QUESTION:
    case NodeKind.NON_CAPTURE_GROUP:
    case NodeKind.LOOKAHEAD:
    case NodeKind.LOOKBEHIND:
      return [node.props.child];
  }
}

export function* preorderIter(node: RegexNode): Generator<RegexNode> {
  yield node;
  for (const child of children(node)) {
    yield* preorderIter(child);
  }
}

export type NodeRepr = string | { chars: string[]; negated: boolean } | null;

export function repr(node: RegexNode): NodeRepr {
  switch (node.kind) {
    case NodeKind.LITERAL:
      return node.props.char;
    case NodeKind.CHAR_CLASS:
      return { chars: [...node.props.chars], negated: node.props.negated };
    default:
      return null;
  }
}

/**
 * Short human-readable label, e.g. `Literal('a')` or `CharClass([abc])^`.
 */
export function pretty(node: RegexNode): string {
  switch (node.kind) {
    case NodeKind.LITERAL:
      return `${node.kind}('${node.props.char}')`;
    case NodeKind.CHAR_CLASS: {
      const chars = [...node.props.chars].sort().join('');
      return `${node.kind}([${chars}])${node.props.negated ? '^' : ''}`;
    }
    case NodeKind.LOOKAHEAD:
    case NodeKind.LOOKBEHIND:
      return `${node.kind}(${node.props.positive ? 'positive' : 'negative'})`;
    default:
      return node.kind;
  }
}

export type ASTRecord = {
  id: string;
  type: NodeKind;
  repr: NodeRepr;
  children: ASTRecord[];
};

/**
 * Plain-data copy of the tree. Ids are `n0`, `n1`, ... in pre-order.
 */
export function astToRecord(root: RegexNode): ASTRecord {
  let nextId = 0;
  const build = (node: RegexNode): ASTRecord => {
    const id = `n${nextId++}`;
    return {
      id,
      type: node.kind,
      repr: repr(node),
      children: children(node).map(build),
    };
  };
  return build(root);
}

export function astToJSON(root: RegexNode): string {
  return JSON.stringify(astToRecord(root), null, 2);
}

const dotString = (s: string) =>
  `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

/**
 * Graphviz source for the tree: one vertex per node, one edge per
 * parent-child link.
 */
export function astToDot(root: RegexNode, comment = 'Regex AST'): string {
  const lines = [`// ${comment}`, 'digraph {'];
  let nextId = 0;
  const visit = (node: RegexNode) => {
    const id = `n${nextId++}`;
    lines.push(`\t${id} [label=${dotString(pretty(node))}]`);
    for (const child of children(node)) {
      const childId = `n${nextId}`;
      lines.push(`\t${id} -> ${childId}`);
      visit(child);
    }
  };
  visit(root);
  lines.push('}');
  return lines.join('\n') + '\n';
}
