import { NodeKind, type RegexNode } from './ast.js';
import { boundaries, charAt } from './text.js';
import { iter } from '../utils/iter.js';

/**
 * Receives the enumeration of every node visited while matching. Nodes never
 * know they are observed: the observer rides along as an argument.
 */
export interface MatchObserver {
  enter(node: RegexNode, pos: number): void;
  candidate(node: RegexNode, pos: number, end: number): void;
  exit(node: RegexNode, pos: number): void;
}

export type Candidates = Generator<number, void, undefined>;

/**
 * Lazily enumerates every end position at which `node` can match `text`
 * starting at `pos`, in the order backtracking should try them.
 *
 * Nothing is cached between calls, so nested unbounded quantifiers can take
 * exponential time on inputs they fail to match.
 */
export function produce(
  node: RegexNode,
  text: string,
  pos: number,
  observer?: MatchObserver
): Candidates {
  return observer
    ? observed(node, text, pos, observer)
    : candidates(node, text, pos);
}

function* observed(
  node: RegexNode,
  text: string,
  pos: number,
  observer: MatchObserver
): Candidates {
  observer.enter(node, pos);
  try {
    for (const end of candidates(node, text, pos, observer)) {
      observer.candidate(node, pos, end);
      yield end;
    }
  } finally {
    observer.exit(node, pos);
  }
}

function* candidates(
  node: RegexNode,
  text: string,
  pos: number,
  observer?: MatchObserver
): Candidates {
  switch (node.kind) {
    case NodeKind.LITERAL: {
      const char = charAt(text, pos);
      if (char === node.props.char) {
        yield pos + char.length;
      }
      return;
    }
    case NodeKind.DOT: {
      const char = charAt(text, pos);
      if (char !== undefined) {
        yield pos + char.length;
      }
      return;
    }
    case NodeKind.CHAR_CLASS: {
      const char = charAt(text, pos);
      if (
        char !== undefined &&
        node.props.chars.has(char) !== node.props.negated
      ) {
        yield pos + char.length;
      }
      return;
    }
    case NodeKind.START:
      if (pos == 0) {
        yield pos;
      }
      return;
    case NodeKind.END:
      if (pos == text.length) {
        yield pos;
      }
      return;
    case NodeKind.SEQUENCE:
      yield* sequence(node.props.nodes, 0, text, pos, observer);
      return;
    case NodeKind.ALTERNATION:
      yield* produce(node.props.left, text, pos, observer);
      yield* produce(node.props.right, text, pos, observer);
      return;
    case NodeKind.STAR:
      yield pos;
      yield* repeat(node.props.child, text, pos, observer);
      return;
    case NodeKind.PLUS:
      for (const first of produce(node.props.child, text, pos, observer)) {
        yield first;
        yield* repeat(node.props.child, text, first, observer);
      }
      return;
    case NodeKind.QUESTION:
    case NodeKind.LAZY_QUESTION:
      yield pos;
      yield* produce(node.props.child, text, pos, observer);
      return;
    case NodeKind.LAZY_STAR:
      yield* lazyStar(node.props.child, text, pos, observer);
      return;
    case NodeKind.LAZY_PLUS:
      for (const mid of produce(node.props.child, text, pos, observer)) {
        // lazyStar starts with `mid` again, so each one is offered twice
        yield mid;
        yield* lazyStar(node.props.child, text, mid, observer);
      }
      return;
    case NodeKind.NON_CAPTURE_GROUP:
      yield* produce(node.props.child, text, pos, observer);
      return;
    case NodeKind.LOOKAHEAD: {
      const found = iter(
        produce(node.props.child, text, pos, observer)
      ).some();
      if (found === node.props.positive) {
        yield pos;
      }
      return;
    }
    case NodeKind.LOOKBEHIND: {
      const { child, positive } = node.props;
      const found = iter(boundaries(text, pos)).some((start) =>
        iter(produce(child, text, start, observer)).some((end) => end == pos)
      );
      if (found === positive) {
        yield pos;
      }
      return;
    }
    default:
      return unreachable(node);
  }
}

function* sequence(
  nodes: readonly RegexNode[],
  index: number,
  text: string,
  pos: number,
  observer?: MatchObserver
): Candidates {
  if (index == nodes.length) {
    yield pos;
    return;
  }
  // every end of this element is a restart point for the rest
  for (const end of produce(nodes[index], text, pos, observer)) {
    yield* sequence(nodes, index + 1, text, end, observer);
  }
}

/**
 * Greedy repetition after the first `pos`: each step commits to the first
 * candidate of `child` and never revisits the others. A step that consumes
 * nothing ends the repetition.
 */
function* repeat(
  child: RegexNode,
  text: string,
  pos: number,
  observer?: MatchObserver
): Candidates {
  let current = pos;
  while (true) {
    const next = iter(produce(child, text, current, observer)).first();
    if (next === undefined || next == current) {
      return;
    }
    yield next;
    current = next;
  }
}

function* lazyStar(
  child: RegexNode,
  text: string,
  pos: number,
  observer?: MatchObserver
): Candidates {
  yield pos;
  for (const mid of produce(child, text, pos, observer)) {
    if (mid == pos) {
      continue;
    }
    yield* lazyStar(child, text, mid, observer);
  }
}

function unreachable(node: never): never {
  throw new Error(`Unrecognized node ${JSON.stringify(node)}`);
}
