export enum NodeKind {
  LITERAL = 'Literal',
  DOT = 'Dot',
  CHAR_CLASS = 'CharClass',
  START = 'Start',
  END = 'End',
  SEQUENCE = 'Sequence',
  ALTERNATION = 'Alternation',
  STAR = 'Star',
  PLUS = 'Plus',
  QUESTION = 'Question',
  LAZY_STAR = 'LazyStar',
  LAZY_PLUS = 'LazyPlus',
  LAZY_QUESTION = 'LazyQuestion',
  NON_CAPTURE_GROUP = 'NonCaptureGroup',
  LOOKAHEAD = 'Lookahead',
  LOOKBEHIND = 'Lookbehind',
}

export abstract class BaseNode<Props> {
  abstract readonly kind: NodeKind;
  readonly props: Readonly<Props>;
  constructor(props: Props) {
    this.props = props;
  }
}

type ChildProps = { child: RegexNode };
type LookaroundProps = { child: RegexNode; positive: boolean };

export class LiteralNode extends BaseNode<{ char: string }> {
  readonly kind = NodeKind.LITERAL;
}

export class DotNode extends BaseNode<{}> {
  readonly kind = NodeKind.DOT;
}

export class CharClassNode extends BaseNode<{
  chars: ReadonlySet<string>;
  negated: boolean;
}> {
  readonly kind = NodeKind.CHAR_CLASS;
}

export class StartNode extends BaseNode<{}> {
  readonly kind = NodeKind.START;
}

export class EndNode extends BaseNode<{}> {
  readonly kind = NodeKind.END;
}

export class SequenceNode extends BaseNode<{ nodes: readonly RegexNode[] }> {
  readonly kind = NodeKind.SEQUENCE;
}

export class AlternationNode extends BaseNode<{
  left: RegexNode;
  right: RegexNode;
}> {
  readonly kind = NodeKind.ALTERNATION;
}

export class StarNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.STAR;
}

export class PlusNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.PLUS;
}

export class QuestionNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.QUESTION;
}

export class LazyStarNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.LAZY_STAR;
}

export class LazyPlusNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.LAZY_PLUS;
}

export class LazyQuestionNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.LAZY_QUESTION;
}

export class NonCaptureGroupNode extends BaseNode<ChildProps> {
  readonly kind = NodeKind.NON_CAPTURE_GROUP;
}

export class LookaheadNode extends BaseNode<LookaroundProps> {
  readonly kind = NodeKind.LOOKAHEAD;
}

export class LookbehindNode extends BaseNode<LookaroundProps> {
  readonly kind = NodeKind.LOOKBEHIND;
}

export type RegexNode =
  | LiteralNode
  | DotNode
  | CharClassNode
  | StartNode
  | EndNode
  | SequenceNode
  | AlternationNode
  | StarNode
  | PlusNode
  | QuestionNode
  | LazyStarNode
  | LazyPlusNode
  | LazyQuestionNode
  | NonCaptureGroupNode
  | LookaheadNode
  | LookbehindNode;

export function literalNode(char: string) {
  return new LiteralNode({ char });
}
export function dotNode() {
  return new DotNode({});
}
export function charClassNode(chars: Iterable<string>, negated = false) {
  return new CharClassNode({ chars: new Set(chars), negated });
}
export function startNode() {
  return new StartNode({});
}
export function endNode() {
  return new EndNode({});
}
export function sequenceNode(nodes: RegexNode[]) {
  return new SequenceNode({ nodes });
}
export function alternationNode(left: RegexNode, right: RegexNode) {
  return new AlternationNode({ left, right });
}
export function starNode(child: RegexNode) {
  return new StarNode({ child });
}
export function plusNode(child: RegexNode) {
  return new PlusNode({ child });
}
export function questionNode(child: RegexNode) {
  return new QuestionNode({ child });
}
export function lazyStarNode(child: RegexNode) {
  return new LazyStarNode({ child });
}
export function lazyPlusNode(child: RegexNode) {
  return new LazyPlusNode({ child });
}
export function lazyQuestionNode(child: RegexNode) {
  return new LazyQuestionNode({ child });
}
export function nonCaptureGroupNode(child: RegexNode) {
  return new NonCaptureGroupNode({ child });
}
export function lookaheadNode(child: RegexNode, positive = true) {
  return new LookaheadNode({ child, positive });
}
export function lookbehindNode(child: RegexNode, positive = true) {
  return new LookbehindNode({ child, positive });
}
