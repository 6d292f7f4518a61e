import { err, ok, type Result } from 'neverthrow';
import {
  alternationNode,
  charClassNode,
  dotNode,
  endNode,
  lazyPlusNode,
  lazyQuestionNode,
  lazyStarNode,
  literalNode,
  lookaheadNode,
  lookbehindNode,
  nonCaptureGroupNode,
  plusNode,
  questionNode,
  type RegexNode,
  sequenceNode,
  starNode,
  startNode,
} from './ast.js';
import { PatternSyntaxError, type SyntaxErrorReason } from './errors.js';
import { charAt } from './text.js';

type GroupPrefix = {
  marker: string;
  wrap: (child: RegexNode) => RegexNode;
};

// '(' followed by one of these opens a special group; anything else is a
// plain group, which is transparent.
const GROUP_PREFIXES: GroupPrefix[] = [
  { marker: '?:', wrap: nonCaptureGroupNode },
  { marker: '?=', wrap: (child) => lookaheadNode(child, true) },
  { marker: '?!', wrap: (child) => lookaheadNode(child, false) },
  { marker: '?<=', wrap: (child) => lookbehindNode(child, true) },
  { marker: '?<!', wrap: (child) => lookbehindNode(child, false) },
];

type Quantifier = {
  greedy: (child: RegexNode) => RegexNode;
  lazy: (child: RegexNode) => RegexNode;
};

// a trailing '?' after any of these selects the lazy form
const QUANTIFIERS: Map<string, Quantifier> = new Map([
  ['*', { greedy: starNode, lazy: lazyStarNode }],
  ['+', { greedy: plusNode, lazy: lazyPlusNode }],
  ['?', { greedy: questionNode, lazy: lazyQuestionNode }],
]);

/**
 * Recursive descent over the pattern string. Precedence, loosest first:
 * alternation, sequence, quantified factor, atom.
 */
export class RegexParser {
  private readonly source: string;
  private pos = 0;

  private constructor(source: string) {
    this.source = source;
  }

  static parse(source: string): RegexNode | null {
    const result = RegexParser.parseResult(source);
    return result.isOk() ? result.value : null;
  }

  static parseOrThrow(source: string): RegexNode {
    return new RegexParser(source).parse();
  }

  static parseResult(source: string): Result<RegexNode, PatternSyntaxError> {
    try {
      return ok(RegexParser.parseOrThrow(source));
    } catch (e) {
      if (e instanceof PatternSyntaxError) {
        return err(e);
      }
      throw e;
    }
  }

  private parse(): RegexNode {
    const node = this.parseAlternation();
    const trailing = this.peek();
    if (trailing !== undefined) {
      throw this.error(
        'trailing-character',
        `Unexpected character '${trailing}'`
      );
    }
    return node;
  }

  private parseAlternation(): RegexNode {
    const left = this.parseSequence();
    if (this.peek() === '|') {
      this.pos++;
      // right-associative: a|b|c is a|(b|c)
      return alternationNode(left, this.parseAlternation());
    }
    return left;
  }

  private parseSequence(): RegexNode {
    const nodes: RegexNode[] = [];
    while (true) {
      const next = this.peek();
      if (next === undefined || next === '|' || next === ')') {
        break;
      }
      nodes.push(this.parseFactor());
    }
    return nodes.length == 1 ? nodes[0] : sequenceNode(nodes);
  }

  private parseFactor(): RegexNode {
    const atom = this.parseAtom();
    const next = this.peek();
    const quantifier = next === undefined ? undefined : QUANTIFIERS.get(next);
    if (!quantifier) {
      return atom;
    }
    this.pos++;
    if (this.peek() === '?') {
      this.pos++;
      return quantifier.lazy(atom);
    }
    return quantifier.greedy(atom);
  }

  private parseAtom(): RegexNode {
    const c = this.peek();
    switch (c) {
      case undefined:
        throw this.error('unexpected-end', 'Unexpected end of pattern');
      case '(':
        return this.parseGroup();
      case '[':
        return this.parseCharClass();
      case '.':
        this.pos++;
        return dotNode();
      case '^':
        this.pos++;
        return startNode();
      case '$':
        this.pos++;
        return endNode();
      case '\\':
        return this.parseEscape();
      case '*':
      case '+':
      case '?':
      case '|':
      case ')':
      case ']':
        throw this.error(
          'unescaped-special',
          `Unescaped special character '${c}'`
        );
      default:
        this.pos += c.length;
        return literalNode(c);
    }
  }

  private parseGroup(): RegexNode {
    this.pos++; // (
    const prefix = GROUP_PREFIXES.find(({ marker }) =>
      this.source.startsWith(marker, this.pos)
    );
    if (prefix) {
      this.pos += prefix.marker.length;
    }
    const child = this.parseAlternation();
    if (this.peek() !== ')') {
      throw this.error('missing-paren', "Missing closing ')'");
    }
    this.pos++;
    return prefix ? prefix.wrap(child) : child;
  }

  private parseCharClass(): RegexNode {
    this.pos++; // [
    const negated = this.peek() === '^';
    if (negated) {
      this.pos++;
    }
    const chars: string[] = [];
    while (true) {
      const c = this.peek();
      if (c === undefined) {
        throw this.error('missing-bracket', "Missing closing ']'");
      }
      if (c === ']') {
        break;
      }
      if (c === '\\') {
        const escaped = this.peek(1);
        if (escaped === undefined) {
          throw this.error(
            'dangling-escape',
            'Pattern ends with an escape character inside []'
          );
        }
        chars.push(escaped);
        this.pos += 1 + escaped.length;
      } else {
        chars.push(c);
        this.pos += c.length;
      }
    }
    this.pos++; // ]
    return charClassNode(chars, negated);
  }

  private parseEscape(): RegexNode {
    // no shorthand classes: \d is the letter d
    const escaped = this.peek(1);
    if (escaped === undefined) {
      throw this.error('dangling-escape', "Pattern ends with '\\'");
    }
    this.pos += 1 + escaped.length;
    return literalNode(escaped);
  }

  /**
   * The character `offset` code units ahead, read as a whole code point: a
   * surrogate pair comes back as one two-unit string.
   */
  private peek(offset = 0): string | undefined {
    return charAt(this.source, this.pos + offset);
  }

  private error(reason: SyntaxErrorReason, cause: string) {
    return new PatternSyntaxError(this.source, this.pos, reason, cause);
  }
}

export const parseRegex = RegexParser.parseOrThrow;
