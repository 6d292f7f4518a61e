import { err, ok, type Result } from 'neverthrow';
import type { RegexNode } from './ast.js';
import { PatternSyntaxError } from './errors.js';
import { type MatchObserver, produce } from './matcher.js';
import { RegexParser } from './parser.js';
import { boundaries, nextIndex } from './text.js';
import { iter, type Iter } from '../utils/iter.js';

export type MatchSpan = { start: number; end: number };

/**
 * A compiled pattern. Matching only reads the tree, so one instance can serve
 * any number of match, search and findall calls.
 */
export class Pattern {
  readonly source: string;
  readonly root: RegexNode;

  /**
   * @throws PatternSyntaxError when `source` is malformed
   */
  constructor(source: string) {
    this.source = source;
    this.root = RegexParser.parseOrThrow(source);
  }

  static compile(source: string): Result<Pattern, PatternSyntaxError> {
    try {
      return ok(new Pattern(source));
    } catch (e) {
      if (e instanceof PatternSyntaxError) {
        return err(e);
      }
      throw e;
    }
  }

  /**
   * Every end position the pattern can reach from `pos`, in backtracking
   * order.
   */
  candidates(text: string, pos: number, observer?: MatchObserver): Iter<number> {
    return iter(produce(this.root, text, pos, observer));
  }

  /**
   * True when the whole of `text` matches. Candidates past the first are
   * needed: the first way to match may stop short of the end.
   */
  match(text: string, observer?: MatchObserver): boolean {
    return this.candidates(text, 0, observer).some(
      (end) => end == text.length
    );
  }

  /**
   * The leftmost start that matches at all, paired with the first end found
   * there. That end is not necessarily the longest one.
   */
  search(text: string, observer?: MatchObserver): MatchSpan | null {
    for (const start of boundaries(text)) {
      const end = this.candidates(text, start, observer).first();
      if (end !== undefined) {
        return { start, end };
      }
    }
    return null;
  }

  /**
   * Non-overlapping matches, ascending by start. A zero-width match still
   * moves the scan forward by one character.
   */
  findall(text: string, observer?: MatchObserver): MatchSpan[] {
    const matches: MatchSpan[] = [];
    let pos = 0;
    while (pos <= text.length) {
      const end = this.candidates(text, pos, observer).first();
      if (end === undefined) {
        pos = nextIndex(text, pos);
        continue;
      }
      matches.push({ start: pos, end });
      pos = Math.max(nextIndex(text, pos), end);
    }
    return matches;
  }

  toString() {
    return `Pattern(${JSON.stringify(this.source)})`;
  }
}
