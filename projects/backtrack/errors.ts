export type SyntaxErrorReason =
  | 'unexpected-end'
  | 'trailing-character'
  | 'missing-paren'
  | 'missing-bracket'
  | 'unescaped-special'
  | 'dangling-escape';

/**
 * The only error the engine raises. Thrown while compiling a pattern; matching
 * itself never fails.
 */
export class PatternSyntaxError extends Error {
  readonly pattern: string;
  readonly offset: number;
  readonly reason: SyntaxErrorReason;

  constructor(
    pattern: string,
    offset: number,
    reason: SyntaxErrorReason,
    cause: string
  ) {
    super(`PatternSyntaxError at ${offset}: ${cause}`);
    this.name = 'PatternSyntaxError';
    this.pattern = pattern;
    this.offset = offset;
    this.reason = reason;
  }

  /**
   * The pattern with a caret under the offending offset.
   */
  pointer(): string[] {
    return [this.pattern, '^'.padStart(this.offset + 1, '-')];
  }
}
