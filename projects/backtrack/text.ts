/**
 * Positions everywhere are UTF-16 indices, but the engine steps over whole
 * characters: a surrogate pair is one character two code units wide.
 */

/**
 * The character starting at `pos`, or undefined past the end.
 */
export function charAt(text: string, pos: number): string | undefined {
  const codePoint = text.codePointAt(pos);
  return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
}

/**
 * Index just after the character at `pos`; past the end it moves by one.
 */
export function nextIndex(text: string, pos: number): number {
  return pos + (charAt(text, pos)?.length ?? 1);
}

/**
 * Every character boundary from 0 through `end`, in order.
 */
export function* boundaries(text: string, end = text.length) {
  for (let pos = 0; pos <= end; pos = nextIndex(text, pos)) {
    yield pos;
  }
}
