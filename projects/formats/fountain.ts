import { Pattern } from '../backtrack/pattern.js';

// There are no range or shorthand classes, so classes list their characters.
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

const SCENE_HEADING = new Pattern('^(?:INT|EXT|EST|INT/EXT)\\..+');
const TRANSITION = new Pattern(`^[${UPPER} ]+TO:$`);
const CHARACTER = new Pattern(
  `^[${UPPER}][${UPPER}${DIGITS} ]+(?:\\([^)]+\\))?$`
);
const PARENTHETICAL = new Pattern('^\\(.*\\)$');
const BLANK = new Pattern('^[ \t]*$');

export type FountainElement =
  | 'blank'
  | 'scene-heading'
  | 'transition'
  | 'character'
  | 'parenthetical'
  | 'dialogue'
  | 'action';

const PARENTHETICAL_INDENT = 30;
const DIALOGUE_INDENT = 20;

/**
 * Decides what a screenplay line is. Lines that match none of the element
 * patterns are dialogue while a speech is running (after a character cue,
 * parenthetical or dialogue line), and action anywhere else.
 */
export function classifyLine(
  line: string,
  previous: FountainElement | null = null
): FountainElement {
  if (BLANK.match(line)) {
    return 'blank';
  }
  if (SCENE_HEADING.match(line)) {
    return 'scene-heading';
  }
  if (TRANSITION.match(line)) {
    return 'transition';
  }
  if (CHARACTER.match(line)) {
    return 'character';
  }
  if (PARENTHETICAL.match(line)) {
    return 'parenthetical';
  }
  if (
    previous == 'character' ||
    previous == 'parenthetical' ||
    previous == 'dialogue'
  ) {
    return 'dialogue';
  }
  return 'action';
}

function center(line: string, width: number): string {
  const margin = width - line.length;
  if (margin <= 0) {
    return line;
  }
  const left = Math.floor(margin / 2) + (margin & width & 1);
  return ' '.repeat(left) + line + ' '.repeat(margin - left);
}

export function formatLine(
  line: string,
  element: FountainElement,
  width: number
): string {
  switch (element) {
    case 'blank':
      return '';
    case 'scene-heading':
      return line.toUpperCase();
    case 'transition':
      return line.padStart(width);
    case 'character':
      return center(line, width);
    case 'parenthetical':
      return ' '.repeat(PARENTHETICAL_INDENT) + line;
    case 'dialogue':
      return ' '.repeat(DIALOGUE_INDENT) + line;
    case 'action':
      return line;
  }
}

/**
 * Lays out Fountain lines as fixed-width screenplay text.
 */
export function formatFountain(lines: string[], width = 80): string {
  const output: string[] = [];
  let previous: FountainElement | null = null;
  for (const raw of lines) {
    const line = raw.replace(/[\r\n]+$/, '');
    const element = classifyLine(line, previous);
    output.push(formatLine(line, element, width));
    previous = element;
  }
  return output.join('\n');
}

export function splitLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] == '') {
    lines.pop();
  }
  return lines;
}
