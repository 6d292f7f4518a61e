import { Pattern } from '../backtrack/pattern.js';

// Quantifiers offer their shortest match first, so each alternative has to
// end on a lookahead for the separator; otherwise the first candidate found
// would be a prefix of the field.
const FIELD = new Pattern(
  '"(?:[^"]|"")*"(?=,|$)|[^,\r\n]*(?=,|$)'
);
const COMMA = new Pattern(',');

function unquote(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replaceAll('""', '"');
  }
  return raw;
}

/**
 * Splits one CSV record into its fields. Empty fields are kept, including the
 * one after a trailing comma.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let pos = 0;
  while (pos <= line.length) {
    const rest = line.slice(pos);
    const field = FIELD.search(rest);
    if (!field) {
      break;
    }
    fields.push(unquote(rest.slice(field.start, field.end)));
    pos += field.end;

    const comma = COMMA.search(line.slice(pos));
    if (comma?.start !== 0) {
      break;
    }
    pos += 1;
  }
  return fields;
}

/**
 * Parses CSV text into records. Lines may end in CRLF, LF or CR; empty lines
 * are skipped.
 */
export function parseCsv(data: string): string[][] {
  return data
    .replaceAll('\r\n', '\n')
    .replaceAll('\r', '\n')
    .split('\n')
    .filter((line) => line.length > 0)
    .map(parseCsvLine);
}
