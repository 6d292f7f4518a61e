import {
  classifyLine,
  type FountainElement,
  formatFountain,
  formatLine,
  splitLines,
} from './fountain.js';

describe('classifyLine', () => {
  const cases: [string, FountainElement | null, FountainElement][] = [
    ['', null, 'blank'],
    [' \t ', null, 'blank'],
    ['INT. KITCHEN - DAY', null, 'scene-heading'],
    ['EXT. PARK', null, 'scene-heading'],
    ['INT/EXT. CAR', null, 'scene-heading'],
    ['CUT TO:', null, 'transition'],
    ['SMASH CUT TO:', null, 'transition'],
    ['JOHN', null, 'character'],
    ['MARY (V.O.)', null, 'character'],
    ['R2D2', null, 'character'],
    ['(beat)', 'character', 'parenthetical'],
    ['Good morning.', 'character', 'dialogue'],
    ['Coffee?', 'parenthetical', 'dialogue'],
    ['And tea.', 'dialogue', 'dialogue'],
    ['Mary pours coffee.', null, 'action'],
    ['Mary pours coffee.', 'blank', 'action'],
    ['int. house', null, 'action'],
  ];
  test.each(cases)('%p after %p', (line, previous, expected) => {
    expect(classifyLine(line, previous)).toBe(expected);
  });
});

describe('formatLine', () => {
  it('centers character cues', () => {
    expect(formatLine('JOHN', 'character', 80)).toBe(
      ' '.repeat(38) + 'JOHN' + ' '.repeat(38)
    );
    expect(formatLine('JO', 'character', 9)).toBe('    JO   ');
  });

  it('right-aligns transitions', () => {
    expect(formatLine('CUT TO:', 'transition', 10)).toBe('   CUT TO:');
  });

  it('upper-cases scene headings', () => {
    expect(formatLine('INT. Kitchen', 'scene-heading', 80)).toBe(
      'INT. KITCHEN'
    );
  });
});

describe('formatFountain', () => {
  it('lays out a short scene', () => {
    const lines = [
      'INT. KITCHEN - DAY',
      '',
      'Mary pours coffee.',
      '',
      'JOHN',
      'Good morning.',
      '(beat)',
      'Coffee?',
      '',
      'CUT TO:',
    ];
    expect(formatFountain(lines, 40).split('\n')).toEqual([
      'INT. KITCHEN - DAY',
      '',
      'Mary pours coffee.',
      '',
      ' '.repeat(18) + 'JOHN' + ' '.repeat(18),
      ' '.repeat(20) + 'Good morning.',
      ' '.repeat(30) + '(beat)',
      ' '.repeat(20) + 'Coffee?',
      '',
      ' '.repeat(33) + 'CUT TO:',
    ]);
  });

  it('ignores carriage returns left by splitting', () => {
    const lines = splitLines('JOHN\r\nHi.\r\n');
    expect(lines).toEqual(['JOHN\r', 'Hi.\r']);
    expect(formatFountain(lines, 10)).toBe(
      '   JOHN   \n' + ' '.repeat(20) + 'Hi.'
    );
  });
});

describe('splitLines', () => {
  it('drops the empty line after a final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
    expect(splitLines('')).toEqual([]);
  });
});
