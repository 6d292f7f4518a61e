import { NodeKind } from '../ast.js';
import { Pattern } from '../pattern.js';
import { formatTraceEvent, MatchTracer } from '../tracer.js';
import { logger } from '../../utils/debug.js';

describe('MatchTracer', () => {
  it('records entries, candidates and exits of a match', () => {
    const tracer = new MatchTracer();
    expect(new Pattern('ab').match('ab', tracer)).toBe(true);
    expect(tracer.lines()).toEqual([
      'ENTER Sequence pos=0',
      'ENTER Literal pos=0',
      'MATCH Literal 0->1',
      'ENTER Literal pos=1',
      'MATCH Literal 1->2',
      'MATCH Sequence 0->2',
      'EXIT Literal pos=1',
      'EXIT Literal pos=0',
      'EXIT Sequence pos=0',
    ]);
  });

  it('traces every start a search tries', () => {
    const tracer = new MatchTracer();
    expect(new Pattern('b').search('ab', tracer)).toEqual({ start: 1, end: 2 });
    expect(tracer.lines()).toEqual([
      'ENTER Literal pos=0',
      'EXIT Literal pos=0',
      'ENTER Literal pos=1',
      'MATCH Literal 1->2',
      'EXIT Literal pos=1',
    ]);
    expect(tracer.events[3]).toEqual({
      type: 'match',
      node: NodeKind.LITERAL,
      pos: 1,
      end: 2,
    });
  });

  it('writes each event to the debug log', () => {
    const tracer = new MatchTracer();
    const logs: string[] = [];
    logger.capture(() => new Pattern('b').search('ab', tracer), logs);
    expect(logs).toEqual(tracer.lines());
  });

  it('can be cleared between runs', () => {
    const tracer = new MatchTracer();
    new Pattern('a').match('a', tracer);
    tracer.clear();
    expect(tracer.events).toEqual([]);
  });

  it('leaves results unchanged', () => {
    const pattern = new Pattern('(a|ab)(?=c)');
    const tracer = new MatchTracer();
    expect(pattern.findall('abcac', tracer)).toEqual(pattern.findall('abcac'));
  });
});

describe('formatTraceEvent', () => {
  it('formats each event type', () => {
    expect(
      formatTraceEvent({ type: 'enter', node: NodeKind.STAR, pos: 3 })
    ).toBe('ENTER Star pos=3');
    expect(
      formatTraceEvent({ type: 'match', node: NodeKind.DOT, pos: 3, end: 4 })
    ).toBe('MATCH Dot 3->4');
    expect(
      formatTraceEvent({ type: 'exit', node: NodeKind.END, pos: 0 })
    ).toBe('EXIT End pos=0');
  });
});
