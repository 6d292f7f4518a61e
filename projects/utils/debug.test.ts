import { colors, log, logger, useColors } from './debug.js';

describe('logger', () => {
  it('captures log lines while a function runs', () => {
    const logs: string[] = [];
    const result = logger.capture(() => {
      log('step', 1);
      log('done');
      return 42;
    }, logs);
    expect(result).toBe(42);
    expect(logs).toEqual(['step 1', 'done']);
  });

  it('stops delivering after unsubscribe', () => {
    const seen: unknown[][] = [];
    const unsubscribe = logger.subscribe((...args) => seen.push(args));
    log('first');
    unsubscribe();
    log('second');
    expect(seen).toEqual([['first']]);
  });
});

describe('colors', () => {
  afterEach(() => useColors(false));

  it('leaves text plain by default', () => {
    expect(colors.red('x')).toBe('x');
  });

  it('wraps text in escape codes when enabled', () => {
    useColors();
    expect(colors.green('ok')).toBe('\u001b[32mok\u001b[0m');
  });
});
