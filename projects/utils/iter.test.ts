import { iter } from './iter.js';

function* tracked(items: number[], state: { pulled: number; closed: boolean }) {
  try {
    for (const item of items) {
      state.pulled++;
      yield item;
    }
  } finally {
    state.closed = true;
  }
}

describe('iter', () => {
  it('first takes one item and closes the source', () => {
    const state = { pulled: 0, closed: false };
    expect(iter(tracked([4, 5, 6], state)).first()).toBe(4);
    expect(state).toEqual({ pulled: 1, closed: true });
  });

  it('first is undefined for an empty source', () => {
    expect(iter<number>().first()).toBeUndefined();
  });

  it('some stops at the first hit', () => {
    const state = { pulled: 0, closed: false };
    expect(iter(tracked([1, 2, 3, 4], state)).some((n) => n == 2)).toBe(true);
    expect(state).toEqual({ pulled: 2, closed: true });
  });

  it('some without a predicate checks for any item', () => {
    expect(iter([0]).some()).toBe(true);
    expect(iter([]).some()).toBe(false);
  });

  it('maps lazily', () => {
    const state = { pulled: 0, closed: false };
    const doubled = iter(tracked([1, 2, 3], state)).map((n) => n * 2);
    expect(state.pulled).toBe(0);
    expect(doubled.first()).toBe(2);
    expect(state).toEqual({ pulled: 1, closed: true });
  });

  it('collects into an array', () => {
    expect(iter(new Set([2, 3, 4])).toArray()).toEqual([2, 3, 4]);
  });
});
