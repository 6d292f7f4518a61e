export abstract class Iter<T> implements IterableIterator<T> {
  [Symbol.iterator]() {
    return this;
  }

  abstract next(): IteratorResult<T>;

  /**
   * Stops the underlying iterator. Generators get the chance to run their
   * `finally` blocks.
   */
  abstract return(): IteratorResult<T>;

  map<O>(mapper: (i: T) => O): Iter<O> {
    return new MapIter(this, mapper);
  }

  /**
   * Takes the first item and closes the source, so nothing after it is ever
   * computed.
   */
  first(): T | undefined {
    const next = this.next();
    this.return();
    return next.done ? undefined : next.value;
  }

  /**
   * True as soon as one item satisfies the predicate (any item, when no
   * predicate is given). The source is closed at the first hit.
   */
  some(predicate: (item: T) => boolean = () => true): boolean {
    for (const item of this) {
      if (predicate(item)) {
        return true;
      }
    }
    return false;
  }

  toArray(): T[] {
    return [...this];
  }
}

class PlainIter<T> extends Iter<T> {
  private iterator: Iterator<T>;
  constructor(iterable: Iterable<T>) {
    super();
    this.iterator = iterable[Symbol.iterator]();
  }
  next() {
    return this.iterator.next();
  }
  return(): IteratorResult<T> {
    this.iterator.return?.();
    return { done: true, value: undefined };
  }
}

export function iter<T>(iterable: Iterable<T> = []): Iter<T> {
  return new PlainIter(iterable);
}

class MapIter<I, O> extends Iter<O> {
  private source: Iter<I>;
  private mapper: (i: I) => O;
  constructor(source: Iter<I>, mapper: (i: I) => O) {
    super();
    this.source = source;
    this.mapper = mapper;
  }
  next(): IteratorResult<O> {
    const { value, done } = this.source.next();
    if (done) {
      return { done, value: undefined };
    }
    return { value: this.mapper(value), done: false };
  }
  return(): IteratorResult<O> {
    this.source.return();
    return { done: true, value: undefined };
  }
}
