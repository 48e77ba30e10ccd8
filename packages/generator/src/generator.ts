/**
 * Generator handles and primitive generators.
 *
 * A generator is a nullary producer of values, usually infinite. Each
 * `next()` is one logical step. Handles are reference objects: every
 * holder of a handle, including every combinator built on it, advances
 * the same producer state.
 *
 * @example
 * ```typescript
 * const evens = count(0, 2);
 * evens.pull(3);                         // [0, 2, 4]
 *
 * const pair = pure(1, "a");
 * pair.next();                           // [1, "a"]
 * ```
 */

import { sentinel, type Sentinel } from "./sentinel.js";

/** A nullary producer. */
export type Producer<T> = () => T;

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------

export class GeneratorHandle<T> implements Iterable<T> {
  private producer: Producer<T>;

  constructor(producer: Producer<T>) {
    this.producer = producer;
  }

  /** Pull one value. */
  next(): T {
    return this.producer();
  }

  /** Pull one value and hand it to `k`. */
  call<R>(k: (value: T) => R): R {
    return k(this.next());
  }

  /** A handle that applies `f` to each value pulled from this one. */
  map<U>(f: (value: T) => U): GeneratorHandle<U> {
    return new GeneratorHandle(() => f(this.next()));
  }

  /** Pull `n` values, in order. */
  pull(n: number): T[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`pull() count must be a non-negative integer, got ${n}`);
    }
    const values: T[] = [];
    for (let i = 0; i < n; i++) values.push(this.next());
    return values;
  }

  /** Exchange producers with another handle. */
  swap(other: GeneratorHandle<T>): void {
    const producer = this.producer;
    this.producer = other.producer;
    other.producer = producer;
  }

  /** Endless iteration; stop with `break`. */
  *[Symbol.iterator](): Generator<T> {
    while (true) yield this.next();
  }
}

/**
 * A handle whose values are tuples. `bind` spreads each tuple into
 * positional arguments.
 */
export class TupleGenerator<Ts extends unknown[]> extends GeneratorHandle<Ts> {
  /** Number of components in each tuple. */
  readonly arity: number;

  constructor(arity: number, producer: Producer<Ts>) {
    super(producer);
    this.arity = arity;
  }

  /** A handle that calls `f` with each tuple's components. */
  spread<R>(f: (...args: Ts) => R): GeneratorHandle<R> {
    return this.map((values) => f(...values));
  }
}

// ---------------------------------------------------------------------------
// Primitive generators
// ---------------------------------------------------------------------------

/** Wrap a producer. */
export function generator<T>(producer: Producer<T>): GeneratorHandle<T> {
  return new GeneratorHandle(producer);
}

/**
 * A constant generator. Given several values it produces a fresh tuple of
 * them on every call.
 */
export function pure<T>(value: T): GeneratorHandle<T>;
export function pure<Ts extends unknown[]>(...values: Ts): TupleGenerator<Ts>;
export function pure<Ts extends unknown[]>(...values: Ts): GeneratorHandle<unknown> {
  if (values.length === 1) {
    const [value] = values;
    return new GeneratorHandle(() => value);
  }
  return new TupleGenerator<Ts>(values.length, () => [...values] as Ts);
}

/** `start`, `start + step`, `start + 2 * step`, ... */
export function count(start?: number, step?: number): GeneratorHandle<number>;
export function count(start: bigint, step: bigint): GeneratorHandle<bigint>;
export function count(
  start: number | bigint = 0,
  step: number | bigint = 1,
): GeneratorHandle<number> | GeneratorHandle<bigint> {
  if (typeof start === "bigint" && typeof step === "bigint") {
    let current = start;
    const by = step;
    return new GeneratorHandle(() => {
      const result = current;
      current += by;
      return result;
    });
  }
  if (typeof start === "number" && typeof step === "number") {
    let current = start;
    const by = step;
    return new GeneratorHandle(() => {
      const result = current;
      current += by;
      return result;
    });
  }
  throw new TypeError("count() start and step must both be numbers or both be bigints");
}

/** `start`, `start * factor`, `start * factor ** 2`, ... */
export function prod(start: number, factor: number): GeneratorHandle<number>;
export function prod(start: bigint, factor: bigint): GeneratorHandle<bigint>;
export function prod(
  start: number | bigint,
  factor: number | bigint,
): GeneratorHandle<number> | GeneratorHandle<bigint> {
  if (typeof start === "bigint" && typeof factor === "bigint") {
    let current = start;
    const by = factor;
    return new GeneratorHandle(() => {
      const result = current;
      current *= by;
      return result;
    });
  }
  if (typeof start === "number" && typeof factor === "number") {
    let current = start;
    const by = factor;
    return new GeneratorHandle(() => {
      const result = current;
      current *= by;
      return result;
    });
  }
  throw new TypeError("prod() start and factor must both be numbers or both be bigints");
}

/** Produces the sentinel forever. */
export const bot: GeneratorHandle<Sentinel> = pure(sentinel);
