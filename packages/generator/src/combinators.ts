/**
 * Generator combinators.
 *
 * - `braid` / `tie` run several generators in lockstep, one value from
 *   each per call, left to right
 * - `bind` maps a function over a generator, spreading tuple values into
 *   positional arguments
 * - `seq` concatenates two generators, switching once a predicate fires
 * - `bound` truncates a generator to `n` values, then yields the sentinel
 *
 * `seq` and `bound` yield variant values; each call declares its own
 * variant family, so read them with `match`, `typeIndex` or
 * `isExhausted`.
 *
 * @example
 * ```typescript
 * const sums = bind((a, b) => a + b, count(0), count(100));
 * sums.pull(3); // [100, 102, 104]
 *
 * const firstThree = bound(count(), 3);
 * firstThree.pull(4).map(isExhausted); // [false, false, false, true]
 * ```
 */

import {
  AG2001,
  createDiagnostic,
  debugLog,
  formatCode,
  opaqueKey,
  type TypeKey,
} from "@altgen/core";
import { algebraic, type Algebraic } from "@altgen/variant";
import { GeneratorHandle, TupleGenerator } from "./generator.js";
import { sentinel, SentinelKey } from "./sentinel.js";

/** One generator per tuple component. */
export type Generators<Ts extends unknown[]> = {
  [I in keyof Ts]: GeneratorHandle<Ts[I]>;
};

// ---------------------------------------------------------------------------
// braid / tie
// ---------------------------------------------------------------------------

/** Pull one value from each generator per call, in argument order. */
export function braid<T, Ts extends unknown[]>(
  first: GeneratorHandle<T>,
  ...rest: Generators<Ts>
): TupleGenerator<[T, ...Ts]> {
  const others: readonly GeneratorHandle<unknown>[] = rest;
  return new TupleGenerator<[T, ...Ts]>(others.length + 1, () => {
    const values: unknown[] = [first.next()];
    for (const g of others) values.push(g.next());
    return values as [T, ...Ts];
  });
}

/** Alias of {@link braid}. */
export const tie = braid;

// ---------------------------------------------------------------------------
// bind
// ---------------------------------------------------------------------------

/** A generator that does not produce tuples for `bind` to spread. */
export type PlainGenerator<T> = GeneratorHandle<T> & { readonly arity?: undefined };

/**
 * Map `f` over a generator.
 *
 * A {@link TupleGenerator} always has its values spread into `f`'s
 * parameters; use `g.map(f)` to receive the tuple whole. Several
 * generators are braided first: `bind(f, g1, g2)` is
 * `bind(f, braid(g1, g2))`.
 */
export function bind<Ts extends unknown[], R>(
  f: (...args: Ts) => R,
  g: TupleGenerator<Ts>,
): GeneratorHandle<R>;
export function bind<T, R>(f: (value: T) => R, g: PlainGenerator<T>): GeneratorHandle<R>;
export function bind<T, U, Ts extends unknown[], R>(
  f: (first: T, second: U, ...rest: Ts) => R,
  g: GeneratorHandle<T>,
  h: GeneratorHandle<U>,
  ...gs: Generators<Ts>
): GeneratorHandle<R>;
export function bind(
  f: (...args: unknown[]) => unknown,
  g: GeneratorHandle<unknown>,
  ...gs: GeneratorHandle<unknown>[]
): GeneratorHandle<unknown> {
  if (gs.length > 0) {
    return braid(g, ...gs).spread(f);
  }
  if (g instanceof TupleGenerator) {
    return g.spread(f);
  }
  return g.map((value) => f(value));
}

// ---------------------------------------------------------------------------
// seq
// ---------------------------------------------------------------------------

export type SequencedAlternatives<T, U> = readonly [TypeKey<T, "first">, TypeKey<U, "second">];

/** A value drawn from the first (tag 0) or second (tag 1) generator. */
export type Sequenced<T, U> = Algebraic<SequencedAlternatives<T, U>>;

/**
 * Draw from `t` until `branch` holds for one of its values, then from
 * `u` forever. The value that fires `branch` is still yielded from `t`.
 * The switch is owned by the returned handle.
 */
export function seq<T, U>(
  t: GeneratorHandle<T>,
  u: GeneratorHandle<U>,
  branch: (value: T) => boolean,
): GeneratorHandle<Sequenced<T, U>> {
  const first = opaqueKey<T, "first">("first");
  const second = opaqueKey<U, "second">("second");
  const family = algebraic<SequencedAlternatives<T, U>>("Seq", [first, second]);
  let switched = false;

  return new GeneratorHandle(() => {
    if (switched) {
      return family.make(second, u.next());
    }
    const value = t.next();
    if (branch(value)) {
      switched = true;
      debugLog("generator", "seq switched to its second generator");
    }
    return family.make(first, value);
  });
}

// ---------------------------------------------------------------------------
// bound
// ---------------------------------------------------------------------------

export type BoundedAlternatives<T> = readonly [TypeKey<T, "value">, typeof SentinelKey];

/** A value of the bounded generator (tag 0) or the sentinel (tag 1). */
export type Bounded<T> = Algebraic<BoundedAlternatives<T>>;

/**
 * Yield `n` values of `g`, then the sentinel on every later call. The
 * counter is owned by the returned handle.
 *
 * @throws RangeError when `n` is not a non-negative integer
 */
export function bound<T>(g: GeneratorHandle<T>, n: number): GeneratorHandle<Bounded<T>> {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`bound() limit must be a non-negative integer, got ${n}`);
  }
  const valueKey = opaqueKey<T, "value">("value");
  const family = algebraic<BoundedAlternatives<T>>("Bounded", [valueKey, SentinelKey]);
  let remaining = n;
  let reported = false;

  return new GeneratorHandle(() => {
    if (remaining > 0) {
      const value = g.next();
      remaining--;
      return family.make(valueKey, value);
    }
    if (!reported) {
      reported = true;
      debugLog("generator", () => {
        const diagnostic = createDiagnostic(AG2001, { count: n });
        return `${formatCode(diagnostic.code)}: ${diagnostic.message}`;
      });
    }
    return family.make(SentinelKey, sentinel);
  });
}

/** Whether a bounded value is the sentinel. */
export function isExhausted<T>(value: Bounded<T>): boolean {
  return value.typeIndex() === 1;
}
