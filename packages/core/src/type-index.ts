/**
 * @altgen/core: Type Index Resolution
 *
 * Maps a type to its position within an ordered tuple of alternatives.
 * The type-level `IndexOf` is the compile-time half; `indexOf` and
 * `resolveIndex` mirror it at run time over the tuple of witnesses that
 * stand in for the (erased) alternative types.
 *
 * Duplicate entries resolve to their first occurrence, at both levels.
 * Ambiguity is not reported.
 */

// ============================================================================
// Type-Level Utilities
// ============================================================================

/**
 * Strict type identity. Unlike mutual assignability this tells `any` apart
 * from everything else and does not collapse optional modifiers.
 *
 * @example
 * ```typescript
 * type A = Equals<number, number>; // true
 * type B = Equals<number, 1>;      // false
 * ```
 */
export type Equals<A, B> =
  (<G>() => G extends A ? 1 : 2) extends <G>() => G extends B ? 1 : 2
    ? true
    : false;

/** Brand symbol for the "type not found" error type (type-only). */
declare const __type_not_found__: unique symbol;

/**
 * Result of an index query for a type that is not in the list.
 *
 * No number is assignable to it, so any use that needs an index fails to
 * compile at the query site.
 */
export interface TypeNotFound<U> {
  readonly [__type_not_found__]: U;
}

/**
 * Zero-based position of the first element of `Ts` identical to `U`.
 *
 * @example
 * ```typescript
 * type I = IndexOf<string, [number, string, string]>; // 1
 * type E = IndexOf<boolean, [number, string]>;        // TypeNotFound<boolean>
 * ```
 */
export type IndexOf<
  U,
  Ts extends readonly unknown[],
  Seen extends unknown[] = [],
> = Ts extends readonly [infer Head, ...infer Rest]
  ? Equals<U, Head> extends true
    ? Seen["length"]
    : IndexOf<U, Rest, [...Seen, Head]>
  : TypeNotFound<U>;

/** `true` when `U` occurs in `Ts`. */
export type IsMember<U, Ts extends readonly unknown[]> =
  Ts extends readonly [infer Head, ...infer Rest]
    ? Equals<U, Head> extends true
      ? true
      : IsMember<U, Rest>
    : false;

/**
 * Union of the index literals of a tuple.
 *
 * @example
 * ```typescript
 * type I = Indices<[number, string, boolean]>; // 0 | 1 | 2
 * ```
 */
export type Indices<Ts extends readonly unknown[]> = {
  [K in keyof Ts]: K extends `${infer N extends number}` ? N : never;
}[number];

/** The literal length of a tuple. */
export type Count<Ts extends readonly unknown[]> = Ts["length"];

// ============================================================================
// Runtime Resolution
// ============================================================================

/**
 * Position of the first element of `list` that is `===` to `item`,
 * or `-1` when there is none.
 */
export function indexOf(item: unknown, list: readonly unknown[]): number {
  for (let i = 0; i < list.length; i++) {
    if (list[i] === item) return i;
  }
  return -1;
}

/** Whether `item` occurs in `list` (reference identity). */
export function isMember(item: unknown, list: readonly unknown[]): boolean {
  return indexOf(item, list) !== -1;
}

/**
 * Runtime mirror of {@link IndexOf}: the position of `item` in `list`,
 * typed as the compile-time constant.
 *
 * The static signature only admits members, so `-1` is never observed
 * by well-typed callers.
 */
export function resolveIndex<U, Ts extends readonly unknown[]>(
  item: U,
  list: Ts,
): IndexOf<U, Ts> {
  return indexOf(item, list) as unknown as IndexOf<U, Ts>;
}
