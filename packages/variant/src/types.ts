/**
 * Core types for the algebraic (sum) type.
 *
 * A declaration lists its alternatives as a tuple of witnesses: type keys
 * from `@altgen/core`, plus at most one {@link self} marker standing for
 * the type being declared. Everything the compiler knows about a variant
 * is computed from that tuple.
 *
 * @module
 */

import type { AnyTypeKey, IndexOf, IsMember, KeyType } from "@altgen/core";
import type { Algebraic } from "./algebraic.js";

/**
 * Marker for the recursive alternative: "the variant type under
 * declaration". Its payload is stored in a `RecursiveBox`.
 */
export interface SelfKey {
  readonly kind: "self";
  readonly name: "self";
}

/** The recursive-alternative marker. */
export const self: SelfKey = Object.freeze({ kind: "self", name: "self" });

/** One entry of a declaration's alternative list. */
export type Alternative = AnyTypeKey | SelfKey;

/** A non-empty, ordered alternative list. */
export type Alternatives = readonly [Alternative, ...Alternative[]];

/**
 * The caller-visible type of one alternative: the key's value type, or
 * the variant itself for {@link self}.
 */
export type Logical<A, Ts extends Alternatives> = A extends SelfKey
  ? Algebraic<Ts>
  : KeyType<A>;

/** Union of every alternative's caller-visible type. */
export type LogicalUnion<Ts extends Alternatives> = {
  [I in keyof Ts]: Logical<Ts[I], Ts>;
}[number];

/** One handler per alternative, in declaration order. */
export type Cases<Ts extends Alternatives, R> = {
  readonly [I in keyof Ts]: (value: Logical<Ts[I], Ts>) => R;
};

/** The self marker, when `Ts` declares it; `never` otherwise. */
export type SelfOf<Ts extends Alternatives> = SelfKey & Ts[number];

/** Compile-time index of alternative `K` in `Ts` (first occurrence). */
export type AlternativeIndex<K, Ts extends Alternatives> = IndexOf<K, Ts>;

/** `true` when `K` is one of the declared alternatives. */
export type IsAlternative<K, Ts extends Alternatives> = IsMember<K, Ts>;

/** The alternative list of a variant type. */
export type AlternativesOf<V> = V extends Algebraic<infer Ts> ? Ts : never;
