/**
 * Algebraic: a never-empty tagged union over a declared list of
 * alternatives.
 *
 * A declaration ({@link AlgebraicType}) fixes the ordered alternatives and
 * builds values; a value ({@link Algebraic}) holds exactly one of them for
 * its whole life. The tag is chosen at construction and never changes:
 * `assign` may replace the payload of the active alternative, never switch
 * to another one.
 *
 * @example
 * ```typescript
 * import { Types } from "@altgen/core";
 * import { algebraic, self } from "@altgen/variant";
 *
 * const Expr = algebraic("Expr", [Types.number, Types.string, self]);
 *
 * const leaf = Expr.from(42);
 * const nested = Expr.from(leaf);        // boxed, tag 2
 *
 * nested.typeIndex();                     // 2
 * nested.value(self).value(Types.number); // 42
 *
 * nested.match([
 *   (n) => `num ${n}`,
 *   (s) => `str ${s}`,
 *   (inner) => `nested ${inner}`,
 * ]);
 * ```
 *
 * @module
 */

import {
  AG1001,
  AG1002,
  AG1004,
  AG1005,
  AltgenError,
  debugLog,
  indexOf,
  invariant,
  isMember,
  resolveIndex,
  unreachable,
  variantAccess,
  type IndexOf,
  type TypeKey,
} from "@altgen/core";
import { RecursiveBox, type BoxTraits } from "./recursive.js";
import { VariantStorage } from "./storage.js";
import type {
  Alternative,
  Alternatives,
  Cases,
  LogicalUnion,
  SelfOf,
} from "./types.js";

/**
 * Key for the factory that is the only way to construct a value.
 *
 * @internal
 */
export const construct: unique symbol = Symbol("Algebraic.construct");

function describe(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

// ============================================================================
// Declaration
// ============================================================================

/**
 * A declared sum type: its name, its alternatives in order, and the
 * constructors for its values.
 */
export class AlgebraicType<Ts extends Alternatives> {
  readonly name: string;
  readonly alternatives: Ts;
  private readonly traits: BoxTraits<Algebraic<Ts>>;

  constructor(name: string, alternatives: Ts) {
    this.name = name;
    this.alternatives = alternatives;
    this.traits = {
      clone: (value) => value.clone(),
      dispose: (value) => value.dispose(),
    };
  }

  /** Number of alternatives. */
  get ntypes(): number {
    return this.alternatives.length;
  }

  /** The alternative at position `n`. */
  type<N extends number>(n: N): Ts[N] {
    invariant(
      Number.isInteger(n) && n >= 0 && n < this.alternatives.length,
      `${this.name} has no alternative at index ${n}`,
    );
    return this.alternatives[n];
  }

  /** Position of `key` among the alternatives (first occurrence). */
  index<K extends Ts[number]>(key: K): IndexOf<K, Ts> {
    return resolveIndex(key, this.alternatives);
  }

  /** Whether `key` is one of the alternatives. */
  isAlgebraicType(key: unknown): boolean {
    return isMember(key, this.alternatives);
  }

  /** Whether `value` is a value of this declaration. */
  owns(value: unknown): value is Algebraic<Ts> {
    return value instanceof Algebraic && value.declaration === this;
  }

  /**
   * Build a value from a payload, picking the first alternative that
   * accepts it. A value of this declaration selects the recursive
   * alternative and is boxed.
   *
   * @throws AltgenError AG1001 when no alternative accepts the payload
   */
  from(value: LogicalUnion<Ts>): Algebraic<Ts> {
    for (let i = 0; i < this.alternatives.length; i++) {
      const alternative: Alternative = this.alternatives[i];
      const accepted =
        alternative.kind === "self" ? this.owns(value) : alternative.is(value);
      if (accepted) {
        debugLog("variant", () => `${this.name}.from chose ${alternative.name} (tag ${i})`);
        return this.build(i, this.store(alternative, value));
      }
    }
    throw new AltgenError(AG1001, { declaration: this.name, value: describe(value) });
  }

  /** Build a value of the named alternative. */
  make(key: SelfOf<Ts>, value: Algebraic<Ts>): Algebraic<Ts>;
  make<T, A extends unknown[]>(key: TypeKey<T, string, A> & Ts[number], value: T): Algebraic<Ts>;
  make(key: Alternative, value: unknown): Algebraic<Ts> {
    return this.build(this.resolve(key), this.store(key, value));
  }

  /** Build a value of the named alternative in place from `create` arguments. */
  emplace<T, A extends unknown[]>(
    key: TypeKey<T, string, A> & Ts[number],
    ...args: A
  ): Algebraic<Ts> {
    const target: TypeKey<T, string, A> = key;
    return this.build(this.resolve(key), target.create(...args));
  }

  /**
   * The stored form of a payload for `key`: the payload itself, or a box
   * around a copy of it for the recursive alternative. The box owns its
   * copy; the caller keeps the original.
   *
   * @throws AltgenError AG1001 when a recursive payload is not a value of
   * this declaration
   */
  store(key: Alternative, value: unknown): unknown {
    if (key.kind !== "self") return value;
    if (!this.owns(value)) {
      throw new AltgenError(AG1001, { declaration: this.name, value: describe(value) });
    }
    return new RecursiveBox<Algebraic<Ts>>(value.clone(), this.traits);
  }

  toString(): string {
    return `${this.name}<${this.alternatives.map((alternative) => alternative.name).join(" | ")}>`;
  }

  private resolve(key: Alternative): number {
    const index = indexOf(key, this.alternatives);
    invariant(index !== -1, `${key.name} is not an alternative of ${this.name}`);
    return index;
  }

  private build(tag: number, stored: unknown): Algebraic<Ts> {
    return Algebraic[construct](this, tag, stored);
  }
}

/**
 * Declare a sum type.
 *
 * @param name - Used in diagnostics and `toString`
 * @param alternatives - Type keys, plus `self` for a recursive alternative
 */
export function algebraic<Ts extends Alternatives>(
  name: string,
  alternatives: Ts,
): AlgebraicType<Ts> {
  return new AlgebraicType(name, alternatives);
}

// ============================================================================
// Value
// ============================================================================

/**
 * One value of a declared sum type. Values are only built through their
 * declaration (`from`, `make`, `emplace`).
 */
export class Algebraic<Ts extends Alternatives> {
  readonly declaration: AlgebraicType<Ts>;
  private readonly tag: number;
  private readonly storage: VariantStorage;

  private constructor(declaration: AlgebraicType<Ts>, tag: number, stored: unknown) {
    this.declaration = declaration;
    this.tag = tag;
    this.storage = new VariantStorage(stored);
  }

  /** @internal */
  static [construct]<Ts extends Alternatives>(
    declaration: AlgebraicType<Ts>,
    tag: number,
    stored: unknown,
  ): Algebraic<Ts> {
    return new Algebraic(declaration, tag, stored);
  }

  /** Position of the active alternative. Never changes. */
  typeIndex(): number {
    return this.tag;
  }

  /** Whether `key` names the active alternative. */
  is(key: Ts[number]): boolean {
    return indexOf(key, this.declaration.alternatives) === this.tag;
  }

  /** Whether the payload has been disposed or moved out. */
  isDisposed(): boolean {
    return this.storage.vacant;
  }

  /**
   * The payload, read as alternative `key`. The recursive alternative is
   * returned unboxed.
   *
   * Under the default `unchecked` access policy the tag is not consulted;
   * reading through the wrong key is a contract violation. Under
   * `variant.access = "checked"` a mismatch throws AG1002.
   */
  value(key: SelfOf<Ts>): Algebraic<Ts>;
  value<T, A extends unknown[]>(key: TypeKey<T, string, A> & Ts[number]): T;
  value(key: Alternative): unknown {
    if (variantAccess() === "checked") {
      const requested = indexOf(key, this.declaration.alternatives);
      if (requested !== this.tag) {
        throw new AltgenError(AG1002, {
          declaration: this.declaration.name,
          active: this.alternative().name,
          tag: this.tag,
          requested: key.name,
        });
      }
    }
    return this.payload<unknown>();
  }

  /** Run the handler of the active alternative on its payload. */
  match<R>(cases: Cases<Ts, R>): R {
    const handlers: readonly ((value: never) => R)[] = cases;
    return handlers[this.tag](this.payload<never>());
  }

  /** Deep copy. A recursive payload is copied through its box. */
  clone(): Algebraic<Ts> {
    const alternative = this.alternative();
    const stored =
      alternative.kind === "self"
        ? this.box().clone()
        : alternative.clone(this.storage.value<unknown>());
    return Algebraic[construct](this.declaration, this.tag, stored);
  }

  /**
   * Transfer the payload to a new value with the same tag. A recursive
   * payload's box is left empty here.
   */
  move(): Algebraic<Ts> {
    const stored =
      this.alternative().kind === "self" ? this.box().move() : this.storage.value<unknown>();
    return Algebraic[construct](this.declaration, this.tag, stored);
  }

  /**
   * Destroy the payload through the active alternative's `dispose`. A
   * recursive payload is released with everything it owns. Disposing
   * twice does nothing.
   */
  dispose(): void {
    if (this.storage.vacant) return;
    const alternative = this.alternative();
    if (alternative.kind === "self") {
      this.storage.take<RecursiveBox<Algebraic<Ts>>>().release();
    } else {
      const payload = this.storage.take<unknown>();
      alternative.dispose?.(payload);
    }
  }

  /**
   * Replace the payload of the active alternative: the old payload is
   * destroyed, then the new one is stored. A recursive payload is copied
   * before the old one is destroyed, so a value may be assigned into itself.
   *
   * @throws AltgenError AG1004 when `key` is not the active alternative
   */
  assign(key: SelfOf<Ts>, value: Algebraic<Ts>): this;
  assign<T, A extends unknown[]>(key: TypeKey<T, string, A> & Ts[number], value: T): this;
  assign(key: Alternative, value: unknown): this {
    if (indexOf(key, this.declaration.alternatives) !== this.tag) {
      throw new AltgenError(AG1004, {
        declaration: this.declaration.name,
        requested: key.name,
        active: this.alternative().name,
      });
    }
    const stored = this.declaration.store(key, value);
    if (key.kind === "self" || this.storage.vacant || this.storage.value<unknown>() !== value) {
      this.dispose();
    }
    this.storage.write(stored);
    return this;
  }

  /**
   * Exchange payloads with another value of the same declaration and tag.
   *
   * @throws AltgenError AG1005 otherwise
   */
  swap(other: Algebraic<Ts>): void {
    if (other.declaration !== this.declaration || other.tag !== this.tag) {
      throw new AltgenError(AG1005, { left: this.toString(), right: other.toString() });
    }
    if (this.alternative().kind === "self") {
      this.box().swap(other.box());
      return;
    }
    const mine = this.storage.cell<unknown>();
    const theirs = other.storage.cell<unknown>();
    const held = mine.get();
    mine.set(theirs.get());
    theirs.set(held);
  }

  /** Same declaration, same tag and equal payloads. */
  equals(other: Algebraic<Ts>): boolean {
    if (other.declaration !== this.declaration || other.tag !== this.tag) return false;
    if (this.storage.vacant || other.storage.vacant) {
      return this.storage.vacant && other.storage.vacant;
    }
    const alternative = this.alternative();
    if (alternative.kind === "self") {
      return this.box().value().equals(other.box().value());
    }
    return alternative.equals(this.storage.value<unknown>(), other.storage.value<unknown>());
  }

  toString(): string {
    const alternative = this.alternative();
    return `${this.declaration.name}.${alternative.name}(${this.showPayload(alternative)})`;
  }

  private showPayload(alternative: Alternative): string {
    if (this.storage.vacant) return "<disposed>";
    switch (alternative.kind) {
      case "self": {
        const box = this.box();
        return box.isEmpty() ? "<empty>" : box.value().toString();
      }
      case "type":
        return alternative.show(this.storage.value<unknown>());
      default:
        return unreachable(alternative);
    }
  }

  private alternative(): Alternative {
    return this.declaration.alternatives[this.tag];
  }

  private box(): RecursiveBox<Algebraic<Ts>> {
    return this.storage.value<RecursiveBox<Algebraic<Ts>>>();
  }

  private payload<U>(): U {
    if (this.alternative().kind === "self") {
      return this.storage.value<RecursiveBox<U>>().value();
    }
    return this.storage.value<U>();
  }
}

/** Whether `value` is a value of any declared sum type. */
export function isAlgebraic(value: unknown): value is Algebraic<Alternatives> {
  return value instanceof Algebraic;
}
