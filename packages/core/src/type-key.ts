/**
 * @altgen/core: Type Keys
 *
 * TypeScript erases types, so a tagged union needs a run-time witness for
 * each alternative. A {@link TypeKey} carries the alternative's name, a
 * type guard, and a small vtable of capabilities (create, clone, equals,
 * show, dispose) in the same spirit as an erased value's vtable.
 *
 * Keys are compared by reference. Two keys built with different literal
 * names are also distinct types, so the static index resolver tells them
 * apart even when they describe the same run-time type.
 *
 * @example
 * ```typescript
 * const celsius = typeKey("celsius", (v: unknown): v is number => typeof v === "number");
 * const point = classKey(Point, { clone: (p) => new Point(p.x, p.y) });
 * ```
 */

/**
 * Run-time witness for one alternative of a sum type.
 *
 * @typeParam T - The value type this key stands for.
 * @typeParam Name - Literal name; distinguishes keys over the same `T`.
 * @typeParam Args - Argument list accepted by `create` (in-place construction).
 */
export interface TypeKey<
  T = unknown,
  Name extends string = string,
  Args extends unknown[] = [value: T],
> {
  readonly kind: "type";
  readonly name: Name;
  is(value: unknown): value is T;
  create(...args: Args): T;
  clone(value: T): T;
  equals(a: T, b: T): boolean;
  show(value: T): string;
  dispose?(value: T): void;
}

/** Any key, whatever it witnesses. */
export type AnyTypeKey = TypeKey<unknown, string, unknown[]>;

/** The value type a key witnesses. */
export type KeyType<K> = K extends TypeKey<infer T, string, infer _Args> ? T : never;

/** The argument list a key's `create` takes. */
export type KeyArgs<K> = K extends TypeKey<infer _T, string, infer Args> ? Args : never;

/** Optional capabilities supplied when building a key. */
export interface KeyCapabilities<T, Args extends unknown[] = [value: T]> {
  create?: (...args: Args) => T;
  clone?: (value: T) => T;
  equals?: (a: T, b: T) => boolean;
  show?: (value: T) => string;
  dispose?: (value: T) => void;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Build a key from a name and a type guard.
 *
 * Unless overridden, `create` and `clone` are the identity, `equals` is
 * `Object.is` and `show` is `String`.
 */
export function typeKey<T, Name extends string>(
  name: Name,
  is: (value: unknown) => value is T,
  capabilities: KeyCapabilities<T> = {},
): TypeKey<T, Name> {
  return {
    kind: "type",
    name,
    is,
    create: capabilities.create ?? ((value: T) => value),
    clone: capabilities.clone ?? ((value: T) => value),
    equals: capabilities.equals ?? Object.is,
    show: capabilities.show ?? String,
    dispose: capabilities.dispose,
  };
}

/**
 * Build a key for instances of a class. `create` forwards to the
 * constructor; the guard is `instanceof`.
 */
export function classKey<I extends object, A extends unknown[]>(
  ctor: new (...args: A) => I,
  capabilities: Omit<KeyCapabilities<I, A>, "create"> = {},
): TypeKey<I, string, A> {
  return {
    kind: "type",
    name: ctor.name,
    is: (value: unknown): value is I => value instanceof ctor,
    create: (...args: A) => new ctor(...args),
    clone: capabilities.clone ?? ((value: I) => value),
    equals: capabilities.equals ?? Object.is,
    show: capabilities.show ?? String,
    dispose: capabilities.dispose,
  };
}

/**
 * Build a key whose guard accepts every value.
 *
 * Useful where a sum type wraps values of a caller-chosen `T` and is only
 * ever built through an explicit key. Because the guard never rejects,
 * guard-based resolution stops at the first opaque key it meets.
 */
export function opaqueKey<T, Name extends string>(
  name: Name,
  capabilities: KeyCapabilities<T> = {},
): TypeKey<T, Name> {
  return typeKey(name, (_value: unknown): _value is T => true, capabilities);
}

/** Whether a value is a {@link TypeKey}. */
export function isTypeKey(value: unknown): value is AnyTypeKey {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "type" &&
    "is" in value &&
    typeof value.is === "function"
  );
}

// ============================================================================
// Built-in Keys
// ============================================================================

/** Keys for the primitive types and `Date`. */
export const Types = {
  number: typeKey("number", (v: unknown): v is number => typeof v === "number"),
  string: typeKey("string", (v: unknown): v is string => typeof v === "string", {
    show: (s) => JSON.stringify(s),
  }),
  boolean: typeKey("boolean", (v: unknown): v is boolean => typeof v === "boolean"),
  bigint: typeKey("bigint", (v: unknown): v is bigint => typeof v === "bigint", {
    show: (n) => `${n}n`,
  }),
  symbol: typeKey("symbol", (v: unknown): v is symbol => typeof v === "symbol"),
  null: typeKey("null", (v: unknown): v is null => v === null),
  undefined: typeKey("undefined", (v: unknown): v is undefined => v === undefined),
  date: typeKey("date", (v: unknown): v is Date => v instanceof Date, {
    clone: (d) => new Date(d.getTime()),
    equals: (a, b) => a.getTime() === b.getTime(),
    show: (d) => d.toISOString(),
  }),
} as const;
