/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: runtime assertion
 * - `unreachable(value?)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * function area(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return Math.PI;
 *     case "square": return 1;
 *     default: unreachable(shape); // Type error if Shape is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 * At runtime, throws if somehow reached.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}
