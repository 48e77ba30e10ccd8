/**
 * Generators of variant values.
 */

import type { Algebraic, AlgebraicType, Alternatives, LogicalUnion } from "@altgen/variant";
import { GeneratorHandle, type Producer } from "./generator.js";

/** A generator whose values are variants of one declaration. */
export type AlgebraicGenerator<Ts extends Alternatives> = GeneratorHandle<Algebraic<Ts>>;

/**
 * Wrap a producer of raw payloads; each payload is stored under the first
 * alternative of `declaration` that accepts it.
 */
export function algebraicGenerator<Ts extends Alternatives>(
  declaration: AlgebraicType<Ts>,
  producer: Producer<LogicalUnion<Ts>>,
): AlgebraicGenerator<Ts> {
  return new GeneratorHandle(() => declaration.from(producer()));
}
