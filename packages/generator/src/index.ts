/**
 * @altgen/generator: composable generators of infinite streams
 *
 * Primitive generators (`pure`, `count`, `prod`, `bot`, `generator`) and
 * the combinators `bind`, `braid`/`tie`, `seq` and `bound`. Finite and
 * concatenated streams are represented with `@altgen/variant` values.
 */

export {
  GeneratorHandle,
  TupleGenerator,
  generator,
  pure,
  count,
  prod,
  bot,
  type Producer,
} from "./generator.js";

export {
  braid,
  tie,
  bind,
  seq,
  bound,
  isExhausted,
  type Generators,
  type PlainGenerator,
  type Sequenced,
  type SequencedAlternatives,
  type Bounded,
  type BoundedAlternatives,
} from "./combinators.js";

export { algebraicGenerator, type AlgebraicGenerator } from "./algebraic-generator.js";

export { sentinel, isSentinel, SentinelKey, type Sentinel } from "./sentinel.js";
