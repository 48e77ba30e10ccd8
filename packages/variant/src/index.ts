/**
 * @altgen/variant: never-empty tagged unions
 *
 * - `algebraic(name, alternatives)` declares a sum type
 * - `Algebraic` values hold exactly one alternative for their whole life
 * - `self` declares a recursive alternative, stored in a `RecursiveBox`
 * - `VariantStorage` is the type-erased slot behind every value
 */

export {
  algebraic,
  isAlgebraic,
  Algebraic,
  AlgebraicType,
} from "./algebraic.js";

export {
  self,
  type SelfKey,
  type Alternative,
  type Alternatives,
  type AlternativeIndex,
  type AlternativesOf,
  type Cases,
  type IsAlternative,
  type Logical,
  type LogicalUnion,
  type SelfOf,
} from "./types.js";

export { RecursiveBox, type BoxTraits } from "./recursive.js";
export { VariantStorage, type StorageCell } from "./storage.js";
