/**
 * Core module exports for @altgen/core
 *
 * This package provides:
 * - Type-index resolution (compile-time and runtime halves)
 * - Type keys: run-time witnesses for the alternatives of a sum type
 * - Configuration, diagnostics and debug logging shared by every package
 * - Runtime safety primitives (invariant, unreachable)
 */

// Type Index Resolution
export {
  indexOf,
  isMember,
  resolveIndex,
  type Equals,
  type IndexOf,
  type IsMember,
  type Indices,
  type Count,
  type TypeNotFound,
} from "./type-index.js";

// Type Keys
export {
  typeKey,
  classKey,
  opaqueKey,
  isTypeKey,
  Types,
  type TypeKey,
  type AnyTypeKey,
  type KeyType,
  type KeyArgs,
  type KeyCapabilities,
} from "./type-key.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";

// Configuration System
export {
  config,
  defineConfig,
  variantAccess,
  type AltgenConfig,
  type VariantConfig,
} from "./config.js";

// Debug Logging
export { debugLog, isDebugEnabled, setLogWriter, type LogWriter } from "./logging.js";

// Diagnostics System
export * from "./diagnostics.js";
