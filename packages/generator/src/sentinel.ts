/**
 * The "sequence exhausted" marker.
 *
 * Stateless: there is exactly one sentinel, and a bounded generator
 * reports exhaustion by storing it under its sentinel alternative. Code
 * tells sentinels apart from values through the variant tag, never by
 * inspecting the payload.
 */

import { typeKey } from "@altgen/core";

export interface Sentinel {
  readonly kind: "sentinel";
}

/** The one sentinel value. */
export const sentinel: Sentinel = Object.freeze({ kind: "sentinel" });

export function isSentinel(value: unknown): value is Sentinel {
  return value === sentinel;
}

/** Alternative key for the sentinel. */
export const SentinelKey = typeKey("sentinel", isSentinel, {
  show: () => "⊥",
});
