/**
 * @subledger/billing - Metadata Merge
 */

import type { Metadata } from "./types.js";

/**
 * Shallow merge-patch: top-level keys of `patch` replace those of `base`.
 * Nested objects are replaced whole, never merged.
 */
export function mergeMetadata(base: Metadata | null | undefined, patch: Metadata): Metadata {
  return { ...(base ?? {}), ...patch };
}
