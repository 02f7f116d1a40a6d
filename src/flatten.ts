// src/flatten.ts — Text Flattener
// Collapses a nested document into one space-joined string for keyword search.

import { MAX_FLATTEN_DEPTH } from "./types.js";
import type { ArchitectureValue } from "./types.js";

/**
 * Concatenate every key and scalar in `value`. Mapping keys come before
 * their values. Anything nested deeper than MAX_FLATTEN_DEPTH contributes
 * nothing.
 */
export function flattenToText(value: ArchitectureValue, depth = 0): string {
  if (depth > MAX_FLATTEN_DEPTH) return "";
  if (typeof value === "string") return value;

  if (Array.isArray(value)) {
    return value.map((item) => flattenToText(item, depth + 1)).join(" ");
  }

  if (value !== null && typeof value === "object") {
    const parts: string[] = [];
    for (const [key, child] of Object.entries(value)) {
      parts.push(key);
      parts.push(flattenToText(child, depth + 1));
    }
    return parts.join(" ");
  }

  return String(value);
}
