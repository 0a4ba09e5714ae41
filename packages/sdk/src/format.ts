/**
 * Deterministic JSON formatting for stored records
 */

import type { Properties, PropertyValue } from "./types.js";

/**
 * Compact JSON of a property mapping with keys in code point order
 */
export function stableStringify(properties: Properties): string {
  const out: Properties = {};
  for (const key of Object.keys(properties).sort()) {
    const value = properties[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return JSON.stringify(out);
}

/**
 * Encode a single value for use inside a store key.
 * Distinct values (including `1` and `"1"`) never share an encoding.
 */
export function encodeKeyValue(value: PropertyValue): string {
  return JSON.stringify(value);
}

