/**
 * Store key layout
 *
 *   {model}:mid                 last allocated id
 *   {model}:{id}                JSON property record
 *   {model}:{property}:{value}  owning id of a unique value (value is JSON-encoded)
 *
 * Model and property names never contain ":" (see validation.ts), so the
 * three shapes cannot collide with each other or across models.
 */

import { encodeKeyValue } from "./format.js";
import type { ModelId, PropertyValue } from "./types.js";

const COUNTER_SUFFIX = "mid";

export function counterKey(model: string): string {
  return `${model}:${COUNTER_SUFFIX}`;
}

export function recordKey(model: string, id: ModelId): string {
  return `${model}:${id}`;
}

export function uniqueKey(model: string, property: string, value: PropertyValue): string {
  return `${model}:${property}:${encodeKeyValue(value)}`;
}
