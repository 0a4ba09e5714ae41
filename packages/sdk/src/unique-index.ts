/**
 * Unique value index: (model, property, value) → owning object id
 *
 * Invariants:
 * - Claims are made with a single atomic set-if-absent, never read-then-write
 * - Releases are compare-and-delete on the owner id, so a stale release never
 *   erases a newer claim made by a different object
 * - Null values are never indexed
 */

import { uniqueKey } from "./keys.js";
import { CorruptRecordError } from "./errors.js";
import type { ModelDefinition, ModelId, PropertyValue, StoreHandle } from "./types.js";

/**
 * Outcome of a reservation
 */
export type ReserveResult = { ok: true } | { ok: false; holderId: ModelId | null };

function decodeOwner(key: string, raw: string): ModelId {
  const id = Number(raw);
  if (!/^[1-9][0-9]*$/.test(raw) || !Number.isSafeInteger(id)) {
    throw new CorruptRecordError(key, `index entry holds ${JSON.stringify(raw)}`);
  }
  return id;
}

export class UniqueIndex {
  #store: StoreHandle;
  #model: ModelDefinition;

  constructor(store: StoreHandle, model: ModelDefinition) {
    this.#store = store;
    this.#model = model;
  }

  /**
   * Store key of an entry
   */
  keyFor(property: string, value: PropertyValue): string {
    return uniqueKey(this.#model.storageName, property, value);
  }

  /**
   * Resolve the current holder of a value
   */
  async lookup(property: string, value: PropertyValue): Promise<ModelId | null> {
    if (value === null) return null;
    const key = this.keyFor(property, value);
    const raw = await this.#store.get(key);
    return raw === null ? null : decodeOwner(key, raw);
  }

  /**
   * Claim a value for `id`. Already holding it counts as success.
   *
   * When the claim fails but the holder is gone by the time it is read
   * (released concurrently), the claim is attempted exactly once more.
   */
  async reserve(property: string, value: PropertyValue, id: ModelId): Promise<ReserveResult> {
    if (value === null) return { ok: true };
    const key = this.keyFor(property, value);
    const owner = String(id);

    for (let attempt = 0; attempt < 2; attempt++) {
      if (await this.#store.setIfAbsent(key, owner)) {
        return { ok: true };
      }
      const raw = await this.#store.get(key);
      if (raw === null) continue;
      const holderId = decodeOwner(key, raw);
      return holderId === id ? { ok: true } : { ok: false, holderId };
    }

    return { ok: false, holderId: null };
  }

  /**
   * Drop the claim on a value if `id` still holds it (idempotent)
   * @returns true when an entry was removed
   */
  async release(property: string, value: PropertyValue, id: ModelId): Promise<boolean> {
    if (value === null) return false;
    return this.#store.deleteIfEquals(this.keyFor(property, value), String(id));
  }
}
