/**
 * Object record persistence
 *
 * Invariants:
 * - `save` is a full overwrite: properties dropped from the instance disappear from the record
 * - Declared properties missing from the instance are written with their default (or null)
 * - Transient ("_"-prefixed) properties are never written
 * - Records are compact JSON with alphabetically sorted keys
 */

import { z } from "zod";
import { recordKey } from "./keys.js";
import { stableStringify } from "./format.js";
import { CorruptRecordError } from "./errors.js";
import { isTransientProperty, validatePropertyName, validatePropertyValue } from "./validation.js";
import type { ModelDefinition, ModelId, Properties, PropertyValue, StoreHandle } from "./types.js";

const PropertyValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const RecordSchema = z.record(z.string(), PropertyValueSchema);

/**
 * Merge declared defaults into a property mapping and drop transient properties
 * @throws ValidationError for invalid names or values
 */
export function materialize(model: ModelDefinition, properties: Properties): Properties {
  const out: Properties = {};

  for (const declared of model.properties.values()) {
    out[declared.name] = declared.default;
  }

  for (const [name, value] of Object.entries(properties)) {
    if (isTransientProperty(name)) continue;
    validatePropertyName(model.name, name);
    out[name] = validatePropertyValue(model.name, name, value);
  }

  return out;
}

/**
 * Own value of a property, or null; inherited members such as `toString` never count
 */
export function readProperty(properties: Properties, name: string): PropertyValue {
  return Object.hasOwn(properties, name) ? (properties[name] ?? null) : null;
}

/**
 * Decode a stored record
 * @throws CorruptRecordError if the payload is not a JSON object of primitive values
 */
export function decodeRecord(key: string, raw: string): Properties {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CorruptRecordError(key, "invalid JSON", { cause: err });
  }

  const result = RecordSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CorruptRecordError(key, `${issue?.message ?? "invalid record"}${where}`);
  }
  return result.data;
}

export class PropertyStore {
  #store: StoreHandle;
  #model: ModelDefinition;

  constructor(store: StoreHandle, model: ModelDefinition) {
    this.#store = store;
    this.#model = model;
  }

  /**
   * Overwrite the record for `id`
   * @returns The mapping as written (defaults merged)
   */
  async save(id: ModelId, properties: Properties): Promise<Properties> {
    const record = materialize(this.#model, properties);
    await this.#store.set(recordKey(this.#model.storageName, id), stableStringify(record));
    return record;
  }

  /**
   * Load the record for `id`, or null when none exists
   */
  async load(id: ModelId): Promise<Properties | null> {
    const key = recordKey(this.#model.storageName, id);
    const raw = await this.#store.get(key);
    if (raw === null) return null;
    return decodeRecord(key, raw);
  }

  /**
   * Delete the record for `id` (idempotent)
   * @returns true when a record was removed
   */
  async remove(id: ModelId): Promise<boolean> {
    return this.#store.del(recordKey(this.#model.storageName, id));
  }
}
