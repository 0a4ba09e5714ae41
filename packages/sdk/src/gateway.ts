/**
 * Persistence engine: create, update, fetch and delete for one model
 *
 * Every operation resolves a store handle once, then runs a short, fixed
 * sequence of single-key primitives:
 *
 *   create  incr → reserve* → set
 *   update  get → reserve* → set → release*
 *   delete  get → del → release*
 *   find    get(index) → get(record)
 *
 * Reserving new unique values before releasing old ones means an object is
 * never without a claim on its current values. A crash between the record
 * write and a release leaves a stale entry that still names this id; it is
 * harmless because releases compare the owner and fetches verify the record.
 */

import { IdAllocator } from "./id-allocator.js";
import { PropertyStore, materialize, readProperty } from "./property-store.js";
import { UniqueIndex } from "./unique-index.js";
import {
  ModelStoreError,
  NotFoundError,
  StoreUnavailableError,
  UniqueConstraintViolation,
  ValidationError,
} from "./errors.js";
import { validateModelId, validatePropertyValue } from "./validation.js";
import { logger } from "./observability/logs.js";
import { metrics, type OperationName } from "./observability/metrics.js";
import type { HandleResolver } from "./connection.js";
import type {
  DeclaredProperty,
  DeleteResult,
  ModelDefinition,
  ModelId,
  Properties,
  PropertyValue,
  PutResult,
  StoreHandle,
  StoredObject,
} from "./types.js";

/**
 * Route every primitive failure to StoreUnavailableError
 */
function guardHandle(handle: StoreHandle, operation: string): StoreHandle {
  const call = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ModelStoreError) throw err;
      throw new StoreUnavailableError(operation, { cause: err });
    }
  };

  return {
    incr: (key) => call(() => handle.incr(key)),
    get: (key) => call(() => handle.get(key)),
    set: (key, value) => call(() => handle.set(key, value)),
    del: (key) => call(() => handle.del(key)),
    setIfAbsent: (key, value) => call(() => handle.setIfAbsent(key, value)),
    deleteIfEquals: (key, expected) => call(() => handle.deleteIfEquals(key, expected)),
  };
}

export class ModelGateway {
  #model: ModelDefinition;
  #resolver: HandleResolver;
  #unique: DeclaredProperty[];

  constructor(model: ModelDefinition, resolver: HandleResolver) {
    this.#model = model;
    this.#resolver = resolver;
    this.#unique = [...model.properties.values()].filter((p) => p.unique);
  }

  get model(): ModelDefinition {
    return this.#model;
  }

  /**
   * Persist a new object: allocate an id, claim unique values, write the record
   */
  async create(properties: Properties): Promise<PutResult> {
    return this.#timed("create", async (): Promise<PutResult> => {
      const record = materialize(this.#model, properties);
      const store = await this.#acquire("create");

      const id = await new IdAllocator(store).next(this.#model.storageName);
      this.#trace("create.allocate", id);

      const index = new UniqueIndex(store, this.#model);
      const reserved: Array<[string, PropertyValue]> = [];
      for (const property of this.#unique) {
        const value = readProperty(record, property.name);
        if (value === null) continue;

        const claim = await index.reserve(property.name, value, id);
        if (!claim.ok) {
          await this.#releaseAll(index, reserved, id);
          return this.#conflict(property.name, value, claim.holderId, id);
        }
        reserved.push([property.name, value]);
      }

      await new PropertyStore(store, this.#model).save(id, record);
      metrics.recordCreate(this.#model.name);
      this.#trace("create.saved", id, { unique: reserved.map(([name]) => name) });

      return { ok: true, id, created: true };
    });
  }

  /**
   * Overwrite an existing object and move the claims of changed unique values
   */
  async update(id: ModelId, properties: Properties): Promise<PutResult> {
    validateModelId(this.#model.name, id);

    return this.#timed("update", async (): Promise<PutResult> => {
      const record = materialize(this.#model, properties);
      const store = await this.#acquire("update");
      const records = new PropertyStore(store, this.#model);

      const previous = await records.load(id);
      if (previous === null) {
        this.#anomaly("update.missing-record", id, "no stored record for an allocated id; claiming all unique values");
      }

      const changed: Array<{ name: string; from: PropertyValue; to: PropertyValue }> = [];
      for (const property of this.#unique) {
        const from = previous === null ? null : readProperty(previous, property.name);
        const to = readProperty(record, property.name);
        if (from !== to) {
          changed.push({ name: property.name, from, to });
        }
      }

      const index = new UniqueIndex(store, this.#model);
      const reserved: Array<[string, PropertyValue]> = [];
      for (const change of changed) {
        if (change.to === null) continue;

        const claim = await index.reserve(change.name, change.to, id);
        if (!claim.ok) {
          await this.#releaseAll(index, reserved, id);
          return this.#conflict(change.name, change.to, claim.holderId, id);
        }
        reserved.push([change.name, change.to]);
      }

      await records.save(id, record);
      this.#trace("update.saved", id, { changed: changed.map((c) => c.name) });

      await this.#releaseAll(
        index,
        changed.map((c): [string, PropertyValue] => [c.name, c.from]),
        id
      );
      metrics.recordUpdate(this.#model.name);

      return { ok: true, id, created: false };
    });
  }

  /**
   * Load an object by id
   */
  async fetchById(id: ModelId): Promise<StoredObject | null> {
    validateModelId(this.#model.name, id);

    return this.#timed("get", async (): Promise<StoredObject | null> => {
      const store = await this.#acquire("get");
      const properties = await new PropertyStore(store, this.#model).load(id);
      metrics.recordLookup(this.#model.name, properties !== null);
      return properties === null ? null : { id, properties };
    });
  }

  /**
   * Resolve the current holder of a unique value without loading the record
   */
  async lookupId(property: string, value: PropertyValue): Promise<ModelId | null> {
    this.#requireUnique(property, value);
    const store = await this.#acquire("lookup");
    return new UniqueIndex(store, this.#model).lookup(property, value);
  }

  /**
   * Load the object currently holding a unique value
   */
  async fetchByUnique(property: string, value: PropertyValue): Promise<StoredObject | null> {
    this.#requireUnique(property, value);

    return this.#timed("find", async (): Promise<StoredObject | null> => {
      const store = await this.#acquire("find");
      const id = await new UniqueIndex(store, this.#model).lookup(property, value);
      if (id === null) {
        metrics.recordLookup(this.#model.name, false);
        return null;
      }

      const properties = await new PropertyStore(store, this.#model).load(id);
      if (properties === null) {
        this.#anomaly("find.dangling-entry", id, `index entry for ${property} has no record`);
        metrics.recordLookup(this.#model.name, false);
        return null;
      }
      if (readProperty(properties, property) !== value) {
        this.#anomaly("find.stale-entry", id, `index entry for ${property} no longer matches the record`);
        metrics.recordLookup(this.#model.name, false);
        return null;
      }

      metrics.recordLookup(this.#model.name, true);
      return { id, properties };
    });
  }

  /**
   * Remove an object and every unique claim it holds. The id is never reused.
   */
  async delete(id: ModelId): Promise<DeleteResult> {
    validateModelId(this.#model.name, id);

    return this.#timed("delete", async (): Promise<DeleteResult> => {
      const store = await this.#acquire("delete");
      const records = new PropertyStore(store, this.#model);

      const previous = await records.load(id);
      if (previous === null) {
        return { ok: false, error: new NotFoundError(this.#model.name, `id ${id}`) };
      }

      await records.remove(id);

      const index = new UniqueIndex(store, this.#model);
      const released: string[] = [];
      for (const property of this.#unique) {
        if (await index.release(property.name, readProperty(previous, property.name), id)) {
          released.push(property.name);
        }
      }

      metrics.recordDelete(this.#model.name);
      this.#trace("delete.removed", id, { released });
      return { ok: true, id, released };
    });
  }

  async #acquire(operation: string): Promise<StoreHandle> {
    const label = `${this.#model.name}.${operation}`;
    let handle: StoreHandle;
    try {
      handle = await this.#resolver.resolve(this.#model);
    } catch (err) {
      if (err instanceof ModelStoreError) throw err;
      throw new StoreUnavailableError(label, { cause: err });
    }
    return guardHandle(handle, label);
  }

  async #releaseAll(
    index: UniqueIndex,
    claims: Array<[string, PropertyValue]>,
    id: ModelId
  ): Promise<void> {
    for (const [name, value] of claims) {
      await index.release(name, value, id);
    }
  }

  #requireUnique(property: string, value: PropertyValue): void {
    if (!this.#unique.some((p) => p.name === property)) {
      throw new ValidationError(`Not a unique property: ${this.#model.name}.${property}`);
    }
    validatePropertyValue(this.#model.name, property, value);
  }

  #conflict(
    property: string,
    value: PropertyValue,
    holderId: ModelId | null,
    id: ModelId
  ): PutResult {
    metrics.recordConflict(this.#model.name);
    this.#trace("put.conflict", id, { property, holderId });
    return {
      ok: false,
      error: new UniqueConstraintViolation(this.#model.name, property, value, holderId),
    };
  }

  #anomaly(event: string, id: ModelId, message: string): void {
    metrics.recordAnomaly(this.#model.name);
    logger.warn("consistency.anomaly", {
      model: this.#model.name,
      id,
      message,
      details: { kind: event },
    });
  }

  #trace(event: string, id: ModelId, details?: Record<string, unknown>): void {
    const entry = { model: this.#model.name, id, details };
    if (this.#model.debug) {
      logger.info(event, entry);
    } else {
      logger.debug(event, entry);
    }
  }

  async #timed<T>(operation: OperationName, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      metrics.recordDuration(this.#model.name, operation, performance.now() - start);
    }
  }
}
