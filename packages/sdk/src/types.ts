/**
 * Core types for modelkv
 */

import type { RedisOptions } from "ioredis";
import type { UniqueConstraintViolation, NotFoundError } from "./errors.js";

/**
 * Primitive value a property may hold
 */
export type PropertyValue = string | number | boolean | null;

/**
 * Open-ended property mapping of an object (declared and dynamic properties alike)
 */
export type Properties = Record<string, PropertyValue>;

/**
 * Object id allocated by the store, positive and never reused within a model
 */
export type ModelId = number;

/**
 * Declared property metadata
 */
export interface PropertyDescriptor {
  /** At most one object per model may hold a given non-null value */
  unique?: boolean;
  /** Value written when the instance does not carry the property (default: null) */
  default?: PropertyValue;
}

/**
 * Store handle: the single-key atomic primitives the engine is built on.
 *
 * Every primitive either completes or rejects; the engine never retries.
 */
export interface StoreHandle {
  /** Atomically increment the integer at `key` and return the new value (first call returns 1) */
  incr(key: string): Promise<number>;
  /** Read a value, or null when absent */
  get(key: string): Promise<string | null>;
  /** Overwrite a value */
  set(key: string, value: string): Promise<void>;
  /** Delete a key; resolves true when something was removed */
  del(key: string): Promise<boolean>;
  /** Write only when the key is absent; resolves true when the write happened */
  setIfAbsent(key: string, value: string): Promise<boolean>;
  /** Delete only when the current value equals `expected`; resolves true when removed */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  /** Release connections or file handles held by the handle */
  close?(): Promise<void>;
}

/**
 * Factory invoked once per engine operation
 */
export type HandleFactory = (model: ModelDefinition) => StoreHandle | Promise<StoreHandle>;

/**
 * Where a model's store handle comes from
 */
export type ConnectionSource =
  | { redis: string | RedisOptions }
  | { root: string; lockTimeoutMs?: number }
  | StoreHandle
  | HandleFactory;

/**
 * Configuration accepted by `defineModel`
 */
export interface ModelConfig {
  /** Declared model name (letters, digits, underscore; starts with a letter) */
  name: string;
  /** Declared properties */
  properties?: Record<string, PropertyDescriptor>;
  /** Store handle source (default: Redis at MODELKV_REDIS_URL) */
  connection?: ConnectionSource;
  /** Name used in store keys (default: `name`) */
  storageName?: string;
  /** Log every operation step at info level */
  debug?: boolean;
}

/**
 * Resolved property descriptor
 */
export interface DeclaredProperty {
  name: string;
  unique: boolean;
  default: PropertyValue;
}

/**
 * Immutable, validated model definition read by the engine
 */
export interface ModelDefinition {
  readonly name: string;
  readonly storageName: string;
  readonly properties: ReadonlyMap<string, DeclaredProperty>;
  readonly debug: boolean;
}

/**
 * Result of a `put`
 */
export type PutResult =
  | { ok: true; id: ModelId; created: boolean }
  | { ok: false; error: UniqueConstraintViolation };

/**
 * Result of a delete
 */
export type DeleteResult =
  | { ok: true; id: ModelId; released: string[] }
  | { ok: false; error: NotFoundError };

/**
 * Stored object as returned by the engine
 */
export interface StoredObject {
  id: ModelId;
  properties: Properties;
}
