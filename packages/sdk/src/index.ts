/**
 * modelkv SDK
 *
 * Schema-light object mapping onto key-value stores, with unique properties
 * enforced through single-key atomic primitives
 */

// Re-export types
export type {
  PropertyValue,
  Properties,
  ModelId,
  PropertyDescriptor,
  StoreHandle,
  HandleFactory,
  ConnectionSource,
  ModelConfig,
  DeclaredProperty,
  ModelDefinition,
  PutResult,
  DeleteResult,
  StoredObject,
} from "./types.js";

// Model API
export { defineModel, Model, ModelInstance } from "./model.js";

// Engine components
export { ModelGateway } from "./gateway.js";
export { IdAllocator } from "./id-allocator.js";
export { PropertyStore, materialize, decodeRecord, readProperty } from "./property-store.js";
export { UniqueIndex, type ReserveResult } from "./unique-index.js";
export { counterKey, recordKey, uniqueKey } from "./keys.js";
export { createResolver, isStoreHandle, type HandleResolver } from "./connection.js";
export { buildDefinition, ModelConfigSchema, PropertyDescriptorSchema } from "./config.js";

// Store adapters
export { MemoryStore } from "./adapters/memory.js";
export { RedisStore, DEFAULT_REDIS_URL } from "./adapters/redis.js";
export { FileStore, type FileStoreOptions } from "./adapters/file.js";

// Utilities
export { stableStringify, encodeKeyValue } from "./format.js";
export {
  MODEL_NAME_PATTERN,
  isValidPropertyName,
  isPropertyValue,
  validatePropertyName,
  validatePropertyValue,
} from "./validation.js";

// Observability
export { logger, formatEntry, type LogLevel, type LogEntry, type LogFields } from "./observability/logs.js";
export { metrics, type ModelMetrics, type OperationName } from "./observability/metrics.js";

// Re-export errors
export {
  ModelStoreError,
  NotFoundError,
  UniqueConstraintViolation,
  StoreUnavailableError,
  CorruptRecordError,
  ValidationError,
  ModelStateError,
  ConfigurationError,
} from "./errors.js";
