/**
 * Error types for modelkv operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - NotFoundError and UniqueConstraintViolation are returned inside results, never thrown by the gateway
 */

import type { ModelId, PropertyValue } from "./types.js";

/**
 * Base class for all modelkv errors
 */
export abstract class ModelStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * An id or unique value has no current mapping
 */
export class NotFoundError extends ModelStoreError {
  readonly code = "ENOTFOUND";

  constructor(
    public readonly model: string,
    public readonly target: string,
    options?: ErrorOptions
  ) {
    super(`Not found: ${model} ${target}`, options);
  }
}

/**
 * A unique value is already claimed by a different object
 */
export class UniqueConstraintViolation extends ModelStoreError {
  readonly code = "E_UNIQUE";

  constructor(
    public readonly model: string,
    public readonly property: string,
    public readonly value: PropertyValue,
    public readonly holderId: ModelId | null,
    options?: ErrorOptions
  ) {
    super(
      `Unique property violation: ${model}.${property} = ${JSON.stringify(value)}` +
        (holderId === null ? "" : ` is held by id ${holderId}`),
      options
    );
  }
}

/**
 * A store primitive or the handle resolver failed
 */
export class StoreUnavailableError extends ModelStoreError {
  readonly code = "E_STORE";

  constructor(
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`Store unavailable during ${operation}`, options);
  }
}

/**
 * A stored record or index entry cannot be decoded
 */
export class CorruptRecordError extends ModelStoreError {
  readonly code = "E_CORRUPT";

  constructor(
    public readonly key: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt value at ${key}: ${reason}`, options);
  }
}

/**
 * Invalid name, property value or lookup target
 */
export class ValidationError extends ModelStoreError {
  readonly code = "E_VALIDATION";
}

/**
 * Operation not allowed in the instance's current state
 */
export class ModelStateError extends ModelStoreError {
  readonly code = "E_STATE";
}

/**
 * Invalid model configuration
 */
export class ConfigurationError extends ModelStoreError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}
