/**
 * Validation utilities for model and property names and values
 */

import { ValidationError } from "./errors.js";
import type { PropertyValue } from "./types.js";

/**
 * Model, storage and declared property names: start with a letter, then letters, digits, underscore
 */
export const MODEL_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Property names: start with a letter or underscore, then letters, digits, underscore
 */
const PROPERTY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check a property name without throwing
 */
export function isValidPropertyName(value: unknown): value is string {
  return typeof value === "string" && PROPERTY_NAME_PATTERN.test(value);
}

/**
 * Transient properties live on the instance only and are never persisted
 */
export function isTransientProperty(name: string): boolean {
  return name.startsWith("_");
}

/**
 * Validate a property name
 * @throws ValidationError if invalid
 */
export function validatePropertyName(model: string, name: string): void {
  if (!isValidPropertyName(name)) {
    throw new ValidationError(
      `Invalid property name: ${model}.${name}. ` +
        `Must start with a letter or underscore and contain only letters, digits, and underscore.`
    );
  }
}

/**
 * Narrow an unknown value to a storable property value
 */
export function isPropertyValue(value: unknown): value is PropertyValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    default:
      return false;
  }
}

/**
 * Validate a property value
 * @throws ValidationError for undefined, non-finite numbers, objects, arrays, and functions
 */
export function validatePropertyValue(model: string, name: string, value: unknown): PropertyValue {
  if (!isPropertyValue(value)) {
    const kind = Array.isArray(value) ? "array" : typeof value === "number" ? String(value) : typeof value;
    throw new ValidationError(
      `Unsupported value for ${model}.${name}: ${kind}. ` +
        `Property values must be strings, finite numbers, booleans, or null.`
    );
  }
  return value;
}

/**
 * Validate an object id
 * @throws ValidationError unless a positive safe integer
 */
export function validateModelId(model: string, id: number): void {
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid ${model} id: ${id}. Ids are positive integers.`);
  }
}
