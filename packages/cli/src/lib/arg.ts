/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isPropertyValue, type ModelId, type Properties, type PropertyValue } from "@modelkv/sdk";

/**
 * Parse an object id argument
 */
export function parseModelId(value: string, name = "id"): ModelId {
  const trimmed = value.trim();

  if (!/^[1-9]\d*$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Narrow a parsed payload to a flat property mapping
 */
export function parseProperties(payload: unknown, source: string): Properties {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    throw new InvalidArgumentError(`Payload in ${source} must be a JSON object`);
  }

  const properties: Properties = {};
  for (const [name, value] of Object.entries(payload)) {
    if (!isPropertyValue(value)) {
      throw new InvalidArgumentError(
        `Property "${name}" in ${source} must be a string, number, boolean, or null`
      );
    }
    properties[name] = value;
  }
  return properties;
}

/**
 * Lookup values are plain strings unless --json-value asks for JSON
 */
export function parseLookupValue(raw: string, asJson: boolean): PropertyValue {
  if (!asJson) {
    return raw;
  }

  const value = parseJson(raw, "<value>");
  if (!isPropertyValue(value)) {
    throw new InvalidArgumentError("<value> must be a JSON string, number, boolean, or null");
  }
  return value;
}
