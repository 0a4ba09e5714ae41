/**
 * Zod schemas for model declarations
 * Validated once at `defineModel`; the resulting definition is frozen
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { isStoreHandle } from "./connection.js";
import { MODEL_NAME_PATTERN } from "./validation.js";
import type { DeclaredProperty, HandleFactory, ModelConfig, ModelDefinition, StoreHandle } from "./types.js";

const ModelNameSchema = z
  .string()
  .regex(MODEL_NAME_PATTERN, "must start with a letter and contain only letters, digits, and underscore");

const PropertyValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const PropertyDescriptorSchema = z
  .object({
    unique: z.boolean().optional(),
    default: PropertyValueSchema.optional(),
  })
  .strict();

const ConnectionSchema = z.union([
  z.custom<HandleFactory>((value) => typeof value === "function", "expected a handle factory"),
  z.custom<StoreHandle>((value) => isStoreHandle(value), "expected a store handle"),
  z
    .object({
      redis: z.union([z.string().min(1), z.record(z.string(), z.unknown())]),
    })
    .strict(),
  z
    .object({
      root: z.string().min(1),
      lockTimeoutMs: z.number().int().positive().optional(),
    })
    .strict(),
]);

export const ModelConfigSchema = z
  .object({
    name: ModelNameSchema,
    properties: z
      .record(
        z.string().regex(MODEL_NAME_PATTERN, "property names must start with a letter"),
        PropertyDescriptorSchema
      )
      .optional(),
    connection: ConnectionSchema.optional(),
    storageName: ModelNameSchema.optional(),
    debug: z.boolean().optional(),
  })
  .strict();

/**
 * Validate a declaration and build the immutable definition the engine reads
 * @throws ConfigurationError listing every issue
 */
export function buildDefinition(config: ModelConfig): ModelDefinition {
  const result = ModelConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    const name = typeof config.name === "string" ? ` "${config.name}"` : "";
    throw new ConfigurationError(`Invalid model declaration${name}`, issues);
  }

  const properties = new Map<string, DeclaredProperty>();
  for (const [name, descriptor] of Object.entries(config.properties ?? {})) {
    properties.set(
      name,
      Object.freeze({
        name,
        unique: descriptor.unique ?? false,
        default: descriptor.default ?? null,
      })
    );
  }

  return Object.freeze({
    name: config.name,
    storageName: config.storageName ?? config.name,
    properties,
    debug: config.debug ?? false,
  });
}
