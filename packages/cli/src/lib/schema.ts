/**
 * Model declarations file for the CLI
 *
 * {
 *   "User": {
 *     "storageName": "users",
 *     "properties": { "username": { "unique": true }, "role": { "default": "member" } }
 *   }
 * }
 */

import { z } from "zod";
import { ConfigurationError, PropertyDescriptorSchema, type ModelConfig } from "@modelkv/sdk";
import { readJsonFromFile } from "./io.js";

const ModelEntrySchema = z
  .object({
    storageName: z.string().optional(),
    properties: z.record(z.string(), PropertyDescriptorSchema).optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export const SchemaFileSchema = z.record(z.string(), ModelEntrySchema);

/**
 * Declarations by model name, without connections
 */
export type ModelDeclarations = Map<string, Omit<ModelConfig, "connection">>;

/**
 * Validate the parsed content of a declarations file
 * @throws ConfigurationError listing every issue
 */
export function parseSchema(content: unknown, source: string): ModelDeclarations {
  const result = SchemaFileSchema.safeParse(content);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid schema file ${source}`, issues);
  }

  const declarations: ModelDeclarations = new Map();
  for (const [name, entry] of Object.entries(result.data)) {
    declarations.set(name, { name, ...entry });
  }
  return declarations;
}

/**
 * Load declarations from a file; no file means no declared properties
 */
export async function loadSchema(filePath: string | undefined): Promise<ModelDeclarations> {
  if (filePath === undefined) {
    return new Map();
  }
  return parseSchema(await readJsonFromFile(filePath), filePath);
}
