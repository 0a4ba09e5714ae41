/**
 * Store adapter for CLI
 * Opens one store handle per invocation and declares models on demand
 */

import { FileStore, RedisStore, defineModel, type Model, type StoreHandle } from "@modelkv/sdk";
import type { Backend } from "./env.js";
import type { ModelDeclarations } from "./schema.js";

/**
 * Models of one CLI invocation, all sharing a single handle
 */
export interface CliStore {
  /**
   * Model by name; undeclared models have no declared properties
   */
  model(name: string): Model;

  /**
   * Close the underlying handle
   */
  close(): Promise<void>;
}

function openHandle(backend: Backend): StoreHandle {
  return backend.kind === "redis" ? RedisStore.connect(backend.url) : new FileStore({ root: backend.root });
}

/**
 * Open a CLI store backed by the SDK
 */
export function openCliStore(backend: Backend, declarations: ModelDeclarations): CliStore {
  const handle = openHandle(backend);
  const models = new Map<string, Model>();

  return {
    model(name: string): Model {
      let model = models.get(name);
      if (!model) {
        model = defineModel({ ...declarations.get(name), name, connection: handle });
        models.set(name, model);
      }
      return model;
    },

    async close(): Promise<void> {
      await handle.close?.();
    },
  };
}
