/**
 * Store handle resolution
 *
 * A resolver is asked for a handle once per engine operation. Handles built
 * from connection options are created on first use and kept by the resolver;
 * caller-supplied handles and factories are passed through untouched.
 */

import { ConfigurationError } from "./errors.js";
import { FileStore } from "./adapters/file.js";
import { DEFAULT_REDIS_URL, RedisStore } from "./adapters/redis.js";
import type { ConnectionSource, ModelDefinition, StoreHandle } from "./types.js";

export interface HandleResolver {
  /** Provide the handle for one engine operation */
  resolve(model: ModelDefinition): Promise<StoreHandle>;
  /** Close handles the resolver created itself */
  close(): Promise<void>;
}

const PRIMITIVES = ["incr", "get", "set", "del", "setIfAbsent", "deleteIfEquals"] as const;

/**
 * Check that a value exposes every store primitive
 */
export function isStoreHandle(value: unknown): value is StoreHandle {
  if (value === null || typeof value !== "object") return false;
  return PRIMITIVES.every((name) => typeof Reflect.get(value, name) === "function");
}

/**
 * Resolver that builds its handle lazily and owns it
 */
function ownedResolver(build: () => StoreHandle): HandleResolver {
  let handle: StoreHandle | undefined;
  return {
    async resolve() {
      handle ??= build();
      return handle;
    },
    async close() {
      const current = handle;
      handle = undefined;
      await current?.close?.();
    },
  };
}

/**
 * Build the resolver for a connection source
 * @param source - Omitted: Redis at MODELKV_REDIS_URL (default redis://127.0.0.1:6379)
 */
export function createResolver(source?: ConnectionSource): HandleResolver {
  if (source === undefined) {
    return ownedResolver(() => RedisStore.connect(process.env.MODELKV_REDIS_URL ?? DEFAULT_REDIS_URL));
  }

  if (typeof source === "function") {
    return {
      async resolve(model) {
        const handle = await source(model);
        if (!isStoreHandle(handle)) {
          throw new ConfigurationError(`Connection factory for ${model.name} did not return a store handle`);
        }
        return handle;
      },
      async close() {},
    };
  }

  if (isStoreHandle(source)) {
    return {
      async resolve() {
        return source;
      },
      async close() {},
    };
  }

  if ("redis" in source) {
    const target = source.redis;
    return ownedResolver(() => RedisStore.connect(target));
  }

  const { root, lockTimeoutMs } = source;
  return ownedResolver(() => new FileStore({ root, lockTimeoutMs }));
}
