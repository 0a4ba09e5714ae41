/**
 * Redis store handle (ioredis)
 *
 *   incr            INCR
 *   setIfAbsent     SET key value NX
 *   deleteIfEquals  EVAL compare-and-delete script
 */

import { Redis, type RedisOptions } from "ioredis";
import type { StoreHandle } from "../types.js";

/**
 * Deletes KEYS[1] only while it still holds ARGV[1]
 */
export const COMPARE_AND_DELETE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

/**
 * Default target when a model declares no connection
 */
export const DEFAULT_REDIS_URL = "redis://127.0.0.1:6379";

export class RedisStore implements StoreHandle {
  #client: Redis;
  #owned: boolean;

  /**
   * @param client - Connected (or lazily connecting) ioredis client
   * @param options - `owned`: quit the client on close (default: false)
   */
  constructor(client: Redis, options: { owned?: boolean } = {}) {
    this.#client = client;
    this.#owned = options.owned ?? false;
  }

  /**
   * Create a handle that owns its own client
   */
  static connect(target: string | RedisOptions = DEFAULT_REDIS_URL): RedisStore {
    const client = typeof target === "string" ? new Redis(target) : new Redis(target);
    return new RedisStore(client, { owned: true });
  }

  async incr(key: string): Promise<number> {
    return this.#client.incr(key);
  }

  async get(key: string): Promise<string | null> {
    return this.#client.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.#client.set(key, value);
  }

  async del(key: string): Promise<boolean> {
    return (await this.#client.del(key)) > 0;
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    return (await this.#client.set(key, value, "NX")) === "OK";
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const removed = await this.#client.eval(COMPARE_AND_DELETE_SCRIPT, 1, key, expected);
    return removed === 1;
  }

  async close(): Promise<void> {
    if (this.#owned) {
      await this.#client.quit();
    }
  }
}
