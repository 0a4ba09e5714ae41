/**
 * Process-local store handle
 *
 * Each primitive yields to the event loop before touching the map, then
 * runs to completion synchronously. Concurrent engine operations therefore
 * interleave between primitives (as they would against a remote store) while
 * every primitive stays atomic.
 */

import type { StoreHandle } from "../types.js";

export class MemoryStore implements StoreHandle {
  #data = new Map<string, string>();

  async incr(key: string): Promise<number> {
    await this.#yield();
    const current = this.#data.get(key);
    const value = current === undefined ? 1 : Number(current) + 1;
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Value at ${key} is not an integer`);
    }
    this.#data.set(key, String(value));
    return value;
  }

  async get(key: string): Promise<string | null> {
    await this.#yield();
    return this.#data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    await this.#yield();
    this.#data.set(key, value);
  }

  async del(key: string): Promise<boolean> {
    await this.#yield();
    return this.#data.delete(key);
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    await this.#yield();
    if (this.#data.has(key)) return false;
    this.#data.set(key, value);
    return true;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    await this.#yield();
    if (this.#data.get(key) !== expected) return false;
    return this.#data.delete(key);
  }

  /**
   * Sorted copy of every key and value
   */
  snapshot(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const key of [...this.#data.keys()].sort()) {
      const value = this.#data.get(key);
      if (value !== undefined) out[key] = value;
    }
    return out;
  }

  /**
   * Remove every key
   */
  clear(): void {
    this.#data.clear();
  }

  #yield(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }
}
