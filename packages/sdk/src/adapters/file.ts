/**
 * File-backed store handle
 *
 * Layout under `root`:
 *   keys/<sha256(key)>.json          { "key": ..., "value": ... }
 *   _meta/locks/<sha256(key)>.lock   held during read-modify-write on that key
 *
 * Invariants:
 * - setIfAbsent never takes the lock: the link of a fully written temp file is atomic
 * - incr, set, del and deleteIfEquals hold the key's lock, so a compare-and-delete
 *   cannot remove a value written after its comparison
 * - get never blocks
 */

import { createHash } from "node:crypto";
import * as path from "node:path";
import { z } from "zod";
import { FileLock } from "./lock.js";
import { atomicWrite, createExclusive, readFileOrNull, removeFile } from "../io.js";
import type { StoreHandle } from "../types.js";

const EntrySchema = z.object({ key: z.string(), value: z.string() });

export interface FileStoreOptions {
  /** Root directory (created on first write) */
  root: string;
  /** Maximum wait for a key lock (default: 5000ms) */
  lockTimeoutMs?: number;
}

export class FileStore implements StoreHandle {
  #root: string;
  #lockTimeoutMs: number;

  constructor(options: FileStoreOptions) {
    this.#root = path.resolve(options.root);
    this.#lockTimeoutMs = options.lockTimeoutMs ?? 5000;
  }

  get root(): string {
    return this.#root;
  }

  async incr(key: string): Promise<number> {
    return this.#locked(key, async () => {
      const current = await this.#read(key);
      const value = current === null ? 1 : Number(current) + 1;
      if (!Number.isSafeInteger(value)) {
        throw new Error(`Value at ${key} is not an integer`);
      }
      await atomicWrite(this.#entryPath(key), this.#encode(key, String(value)));
      return value;
    });
  }

  async get(key: string): Promise<string | null> {
    return this.#read(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.#locked(key, () => atomicWrite(this.#entryPath(key), this.#encode(key, value)));
  }

  async del(key: string): Promise<boolean> {
    return this.#locked(key, () => removeFile(this.#entryPath(key)));
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    return createExclusive(this.#entryPath(key), this.#encode(key, value));
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    return this.#locked(key, async () => {
      if ((await this.#read(key)) !== expected) return false;
      return removeFile(this.#entryPath(key));
    });
  }

  #digest(key: string): string {
    return createHash("sha256").update(key).digest("hex");
  }

  #entryPath(key: string): string {
    return path.join(this.#root, "keys", `${this.#digest(key)}.json`);
  }

  #encode(key: string, value: string): string {
    return JSON.stringify({ key, value }) + "\n";
  }

  async #read(key: string): Promise<string | null> {
    const filePath = this.#entryPath(key);
    const raw = await readFileOrNull(filePath);
    if (raw === null) return null;

    const entry = EntrySchema.safeParse(JSON.parse(raw));
    if (!entry.success || entry.data.key !== key) {
      throw new Error(`Unreadable entry for ${key} at ${filePath}`);
    }
    return entry.data.value;
  }

  async #locked<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lock = new FileLock(path.join(this.#root, "_meta", "locks", `${this.#digest(key)}.lock`));
    return lock.withLock(fn, this.#lockTimeoutMs);
  }
}
