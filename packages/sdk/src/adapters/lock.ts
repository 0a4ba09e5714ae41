/**
 * File-based lock for serializing read-modify-write on one store key
 * Uses exclusive file open so that only one holder exists across processes
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorCode } from "../io.js";

export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(lockPath: string) {
    this.#lockPath = lockPath;
  }

  /**
   * Acquire the lock, polling until `timeoutMs` elapses
   * @param timeoutMs - Maximum time to wait for the lock (default: 5000ms)
   * @param retryIntervalMs - Time between attempts (default: 5ms)
   */
  async acquire(timeoutMs: number = 5000, retryIntervalMs: number = 5): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      const fd = await this.#tryOpen();
      if (fd === null) {
        if (Date.now() - startTime > timeoutMs) {
          throw new Error(
            `Failed to acquire lock after ${timeoutMs}ms. ` +
              `Lock file: ${this.#lockPath}. ` +
              `This may indicate a stale lock from a crashed process - ` +
              `manually delete the lock file if safe.`
          );
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      this.#fd = fd;
      this.#acquired = true;

      try {
        // Write PID and timestamp for debugging
        await fd.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
        return;
      } catch (err) {
        // Unlink the half-written lock file, or the key stays locked
        await this.release();
        throw err;
      }
    }
  }

  /**
   * Exclusive create; null while another holder has the lock
   */
  async #tryOpen(): Promise<fs.FileHandle | null> {
    try {
      return await fs.open(this.#lockPath, "wx");
    } catch (err) {
      if (errorCode(err) === "EEXIST") {
        return null;
      }
      throw err;
    }
  }

  /**
   * Release the lock (no-op when not held)
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up
      if (errorCode(err) !== "ENOENT") {
        throw err;
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
