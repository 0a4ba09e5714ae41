/**
 * Atomic file I/O for the file-backed store
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename/link)
 * - Temp files are removed on failure paths
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename (or link) → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";

/**
 * Error code of a failed fs call, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Write content to a fresh temp file beside `filePath` and flush it
 * @returns Temp file path
 */
async function writeTemp(filePath: string, content: string): Promise<string> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await fs.mkdir(dir, { recursive: true });

  const fileHandle = await fs.open(tmp, "w", 0o600);
  try {
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync for performance, fall back to sync
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }
  } catch (err) {
    await fileHandle.close();
    await fs.rm(tmp, { force: true });
    throw err;
  }

  await fileHandle.close();
  return tmp;
}

/**
 * Fsync a directory (best-effort; unsupported on some platforms)
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && process.env.MODELKV_DEBUG) {
      console.warn(`Directory fsync failed for ${dir}:`, err);
    }
  }
}

/**
 * Atomically replace a file's content (last writer wins)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tmp = await writeTemp(filePath, content);
  try {
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
  await syncDirectory(dirname(filePath));
}

/**
 * Atomically create a file only if none exists yet.
 * The content is fully written before the name appears (hard link of a temp file).
 * @returns false when the file already existed
 */
export async function createExclusive(filePath: string, content: string): Promise<boolean> {
  const tmp = await writeTemp(filePath, content);
  try {
    await fs.link(tmp, filePath);
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      return false;
    }
    throw err;
  } finally {
    await fs.rm(tmp, { force: true });
  }
  await syncDirectory(dirname(filePath));
  return true;
}

/**
 * Read a UTF-8 file, or null when it does not exist
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Remove a file (idempotent)
 * @returns true when a file was removed
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw err;
  }
}
