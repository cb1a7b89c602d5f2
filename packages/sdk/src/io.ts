/**
 * Atomic file I/O operations for crash-safe persistence
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files read as undefined rather than failing
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StoreError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Extract the errno code from an unknown thrown value
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StoreError(`Failed to create directory: ${dirPath}`, { cause: err });
  }
}

/**
 * Flush a file handle, falling back to a full sync where datasync is unsupported
 */
export async function syncHandle(handle: fs.FileHandle): Promise<void> {
  try {
    await handle.datasync();
  } catch (err) {
    // ENOTSUP/ENOSYS: not supported on this platform
    // EINVAL: some CIFS/FUSE mounts report this instead
    const code = errorCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await handle.sync();
    } else {
      throw err;
    }
  }
}

/**
 * Fsync a directory so a rename inside it is durable (best-effort)
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
    // Platforms without directory fsync report one of these
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dirsync.failed", { message: `Directory fsync failed for ${dir}`, details: { code } });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");
    await syncHandle(fileHandle);

    // Close the file handle before rename
    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { details: { path: tmp, code: errorCode(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // The temp file may never have been created
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.unlink.failed", { details: { path: tmp, code: errorCode(unlinkErr) } });
      }
    });

    throw new StoreError(`Failed to write file: ${filePath}`, { cause: err });
  }
}

/**
 * Read a UTF-8 file
 * @param filePath - File path to read
 * @returns File contents, or undefined if the file does not exist
 */
export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw new StoreError(`Failed to read file: ${filePath}`, { cause: err });
  }
}
