/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase } from "@ordtab/sdk";
import type { Database, DatabaseOptions } from "@ordtab/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "ordtab-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "ordtab-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a file-backed database in a temp directory, cleaning up after
 * @param fn - Function to execute with the database and its directory
 * @param options - Optional database options (path will be overridden)
 * @returns Result of fn
 */
export async function withTempDatabase<T>(
  fn: (db: Database, dir: string) => Promise<T>,
  options?: Omit<DatabaseOptions, "path">
): Promise<T> {
  const dir = await createTempDir();
  let db: Database;
  try {
    db = await openDatabase({ ...options, path: dir });
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(db, dir);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      if (!db.store.closed) {
        await db.close();
      }
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dir);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
