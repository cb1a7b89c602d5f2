/**
 * File-based lock preventing two processes from opening one database directory
 * Uses exclusive file open to ensure only one owner at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { StoreError } from "../errors.js";
import { errorCode } from "../io.js";
import { logger } from "../observability/logs.js";

const lockInfoSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string(),
});

/**
 * Check whether a process id belongs to a running process
 */
function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

/**
 * Simple file-based lock using exclusive open
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(root: string, lockName: string = "LOCK") {
    this.#lockPath = path.join(root, lockName);
  }

  /**
   * Acquire the lock, replacing a lock left behind by a process that no longer runs
   * @param timeoutMs - Maximum time to wait for the lock (default: 0, fail at once)
   * @param retryIntervalMs - Time between retry attempts (default: 50ms)
   */
  async acquire(timeoutMs: number = 0, retryIntervalMs: number = 50): Promise<void> {
    if (this.#acquired) {
      throw new StoreError("Lock already acquired");
    }

    const startTime = Date.now();

    while (true) {
      try {
        // Try to open file exclusively (fails if already exists)
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        // Write PID and timestamp for stale lock detection
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo));
        await this.#fd.sync();

        return;
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw new StoreError(`Failed to create lock file: ${this.#lockPath}`, { cause: err });
        }

        const holder = await this.#readHolder();
        if (holder !== undefined && !isAlive(holder)) {
          logger.warn("store.lock.stale", {
            message: `Removing lock left by process ${holder}`,
            details: { path: this.#lockPath },
          });
          await fs.rm(this.#lockPath, { force: true });
          continue;
        }

        if (Date.now() - startTime >= timeoutMs) {
          throw new StoreError(
            `Database is locked by ${holder !== undefined ? `process ${holder}` : "another process"}. ` +
              `Lock file: ${this.#lockPath}`
          );
        }

        // Wait and retry
        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
      }
    }
  }

  /**
   * PID recorded in an existing lock file, if readable
   */
  async #readHolder(): Promise<number | undefined> {
    try {
      const content = await fs.readFile(this.#lockPath, "utf-8");
      const parsed = lockInfoSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data.pid : undefined;
    } catch {
      // A lock being written or removed concurrently reads as unknown
      return undefined;
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return; // Nothing to release
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Ignore if lock file doesn't exist (already cleaned up)
      if (errorCode(err) !== "ENOENT") {
        throw new StoreError(`Failed to release lock: ${this.#lockPath}`, { cause: err });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Check if lock is acquired
   */
  isAcquired(): boolean {
    return this.#acquired;
  }
}
