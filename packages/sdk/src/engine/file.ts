/**
 * Durable ordered store backed by a batch log and a snapshot
 *
 * Layout of a database directory:
 * - `batches.log`: one JSON line per committed batch, `{"seq":n,"ops":[...]}`
 *   with base64 keys and values
 * - `snapshot.json`: every collection as of batch `seq`, written atomically
 * - `LOCK`: held by the process that has the directory open
 *
 * Invariants:
 * - A batch is appended (and fsynced when `sync` is on) before it becomes
 *   visible in memory, so every batch a reader observes survives a restart
 * - Opening replays the snapshot, then every logged batch newer than it
 * - Only the final log line may be torn; it is discarded on open
 */

import * as fs from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { StoreClosedError, StoreError } from "../errors.js";
import { atomicWrite, ensureDirectory, readTextFile, syncHandle } from "../io.js";
import { Mutex } from "../mutex.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";
import type {
  BatchOp,
  IterateOptions,
  KVEntry,
  OrderedStore,
  Range,
  WriteBatch,
} from "../types.js";
import { Batch } from "./batch.js";
import { FileLock } from "./lock.js";
import { countByCollection, MemoryStore, type MemoryStoreOptions } from "./memory.js";

export const LOG_FILE = "batches.log";
export const SNAPSHOT_FILE = "snapshot.json";
export const DEFAULT_COMPACT_THRESHOLD = 1000;

const SNAPSHOT_VERSION = 1;

const logOpSchema = z.discriminatedUnion("t", [
  z.object({ t: z.literal("put"), c: z.string().min(1), k: z.string(), v: z.string() }),
  z.object({ t: z.literal("del"), c: z.string().min(1), k: z.string() }),
]);

const logLineSchema = z.object({
  seq: z.number().int().positive(),
  ops: z.array(logOpSchema),
});

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  seq: z.number().int().nonnegative(),
  collections: z.record(z.array(z.tuple([z.string(), z.string()]))),
});

type LogOp = z.infer<typeof logOpSchema>;

export interface FileStoreOptions extends MemoryStoreOptions {
  /** Database directory, created when missing */
  path: string;
  /** Fsync the log after every batch (default: true) */
  sync?: boolean;
  /** Compact once the log holds this many batches (default: 1000) */
  compactThreshold?: number;
}

/**
 * What opening a database found on disk
 */
export interface RecoveryReport {
  /** Sequence number covered by the snapshot (0 without one) */
  snapshotSeq: number;
  /** Logged batches applied on top of the snapshot */
  replayed: number;
  /** Whether a torn final log line was discarded */
  tornTail: boolean;
}

/**
 * Log and snapshot state of an open file store
 */
export interface FileStoreStatus {
  path: string;
  seq: number;
  logBatches: number;
  logBytes: number;
  recovery: RecoveryReport;
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function fromBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, "base64"));
}

function encodeOp(op: BatchOp): LogOp {
  return op.type === "put"
    ? { t: "put", c: op.collection, k: toBase64(op.key), v: toBase64(op.value) }
    : { t: "del", c: op.collection, k: toBase64(op.key) };
}

function decodeOp(op: LogOp): BatchOp {
  return op.t === "put"
    ? { type: "put", collection: op.c, key: fromBase64(op.k), value: fromBase64(op.v) }
    : { type: "delete", collection: op.c, key: fromBase64(op.k) };
}

/**
 * Parse one log line, returning undefined when it is not a valid batch
 */
function parseLine(line: string): z.infer<typeof logLineSchema> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = logLineSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Load the snapshot into memory
 * @returns Sequence number the snapshot covers
 */
async function loadSnapshot(dir: string, memory: MemoryStore): Promise<number> {
  const snapshotPath = join(dir, SNAPSHOT_FILE);
  const content = await readTextFile(snapshotPath);
  if (content === undefined) {
    return 0;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new StoreError(`Snapshot is not valid JSON: ${snapshotPath}`, { cause: err });
  }
  const result = snapshotSchema.safeParse(parsed);
  if (!result.success) {
    throw new StoreError(`Snapshot has an unexpected shape: ${snapshotPath}`, {
      cause: result.error,
    });
  }

  const ops: BatchOp[] = [];
  for (const [collection, entries] of Object.entries(result.data.collections)) {
    for (const [key, value] of entries) {
      ops.push({ type: "put", collection, key: fromBase64(key), value: fromBase64(value) });
    }
  }
  memory.apply(ops);
  return result.data.seq;
}

/**
 * Durable store: a MemoryStore whose batches are logged before they apply
 *
 * @example
 * ```typescript
 * const store = await FileStore.open({ path: "./data" });
 * await store.put("users", key, value);
 * await store.close();
 * ```
 */
export class FileStore implements OrderedStore {
  #dir: string;
  #memory: MemoryStore;
  #lock: FileLock;
  #log: fs.FileHandle;
  #mutex = new Mutex();
  #sync: boolean;
  #compactThreshold: number;
  #seq: number;
  #logBatches: number;
  #logBytes: number;
  #recovery: RecoveryReport;
  #closed = false;

  private constructor(init: {
    dir: string;
    memory: MemoryStore;
    lock: FileLock;
    log: fs.FileHandle;
    sync: boolean;
    compactThreshold: number;
    seq: number;
    logBatches: number;
    logBytes: number;
    recovery: RecoveryReport;
  }) {
    this.#dir = init.dir;
    this.#memory = init.memory;
    this.#lock = init.lock;
    this.#log = init.log;
    this.#sync = init.sync;
    this.#compactThreshold = init.compactThreshold;
    this.#seq = init.seq;
    this.#logBatches = init.logBatches;
    this.#logBytes = init.logBytes;
    this.#recovery = init.recovery;
  }

  /**
   * Open (or create) a database directory and recover its contents
   */
  static async open(options: FileStoreOptions): Promise<FileStore> {
    const dir = options.path;
    await ensureDirectory(dir);

    const lock = new FileLock(dir);
    await lock.acquire();

    let log: fs.FileHandle | undefined;
    try {
      const memory = new MemoryStore(options);
      const snapshotSeq = await loadSnapshot(dir, memory);

      const logPath = join(dir, LOG_FILE);
      const content = (await readTextFile(logPath)) ?? "";
      const lines = content.split("\n");
      // After a final newline split() leaves one empty string behind
      const complete = content.endsWith("\n") ? lines.length - 1 : lines.length;

      let seq = snapshotSeq;
      let replayed = 0;
      let logBatches = 0;
      let validBytes = 0;
      let tornTail = false;

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i]!;
        if (line.length === 0) {
          if (i < complete) validBytes += 1;
          continue;
        }

        const batch = parseLine(line);
        if (!batch) {
          const rest = lines.slice(i + 1).some((next) => next.length > 0);
          if (rest) {
            throw new StoreError(`Batch log is corrupt at line ${i + 1}: ${logPath}`);
          }
          tornTail = true;
          break;
        }

        validBytes += Buffer.byteLength(line) + 1;
        logBatches++;
        if (batch.seq > seq) {
          memory.apply(batch.ops.map(decodeOp));
          seq = batch.seq;
          replayed++;
        }
      }

      log = await fs.open(logPath, "a");
      if (tornTail) {
        logger.warn("store.recover.torn", {
          message: `Discarding torn final batch in ${logPath}`,
          details: { keptBytes: validBytes, fileBytes: Buffer.byteLength(content) },
        });
        await log.truncate(validBytes);
        await syncHandle(log);
      } else if (content.length > 0 && !content.endsWith("\n")) {
        // The last batch is whole but lost its newline
        await log.write("\n");
        await syncHandle(log);
      } else {
        validBytes = Buffer.byteLength(content);
      }

      const recovery: RecoveryReport = { snapshotSeq, replayed, tornTail };
      logger.info("store.recover", {
        message: `Opened ${dir}`,
        details: { ...recovery, seq },
      });

      return new FileStore({
        dir,
        memory,
        lock,
        log,
        sync: options.sync ?? true,
        compactThreshold: options.compactThreshold ?? DEFAULT_COMPACT_THRESHOLD,
        seq,
        logBatches,
        logBytes: validBytes,
        recovery,
      });
    } catch (err) {
      await log?.close();
      await lock.release();
      throw err;
    }
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Current log and snapshot state
   */
  get status(): FileStoreStatus {
    return {
      path: this.#dir,
      seq: this.#seq,
      logBatches: this.#logBatches,
      logBytes: this.#logBytes,
      recovery: { ...this.#recovery },
    };
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError();
    }
  }

  async get(collection: string, key: Uint8Array): Promise<Uint8Array | undefined> {
    this.#assertOpen();
    return this.#memory.get(collection, key);
  }

  async put(collection: string, key: Uint8Array, value: Uint8Array): Promise<void> {
    await this.write([{ type: "put", collection, key, value }]);
  }

  async delete(collection: string, key: Uint8Array): Promise<void> {
    await this.write([{ type: "delete", collection, key }]);
  }

  async *iterate(collection: string, options: IterateOptions = {}): AsyncGenerator<KVEntry> {
    this.#assertOpen();
    yield* this.#memory.iterate(collection, options);
  }

  batch(): WriteBatch {
    return new Batch((ops) => this.write(ops));
  }

  async write(ops: readonly BatchOp[]): Promise<void> {
    this.#assertOpen();
    if (ops.length === 0) return;

    await this.#mutex.withLock(async () => {
      this.#assertOpen();
      this.#memory.validate(ops);

      const start = performance.now();
      const seq = this.#seq + 1;
      const line = `${JSON.stringify({ seq, ops: ops.map(encodeOp) })}\n`;

      try {
        await this.#log.write(line);
        if (this.#sync) {
          await syncHandle(this.#log);
        }
      } catch (err) {
        // Drop whatever part of the line reached the file
        await this.#log.truncate(this.#logBytes).catch((truncateErr: unknown) => {
          logger.error("store.log.truncate.failed", {
            message: String(truncateErr),
            details: { path: this.#dir },
          });
        });
        throw new StoreError(`Failed to append batch ${seq}`, { cause: err });
      }

      this.#seq = seq;
      this.#logBatches++;
      this.#logBytes += Buffer.byteLength(line);
      this.#memory.apply(ops);

      const elapsed = performance.now() - start;
      for (const [collection, counts] of countByCollection(ops)) {
        metrics.recordBatch(collection, counts.puts, counts.deletes, elapsed);
      }

      if (this.#logBatches >= this.#compactThreshold) {
        // The batch is already durable; a failed compaction only delays the next one
        await this.#compactLocked().catch((err: unknown) => {
          logger.error("store.compact.failed", {
            message: err instanceof Error ? err.message : String(err),
            details: { path: this.#dir },
          });
        });
      }
    });
  }

  /**
   * Write a snapshot of every collection and empty the batch log
   */
  async compact(): Promise<void> {
    this.#assertOpen();
    await this.#mutex.withLock(async () => {
      this.#assertOpen();
      await this.#compactLocked();
    });
  }

  async #compactLocked(): Promise<void> {
    const start = performance.now();
    const collections: Record<string, Array<[string, string]>> = {};
    let entries = 0;
    for (const [name, items] of this.#memory.dump()) {
      collections[name] = items.map((entry): [string, string] => [
        toBase64(entry.key),
        toBase64(entry.value),
      ]);
      entries += items.length;
    }

    await atomicWrite(
      join(this.#dir, SNAPSHOT_FILE),
      JSON.stringify({ version: SNAPSHOT_VERSION, seq: this.#seq, collections })
    );

    // Batches up to seq are now in the snapshot; replay skips them even if this truncate is lost
    await this.#log.truncate(0);
    await syncHandle(this.#log);

    logger.info("store.compact", {
      message: `Compacted ${this.#logBatches} batch(es)`,
      details: { seq: this.#seq, entries, durationMs: Math.round(performance.now() - start) },
    });
    this.#logBatches = 0;
    this.#logBytes = 0;
  }

  async collections(): Promise<string[]> {
    this.#assertOpen();
    return this.#memory.collections();
  }

  async count(collection: string, options: Range<Uint8Array> = {}): Promise<number> {
    this.#assertOpen();
    return this.#memory.count(collection, options);
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    await this.#mutex.withLock(async () => {
      if (this.#closed) return;
      this.#closed = true;
      try {
        if (!this.#sync) {
          await syncHandle(this.#log);
        }
        await this.#log.close();
        await this.#memory.close();
      } finally {
        await this.#lock.release();
      }
    });
  }
}
