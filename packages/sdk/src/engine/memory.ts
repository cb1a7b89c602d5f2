/**
 * In-memory ordered store
 *
 * Each collection is a sorted array of entries searched with binary search.
 *
 * Invariants:
 * - Entries within a collection are strictly ascending by compareBytes
 * - A batch is fully validated before any collection changes; applying a
 *   validated batch cannot fail, so a rejected batch has no side effects
 * - Stored keys and values are private copies; callers never share buffers
 *   with the store
 */

import { compareBytes } from "../codec/bytes.js";
import { StoreClosedError, StoreError } from "../errors.js";
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

export const DEFAULT_MAX_KEY_BYTES = 64 * 1024;
export const DEFAULT_MAX_VALUE_BYTES = 16 * 1024 * 1024;

export interface MemoryStoreOptions {
  /** Largest accepted key in bytes (default: 64 KiB) */
  maxKeyBytes?: number;
  /** Largest accepted value in bytes (default: 16 MiB) */
  maxValueBytes?: number;
}

/**
 * Index of the first entry whose key is >= key (or > key when `after` is set)
 */
function search(entries: readonly KVEntry[], key: Uint8Array, after: boolean): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const cmp = compareBytes(entries[mid]!.key, key);
    if (cmp < 0 || (after && cmp === 0)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Half-open index window [start, end) of the entries inside a byte interval
 */
export function rangeWindow(
  entries: readonly KVEntry[],
  range: Range<Uint8Array>
): { start: number; end: number } {
  let start = 0;
  let end = entries.length;

  if (range.gte !== undefined) start = Math.max(start, search(entries, range.gte, false));
  if (range.gt !== undefined) start = Math.max(start, search(entries, range.gt, true));
  if (range.lt !== undefined) end = Math.min(end, search(entries, range.lt, false));
  if (range.lte !== undefined) end = Math.min(end, search(entries, range.lte, true));

  return { start, end: Math.max(start, end) };
}

function copyEntry(entry: KVEntry): KVEntry {
  return { key: new Uint8Array(entry.key), value: new Uint8Array(entry.value) };
}

/**
 * Ordered store held entirely in memory
 *
 * @example
 * ```typescript
 * const store = new MemoryStore();
 * await store.batch().put("users", key, value).delete("users", oldKey).write();
 * ```
 */
export class MemoryStore implements OrderedStore {
  #collections = new Map<string, KVEntry[]>();
  #closed = false;
  #maxKeyBytes: number;
  #maxValueBytes: number;

  constructor(options: MemoryStoreOptions = {}) {
    this.#maxKeyBytes = options.maxKeyBytes ?? DEFAULT_MAX_KEY_BYTES;
    this.#maxValueBytes = options.maxValueBytes ?? DEFAULT_MAX_VALUE_BYTES;
  }

  get closed(): boolean {
    return this.#closed;
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError();
    }
  }

  async get(collection: string, key: Uint8Array): Promise<Uint8Array | undefined> {
    this.#assertOpen();
    const start = performance.now();
    const value = this.lookup(collection, key);
    metrics.recordRead(collection, value !== undefined, performance.now() - start);
    return value ? new Uint8Array(value) : undefined;
  }

  /**
   * Synchronous point lookup without metrics; the returned buffer is shared
   */
  lookup(collection: string, key: Uint8Array): Uint8Array | undefined {
    const entries = this.#collections.get(collection);
    if (!entries) return undefined;
    const idx = search(entries, key, false);
    const entry = entries[idx];
    return entry && compareBytes(entry.key, key) === 0 ? entry.value : undefined;
  }

  async put(collection: string, key: Uint8Array, value: Uint8Array): Promise<void> {
    await this.write([{ type: "put", collection, key, value }]);
  }

  async delete(collection: string, key: Uint8Array): Promise<void> {
    await this.write([{ type: "delete", collection, key }]);
  }

  async *iterate(collection: string, options: IterateOptions = {}): AsyncGenerator<KVEntry> {
    this.#assertOpen();
    const limit = options.limit;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new StoreError(`Invalid scan limit: ${limit}`);
    }

    const started = performance.now();
    const entries = this.#collections.get(collection) ?? [];
    let { start, end } = rangeWindow(entries, options);
    if (limit !== undefined && end - start > limit) {
      if (options.reverse) {
        start = end - limit;
      } else {
        end = start + limit;
      }
    }

    // Later batches splice the live array, so iterate over a copy of the window
    const window = entries.slice(start, end);
    try {
      if (options.reverse) {
        for (let i = window.length - 1; i >= 0; i--) {
          this.#assertOpen();
          yield copyEntry(window[i]!);
        }
      } else {
        for (const entry of window) {
          this.#assertOpen();
          yield copyEntry(entry);
        }
      }
    } finally {
      metrics.recordScan(collection, performance.now() - started);
    }
  }

  batch(): WriteBatch {
    return new Batch((ops) => this.write(ops));
  }

  async write(ops: readonly BatchOp[]): Promise<void> {
    this.#assertOpen();
    this.validate(ops);
    const start = performance.now();
    this.apply(ops);
    const elapsed = performance.now() - start;
    for (const [collection, counts] of countByCollection(ops)) {
      metrics.recordBatch(collection, counts.puts, counts.deletes, elapsed);
    }
  }

  /**
   * Check every operation of a batch without changing anything
   * @throws {StoreError} When an operation is malformed or exceeds a size limit
   */
  validate(ops: readonly BatchOp[]): void {
    ops.forEach((op, i) => {
      if (typeof op.collection !== "string" || op.collection.length === 0) {
        throw new StoreError(`Batch operation ${i}: collection name must be a non-empty string`);
      }
      if (!(op.key instanceof Uint8Array)) {
        throw new StoreError(`Batch operation ${i}: key must be a Uint8Array`);
      }
      if (op.key.length > this.#maxKeyBytes) {
        throw new StoreError(
          `Batch operation ${i}: key of ${op.key.length} bytes exceeds the ${this.#maxKeyBytes} byte limit`
        );
      }
      if (op.type === "put") {
        if (!(op.value instanceof Uint8Array)) {
          throw new StoreError(`Batch operation ${i}: value must be a Uint8Array`);
        }
        if (op.value.length > this.#maxValueBytes) {
          throw new StoreError(
            `Batch operation ${i}: value of ${op.value.length} bytes exceeds the ${this.#maxValueBytes} byte limit`
          );
        }
      }
    });
  }

  /**
   * Apply a validated batch in order
   */
  apply(ops: readonly BatchOp[]): void {
    for (const op of ops) {
      let entries = this.#collections.get(op.collection);
      if (op.type === "put") {
        if (!entries) {
          entries = [];
          this.#collections.set(op.collection, entries);
        }
        const idx = search(entries, op.key, false);
        const existing = entries[idx];
        const entry = { key: new Uint8Array(op.key), value: new Uint8Array(op.value) };
        if (existing && compareBytes(existing.key, op.key) === 0) {
          entries[idx] = entry;
        } else {
          entries.splice(idx, 0, entry);
        }
      } else if (entries) {
        const idx = search(entries, op.key, false);
        const existing = entries[idx];
        if (existing && compareBytes(existing.key, op.key) === 0) {
          entries.splice(idx, 1);
          if (entries.length === 0) {
            this.#collections.delete(op.collection);
          }
        }
      }
    }
  }

  async collections(): Promise<string[]> {
    this.#assertOpen();
    return [...this.#collections.keys()].sort();
  }

  async count(collection: string, options: Range<Uint8Array> = {}): Promise<number> {
    this.#assertOpen();
    const entries = this.#collections.get(collection) ?? [];
    const { start, end } = rangeWindow(entries, options);
    return end - start;
  }

  /**
   * Every non-empty collection with its entries in key order; buffers are shared
   */
  dump(): Map<string, readonly KVEntry[]> {
    return new Map(this.#collections);
  }

  async close(): Promise<void> {
    this.#closed = true;
    this.#collections.clear();
  }
}

/**
 * Number of puts and deletes per collection in a batch
 */
export function countByCollection(
  ops: readonly BatchOp[]
): Map<string, { puts: number; deletes: number }> {
  const counts = new Map<string, { puts: number; deletes: number }>();
  for (const op of ops) {
    let entry = counts.get(op.collection);
    if (!entry) {
      entry = { puts: 0, deletes: 0 };
      counts.set(op.collection, entry);
    }
    if (op.type === "put") {
      entry.puts++;
    } else {
      entry.deletes++;
    }
  }
  return counts;
}
