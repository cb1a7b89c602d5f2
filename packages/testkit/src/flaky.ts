/**
 * Store wrapper that fails writes on demand
 */

import { Batch, StoreError } from "@ordtab/sdk";
import type {
  BatchOp,
  IterateOptions,
  KVEntry,
  OrderedStore,
  Range,
  WriteBatch,
} from "@ordtab/sdk";

/**
 * Decides whether a batch should fail; receives the batch's operations
 */
export type FailurePredicate = (ops: readonly BatchOp[]) => boolean;

/**
 * OrderedStore that delegates to another store but rejects selected batches
 * with a StoreError before they reach it
 *
 * @example
 * ```typescript
 * const store = new FlakyStore(new MemoryStore());
 * store.failNext();
 * await expect(table.insert("k", "v")).rejects.toThrow(StoreError);
 * ```
 */
export class FlakyStore implements OrderedStore {
  #inner: OrderedStore;
  #pending = 0;
  #predicate: FailurePredicate | undefined;
  #failures = 0;
  #writes: BatchOp[][] = [];

  constructor(inner: OrderedStore) {
    this.#inner = inner;
  }

  /**
   * Fail the next `count` batches (default: 1)
   */
  failNext(count = 1): void {
    this.#pending += count;
  }

  /**
   * Fail every batch matching a predicate until cleared with undefined
   */
  failWhen(predicate: FailurePredicate | undefined): void {
    this.#predicate = predicate;
  }

  /** Number of batches rejected so far */
  get failures(): number {
    return this.#failures;
  }

  /** Operations of every batch that reached the inner store */
  get writes(): readonly (readonly BatchOp[])[] {
    return this.#writes;
  }

  get closed(): boolean {
    return this.#inner.closed;
  }

  get(collection: string, key: Uint8Array): Promise<Uint8Array | undefined> {
    return this.#inner.get(collection, key);
  }

  async put(collection: string, key: Uint8Array, value: Uint8Array): Promise<void> {
    await this.write([{ type: "put", collection, key, value }]);
  }

  async delete(collection: string, key: Uint8Array): Promise<void> {
    await this.write([{ type: "delete", collection, key }]);
  }

  iterate(collection: string, options?: IterateOptions): AsyncIterable<KVEntry> {
    return this.#inner.iterate(collection, options);
  }

  batch(): WriteBatch {
    return new Batch((ops) => this.write(ops));
  }

  async write(ops: readonly BatchOp[]): Promise<void> {
    if (this.#pending > 0 || this.#predicate?.(ops)) {
      if (this.#pending > 0) this.#pending--;
      this.#failures++;
      throw new StoreError(`Injected failure for a batch of ${ops.length} operation(s)`);
    }
    await this.#inner.write(ops);
    this.#writes.push([...ops]);
  }

  collections(): Promise<string[]> {
    return this.#inner.collections();
  }

  count(collection: string, options?: Range<Uint8Array>): Promise<number> {
    return this.#inner.count(collection, options);
  }

  close(): Promise<void> {
    return this.#inner.close();
  }
}
