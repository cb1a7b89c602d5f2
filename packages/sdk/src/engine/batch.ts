import type { BatchOp, WriteBatch } from "../types.js";

/**
 * Receives the operations of a batch when it is written
 */
export type BatchSink = (ops: readonly BatchOp[]) => Promise<void>;

/**
 * WriteBatch that queues operations and hands them to its store on write
 *
 * Keys and values are copied when queued, so callers may reuse buffers.
 * Queued operations are kept when a write fails and cleared when it succeeds.
 */
export class Batch implements WriteBatch {
  #ops: BatchOp[] = [];
  #sink: BatchSink;

  constructor(sink: BatchSink) {
    this.#sink = sink;
  }

  put(collection: string, key: Uint8Array, value: Uint8Array): this {
    this.#ops.push({ type: "put", collection, key: new Uint8Array(key), value: new Uint8Array(value) });
    return this;
  }

  delete(collection: string, key: Uint8Array): this {
    this.#ops.push({ type: "delete", collection, key: new Uint8Array(key) });
    return this;
  }

  get ops(): readonly BatchOp[] {
    return this.#ops;
  }

  get size(): number {
    return this.#ops.length;
  }

  clear(): void {
    this.#ops = [];
  }

  async write(): Promise<void> {
    if (this.#ops.length === 0) return;
    const ops = this.#ops;
    this.#ops = [];
    try {
      await this.#sink(ops);
    } catch (err) {
      this.#ops = [...ops, ...this.#ops];
      throw err;
    }
  }
}
