/**
 * Typed tables over one collection of an ordered store
 *
 * Invariants:
 * - Records are stored as encode(key) -> encode(value) in a single collection
 * - Scans follow the byte order of encoded keys, which is the key order
 * - Read-then-write sequences of one table instance are serialized by a mutex
 */

import { Mutex } from "./mutex.js";
import { logger } from "./observability/logs.js";
import type { Codec, OrderedCodec, OrderedStore, Range, ScanOptions } from "./types.js";

/**
 * Codecs of a base table
 */
export interface TableOptions<K, V> {
  key: OrderedCodec<K>;
  value: Codec<V>;
}

/**
 * Translate a typed key range into a byte range
 */
export function encodeRange<K>(codec: OrderedCodec<K>, range: Range<K> = {}): Range<Uint8Array> {
  const out: Range<Uint8Array> = {};
  if (range.gte !== undefined) out.gte = codec.encode(range.gte);
  if (range.gt !== undefined) out.gt = codec.encode(range.gt);
  if (range.lte !== undefined) out.lte = codec.encode(range.lte);
  if (range.lt !== undefined) out.lt = codec.encode(range.lt);
  return out;
}

/**
 * First item of an async iterable, closing the iteration early
 */
export async function first<T>(items: AsyncIterable<T>): Promise<T | undefined> {
  for await (const item of items) {
    return item;
  }
  return undefined;
}

/**
 * State shared by every kind of table
 */
export abstract class TableBase {
  readonly name: string;
  protected readonly store: OrderedStore;
  protected readonly mutex = new Mutex();

  constructor(store: OrderedStore, name: string) {
    this.store = store;
    this.name = name;
  }

  /** Collections owned by this table, primary first */
  abstract get collections(): readonly string[];

  /**
   * Remove every record and index entry in one batch
   * @returns Number of records removed
   */
  async clear(): Promise<number> {
    return this.mutex.withLock(async () => {
      const batch = this.store.batch();
      let records = 0;
      for (const [i, collection] of this.collections.entries()) {
        for await (const entry of this.store.iterate(collection)) {
          batch.delete(collection, entry.key);
          if (i === 0) records++;
        }
      }
      await batch.write();
      logger.debug("table.clear", { table: this.name, details: { records } });
      return records;
    });
  }
}

/**
 * Map from typed keys to typed values kept in key order
 *
 * @example
 * ```typescript
 * const users = await db.table("users", { key: keys.string, value: values.json(userSchema) });
 * await users.insert("ada", { name: "Ada Lovelace" });
 * for await (const [id, user] of users.scan({ gte: "a", lt: "b" })) { ... }
 * ```
 */
export class Table<K, V> extends TableBase {
  readonly collection: string;
  readonly keyCodec: OrderedCodec<K>;
  readonly valueCodec: Codec<V>;

  constructor(store: OrderedStore, name: string, options: TableOptions<K, V>, collection = name) {
    super(store, name);
    this.collection = collection;
    this.keyCodec = options.key;
    this.valueCodec = options.value;
  }

  get collections(): readonly string[] {
    return [this.collection];
  }

  /**
   * Look up the value stored under a key
   */
  async get(key: K): Promise<V | undefined> {
    const bytes = await this.store.get(this.collection, this.keyCodec.encode(key));
    return bytes === undefined ? undefined : this.valueCodec.decode(bytes);
  }

  /**
   * Check whether a key holds a value
   */
  async has(key: K): Promise<boolean> {
    return (await this.store.get(this.collection, this.keyCodec.encode(key))) !== undefined;
  }

  /**
   * Store a value, replacing any previous one
   * @returns The previous value, if any
   */
  async insert(key: K, value: V): Promise<V | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    const valueBytes = this.valueCodec.encode(value);
    return this.mutex.withLock(async () => {
      const prevBytes = await this.store.get(this.collection, keyBytes);
      const prev = prevBytes === undefined ? undefined : this.valueCodec.decode(prevBytes);
      await this.store.put(this.collection, keyBytes, valueBytes);
      return prev;
    });
  }

  /**
   * Delete a key
   * @returns The removed value, if the key was present
   */
  async remove(key: K): Promise<V | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    return this.mutex.withLock(async () => {
      const prevBytes = await this.store.get(this.collection, keyBytes);
      if (prevBytes === undefined) return undefined;
      const prev = this.valueCodec.decode(prevBytes);
      await this.store.delete(this.collection, keyBytes);
      return prev;
    });
  }

  /**
   * Lazily iterate records whose keys fall inside a range
   *
   * Each call starts a fresh iteration over the current contents.
   */
  async *scan(range: Range<K> = {}, options: ScanOptions = {}): AsyncGenerator<[K, V]> {
    const entries = this.store.iterate(this.collection, {
      ...encodeRange(this.keyCodec, range),
      ...options,
    });
    for await (const entry of entries) {
      yield [this.keyCodec.decode(entry.key), this.valueCodec.decode(entry.value)];
    }
  }

  /**
   * Lazily iterate the keys inside a range without decoding values
   */
  async *keys(range: Range<K> = {}, options: ScanOptions = {}): AsyncGenerator<K> {
    const entries = this.store.iterate(this.collection, {
      ...encodeRange(this.keyCodec, range),
      ...options,
    });
    for await (const entry of entries) {
      yield this.keyCodec.decode(entry.key);
    }
  }

  /**
   * Number of records inside a range
   */
  async count(range: Range<K> = {}): Promise<number> {
    return this.store.count(this.collection, encodeRange(this.keyCodec, range));
  }

  /** Record with the smallest key */
  async min(): Promise<[K, V] | undefined> {
    return first(this.scan({}, { limit: 1 }));
  }

  /** Record with the largest key */
  async max(): Promise<[K, V] | undefined> {
    return first(this.scan({}, { reverse: true, limit: 1 }));
  }

  /** First record whose key is greater than `key` */
  async succ(key: K): Promise<[K, V] | undefined> {
    return first(this.scan({ gt: key }, { limit: 1 }));
  }

  /** First record whose key is greater than or equal to `key` */
  async succIncl(key: K): Promise<[K, V] | undefined> {
    return first(this.scan({ gte: key }, { limit: 1 }));
  }

  /** Last record whose key is less than `key` */
  async pred(key: K): Promise<[K, V] | undefined> {
    return first(this.scan({ lt: key }, { reverse: true, limit: 1 }));
  }

  /** Last record whose key is less than or equal to `key` */
  async predIncl(key: K): Promise<[K, V] | undefined> {
    return first(this.scan({ lte: key }, { reverse: true, limit: 1 }));
  }
}
