/**
 * Tables that can be queried by value as well as by key
 *
 * Collections:
 * - primary: encode(key) -> encode(value)
 * - value index: frame(encode(value)) ++ encode(key) -> empty
 *
 * Framing escapes and terminates the value bytes, so all entries for one
 * value form a contiguous prefix range ordered by key, and no value's range
 * overlaps another's.
 *
 * Invariants:
 * - Every record has exactly one value index entry
 * - With `unique`, no two keys hold the same encoded value
 */

import { concatBytes, equalBytes, prefixSuccessor } from "./codec/bytes.js";
import { frameBytes, readFramedBytes } from "./codec/keys.js";
import { IndexCorruptionError, UniqueConstraintError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { encodeRange, first, TableBase } from "./table.js";
import type {
  Codec,
  IndexReport,
  IterateOptions,
  OrderedCodec,
  OrderedStore,
  Range,
  ScanOptions,
} from "./types.js";

const EMPTY = new Uint8Array(0);

/**
 * Codecs and policy of a reversible table
 *
 * Value index keys hold the framed encoded value followed by the encoded key,
 * so an encoded value plus its key must fit the store's `maxKeyBytes`
 * (64 KiB by default). A larger value fails the whole batch with a
 * StoreError and nothing is written.
 */
export interface ReversibleOptions<K, V> {
  key: OrderedCodec<K>;
  value: Codec<V>;
  /** Reject a value already held by a different key (default: false) */
  unique?: boolean;
}

/**
 * Table with a secondary index from values back to keys
 *
 * @example
 * ```typescript
 * const owners = await db.reversible("owners", { key: keys.string, value: values.utf8 });
 * await owners.insert("car-1", "ada");
 * await owners.insert("car-2", "ada");
 * for await (const car of owners.getByValue("ada")) { ... } // car-1, car-2
 * ```
 */
export class ReversibleTable<K, V> extends TableBase {
  readonly collection: string;
  readonly indexCollection: string;
  readonly keyCodec: OrderedCodec<K>;
  readonly valueCodec: Codec<V>;
  readonly unique: boolean;

  constructor(
    store: OrderedStore,
    name: string,
    options: ReversibleOptions<K, V>,
    collections: { primary: string; index: string } = { primary: name, index: `${name}/by_value` }
  ) {
    super(store, name);
    this.collection = collections.primary;
    this.indexCollection = collections.index;
    this.keyCodec = options.key;
    this.valueCodec = options.value;
    this.unique = options.unique ?? false;
  }

  get collections(): readonly string[] {
    return [this.collection, this.indexCollection];
  }

  /**
   * Byte range holding every index entry of one encoded value
   */
  #valueRange(valueBytes: Uint8Array): { prefix: Uint8Array; range: IterateOptions } {
    const prefix = frameBytes(valueBytes);
    // A frame ends in 0x00 0x00, so its successor always exists
    const lt = prefixSuccessor(prefix);
    return { prefix, range: lt === undefined ? { gte: prefix } : { gte: prefix, lt } };
  }

  /**
   * Split a value index key into encoded value and encoded key
   */
  #splitIndexKey(indexKey: Uint8Array): { valueBytes: Uint8Array; keyBytes: Uint8Array } {
    const framed = readFramedBytes(this.indexCollection, indexKey, 0);
    return { valueBytes: framed.value, keyBytes: indexKey.subarray(framed.offset) };
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
   * Store a value, moving the key's value index entry
   * @returns The previous value, if any
   * @throws {UniqueConstraintError} When `unique` is set and another key holds the value
   */
  async insert(key: K, value: V): Promise<V | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    const valueBytes = this.valueCodec.encode(value);

    return this.mutex.withLock(async () => {
      const { prefix, range } = this.#valueRange(valueBytes);

      if (this.unique) {
        for await (const entry of this.store.iterate(this.indexCollection, { ...range, limit: 2 })) {
          if (!equalBytes(entry.key.subarray(prefix.length), keyBytes)) {
            throw new UniqueConstraintError(this.name);
          }
        }
      }

      const prevBytes = await this.store.get(this.collection, keyBytes);
      const prev = prevBytes === undefined ? undefined : this.valueCodec.decode(prevBytes);

      const batch = this.store.batch().put(this.collection, keyBytes, valueBytes);
      if (prevBytes !== undefined && !equalBytes(prevBytes, valueBytes)) {
        batch.delete(this.indexCollection, concatBytes(frameBytes(prevBytes), keyBytes));
      }
      batch.put(this.indexCollection, concatBytes(prefix, keyBytes), EMPTY);
      await batch.write();
      return prev;
    });
  }

  /**
   * Delete a record and its value index entry
   * @returns The removed value, if the key was present
   */
  async remove(key: K): Promise<V | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    return this.mutex.withLock(async () => {
      const prevBytes = await this.store.get(this.collection, keyBytes);
      if (prevBytes === undefined) return undefined;
      const prev = this.valueCodec.decode(prevBytes);

      await this.store
        .batch()
        .delete(this.collection, keyBytes)
        .delete(this.indexCollection, concatBytes(frameBytes(prevBytes), keyBytes))
        .write();
      return prev;
    });
  }

  /**
   * Lazily iterate every key holding a value, in key order
   */
  async *getByValue(value: V, options: ScanOptions = {}): AsyncGenerator<K> {
    const { prefix, range } = this.#valueRange(this.valueCodec.encode(value));
    for await (const entry of this.store.iterate(this.indexCollection, { ...range, ...options })) {
      yield this.keyCodec.decode(entry.key.subarray(prefix.length));
    }
  }

  /**
   * Smallest key holding a value
   */
  async firstKeyByValue(value: V): Promise<K | undefined> {
    return first(this.getByValue(value, { limit: 1 }));
  }

  /**
   * Check whether any key holds a value
   */
  async hasValue(value: V): Promise<boolean> {
    return (await this.countByValue(value)) > 0;
  }

  /**
   * Number of keys holding a value
   */
  async countByValue(value: V): Promise<number> {
    const { range } = this.#valueRange(this.valueCodec.encode(value));
    return this.store.count(this.indexCollection, range);
  }

  /**
   * Lazily iterate records ordered by key
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
   * Lazily iterate records ordered by encoded value, then key
   */
  async *scanByValue(options: ScanOptions = {}): AsyncGenerator<[V, K]> {
    for await (const entry of this.store.iterate(this.indexCollection, options)) {
      const { valueBytes, keyBytes } = this.#splitIndexKey(entry.key);
      yield [this.valueCodec.decode(valueBytes), this.keyCodec.decode(keyBytes)];
    }
  }

  /**
   * Number of records whose keys fall inside a range
   */
  async count(range: Range<K> = {}): Promise<number> {
    return this.store.count(this.collection, encodeRange(this.keyCodec, range));
  }

  /**
   * Compare the value index with the primary collection
   */
  async verify(): Promise<IndexReport> {
    let records = 0;
    let missing = 0;
    for await (const entry of this.store.iterate(this.collection)) {
      records++;
      const indexKey = concatBytes(frameBytes(entry.value), entry.key);
      if ((await this.store.get(this.indexCollection, indexKey)) === undefined) {
        missing++;
      }
    }

    let indexEntries = 0;
    let orphaned = 0;
    for await (const entry of this.store.iterate(this.indexCollection)) {
      indexEntries++;
      const { valueBytes, keyBytes } = this.#splitIndexKey(entry.key);
      const stored = await this.store.get(this.collection, keyBytes);
      if (stored === undefined || !equalBytes(stored, valueBytes)) {
        orphaned++;
      }
    }

    const report: IndexReport = {
      table: this.name,
      records,
      indexEntries,
      missing,
      orphaned,
      ok: missing === 0 && orphaned === 0,
    };
    logger.info("table.verify", {
      table: this.name,
      collection: this.indexCollection,
      details: { ...report },
    });
    return report;
  }

  /**
   * Rebuild the value index from the primary collection in one batch
   * @returns Number of index entries written
   * @throws {IndexCorruptionError} When `unique` is set and two keys hold one value
   */
  async reindex(): Promise<number> {
    return this.mutex.withLock(async () => {
      const batch = this.store.batch();
      for await (const entry of this.store.iterate(this.indexCollection)) {
        batch.delete(this.indexCollection, entry.key);
      }

      const seen = new Set<string>();
      let written = 0;
      for await (const entry of this.store.iterate(this.collection)) {
        const framed = frameBytes(entry.value);
        if (this.unique) {
          const id = Buffer.from(framed).toString("base64");
          if (seen.has(id)) {
            throw new IndexCorruptionError(
              this.collection,
              "two keys hold the same value in a unique table"
            );
          }
          seen.add(id);
        }
        batch.put(this.indexCollection, concatBytes(framed, entry.key), EMPTY);
        written++;
      }

      await batch.write();
      logger.info("table.reindex", {
        table: this.name,
        collection: this.indexCollection,
        details: { written },
      });
      return written;
    });
  }
}
