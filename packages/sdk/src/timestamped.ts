/**
 * Tables that record a timestamp with every value and index records by time
 *
 * Collections:
 * - primary: encode(key) -> encode(timestamp) ++ encode(value)
 * - time index: encode(timestamp) ++ encode(key) -> empty
 *
 * Invariants:
 * - Every record has exactly one time index entry, carrying the record's timestamp
 * - Every write touching both collections is one atomic batch
 */

import { compareBytes, concatBytes, equalBytes, prefixSuccessor, toHex } from "./codec/bytes.js";
import { IndexCorruptionError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { encodeRange, first, TableBase } from "./table.js";
import type {
  Codec,
  IndexReport,
  KVEntry,
  OrderedCodec,
  OrderedStore,
  Range,
  ScanOptions,
  Stamped,
  TimedEntry,
} from "./types.js";

const EMPTY = new Uint8Array(0);

/**
 * Codecs of a timestamped table
 */
export interface TimestampedOptions<K, V, T> {
  key: OrderedCodec<K>;
  value: Codec<V>;
  timestamp: OrderedCodec<T>;
}

/**
 * Options for timestamp navigation
 */
export interface NavigateOptions {
  /** Accept the given timestamp itself */
  inclusive?: boolean;
}

/**
 * Codec for the primary record: the timestamp followed by the value
 */
export function stamped<V, T>(value: Codec<V>, timestamp: OrderedCodec<T>): Codec<Stamped<V, T>> {
  return {
    name: `stamped(${timestamp.name},${value.name})`,
    encode(record: Stamped<V, T>): Uint8Array {
      return concatBytes(timestamp.encode(record.timestamp), value.encode(record.value));
    },
    decode(bytes: Uint8Array): Stamped<V, T> {
      const ts = timestamp.read(bytes, 0);
      return { timestamp: ts.value, value: value.decode(bytes.subarray(ts.offset)) };
    },
  };
}

/**
 * Translate a timestamp range into a byte range over the time index
 *
 * Index keys extend the encoded timestamp, so inclusive upper and exclusive
 * lower bounds must cover every key sharing the timestamp prefix.
 */
export function timeRange<T>(codec: OrderedCodec<T>, range: Range<T> = {}): Range<Uint8Array> {
  const out: Range<Uint8Array> = {};
  const raise = (bound: Uint8Array): void => {
    if (out.gte === undefined || compareBytes(bound, out.gte) > 0) out.gte = bound;
  };
  const lower = (bound: Uint8Array): void => {
    if (out.lt === undefined || compareBytes(bound, out.lt) < 0) out.lt = bound;
  };

  if (range.gte !== undefined) raise(codec.encode(range.gte));
  if (range.gt !== undefined) {
    const bound = prefixSuccessor(codec.encode(range.gt));
    if (bound === undefined) {
      // Nothing sorts after the largest timestamp
      out.gte = codec.encode(range.gt);
      out.lt = out.gte;
      return out;
    }
    raise(bound);
  }
  if (range.lt !== undefined) lower(codec.encode(range.lt));
  if (range.lte !== undefined) {
    const bound = prefixSuccessor(codec.encode(range.lte));
    if (bound !== undefined) lower(bound);
  }
  return out;
}

/**
 * Table whose records carry a timestamp and can be scanned in time order
 *
 * @example
 * ```typescript
 * const events = await db.timestamped("events", {
 *   key: keys.string,
 *   value: values.json(eventSchema),
 *   timestamp: keys.int53,
 * });
 * await events.insert("job-1", { state: "queued" }, Date.now());
 * for await (const { timestamp, key } of events.scanByTime({ gte: since })) { ... }
 * ```
 */
export class TimestampedTable<K, V, T> extends TableBase {
  readonly collection: string;
  readonly indexCollection: string;
  readonly keyCodec: OrderedCodec<K>;
  readonly valueCodec: Codec<V>;
  readonly timestampCodec: OrderedCodec<T>;
  #record: Codec<Stamped<V, T>>;

  constructor(
    store: OrderedStore,
    name: string,
    options: TimestampedOptions<K, V, T>,
    collections: { primary: string; index: string } = { primary: name, index: `${name}/by_time` }
  ) {
    super(store, name);
    this.collection = collections.primary;
    this.indexCollection = collections.index;
    this.keyCodec = options.key;
    this.valueCodec = options.value;
    this.timestampCodec = options.timestamp;
    this.#record = stamped(options.value, options.timestamp);
  }

  get collections(): readonly string[] {
    return [this.collection, this.indexCollection];
  }

  /**
   * Encoded timestamp at the front of a stored record
   */
  #timestampBytes(record: Uint8Array): Uint8Array {
    const { offset } = this.timestampCodec.read(record, 0);
    return record.subarray(0, offset);
  }

  /**
   * Look up a record with its timestamp
   */
  async get(key: K): Promise<Stamped<V, T> | undefined> {
    const bytes = await this.store.get(this.collection, this.keyCodec.encode(key));
    return bytes === undefined ? undefined : this.#record.decode(bytes);
  }

  /**
   * Check whether a key holds a record
   */
  async has(key: K): Promise<boolean> {
    return (await this.store.get(this.collection, this.keyCodec.encode(key))) !== undefined;
  }

  /**
   * Store a value at a timestamp, moving the key's time index entry
   * @returns The previous record, if any
   */
  async insert(key: K, value: V, timestamp: T): Promise<Stamped<V, T> | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    const tsBytes = this.timestampCodec.encode(timestamp);
    const recordBytes = concatBytes(tsBytes, this.valueCodec.encode(value));

    return this.mutex.withLock(async () => {
      const prevBytes = await this.store.get(this.collection, keyBytes);
      const prev = prevBytes === undefined ? undefined : this.#record.decode(prevBytes);

      const batch = this.store.batch().put(this.collection, keyBytes, recordBytes);
      if (prevBytes !== undefined) {
        const prevTs = this.#timestampBytes(prevBytes);
        if (!equalBytes(prevTs, tsBytes)) {
          batch.delete(this.indexCollection, concatBytes(prevTs, keyBytes));
        }
      }
      batch.put(this.indexCollection, concatBytes(tsBytes, keyBytes), EMPTY);
      await batch.write();
      return prev;
    });
  }

  /**
   * Delete a record and its time index entry
   * @returns The removed record, if the key was present
   */
  async remove(key: K): Promise<Stamped<V, T> | undefined> {
    const keyBytes = this.keyCodec.encode(key);
    return this.mutex.withLock(async () => {
      const prevBytes = await this.store.get(this.collection, keyBytes);
      if (prevBytes === undefined) return undefined;
      const prev = this.#record.decode(prevBytes);

      await this.store
        .batch()
        .delete(this.collection, keyBytes)
        .delete(this.indexCollection, concatBytes(this.#timestampBytes(prevBytes), keyBytes))
        .write();
      return prev;
    });
  }

  /**
   * Resolve a time index entry against the primary collection
   * @returns undefined when the entry was moved or removed after the scan started
   * @throws {IndexCorruptionError} When the entry disagrees with the current record
   */
  async #resolve(entry: KVEntry): Promise<TimedEntry<K, V, T> | undefined> {
    const ts = this.timestampCodec.read(entry.key, 0);
    const keyBytes = entry.key.subarray(ts.offset);
    const recordBytes = await this.store.get(this.collection, keyBytes);

    const tsBytes = entry.key.subarray(0, ts.offset);
    if (recordBytes === undefined || !equalBytes(this.#timestampBytes(recordBytes), tsBytes)) {
      // A concurrent insert or remove moves the entry; only a surviving entry is corrupt
      if ((await this.store.get(this.indexCollection, entry.key)) === undefined) {
        return undefined;
      }
      throw new IndexCorruptionError(
        this.indexCollection,
        recordBytes === undefined
          ? `entry ${toHex(entry.key)} has no record`
          : `entry ${toHex(entry.key)} does not match the record's timestamp`
      );
    }

    const record = this.#record.decode(recordBytes);
    return { timestamp: ts.value, key: this.keyCodec.decode(keyBytes), value: record.value };
  }

  /**
   * Lazily iterate records ordered by timestamp, then key
   *
   * Each call starts a fresh iteration over the current contents.
   */
  async *scanByTime(
    range: Range<T> = {},
    options: ScanOptions = {}
  ): AsyncGenerator<TimedEntry<K, V, T>> {
    const entries = this.store.iterate(this.indexCollection, {
      ...timeRange(this.timestampCodec, range),
      ...options,
    });
    for await (const entry of entries) {
      const resolved = await this.#resolve(entry);
      if (resolved) yield resolved;
    }
  }

  /**
   * Lazily iterate records ordered by key
   */
  async *scan(
    range: Range<K> = {},
    options: ScanOptions = {}
  ): AsyncGenerator<TimedEntry<K, V, T>> {
    const entries = this.store.iterate(this.collection, {
      ...encodeRange(this.keyCodec, range),
      ...options,
    });
    for await (const entry of entries) {
      const record = this.#record.decode(entry.value);
      yield {
        timestamp: record.timestamp,
        key: this.keyCodec.decode(entry.key),
        value: record.value,
      };
    }
  }

  /**
   * Number of records whose keys fall inside a range
   */
  async count(range: Range<K> = {}): Promise<number> {
    return this.store.count(this.collection, encodeRange(this.keyCodec, range));
  }

  /**
   * Number of records whose timestamps fall inside a range
   */
  async countByTime(range: Range<T> = {}): Promise<number> {
    return this.store.count(this.indexCollection, timeRange(this.timestampCodec, range));
  }

  /**
   * Timestamp at the front of the first index entry of a byte range
   */
  async #timestampAt(range: Range<Uint8Array>, reverse: boolean): Promise<T | undefined> {
    const entry = await first(
      this.store.iterate(this.indexCollection, { ...range, reverse, limit: 1 })
    );
    return entry === undefined ? undefined : this.timestampCodec.read(entry.key, 0).value;
  }

  /** Earliest recorded timestamp */
  async firstTimestamp(): Promise<T | undefined> {
    return this.#timestampAt({}, false);
  }

  /** Latest recorded timestamp */
  async lastTimestamp(): Promise<T | undefined> {
    return this.#timestampAt({}, true);
  }

  /**
   * Earliest recorded timestamp after `timestamp` (or at it, when inclusive)
   */
  async nextTimestamp(timestamp: T, options: NavigateOptions = {}): Promise<T | undefined> {
    const range = options.inclusive ? { gte: timestamp } : { gt: timestamp };
    return this.#timestampAt(timeRange(this.timestampCodec, range), false);
  }

  /**
   * Latest recorded timestamp before `timestamp` (or at it, when inclusive)
   */
  async previousTimestamp(timestamp: T, options: NavigateOptions = {}): Promise<T | undefined> {
    const range = options.inclusive ? { lte: timestamp } : { lt: timestamp };
    return this.#timestampAt(timeRange(this.timestampCodec, range), true);
  }

  /**
   * Compare the time index with the primary collection
   */
  async verify(): Promise<IndexReport> {
    let records = 0;
    let missing = 0;
    for await (const entry of this.store.iterate(this.collection)) {
      records++;
      const indexKey = concatBytes(this.#timestampBytes(entry.value), entry.key);
      if ((await this.store.get(this.indexCollection, indexKey)) === undefined) {
        missing++;
      }
    }

    let indexEntries = 0;
    let orphaned = 0;
    for await (const entry of this.store.iterate(this.indexCollection)) {
      indexEntries++;
      const ts = this.timestampCodec.read(entry.key, 0);
      const recordBytes = await this.store.get(this.collection, entry.key.subarray(ts.offset));
      if (
        recordBytes === undefined ||
        !equalBytes(this.#timestampBytes(recordBytes), entry.key.subarray(0, ts.offset))
      ) {
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
   * Rebuild the time index from the primary collection in one batch
   * @returns Number of index entries written
   */
  async reindex(): Promise<number> {
    return this.mutex.withLock(async () => {
      const batch = this.store.batch();
      for await (const entry of this.store.iterate(this.indexCollection)) {
        batch.delete(this.indexCollection, entry.key);
      }
      let written = 0;
      for await (const entry of this.store.iterate(this.collection)) {
        const indexKey = concatBytes(this.#timestampBytes(entry.value), entry.key);
        batch.put(this.indexCollection, indexKey, EMPTY);
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
