/**
 * Core types for ordtab
 */

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

/**
 * Bidirectional transformation between a typed value and its bytes
 *
 * Only round-tripping is required: `decode(encode(v))` equals `v`.
 * Codecs are pure; decoding malformed bytes throws EncodingError.
 */
export interface Codec<T> {
  /** Stable name recorded in the catalog, e.g. "string" or "pair(int53,string)" */
  readonly name: string;

  /** Encode a value into bytes */
  encode(value: T): Uint8Array;

  /** Decode bytes produced by encode; the whole input must be consumed */
  decode(bytes: Uint8Array): T;
}

/**
 * Result of reading one self-delimited value out of a longer byte string
 */
export interface Decoded<T> {
  value: T;
  /** Offset of the first byte after the value */
  offset: number;
}

/**
 * Codec whose byte order matches the order of the values it encodes
 *
 * Invariants:
 * - `a < b` implies `compareBytes(encode(a), encode(b)) < 0`
 * - no encoding is a proper prefix of another, so concatenated encodings
 *   sort like tuples of their values
 */
export interface OrderedCodec<T> extends Codec<T> {
  /** Decode one value starting at `offset`, leaving any trailing bytes */
  read(bytes: Uint8Array, offset: number): Decoded<T>;
}

// ---------------------------------------------------------------------------
// Ranges and scans
// ---------------------------------------------------------------------------

/**
 * Interval over typed keys; omitted bounds are open
 */
export interface Range<T> {
  gte?: T;
  gt?: T;
  lte?: T;
  lt?: T;
}

/**
 * Options shared by every scan
 */
export interface ScanOptions {
  /** Iterate in descending order */
  reverse?: boolean;
  /** Stop after this many entries */
  limit?: number;
}

// ---------------------------------------------------------------------------
// Store engine contract
// ---------------------------------------------------------------------------

/**
 * Byte-level iteration options for a single collection
 */
export interface IterateOptions extends Range<Uint8Array>, ScanOptions {}

/**
 * Raw entry yielded by an engine
 */
export interface KVEntry {
  key: Uint8Array;
  value: Uint8Array;
}

/**
 * One write inside an atomic batch
 */
export type BatchOp =
  | { type: "put"; collection: string; key: Uint8Array; value: Uint8Array }
  | { type: "delete"; collection: string; key: Uint8Array };

/**
 * Builder accumulating writes across collections, submitted once
 */
export interface WriteBatch {
  /** Queue a put */
  put(collection: string, key: Uint8Array, value: Uint8Array): this;

  /** Queue a delete */
  delete(collection: string, key: Uint8Array): this;

  /** Queued operations in submission order */
  readonly ops: readonly BatchOp[];

  /** Number of queued operations */
  readonly size: number;

  /** Discard all queued operations */
  clear(): void;

  /** Apply every queued operation as one all-or-nothing unit */
  write(): Promise<void>;
}

/**
 * Embedded ordered byte store with named collections
 *
 * Invariants:
 * - Iteration yields entries in ascending unsigned byte order of keys
 *   (descending with `reverse`)
 * - `write` applies all operations or none; no reader observes a partial batch
 * - Each `iterate` call starts a fresh iteration over the current state
 */
export interface OrderedStore {
  /** Point lookup */
  get(collection: string, key: Uint8Array): Promise<Uint8Array | undefined>;

  /** Single put, equivalent to a one-operation batch */
  put(collection: string, key: Uint8Array, value: Uint8Array): Promise<void>;

  /** Single delete, equivalent to a one-operation batch */
  delete(collection: string, key: Uint8Array): Promise<void>;

  /** Lazy ordered iteration over a byte interval */
  iterate(collection: string, options?: IterateOptions): AsyncIterable<KVEntry>;

  /** Start a new batch against this store */
  batch(): WriteBatch;

  /** Apply operations atomically */
  write(ops: readonly BatchOp[]): Promise<void>;

  /** Names of collections holding at least one entry */
  collections(): Promise<string[]>;

  /** Number of entries in a collection, optionally restricted to an interval */
  count(collection: string, options?: Range<Uint8Array>): Promise<number>;

  /** Release resources; later calls fail with StoreClosedError */
  close(): Promise<void>;

  /** True once close has been called */
  readonly closed: boolean;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * A value together with the timestamp it was recorded at
 */
export interface Stamped<V, T> {
  value: V;
  timestamp: T;
}

/**
 * Entry yielded by time-ordered scans
 */
export interface TimedEntry<K, V, T> {
  timestamp: T;
  key: K;
  value: V;
}

/**
 * Kinds of table recorded in the catalog
 */
export type TableKind = "plain" | "timestamped" | "reversible";

/**
 * Catalog record describing a table and its codecs
 */
export interface CatalogEntry {
  name: string;
  kind: TableKind;
  key: string;
  value: string;
  timestamp?: string;
  unique?: boolean;
  createdAt: string;
}

/**
 * Result of checking a secondary index against its primary collection
 */
export interface IndexReport {
  /** Table name */
  table: string;
  /** Records checked in the primary collection */
  records: number;
  /** Entries present in the index collection */
  indexEntries: number;
  /** Records with no matching index entry */
  missing: number;
  /** Index entries whose record is absent or differs */
  orphaned: number;
  /** True when missing and orphaned are both zero */
  ok: boolean;
}
