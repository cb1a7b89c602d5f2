/**
 * Typed tables over an ordered byte store
 */

export * as keys from "./codec/keys.js";
export * as values from "./codec/values.js";
export type { JsonValue } from "./codec/values.js";
export {
  compareBytes,
  concatBytes,
  equalBytes,
  fromHex,
  hasPrefix,
  prefixSuccessor,
  toHex,
} from "./codec/bytes.js";

export { Batch, type BatchSink } from "./engine/batch.js";
export {
  MemoryStore,
  DEFAULT_MAX_KEY_BYTES,
  DEFAULT_MAX_VALUE_BYTES,
  type MemoryStoreOptions,
} from "./engine/memory.js";
export {
  FileStore,
  LOG_FILE,
  SNAPSHOT_FILE,
  DEFAULT_COMPACT_THRESHOLD,
  type FileStoreOptions,
  type FileStoreStatus,
  type RecoveryReport,
} from "./engine/file.js";

export { Table, TableBase, encodeRange, type TableOptions } from "./table.js";
export {
  TimestampedTable,
  stamped,
  timeRange,
  type NavigateOptions,
  type TimestampedOptions,
} from "./timestamped.js";
export { ReversibleTable, type ReversibleOptions } from "./reversible.js";
export {
  Database,
  openDatabase,
  collectionsFor,
  CATALOG_COLLECTION,
  type CollectionStats,
  type DatabaseStats,
  type TableStats,
} from "./database.js";
export {
  DatabaseOptionsSchema,
  resolveOptions,
  type DatabaseOptions,
  type ResolvedOptions,
} from "./config.js";

export {
  OrdtabError,
  EncodingError,
  StoreError,
  StoreClosedError,
  IndexCorruptionError,
  UniqueConstraintError,
  CollectionInUseError,
  SchemaMismatchError,
  ConfigError,
} from "./errors.js";

export { logger, type LogEntry, type LogLevel } from "./observability/logs.js";
export {
  metrics,
  type CollectionMetrics,
  type MetricsSnapshot,
} from "./observability/metrics.js";

export type {
  BatchOp,
  CatalogEntry,
  Codec,
  Decoded,
  IndexReport,
  IterateOptions,
  KVEntry,
  OrderedCodec,
  OrderedStore,
  Range,
  ScanOptions,
  Stamped,
  TableKind,
  TimedEntry,
  WriteBatch,
} from "./types.js";
