/**
 * Database handle: an ordered store plus the catalog of tables created in it
 *
 * Invariants:
 * - Each collection is owned by at most one table instance per Database
 * - A table reopened under an existing name must match the catalog's kind and codecs
 */

import { z } from "zod";
import { resolveOptions, type DatabaseOptions } from "./config.js";
import { FileStore, type FileStoreStatus } from "./engine/file.js";
import { MemoryStore } from "./engine/memory.js";
import { CollectionInUseError, ConfigError, SchemaMismatchError, StoreError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics, type MetricsSnapshot } from "./observability/metrics.js";
import { ReversibleTable, type ReversibleOptions } from "./reversible.js";
import { Table, type TableOptions } from "./table.js";
import { TimestampedTable, type TimestampedOptions } from "./timestamped.js";
import type { CatalogEntry, OrderedStore, TableKind } from "./types.js";

/** Collection holding one catalog entry per table */
export const CATALOG_COLLECTION = "__catalog__";

const TABLE_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const utf8Encoder = new TextEncoder();

const catalogEntrySchema = z.object({
  name: z.string(),
  kind: z.enum(["plain", "timestamped", "reversible"]),
  key: z.string(),
  value: z.string(),
  timestamp: z.string().optional(),
  unique: z.boolean().optional(),
  createdAt: z.string(),
});

/**
 * Counts and metrics of one collection
 */
export interface CollectionStats {
  name: string;
  entries: number;
  metrics: MetricsSnapshot;
}

/**
 * Summary of a table and its collections
 */
export interface TableStats {
  name: string;
  kind: TableKind;
  records: number;
  collections: CollectionStats[];
}

/**
 * Summary of every table in a database
 */
export interface DatabaseStats {
  tables: TableStats[];
  /** Present for file-backed databases */
  file?: FileStoreStatus;
}

/**
 * Collection names used by a table of a given kind
 */
export function collectionsFor(name: string, kind: TableKind): string[] {
  switch (kind) {
    case "plain":
      return [name];
    case "timestamped":
      return [name, `${name}/by_time`];
    case "reversible":
      return [name, `${name}/by_value`];
  }
}

/**
 * Human-readable description of a catalog definition
 */
function describeDefinition(entry: Omit<CatalogEntry, "name" | "createdAt">): string {
  const parts = [`key ${entry.key}`, `value ${entry.value}`];
  if (entry.timestamp !== undefined) parts.push(`timestamp ${entry.timestamp}`);
  if (entry.unique) parts.push("unique");
  return `${entry.kind} table (${parts.join(", ")})`;
}

function parseCatalogEntry(bytes: Uint8Array): CatalogEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new StoreError("Catalog entry is not valid JSON", { cause: err });
  }
  const result = catalogEntrySchema.safeParse(parsed);
  if (!result.success) {
    throw new StoreError("Catalog entry has an unexpected shape", { cause: result.error });
  }
  return result.data;
}

/**
 * Typed tables over one ordered store
 *
 * @example
 * ```typescript
 * const db = await openDatabase({ path: "./data" });
 * const users = await db.table("users", { key: keys.string, value: values.json(userSchema) });
 * await users.insert("ada", { name: "Ada" });
 * await db.close();
 * ```
 */
export class Database {
  #store: OrderedStore;
  #owners = new Map<string, string>();

  constructor(store: OrderedStore) {
    this.#store = store;
  }

  /**
   * Wrap an already opened store
   */
  static fromStore(store: OrderedStore): Database {
    return new Database(store);
  }

  /** Underlying store */
  get store(): OrderedStore {
    return this.#store;
  }

  /**
   * Check or record a table definition and claim its collections
   */
  async #register(definition: Omit<CatalogEntry, "createdAt">): Promise<void> {
    const { name } = definition;
    if (!TABLE_NAME.test(name)) {
      throw new ConfigError(
        `table name "${name}" must start with a letter or digit and contain only letters, digits, ".", "_" or "-"`
      );
    }

    const collections = collectionsFor(name, definition.kind);
    for (const collection of collections) {
      if (this.#owners.has(collection)) {
        throw new CollectionInUseError(collection);
      }
    }

    const catalogKey = utf8Encoder.encode(name);
    const existing = await this.#store.get(CATALOG_COLLECTION, catalogKey);
    if (existing !== undefined) {
      const recorded = parseCatalogEntry(existing);
      const expected = describeDefinition(recorded);
      const actual = describeDefinition(definition);
      if (expected !== actual) {
        throw new SchemaMismatchError(name, expected, actual);
      }
    } else {
      const entry: CatalogEntry = { ...definition, createdAt: new Date().toISOString() };
      const bytes = utf8Encoder.encode(JSON.stringify(entry));
      await this.#store.put(CATALOG_COLLECTION, catalogKey, bytes);
      logger.info("table.create", { table: name, message: describeDefinition(definition) });
    }

    // Re-check after the await: another open of the same name may have claimed it
    for (const collection of collections) {
      if (this.#owners.has(collection)) {
        throw new CollectionInUseError(collection);
      }
    }
    for (const collection of collections) {
      this.#owners.set(collection, name);
    }
  }

  /**
   * Open (or create) a key-value table
   */
  async table<K, V>(name: string, options: TableOptions<K, V>): Promise<Table<K, V>> {
    await this.#register({
      name,
      kind: "plain",
      key: options.key.name,
      value: options.value.name,
    });
    return new Table(this.#store, name, options);
  }

  /**
   * Open (or create) a table indexed by timestamp
   */
  async timestamped<K, V, T>(
    name: string,
    options: TimestampedOptions<K, V, T>
  ): Promise<TimestampedTable<K, V, T>> {
    await this.#register({
      name,
      kind: "timestamped",
      key: options.key.name,
      value: options.value.name,
      timestamp: options.timestamp.name,
    });
    return new TimestampedTable(this.#store, name, options);
  }

  /**
   * Open (or create) a table indexed by value
   */
  async reversible<K, V>(
    name: string,
    options: ReversibleOptions<K, V>
  ): Promise<ReversibleTable<K, V>> {
    await this.#register({
      name,
      kind: "reversible",
      key: options.key.name,
      value: options.value.name,
      unique: options.unique ?? false,
    });
    return new ReversibleTable(this.#store, name, options);
  }

  /**
   * Give up ownership of a table's collections so it can be opened again
   */
  release(table: { name: string; collections: readonly string[] }): void {
    for (const collection of table.collections) {
      if (this.#owners.get(collection) === table.name) {
        this.#owners.delete(collection);
      }
    }
  }

  /**
   * Catalog entry of one table
   */
  async describe(name: string): Promise<CatalogEntry | undefined> {
    const bytes = await this.#store.get(CATALOG_COLLECTION, utf8Encoder.encode(name));
    return bytes === undefined ? undefined : parseCatalogEntry(bytes);
  }

  /**
   * Every table recorded in the catalog, ordered by name
   */
  async tables(): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];
    for await (const entry of this.#store.iterate(CATALOG_COLLECTION)) {
      entries.push(parseCatalogEntry(entry.value));
    }
    return entries;
  }

  /**
   * Record counts and operation metrics for every table
   */
  async stats(): Promise<DatabaseStats> {
    const tables: TableStats[] = [];
    for (const entry of await this.tables()) {
      const collections: CollectionStats[] = [];
      for (const collection of collectionsFor(entry.name, entry.kind)) {
        collections.push({
          name: collection,
          entries: await this.#store.count(collection),
          metrics: metrics.snapshot(collection),
        });
      }
      tables.push({
        name: entry.name,
        kind: entry.kind,
        records: collections[0]?.entries ?? 0,
        collections,
      });
    }

    const stats: DatabaseStats = { tables };
    if (this.#store instanceof FileStore) {
      stats.file = this.#store.status;
    }
    return stats;
  }

  /**
   * Fold the batch log into a snapshot (file-backed databases only)
   * @returns Whether anything was compacted
   */
  async compact(): Promise<boolean> {
    if (this.#store instanceof FileStore) {
      await this.#store.compact();
      return true;
    }
    return false;
  }

  /**
   * Close the underlying store
   */
  async close(): Promise<void> {
    this.#owners.clear();
    await this.#store.close();
  }
}

/**
 * Open a database: file-backed when `path` is given, in memory otherwise
 * @throws {ConfigError} When options fail validation
 */
export async function openDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const resolved = resolveOptions(options);
  const limits = { maxKeyBytes: resolved.maxKeyBytes, maxValueBytes: resolved.maxValueBytes };

  const store =
    resolved.path !== undefined
      ? await FileStore.open({
          ...limits,
          path: resolved.path,
          sync: resolved.sync,
          compactThreshold: resolved.compactThreshold,
        })
      : new MemoryStore(limits);

  logger.info("store.open", {
    message: resolved.path ?? "in-memory",
    details: { sync: resolved.sync, compactThreshold: resolved.compactThreshold },
  });
  return new Database(store);
}
