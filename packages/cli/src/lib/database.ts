/**
 * Opening databases and tables from the command line
 *
 * The CLI stores JSON values under string or integer keys, with integer
 * millisecond timestamps. Tables created through the library with other
 * codecs are listed but cannot be read here.
 */

import { InvalidArgumentError } from "commander";
import { keys, openDatabase, values } from "@ordtab/sdk";
import type {
  CatalogEntry,
  Database,
  JsonValue,
  OrderedCodec,
  ReversibleTable,
  Table,
  TableKind,
  TimestampedTable,
} from "@ordtab/sdk";
import { parseInteger } from "./arg.js";
import { CliError } from "./errors.js";

/** Key codecs the CLI can read, by option value */
export const KEY_TYPES = { string: "string", int: "int53" } as const;

export type KeyType = keyof typeof KEY_TYPES;

const jsonCodec = values.json(values.jsonValue);

/**
 * Table opened with CLI codecs; keys are always handled as strings
 */
export type CliTable =
  | { kind: "plain"; entry: CatalogEntry; table: Table<string, JsonValue> }
  | { kind: "timestamped"; entry: CatalogEntry; table: TimestampedTable<string, JsonValue, number> }
  | { kind: "reversible"; entry: CatalogEntry; table: ReversibleTable<string, JsonValue> };

/**
 * Key codec that takes and returns the key's command line spelling
 */
export function keyCodec(type: KeyType): OrderedCodec<string> {
  if (type === "string") {
    return keys.string;
  }
  return {
    name: keys.int53.name,
    encode: (key) => keys.int53.encode(parseInteger(key, "key")),
    decode: (bytes) => String(keys.int53.decode(bytes)),
    read: (bytes, offset) => {
      const decoded = keys.int53.read(bytes, offset);
      return { value: String(decoded.value), offset: decoded.offset };
    },
  };
}

/**
 * Narrow a command line string to a key type
 */
export function parseKeyType(value: string): KeyType {
  if (value === "string" || value === "int") {
    return value;
  }
  throw new InvalidArgumentError(`Unknown key type "${value}" (expected string or int)`);
}

/**
 * Narrow a command line string to a table kind
 */
export function parseKind(value: string): TableKind {
  if (value === "plain" || value === "timestamped" || value === "reversible") {
    return value;
  }
  throw new InvalidArgumentError(
    `Unknown table kind "${value}" (expected plain, timestamped or reversible)`
  );
}

function keyTypeOf(entry: CatalogEntry): KeyType {
  if (entry.key === KEY_TYPES.string) return "string";
  if (entry.key === KEY_TYPES.int) return "int";
  throw new CliError(`Table "${entry.name}" uses key codec "${entry.key}", which the CLI cannot read`);
}

/**
 * Open a file-backed database for one command
 */
export async function openCliDatabase(path: string): Promise<Database> {
  return openDatabase({ path });
}

/**
 * Run a command against an open database, closing it afterwards
 */
export async function withDatabase<T>(path: string, fn: (db: Database) => Promise<T>): Promise<T> {
  const db = await openCliDatabase(path);
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}

/**
 * Create a table, or check an existing one against the requested definition
 * @returns Whether the table was newly created
 */
export async function createTable(
  db: Database,
  name: string,
  kind: TableKind,
  keyType: KeyType,
  unique: boolean
): Promise<boolean> {
  const existed = (await db.describe(name)) !== undefined;
  const key = keyCodec(keyType);
  switch (kind) {
    case "plain":
      await db.table(name, { key, value: jsonCodec });
      break;
    case "timestamped":
      await db.timestamped(name, { key, value: jsonCodec, timestamp: keys.int53 });
      break;
    case "reversible":
      await db.reversible(name, { key, value: jsonCodec, unique });
      break;
  }
  return !existed;
}

/**
 * Open a table recorded in the catalog with the CLI codecs
 * @throws {CliError} exit code 2 when the table does not exist
 */
export async function openTable(db: Database, name: string): Promise<CliTable> {
  const entry = await db.describe(name);
  if (entry === undefined) {
    throw new CliError(`Table not found: ${name}`, { exitCode: 2 });
  }
  if (entry.value !== jsonCodec.name) {
    throw new CliError(`Table "${name}" uses value codec "${entry.value}", which the CLI cannot read`);
  }

  const key = keyCodec(keyTypeOf(entry));
  switch (entry.kind) {
    case "plain":
      return { kind: "plain", entry, table: await db.table(name, { key, value: jsonCodec }) };
    case "timestamped":
      if (entry.timestamp !== keys.int53.name) {
        throw new CliError(
          `Table "${name}" uses timestamp codec "${entry.timestamp ?? "none"}", which the CLI cannot read`
        );
      }
      return {
        kind: "timestamped",
        entry,
        table: await db.timestamped(name, { key, value: jsonCodec, timestamp: keys.int53 }),
      };
    case "reversible":
      return {
        kind: "reversible",
        entry,
        table: await db.reversible(name, { key, value: jsonCodec, unique: entry.unique ?? false }),
      };
  }
}

/**
 * Check that a JSON input is a storable value
 */
export function toJsonValue(input: unknown, source: string): JsonValue {
  const result = values.jsonValue.safeParse(input);
  if (!result.success) {
    throw new CliError(`${source} is not a JSON value`, { cause: result.error });
  }
  return result.data;
}
