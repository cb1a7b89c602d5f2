/**
 * Error types for table and store operations
 *
 * Invariants:
 * - Every error carries a stable `name` and `code` for programmatic handling
 * - Every error accepts a `cause` for wrapping underlying failures
 * - Absence of a record is never an error; lookups return `undefined`
 */

/**
 * Base class for all ordtab errors
 */
export abstract class OrdtabError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when bytes cannot be decoded, or a value cannot be encoded, by a codec
 */
export class EncodingError extends OrdtabError {
  readonly code = "E_ENCODING";

  constructor(
    public readonly codec: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Codec "${codec}": ${reason}`, options);
  }
}

/**
 * Thrown by a store engine when a read or a batch cannot be applied
 */
export class StoreError extends OrdtabError {
  readonly code: string = "E_STORE";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when an operation reaches a store that has been closed
 */
export class StoreClosedError extends StoreError {
  override readonly code = "E_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Store is closed", options);
  }
}

/**
 * Thrown when a secondary index entry does not agree with its primary record
 */
export class IndexCorruptionError extends OrdtabError {
  readonly code = "E_INDEX";

  constructor(
    public readonly collection: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Index "${collection}" is inconsistent: ${reason}`, options);
  }
}

/**
 * Thrown when a unique reversible table already maps a value to another key
 */
export class UniqueConstraintError extends OrdtabError {
  readonly code = "E_UNIQUE";

  constructor(
    public readonly table: string,
    options?: ErrorOptions
  ) {
    super(`Table "${table}" already holds this value under a different key`, options);
  }
}

/**
 * Thrown when a second table tries to claim a collection that is already owned
 */
export class CollectionInUseError extends OrdtabError {
  readonly code = "E_IN_USE";

  constructor(
    public readonly collection: string,
    options?: ErrorOptions
  ) {
    super(`Collection "${collection}" is already owned by another table`, options);
  }
}

/**
 * Thrown when a table is opened with a kind or codecs that differ from the catalog
 */
export class SchemaMismatchError extends OrdtabError {
  readonly code = "E_SCHEMA";

  constructor(
    public readonly table: string,
    public readonly expected: string,
    public readonly actual: string,
    options?: ErrorOptions
  ) {
    super(`Table "${table}" was created as ${expected}, not ${actual}`, options);
  }
}

/**
 * Thrown when database options or a table definition fail validation
 */
export class ConfigError extends OrdtabError {
  readonly code = "E_CONFIG";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid configuration: ${reason}`, options);
  }
}
