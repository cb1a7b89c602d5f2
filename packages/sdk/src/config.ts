/**
 * Database options and their defaults
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_COMPACT_THRESHOLD } from "./engine/file.js";
import { DEFAULT_MAX_KEY_BYTES, DEFAULT_MAX_VALUE_BYTES } from "./engine/memory.js";

export const DatabaseOptionsSchema = z
  .object({
    /** Database directory; omitted for an in-memory database */
    path: z.string().min(1).optional(),
    /** Fsync the batch log after every batch */
    sync: z.boolean().default(true),
    /** Batches kept in the log before it is folded into the snapshot */
    compactThreshold: z.number().int().positive().default(DEFAULT_COMPACT_THRESHOLD),
    /** Largest accepted key in bytes */
    maxKeyBytes: z.number().int().positive().default(DEFAULT_MAX_KEY_BYTES),
    /** Largest accepted value in bytes */
    maxValueBytes: z.number().int().positive().default(DEFAULT_MAX_VALUE_BYTES),
  })
  .strict();

/**
 * Options accepted by openDatabase
 */
export type DatabaseOptions = z.input<typeof DatabaseOptionsSchema>;

/**
 * Options with every default filled in
 */
export type ResolvedOptions = z.output<typeof DatabaseOptionsSchema>;

/**
 * Validate options and apply defaults
 * @throws {ConfigError} When an option has the wrong type or range, or is unknown
 */
export function resolveOptions(options: DatabaseOptions = {}): ResolvedOptions {
  const result = DatabaseOptionsSchema.safeParse(options);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      .join("; ");
    throw new ConfigError(reason, { cause: result.error });
  }
  return result.data;
}
