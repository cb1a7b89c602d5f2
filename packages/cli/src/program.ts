/**
 * ordtab command definitions
 */

import { readFileSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { logger } from "@ordtab/sdk";
import type {
  Database,
  JsonValue,
  Range,
  ReversibleTable,
  ScanOptions,
  TableKind,
  TimestampedTable,
} from "@ordtab/sdk";
import { parseInteger, parseNonNegativeInt } from "./lib/arg.js";
import {
  createTable,
  openTable,
  parseKeyType,
  parseKind,
  toJsonValue,
  withDatabase,
  type CliTable,
  type KeyType,
} from "./lib/database.js";
import { resolvePath } from "./lib/env.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { isStdinTTY, readJsonInput } from "./lib/io.js";
import { colorize, formatBytes, printJson, printLines, printNdjson } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

type GlobalOptions = {
  path?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface CreateOptions {
  kind: TableKind;
  key: KeyType;
  unique?: boolean;
}

interface InputOptions {
  file?: string;
  data?: string;
}

const packageJson: unknown = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf-8")
);
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

function wrongKind(opened: CliTable, expected: TableKind): CliError {
  return new CliError(`Table "${opened.entry.name}" is a ${opened.kind} table, not ${expected}`);
}

function timestampedTable(opened: CliTable): TimestampedTable<string, JsonValue, number> {
  if (opened.kind !== "timestamped") throw wrongKind(opened, "timestamped");
  return opened.table;
}

function reversibleTable(opened: CliTable): ReversibleTable<string, JsonValue> {
  if (opened.kind !== "reversible") throw wrongKind(opened, "reversible");
  return opened.table;
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question(question)).trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

/**
 * Build the ordtab program; parse errors throw instead of exiting
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      // run() reports every error once
      outputError: () => {},
    })
    .exitOverride();

  program
    .name("ordtab")
    .description("ordtab - typed tables with time and value indexes over an ordered store")
    .version(version)
    .option("--path <dir>", "Database directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) {
        logger.setLevel("info");
      }
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const say = (line: string): void => {
    if (!globals().quiet) console.log(line);
  };

  /** Open the database named by the global options, time the command and close it */
  const withDb = <T>(label: string, fn: (db: Database) => Promise<T>): Promise<T> =>
    withTiming(label, () => withDatabase(resolvePath(globals().path), fn), globals().verbose);

  program
    .command("create <table>")
    .description("Create a table, or check an existing one matches")
    .requiredOption("--kind <kind>", "plain, timestamped or reversible", parseKind)
    .option("--key <type>", "Key type: string or int", parseKeyType, "string")
    .option("--unique", "Reject a value held by another key (reversible tables)")
    .action(async (name: string, options: CreateOptions) => {
      if (options.unique && options.kind !== "reversible") {
        throw new InvalidArgumentError("--unique applies to reversible tables only");
      }
      await withDb("cli.create", async (db) => {
        const unique = options.unique ?? false;
        const created = await createTable(db, name, options.kind, options.key, unique);
        say(created ? `Created ${options.kind} table ${name}` : `Table ${name} already exists`);
      });
    });

  program
    .command("tables")
    .description("List tables")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withDb("cli.tables", async (db) => {
        const tables = await db.tables();
        if (options.json) {
          printJson(tables);
          return;
        }
        printLines(
          tables.map((t) => {
            const codecs = [`key=${t.key}`, `value=${t.value}`];
            if (t.timestamp !== undefined) codecs.push(`timestamp=${t.timestamp}`);
            if (t.unique) codecs.push("unique");
            return `${t.name}\t${t.kind}\t${codecs.join(" ")}`;
          })
        );
      });
    });

  program
    .command("put <table> <key>")
    .description("Store or replace a record")
    .option("--file <path>", "Read the value from a JSON file")
    .option("--data <json>", "Inline JSON value")
    .option("--at <ms>", "Timestamp (timestamped tables, default now)", (v) =>
      parseInteger(v, "--at")
    )
    .action(async (name: string, key: string, options: InputOptions & { at?: number }) => {
      const value = toJsonValue(await readJsonInput(options), "input");
      await withDb("cli.put", async (db) => {
        const opened = await openTable(db, name);
        if (opened.kind === "timestamped") {
          await opened.table.insert(key, value, options.at ?? Date.now());
        } else if (options.at !== undefined) {
          throw new InvalidArgumentError("--at applies to timestamped tables only");
        } else {
          await opened.table.insert(key, value);
        }
        say(`Stored ${name}/${key}`);
      });
    });

  program
    .command("get <table> <key>")
    .description("Print the value stored under a key")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (name: string, key: string, options: { raw?: boolean }) => {
      await withDb("cli.get", async (db) => {
        const opened = await openTable(db, name);
        const found = await opened.table.get(key);
        if (found === undefined) {
          throw new CliError(`Record not found: ${name}/${key}`, { exitCode: 2 });
        }
        printJson(found, { raw: options.raw });
      });
    });

  program
    .command("rm <table> <key>")
    .description("Remove a record")
    .option("--force", "Remove without confirmation")
    .action(async (name: string, key: string, options: { force?: boolean }) => {
      if (!options.force) {
        if (!isStdinTTY()) {
          throw new InvalidArgumentError("Use --force to confirm removal in non-interactive mode");
        }
        if (!(await confirm(`Remove ${name}/${key}? (y/N) `))) {
          throw new CliError("Aborted by user", { exitCode: 1 });
        }
      }
      await withDb("cli.rm", async (db) => {
        const opened = await openTable(db, name);
        if ((await opened.table.remove(key)) === undefined) {
          throw new CliError(`Record not found: ${name}/${key}`, { exitCode: 2 });
        }
        say(`Removed ${name}/${key}`);
      });
    });

  program
    .command("scan <table>")
    .description("Print records in key order, one JSON document per line")
    .option("--gte <key>", "Smallest key to include")
    .option("--lte <key>", "Largest key to include")
    .option("--limit <n>", "Maximum number of records", (v) => parseNonNegativeInt(v, "--limit"))
    .option("--reverse", "Descending key order")
    .action(async (name: string, options: { gte?: string; lte?: string } & ScanOptions) => {
      const range: Range<string> = {};
      if (options.gte !== undefined) range.gte = options.gte;
      if (options.lte !== undefined) range.lte = options.lte;
      const scan: ScanOptions = { limit: options.limit, reverse: options.reverse };

      await withDb("cli.scan", async (db) => {
        const opened = await openTable(db, name);
        if (opened.kind === "timestamped") {
          const rows = await collect(opened.table.scan(range, scan));
          printNdjson(rows.map((r) => ({ key: r.key, timestamp: r.timestamp, value: r.value })));
        } else {
          const rows = await collect(opened.table.scan(range, scan));
          printNdjson(rows.map(([key, value]) => ({ key, value })));
        }
      });
    });

  program
    .command("history <table>")
    .description("Print records of a timestamped table in time order")
    .option("--since <ms>", "Earliest timestamp to include", (v) => parseInteger(v, "--since"))
    .option("--until <ms>", "Latest timestamp to include", (v) => parseInteger(v, "--until"))
    .option("--limit <n>", "Maximum number of records", (v) => parseNonNegativeInt(v, "--limit"))
    .option("--reverse", "Newest first")
    .action(async (name: string, options: { since?: number; until?: number } & ScanOptions) => {
      const range: Range<number> = {};
      if (options.since !== undefined) range.gte = options.since;
      if (options.until !== undefined) range.lte = options.until;

      await withDb("cli.history", async (db) => {
        const table = timestampedTable(await openTable(db, name));
        const rows = await collect(
          table.scanByTime(range, { limit: options.limit, reverse: options.reverse })
        );
        printNdjson(rows.map((r) => ({ timestamp: r.timestamp, key: r.key, value: r.value })));
      });
    });

  program
    .command("find <table>")
    .description("Print the keys holding a value in a reversible table")
    .option("--file <path>", "Read the value from a JSON file")
    .option("--data <json>", "Inline JSON value")
    .option("--limit <n>", "Maximum number of keys", (v) => parseNonNegativeInt(v, "--limit"))
    .action(async (name: string, options: InputOptions & { limit?: number }) => {
      const value = toJsonValue(await readJsonInput(options), "input");
      await withDb("cli.find", async (db) => {
        const table = reversibleTable(await openTable(db, name));
        printLines(await collect(table.getByValue(value, { limit: options.limit })));
      });
    });

  program
    .command("verify [table]")
    .description("Check secondary indexes against their tables")
    .option("--repair", "Rebuild inconsistent indexes")
    .action(async (name: string | undefined, options: { repair?: boolean }) => {
      await withDb("cli.verify", async (db) => {
        const names = name !== undefined ? [name] : (await db.tables()).map((t) => t.name);
        let failed = 0;
        for (const tableName of names) {
          const opened = await openTable(db, tableName);
          if (opened.kind === "plain") {
            say(`${tableName}: no index`);
            continue;
          }
          const report = await opened.table.verify();
          if (report.ok) {
            say(
              `${tableName}: ok (${report.records} records, ${report.indexEntries} index entries)`
            );
            continue;
          }
          say(`${tableName}: ${report.missing} missing, ${report.orphaned} orphaned index entries`);
          if (options.repair) {
            say(`${tableName}: rebuilt ${await opened.table.reindex()} index entries`);
          } else {
            failed++;
          }
        }
        if (failed > 0) {
          throw new CliError(`${failed} table(s) have inconsistent indexes; rerun with --repair`);
        }
      });
    });

  program
    .command("compact")
    .description("Fold the batch log into the snapshot")
    .action(async () => {
      await withDb("cli.compact", async (db) => {
        await db.compact();
        say("Compacted batch log into snapshot");
      });
    });

  program
    .command("stats")
    .description("Show record counts and store status")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: { json?: boolean }) => {
      await withDb("cli.stats", async (db) => {
        const stats = await db.stats();
        if (options.json) {
          printJson(stats, { raw: true });
          return;
        }
        for (const table of stats.tables) {
          console.log(`${table.name} (${table.kind}): ${table.records} records`);
          for (const collection of table.collections.slice(1)) {
            console.log(`  ${collection.name}: ${collection.entries} entries`);
          }
        }
        if (stats.file) {
          console.log(
            `Batch log: ${stats.file.logBatches} batches, ` +
              `${formatBytes(stats.file.logBytes)} (seq ${stats.file.seq})`
          );
        }
      });
    });

  return program;
}

/**
 * Parse and execute one command line
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) {
      return 0;
    }
    const verbose = program.opts<GlobalOptions>().verbose ?? false;
    const message = formatCliError(err, verbose).replace(/^error: /, "");
    console.error(`Error: ${message}`);
    return mapErrorToExitCode(err);
  }
}
