/**
 * Basic Usage Example
 *
 * Demonstrates the three kinds of table over an in-memory database.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { z } from "zod";
import { keys, openDatabase, values } from "@ordtab/sdk";

const taskSchema = z.object({
  title: z.string(),
  status: z.enum(["open", "done"]),
});

async function main(): Promise<void> {
  const db = await openDatabase();

  // Plain table: ordered by key
  console.log("Plain table");
  const tasks = await db.table("tasks", { key: keys.string, value: values.json(taskSchema) });
  await tasks.insert("task-2", { title: "Write docs", status: "open" });
  await tasks.insert("task-1", { title: "Ship release", status: "done" });
  for await (const [id, task] of tasks.scan()) {
    console.log(`  ${id}: ${task.title} (${task.status})`);
  }

  // Timestamped table: also ordered by time
  console.log("\nTimestamped table");
  const logins = await db.timestamped("logins", {
    key: keys.string,
    value: values.utf8,
    timestamp: keys.int53,
  });
  await logins.insert("ada", "laptop", 1_700_000_300_000);
  await logins.insert("bob", "phone", 1_700_000_100_000);
  await logins.insert("cyd", "tablet", 1_700_000_200_000);
  for await (const entry of logins.scanByTime({ gte: 1_700_000_150_000 })) {
    console.log(`  ${new Date(entry.timestamp).toISOString()} ${entry.key} on ${entry.value}`);
  }
  console.log(`  latest login: ${await logins.lastTimestamp()}`);

  // Reversible table: keys by value, duplicates allowed
  console.log("\nReversible table");
  const owners = await db.reversible("owners", { key: keys.string, value: values.utf8 });
  await owners.insert("car-1", "ada");
  await owners.insert("car-2", "bob");
  await owners.insert("car-3", "ada");
  for await (const car of owners.getByValue("ada")) {
    console.log(`  ada owns ${car}`);
  }

  const stats = await db.stats();
  console.log("\nTables");
  for (const table of stats.tables) {
    console.log(`  ${table.name} (${table.kind}): ${table.records} records`);
  }

  await db.close();
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
