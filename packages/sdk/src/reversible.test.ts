import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { collect, FlakyStore } from "@ordtab/testkit";
import { concatBytes } from "./codec/bytes.js";
import { frameBytes, int53, string } from "./codec/keys.js";
import { json, utf8 } from "./codec/values.js";
import { MemoryStore } from "./engine/memory.js";
import { EncodingError, IndexCorruptionError, StoreError, UniqueConstraintError } from "./errors.js";
import { ReversibleTable } from "./reversible.js";

describe("ReversibleTable", () => {
  let store: MemoryStore;
  let owners: ReversibleTable<string, string>;

  beforeEach(() => {
    store = new MemoryStore();
    owners = new ReversibleTable(store, "owners", { key: string, value: utf8 });
  });

  it("should find every key holding a duplicated value in key order", async () => {
    await owners.insert("k2", "x");
    await owners.insert("k1", "x");
    await owners.insert("k3", "y");

    expect(await collect(owners.getByValue("x"))).toEqual(["k1", "k2"]);
    expect(await owners.firstKeyByValue("x")).toBe("k1");
    expect(await owners.countByValue("x")).toBe(2);
    expect(await owners.hasValue("z")).toBe(false);
  });

  it("should follow a key when its value changes", async () => {
    await owners.insert("k", "old");
    expect(await owners.insert("k", "new")).toBe("old");

    expect(await collect(owners.getByValue("old"))).toEqual([]);
    expect(await collect(owners.getByValue("new"))).toEqual(["k"]);
    expect(await store.count("owners/by_value")).toBe(1);
  });

  it("should drop the index entry on remove", async () => {
    await owners.insert("k", "v");
    expect(await owners.remove("k")).toBe("v");
    expect(await owners.remove("k")).toBeUndefined();
    expect(await owners.hasValue("v")).toBe(false);
    expect(await owners.get("k")).toBeUndefined();
  });

  it("should not confuse values that share a prefix", async () => {
    await owners.insert("a", "ab");
    await owners.insert("b", "a");
    await owners.insert("c", "a\u0000");

    expect(await collect(owners.getByValue("a"))).toEqual(["b"]);
    expect(await collect(owners.getByValue("ab"))).toEqual(["a"]);
    expect(await collect(owners.getByValue("a\u0000"))).toEqual(["c"]);
  });

  it("should scan by key and by value", async () => {
    await owners.insert("k1", "b");
    await owners.insert("k2", "a");
    await owners.insert("k3", "b");

    expect(await collect(owners.scan())).toEqual([
      ["k1", "b"],
      ["k2", "a"],
      ["k3", "b"],
    ]);
    expect(await collect(owners.scanByValue())).toEqual([
      ["a", "k2"],
      ["b", "k1"],
      ["b", "k3"],
    ]);
    expect(await owners.count({ gte: "k2" })).toBe(2);
  });

  it("should index structured values by their canonical encoding", async () => {
    const tags = new ReversibleTable(store, "tags", {
      key: int53,
      value: json(z.object({ color: z.string(), size: z.number() })),
    });
    await tags.insert(1, { color: "red", size: 2 });
    await tags.insert(2, { size: 2, color: "red" });

    expect(await collect(tags.getByValue({ color: "red", size: 2 }))).toEqual([1, 2]);
  });

  describe("unique policy", () => {
    let unique: ReversibleTable<string, string>;

    beforeEach(() => {
      unique = new ReversibleTable(store, "emails", { key: string, value: utf8, unique: true });
    });

    it("should reject a value held by another key and write nothing", async () => {
      await unique.insert("u1", "a@example.com");
      await expect(unique.insert("u2", "a@example.com")).rejects.toThrow(UniqueConstraintError);

      expect(await unique.get("u2")).toBeUndefined();
      expect(await collect(unique.getByValue("a@example.com"))).toEqual(["u1"]);
    });

    it("should allow a key to keep or change its own value", async () => {
      await unique.insert("u1", "a@example.com");
      expect(await unique.insert("u1", "a@example.com")).toBe("a@example.com");
      expect(await unique.insert("u1", "b@example.com")).toBe("a@example.com");
      await unique.insert("u2", "a@example.com");

      expect(await collect(unique.getByValue("a@example.com"))).toEqual(["u2"]);
    });

    it("should refuse to rebuild an index over duplicated values", async () => {
      await store.put("emails", string.encode("u1"), utf8.encode("same"));
      await store.put("emails", string.encode("u2"), utf8.encode("same"));
      await expect(unique.reindex()).rejects.toThrow(IndexCorruptionError);
    });
  });

  describe("index consistency", () => {
    it("should detect and repair a stale index entry", async () => {
      await owners.insert("k", "v");
      await store.put(
        "owners/by_value",
        concatBytes(frameBytes(utf8.encode("stale")), string.encode("k")),
        new Uint8Array(0)
      );
      await store.put("owners", string.encode("lost"), utf8.encode("w"));

      expect(await owners.verify()).toEqual({
        table: "owners",
        records: 2,
        indexEntries: 2,
        missing: 1,
        orphaned: 1,
        ok: false,
      });

      expect(await owners.reindex()).toBe(2);
      expect((await owners.verify()).ok).toBe(true);
      expect(await collect(owners.getByValue("stale"))).toEqual([]);
      expect(await collect(owners.getByValue("w"))).toEqual(["lost"]);
    });
  });

  describe("size limits", () => {
    it("should refuse a value whose index key exceeds the store's key limit", async () => {
      const small = new MemoryStore({ maxKeyBytes: 16 });
      const table = new ReversibleTable(small, "owners", { key: string, value: utf8 });

      // frame("v" * 11) is 13 bytes, frame("k") is 3
      await table.insert("k", "v".repeat(11));
      await expect(table.insert("k", "v".repeat(12))).rejects.toThrow(
        "key of 17 bytes exceeds the 16 byte limit"
      );

      expect(await table.get("k")).toBe("v".repeat(11));
      expect(await small.count("owners/by_value")).toBe(1);
    });
  });

  describe("atomicity", () => {
    it("should write nothing when the value cannot be encoded", async () => {
      const flaky = new FlakyStore(store);
      const counters = new ReversibleTable(flaky, "counters", {
        key: string,
        value: json(z.object({ n: z.number() })),
      });
      await counters.insert("k", { n: 1 });

      await expect(counters.insert("k", { n: Number.NaN })).rejects.toThrow(EncodingError);
      await expect(counters.insert("j", { n: Number.POSITIVE_INFINITY })).rejects.toThrow(
        EncodingError
      );

      expect(flaky.writes).toHaveLength(1);
      expect(await counters.get("k")).toEqual({ n: 1 });
      expect(await store.count("counters/by_value")).toBe(1);
      expect(await counters.remove("k")).toEqual({ n: 1 });
      expect(await store.count("counters/by_value")).toBe(0);
    });


    it("should leave both collections untouched when the batch fails", async () => {
      const flaky = new FlakyStore(store);
      const table = new ReversibleTable(flaky, "owners", { key: string, value: utf8 });
      await table.insert("k", "v");

      flaky.failWhen((ops) => ops.some((op) => op.collection === "owners/by_value"));
      await expect(table.insert("k", "w")).rejects.toThrow(StoreError);
      await expect(table.remove("k")).rejects.toThrow(StoreError);
      flaky.failWhen(undefined);

      expect(flaky.failures).toBe(2);
      expect(flaky.writes.map((ops) => ops.length)).toEqual([2]);
      expect(await table.get("k")).toBe("v");
      expect(await collect(table.getByValue("v"))).toEqual(["k"]);
      expect(await collect(table.getByValue("w"))).toEqual([]);
    });
  });
});
