import { describe, it, expect, beforeEach } from "vitest";
import { bytes as b, text as s } from "@ordtab/testkit";
import { MemoryStore } from "./memory.js";
import { StoreClosedError, StoreError } from "../errors.js";
import type { KVEntry } from "../types.js";

async function keysOf(entries: AsyncIterable<KVEntry>): Promise<string[]> {
  const out: string[] = [];
  for await (const entry of entries) {
    out.push(s(entry.key) ?? "");
  }
  return out;
}

describe("MemoryStore", () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = new MemoryStore();
    const batch = store.batch();
    for (const key of ["d", "b", "a", "e", "c"]) {
      batch.put("letters", b(key), b(key.toUpperCase()));
    }
    await batch.write();
  });

  describe("point operations", () => {
    it("should get, overwrite and delete values", async () => {
      expect(s(await store.get("letters", b("c")))).toBe("C");

      await store.put("letters", b("c"), b("see"));
      expect(s(await store.get("letters", b("c")))).toBe("see");

      await store.delete("letters", b("c"));
      expect(await store.get("letters", b("c"))).toBeUndefined();
      expect(await store.count("letters")).toBe(4);
    });

    it("should keep collections separate", async () => {
      await store.put("other", b("a"), b("1"));
      expect(s(await store.get("other", b("a")))).toBe("1");
      expect(s(await store.get("letters", b("a")))).toBe("A");
      expect(await store.collections()).toEqual(["letters", "other"]);
    });

    it("should ignore deletes of missing keys", async () => {
      await store.delete("letters", b("zz"));
      await store.delete("missing", b("a"));
      expect(await store.count("letters")).toBe(5);
    });

    it("should drop a collection once its last entry is deleted", async () => {
      await store.put("solo", b("k"), b("v"));
      await store.delete("solo", b("k"));
      expect(await store.collections()).toEqual(["letters"]);
    });

    it("should copy stored and returned buffers", async () => {
      const key = b("x");
      const value = b("1");
      await store.put("letters", key, value);
      value[0] = 0x32;

      const read = await store.get("letters", key);
      expect(s(read)).toBe("1");
      read?.set([0x33]);
      expect(s(await store.get("letters", key))).toBe("1");
    });
  });

  describe("iterate", () => {
    it("should yield keys in ascending order", async () => {
      expect(await keysOf(store.iterate("letters"))).toEqual(["a", "b", "c", "d", "e"]);
    });

    it("should honour inclusive and exclusive bounds", async () => {
      expect(await keysOf(store.iterate("letters", { gte: b("b"), lt: b("d") }))).toEqual([
        "b",
        "c",
      ]);
      expect(await keysOf(store.iterate("letters", { gt: b("b"), lte: b("d") }))).toEqual([
        "c",
        "d",
      ]);
      expect(await keysOf(store.iterate("letters", { gte: b("bb") }))).toEqual(["c", "d", "e"]);
    });

    it("should iterate in reverse with a limit", async () => {
      expect(await keysOf(store.iterate("letters", { reverse: true, limit: 2 }))).toEqual([
        "e",
        "d",
      ]);
      expect(
        await keysOf(store.iterate("letters", { lt: b("d"), reverse: true, limit: 2 }))
      ).toEqual(["c", "b"]);
    });

    it("should yield nothing for empty or inverted ranges", async () => {
      expect(await keysOf(store.iterate("letters", { gte: b("d"), lt: b("b") }))).toEqual([]);
      expect(await keysOf(store.iterate("letters", { limit: 0 }))).toEqual([]);
      expect(await keysOf(store.iterate("nothing"))).toEqual([]);
    });

    it("should not observe writes made after iteration starts", async () => {
      const seen: string[] = [];
      for await (const entry of store.iterate("letters")) {
        seen.push(s(entry.key) ?? "");
        if (seen.length === 1) {
          await store.batch().put("letters", b("aa"), b("AA")).delete("letters", b("e")).write();
        }
      }
      expect(seen).toEqual(["a", "b", "c", "d", "e"]);
      expect(await keysOf(store.iterate("letters"))).toEqual(["a", "aa", "b", "c", "d"]);
    });

    it("should restart from the current state on every call", async () => {
      const iterable = store.iterate("letters", { limit: 1 });
      expect(await keysOf(iterable)).toEqual(["a"]);
      await store.delete("letters", b("a"));
      expect(await keysOf(store.iterate("letters", { limit: 1 }))).toEqual(["b"]);
    });

    it("should reject negative limits", async () => {
      await expect(keysOf(store.iterate("letters", { limit: -1 }))).rejects.toThrow(
        /Invalid scan limit/
      );
    });

    it("should count entries inside a range", async () => {
      expect(await store.count("letters", { gt: b("a"), lt: b("e") })).toBe(3);
    });
  });

  describe("batches", () => {
    it("should apply operations in order", async () => {
      await store
        .batch()
        .put("letters", b("z"), b("1"))
        .delete("letters", b("z"))
        .put("letters", b("y"), b("2"))
        .put("letters", b("y"), b("3"))
        .write();

      expect(await store.get("letters", b("z"))).toBeUndefined();
      expect(s(await store.get("letters", b("y")))).toBe("3");
    });

    it("should leave every collection unchanged when one operation is invalid", async () => {
      const limited = new MemoryStore({ maxKeyBytes: 4 });
      await limited.put("a", b("k"), b("v"));

      const batch = limited
        .batch()
        .put("a", b("k2"), b("v2"))
        .delete("a", b("k"))
        .put("b", b("too-long-key"), b("v"));
      await expect(batch.write()).rejects.toThrow(StoreError);

      expect(s(await limited.get("a", b("k")))).toBe("v");
      expect(await limited.get("a", b("k2"))).toBeUndefined();
      expect(await limited.collections()).toEqual(["a"]);
      expect(batch.size).toBe(3);
    });

    it("should enforce the value size limit", async () => {
      const limited = new MemoryStore({ maxValueBytes: 2 });
      await expect(limited.put("a", b("k"), b("abc"))).rejects.toThrow(
        "Batch operation 0: value of 3 bytes exceeds the 2 byte limit"
      );
    });

    it("should reject empty collection names", async () => {
      await expect(store.put("", b("k"), b("v"))).rejects.toThrow(/non-empty string/);
    });

    it("should clear a batch after a successful write", async () => {
      const batch = store.batch().put("letters", b("q"), b("Q"));
      expect(batch.size).toBe(1);
      await batch.write();
      expect(batch.size).toBe(0);
      expect(batch.ops).toEqual([]);
    });
  });

  describe("close", () => {
    it("should reject operations once closed", async () => {
      await store.close();
      expect(store.closed).toBe(true);
      await expect(store.get("letters", b("a"))).rejects.toThrow(StoreClosedError);
      await expect(store.put("letters", b("a"), b("A"))).rejects.toThrow(StoreClosedError);
      await expect(keysOf(store.iterate("letters"))).rejects.toThrow(StoreClosedError);
    });

    it("should stop an iteration in progress", async () => {
      const seen: string[] = [];
      const run = async (): Promise<void> => {
        for await (const entry of store.iterate("letters")) {
          seen.push(s(entry.key) ?? "");
          await store.close();
        }
      };
      await expect(run()).rejects.toThrow(StoreClosedError);
      expect(seen).toEqual(["a"]);
    });
  });
});
