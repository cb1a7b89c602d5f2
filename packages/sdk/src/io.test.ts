import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@ordtab/testkit";
import { atomicWrite, ensureDirectory, errorCode, readTextFile } from "./io.js";
import { StoreError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read a file", async () => {
      const filePath = join(testDir, "snapshot.json");
      await atomicWrite(filePath, '{"seq":1}');
      expect(await readTextFile(filePath)).toBe('{"seq":1}');
    });

    it("should not leave temp files after a successful write", async () => {
      await atomicWrite(join(testDir, "snapshot.json"), "data");
      expect(await readdir(testDir)).toEqual(["snapshot.json"]);
    });

    it("should replace an existing file", async () => {
      const filePath = join(testDir, "snapshot.json");
      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");
      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "a", "b", "snapshot.json");
      await atomicWrite(filePath, "nested");
      expect(await readTextFile(filePath)).toBe("nested");
    });

    it("should fail with StoreError and clean up when the target is a directory", async () => {
      await ensureDirectory(join(testDir, "taken"));
      await expect(atomicWrite(join(testDir, "taken"), "data")).rejects.toThrow(StoreError);
      expect(await readdir(testDir)).toEqual(["taken"]);
    });
  });

  describe("readTextFile", () => {
    it("should return undefined for a missing file", async () => {
      expect(await readTextFile(join(testDir, "missing.log"))).toBeUndefined();
    });

    it("should wrap other failures in StoreError", async () => {
      await expect(readTextFile(testDir)).rejects.toThrow(`Failed to read file: ${testDir}`);
    });
  });

  describe("ensureDirectory", () => {
    it("should be idempotent", async () => {
      const dir = join(testDir, "data");
      await ensureDirectory(dir);
      await ensureDirectory(dir);
      expect(await readdir(testDir)).toEqual(["data"]);
    });

    it("should fail when a file is in the way", async () => {
      const file = join(testDir, "file");
      await writeFile(file, "x");
      await expect(ensureDirectory(join(file, "sub"))).rejects.toThrow(StoreError);
    });
  });

  describe("errorCode", () => {
    it("should read the errno code of a system error", async () => {
      const err = await readTextFile(testDir).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(StoreError);
      expect(err instanceof Error ? errorCode(err.cause) : undefined).toBe("EISDIR");
    });

    it("should ignore values without a string code", () => {
      expect(errorCode(new Error("plain"))).toBeUndefined();
      expect(errorCode("ENOENT")).toBeUndefined();
    });
  });
});
