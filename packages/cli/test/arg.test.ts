/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseInteger, parseJson, parseNonNegativeInt } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "--limit")).toBe(0);
      expect(parseNonNegativeInt(" 42 ", "--limit")).toBe(42);
      expect(parseNonNegativeInt("10000", "--limit")).toBe(10000);
    });

    it("should reject negative and non-numeric values", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "--limit")).toThrow(
        "--limit must be a non-negative integer"
      );
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("10001", "--limit")).toThrow("--limit must be <= 10000");
    });
  });

  describe("parseInteger", () => {
    it("should parse signed integers", () => {
      expect(parseInteger("-5", "--at")).toBe(-5);
      expect(parseInteger("1700000000000", "--at")).toBe(1700000000000);
    });

    it("should reject fractions and text", () => {
      expect(() => parseInteger("1.5", "--at")).toThrow("--at must be an integer");
      expect(() => parseInteger("soon", "key")).toThrow("key must be an integer");
    });

    it("should reject integers beyond the safe range", () => {
      expect(() => parseInteger("9007199254740993", "--at")).toThrow(
        "--at is outside the safe integer range"
      );
    });
  });

  describe("parseJson", () => {
    it("should parse JSON and strip a BOM", () => {
      expect(parseJson('{"a":1}', "--data")).toEqual({ a: 1 });
      expect(parseJson("\uFEFF[1,2]", "stdin")).toEqual([1, 2]);
    });

    it("should name the source of invalid JSON", () => {
      expect(() => parseJson("{oops", "--data")).toThrow(/^Invalid JSON in --data: /);
    });
  });
});
