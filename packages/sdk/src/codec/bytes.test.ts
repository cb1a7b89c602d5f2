import { describe, it, expect } from "vitest";
import {
  compareBytes,
  concatBytes,
  equalBytes,
  fromHex,
  hasPrefix,
  prefixSuccessor,
  toHex,
} from "./bytes.js";

describe("compareBytes", () => {
  it("should compare unsigned and lexicographically", () => {
    expect(compareBytes(Uint8Array.of(1), Uint8Array.of(2))).toBeLessThan(0);
    expect(compareBytes(Uint8Array.of(0x80), Uint8Array.of(0x7f))).toBeGreaterThan(0);
    expect(compareBytes(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(0);
  });

  it("should order a prefix before its extensions", () => {
    expect(compareBytes(Uint8Array.of(1), Uint8Array.of(1, 0))).toBeLessThan(0);
    expect(compareBytes(Uint8Array.of(), Uint8Array.of(0))).toBeLessThan(0);
  });
});

describe("equalBytes and hasPrefix", () => {
  it("should check equality", () => {
    expect(equalBytes(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
    expect(equalBytes(Uint8Array.of(1, 2), Uint8Array.of(1))).toBe(false);
  });

  it("should check prefixes", () => {
    expect(hasPrefix(Uint8Array.of(1, 2, 3), Uint8Array.of(1, 2))).toBe(true);
    expect(hasPrefix(Uint8Array.of(1, 2, 3), Uint8Array.of())).toBe(true);
    expect(hasPrefix(Uint8Array.of(1), Uint8Array.of(1, 2))).toBe(false);
  });
});

describe("concatBytes", () => {
  it("should join parts into a new buffer", () => {
    const a = Uint8Array.of(1);
    const joined = concatBytes(a, Uint8Array.of(2, 3), Uint8Array.of());
    expect(joined).toEqual(Uint8Array.of(1, 2, 3));

    const single = concatBytes(a);
    single[0] = 9;
    expect(a[0]).toBe(1);
  });
});

describe("prefixSuccessor", () => {
  it("should increment the last byte", () => {
    expect(prefixSuccessor(Uint8Array.of(1, 2))).toEqual(Uint8Array.of(1, 3));
  });

  it("should drop trailing 0xff bytes", () => {
    expect(prefixSuccessor(Uint8Array.of(1, 0xff, 0xff))).toEqual(Uint8Array.of(2));
  });

  it("should return undefined when no successor exists", () => {
    expect(prefixSuccessor(Uint8Array.of())).toBeUndefined();
    expect(prefixSuccessor(Uint8Array.of(0xff, 0xff))).toBeUndefined();
  });

  it("should not modify its input", () => {
    const input = Uint8Array.of(4, 5);
    prefixSuccessor(input);
    expect(input).toEqual(Uint8Array.of(4, 5));
  });
});

describe("hex", () => {
  it("should round trip", () => {
    expect(toHex(Uint8Array.of(0, 10, 255))).toBe("000aff");
    expect(fromHex("000AFF")).toEqual(Uint8Array.of(0, 10, 255));
  });

  it("should reject malformed hex", () => {
    expect(() => fromHex("abc")).toThrow(TypeError);
    expect(() => fromHex("zz")).toThrow(TypeError);
  });
});
