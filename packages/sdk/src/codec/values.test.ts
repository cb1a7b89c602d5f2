import { describe, it, expect } from "vitest";
import { z } from "zod";
import { json, jsonValue, raw, utf8 } from "./values.js";
import { EncodingError } from "../errors.js";

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
const encode = (value: string): Uint8Array => new TextEncoder().encode(value);

describe("json", () => {
  const user = json(z.object({ name: z.string(), age: z.number() }), "user");

  it("should encode canonical JSON with sorted keys", () => {
    const codec = json(jsonValue);
    expect(text(codec.encode({ b: 1, a: [true, null] }))).toBe('{"a":[true,null],"b":1}');
  });

  it("should give structurally equal values the same bytes", () => {
    const codec = json(jsonValue);
    expect(codec.encode({ x: 1, y: { p: 1, q: 2 } })).toEqual(
      codec.encode({ y: { q: 2, p: 1 }, x: 1 })
    );
  });

  it("should round trip values accepted by the schema", () => {
    expect(user.decode(user.encode({ name: "Ada", age: 36 }))).toEqual({ name: "Ada", age: 36 });
  });

  it("should reject stored values that do not match the schema", () => {
    expect(() => user.decode(encode('{"name":"Ada","age":"old"}'))).toThrow(
      /Codec "user": schema mismatch at age/
    );
  });

  it("should reject bytes that are not JSON", () => {
    expect(() => user.decode(encode("{"))).toThrow(EncodingError);
  });

  it("should reject values without a JSON form", () => {
    const codec = json(z.unknown());
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(() => codec.encode(cyclic)).toThrow(/cannot be serialized/);
  });

  it("should refuse to write numbers JSON cannot hold", () => {
    const counter = json(z.object({ n: z.number() }));
    expect(() => counter.encode({ n: Number.NaN })).toThrow(
      'Codec "json": value cannot be serialized as JSON: Non-finite number NaN has no JSON representation'
    );
    expect(() => json(jsonValue).encode([1, Number.POSITIVE_INFINITY])).toThrow(
      /Non-finite number Infinity/
    );
  });

  it("should refuse to write values the schema would reject on read", () => {
    const counter = json(z.object({ n: z.number().int() }));
    expect(() => counter.encode({ n: 1.5 })).toThrow(
      'Codec "json": schema mismatch at n: Expected integer, received float'
    );
    const stamped = json(z.object({ at: z.date() }));
    expect(() => stamped.encode({ at: new Date(0) })).toThrow(/schema mismatch at at/);
  });

  it("should round trip strings outside the basic plane and lone surrogates", () => {
    const codec = json(jsonValue);
    const value = { emoji: "😀𝄞", lone: "\uD800x\uDC00" };
    expect(codec.decode(codec.encode(value))).toEqual(value);
    expect(text(codec.encode("\uD800"))).toBe('"\\ud800"');
  });

  it("should apply schema transforms on decode", () => {
    const codec = json(z.object({ at: z.string().transform((s) => s.length) }));
    expect(codec.decode(encode('{"at":"abcd"}'))).toEqual({ at: 4 });
  });
});

describe("utf8", () => {
  it("should store text without framing", () => {
    expect(utf8.encode("hé")).toEqual(Uint8Array.of(0x68, 0xc3, 0xa9));
    expect(utf8.decode(Uint8Array.of(0x68, 0xc3, 0xa9))).toBe("hé");
  });

  it("should reject invalid UTF-8", () => {
    expect(() => utf8.decode(Uint8Array.of(0xff))).toThrow(/invalid UTF-8/);
  });

  it("should reject lone surrogates", () => {
    expect(() => utf8.encode("ok\uDBFF")).toThrow('Codec "utf8": lone surrogate at index 2');
    expect(utf8.decode(utf8.encode("𝄞"))).toBe("𝄞");
  });
});

describe("raw", () => {
  it("should copy bytes in both directions", () => {
    const input = Uint8Array.of(1, 2, 3);
    const stored = raw.encode(input);
    input[0] = 9;
    expect(stored).toEqual(Uint8Array.of(1, 2, 3));
    expect(raw.decode(stored)).not.toBe(stored);
  });
});
