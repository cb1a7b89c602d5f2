/**
 * Order-preserving key codecs
 *
 * Each codec maps values to bytes whose unsigned lexicographic order matches
 * the natural order of the values. Encodings are prefix-free, so a key made
 * by concatenating encodings (a time index key, a tuple) sorts field by field.
 *
 * Layouts:
 * - uint32: 4 bytes big endian
 * - int53, int64: 8 bytes big endian two's complement with the sign bit flipped
 * - float64: IEEE 754 big endian; positives get the sign bit set, negatives
 *   have every bit inverted
 * - string, bytes: 0x00 escaped as 0x00 0xff, terminated by 0x00 0x00
 */

import { EncodingError } from "../errors.js";
import type { Decoded, OrderedCodec } from "../types.js";

const SIGN_BIT = 1n << 63n;
const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Build a codec from an encoder and a reader; decode requires the reader to
 * consume the whole input
 */
function defineOrdered<T>(
  name: string,
  encode: (value: T) => Uint8Array,
  read: (bytes: Uint8Array, offset: number) => Decoded<T>
): OrderedCodec<T> {
  return {
    name,
    encode,
    read,
    decode(bytes: Uint8Array): T {
      const { value, offset } = read(bytes, 0);
      if (offset !== bytes.length) {
        throw new EncodingError(name, `${bytes.length - offset} trailing byte(s) after value`);
      }
      return value;
    },
  };
}

/**
 * Return a DataView over `length` bytes at `offset`, or fail on truncated input
 */
function view(name: string, bytes: Uint8Array, offset: number, length: number): DataView {
  if (offset < 0 || offset + length > bytes.length) {
    throw new EncodingError(
      name,
      `expected ${length} byte(s) at offset ${offset}, input has ${bytes.length}`
    );
  }
  return new DataView(bytes.buffer, bytes.byteOffset + offset, length);
}

/**
 * Escape and terminate a byte string so it can be followed by other fields
 */
export function frameBytes(bytes: Uint8Array): Uint8Array {
  let zeros = 0;
  for (const byte of bytes) {
    if (byte === 0x00) zeros++;
  }

  const out = new Uint8Array(bytes.length + zeros + 2);
  let j = 0;
  for (const byte of bytes) {
    out[j++] = byte;
    if (byte === 0x00) {
      out[j++] = 0xff;
    }
  }
  // Terminator 0x00 0x00 sorts below any escaped 0x00 0xff and any other byte
  out[j++] = 0x00;
  out[j] = 0x00;
  return out;
}

/**
 * Read a framed byte string written by frameBytes
 */
export function readFramedBytes(name: string, bytes: Uint8Array, offset: number): Decoded<Uint8Array> {
  const out: number[] = [];
  let i = offset;

  while (i < bytes.length) {
    const byte = bytes[i]!;
    if (byte !== 0x00) {
      out.push(byte);
      i++;
      continue;
    }

    const next = bytes[i + 1];
    if (next === 0x00) {
      return { value: Uint8Array.from(out), offset: i + 2 };
    }
    if (next === 0xff) {
      out.push(0x00);
      i += 2;
      continue;
    }
    if (next === undefined) {
      break;
    }
    throw new EncodingError(name, `invalid escape 0x00 0x${next.toString(16)} at offset ${i}`);
  }

  throw new EncodingError(name, `unterminated byte string starting at offset ${offset}`);
}

function encodeInt64(name: string, value: bigint): Uint8Array {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new EncodingError(name, `${value} is outside the signed 64-bit range`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, value) ^ SIGN_BIT);
  return out;
}

function readInt64(name: string, bytes: Uint8Array, offset: number): Decoded<bigint> {
  const raw = view(name, bytes, offset, 8).getBigUint64(0);
  return { value: BigInt.asIntN(64, raw ^ SIGN_BIT), offset: offset + 8 };
}

/**
 * Unsigned 32-bit integers
 */
export const uint32: OrderedCodec<number> = defineOrdered(
  "uint32",
  (value) => {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new EncodingError("uint32", `${value} is not an unsigned 32-bit integer`);
    }
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value);
    return out;
  },
  (bytes, offset) => ({
    value: view("uint32", bytes, offset, 4).getUint32(0),
    offset: offset + 4,
  })
);

/**
 * Safe integers (the range of Number.isSafeInteger)
 */
export const int53: OrderedCodec<number> = defineOrdered(
  "int53",
  (value) => {
    if (!Number.isSafeInteger(value)) {
      throw new EncodingError("int53", `${value} is not a safe integer`);
    }
    return encodeInt64("int53", BigInt(value));
  },
  (bytes, offset) => {
    const decoded = readInt64("int53", bytes, offset);
    if (decoded.value > MAX_SAFE || decoded.value < MIN_SAFE) {
      throw new EncodingError("int53", `${decoded.value} is outside the safe integer range`);
    }
    return { value: Number(decoded.value), offset: decoded.offset };
  }
);

/**
 * Signed 64-bit integers as bigint
 */
export const int64: OrderedCodec<bigint> = defineOrdered(
  "int64",
  (value) => encodeInt64("int64", value),
  (bytes, offset) => readInt64("int64", bytes, offset)
);

/**
 * Finite and infinite doubles; NaN has no place in a total order and is rejected
 */
export const float64: OrderedCodec<number> = defineOrdered(
  "float64",
  (value) => {
    if (Number.isNaN(value)) {
      throw new EncodingError("float64", "NaN cannot be used as a key");
    }
    const out = new Uint8Array(8);
    // -0 and 0 compare equal, so both take the encoding of 0
    new DataView(out.buffer).setFloat64(0, value === 0 ? 0 : value);
    if (out[0]! & 0x80) {
      for (let i = 0; i < 8; i++) out[i] = ~out[i]! & 0xff;
    } else {
      out[0] = out[0]! | 0x80;
    }
    return out;
  },
  (bytes, offset) => {
    view("float64", bytes, offset, 8);
    const raw = new Uint8Array(bytes.subarray(offset, offset + 8));
    if (raw[0]! & 0x80) {
      raw[0] = raw[0]! & 0x7f;
    } else {
      for (let i = 0; i < 8; i++) raw[i] = ~raw[i]! & 0xff;
    }
    const value = new DataView(raw.buffer).getFloat64(0);
    if (Number.isNaN(value)) {
      throw new EncodingError("float64", `NaN found at offset ${offset}`);
    }
    return { value, offset: offset + 8 };
  }
);

/**
 * Booleans, false before true
 */
export const boolean: OrderedCodec<boolean> = defineOrdered(
  "boolean",
  (value) => Uint8Array.of(value ? 1 : 0),
  (bytes, offset) => {
    const byte = view("boolean", bytes, offset, 1).getUint8(0);
    if (byte > 1) {
      throw new EncodingError("boolean", `unexpected byte 0x${byte.toString(16)}`);
    }
    return { value: byte === 1, offset: offset + 1 };
  }
);

/**
 * Dates as epoch milliseconds
 */
export const date: OrderedCodec<Date> = defineOrdered(
  "date",
  (value) => {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new EncodingError("date", "invalid Date");
    }
    return int53.encode(ms);
  },
  (bytes, offset) => {
    const decoded = int53.read(bytes, offset);
    return { value: new Date(decoded.value), offset: decoded.offset };
  }
);

// Matches a high surrogate not followed by a low one, or a low one not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * UTF-8 bytes of a well-formed string
 * @throws {EncodingError} On a lone surrogate, which UTF-8 cannot represent
 */
export function encodeUtf8(name: string, value: string): Uint8Array {
  const match = LONE_SURROGATE.exec(value);
  if (match) {
    throw new EncodingError(name, `lone surrogate at index ${match.index}`);
  }
  return utf8Encoder.encode(value);
}

/**
 * Strings as framed UTF-8; ordered by code point
 */
export const string: OrderedCodec<string> = defineOrdered(
  "string",
  (value) => frameBytes(encodeUtf8("string", value)),
  (bytes, offset) => {
    const framed = readFramedBytes("string", bytes, offset);
    try {
      return { value: utf8Decoder.decode(framed.value), offset: framed.offset };
    } catch (err) {
      throw new EncodingError("string", "invalid UTF-8", { cause: err });
    }
  }
);

/**
 * Arbitrary byte strings, framed
 */
export const bytes: OrderedCodec<Uint8Array> = defineOrdered(
  "bytes",
  (value) => frameBytes(value),
  (input, offset) => readFramedBytes("bytes", input, offset)
);

/**
 * Two codecs side by side, ordered by the first value then the second
 */
export function pair<A, B>(first: OrderedCodec<A>, second: OrderedCodec<B>): OrderedCodec<[A, B]> {
  const name = `pair(${first.name},${second.name})`;
  return defineOrdered<[A, B]>(
    name,
    ([a, b]) => {
      const left = first.encode(a);
      const right = second.encode(b);
      const out = new Uint8Array(left.length + right.length);
      out.set(left, 0);
      out.set(right, left.length);
      return out;
    },
    (input, offset) => {
      const a = first.read(input, offset);
      const b = second.read(input, a.offset);
      return { value: [a.value, b.value], offset: b.offset };
    }
  );
}

/**
 * Three codecs side by side, ordered field by field
 */
export function triple<A, B, C>(
  first: OrderedCodec<A>,
  second: OrderedCodec<B>,
  third: OrderedCodec<C>
): OrderedCodec<[A, B, C]> {
  const head = pair(first, second);
  const name = `triple(${first.name},${second.name},${third.name})`;
  return defineOrdered<[A, B, C]>(
    name,
    ([a, b, c]) => {
      const left = head.encode([a, b]);
      const right = third.encode(c);
      const out = new Uint8Array(left.length + right.length);
      out.set(left, 0);
      out.set(right, left.length);
      return out;
    },
    (input, offset) => {
      const ab = head.read(input, offset);
      const c = third.read(input, ab.offset);
      return { value: [ab.value[0], ab.value[1], c.value], offset: c.offset };
    }
  );
}
