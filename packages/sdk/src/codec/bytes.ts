/**
 * Byte string helpers shared by the codecs and the store engines
 *
 * All comparisons are unsigned and lexicographic, which is the order every
 * engine iterates in.
 */

const EMPTY = new Uint8Array(0);

/**
 * Compare two byte strings lexicographically
 * @returns Negative if a < b, positive if a > b, 0 if equal
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = a[i]! - b[i]!;
    if (diff !== 0) {
      return diff;
    }
  }
  return a.length - b.length;
}

/**
 * Check two byte strings for equality
 */
export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && compareBytes(a, b) === 0;
}

/**
 * Concatenate byte strings into a new buffer
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  if (parts.length === 0) return EMPTY;
  if (parts.length === 1) return new Uint8Array(parts[0]!);

  let total = 0;
  for (const part of parts) total += part.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Check whether `bytes` begins with `prefix`
 */
export function hasPrefix(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > bytes.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * Smallest byte string that sorts after every string starting with `prefix`
 *
 * Trailing 0xff bytes are dropped and the last remaining byte incremented.
 * Returns undefined when the prefix is empty or all 0xff, since no such
 * upper bound exists.
 */
export function prefixSuccessor(prefix: Uint8Array): Uint8Array | undefined {
  let end = prefix.length;
  while (end > 0 && prefix[end - 1] === 0xff) {
    end--;
  }
  if (end === 0) {
    return undefined;
  }
  const out = new Uint8Array(prefix.subarray(0, end));
  out[end - 1] = out[end - 1]! + 1;
  return out;
}

/**
 * Lowercase hex representation of a byte string
 */
export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Parse a hex string produced by toHex
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) {
    throw new TypeError(`Invalid hex string: "${hex}"`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
