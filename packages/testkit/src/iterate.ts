/**
 * Async iteration helpers
 */

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

/**
 * Decode bytes as UTF-8 for readable assertions
 */
export function text(bytes: Uint8Array | undefined): string | undefined {
  return bytes === undefined ? undefined : new TextDecoder().decode(bytes);
}

/**
 * Encode a string as UTF-8 bytes
 */
export function bytes(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}
