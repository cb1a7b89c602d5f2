/**
 * Deterministic JSON formatting utilities
 *
 * Equal values must produce equal bytes: the reverse index is keyed by the
 * encoded value, so object key order cannot depend on insertion order.
 */

/**
 * Compare object keys by UTF-16 code unit, independent of locale
 */
function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable, deterministic JSON stringification with sorted object keys
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 0, compact)
 * @returns JSON text without trailing newline
 * @throws {TypeError} On circular references, non-finite numbers or values JSON cannot represent
 */
export function stableStringify(value: unknown, indent = 0): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (typeof input === "number" && !Number.isFinite(input)) {
      throw new TypeError(`Non-finite number ${input} has no JSON representation`);
    }
    if (input === null || typeof input !== "object") {
      return input;
    }

    // Honour toJSON (Date and friends) before sorting keys
    if ("toJSON" in input && typeof input.toJSON === "function") {
      return normalize(input.toJSON());
    }

    // Detect cycles
    if (seen.has(input)) {
      throw new TypeError("Circular reference detected in object");
    }
    seen.add(input);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(input)) {
        return input.map(normalize);
      }

      // Objects: sort keys and normalize values
      const out: Record<string, unknown> = {};
      const entries = Object.entries(input).sort(([a], [b]) => compareKeys(a, b));
      for (const [k, v] of entries) {
        out[k] = normalize(v);
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  const text: string | undefined = JSON.stringify(normalize(value), null, indent);
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
  }
  return text;
}
