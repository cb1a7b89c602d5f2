/**
 * Value codecs
 *
 * Values only need to round-trip. Any ordered key codec can also be used as
 * a value codec.
 */

import { z } from "zod";
import { EncodingError } from "../errors.js";
import { stableStringify } from "../format.js";
import { encodeUtf8 } from "./keys.js";
import type { Codec } from "../types.js";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Any value JSON can represent
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Schema accepting any JSON value
 */
export const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValue),
    z.record(jsonValue),
  ])
);

/**
 * Canonical JSON encoded as UTF-8, validated against a zod schema
 *
 * Object keys are sorted, so structurally equal values share one encoding.
 * Encoding checks the value as it will be read back, so nothing is written
 * that cannot be decoded; a schema whose output differs from its input
 * (a transform) can decode stored values but not encode its own output.
 *
 * @example
 * ```typescript
 * const user = json(z.object({ name: z.string(), age: z.number() }));
 * const bytes = user.encode({ name: "Ada", age: 36 });
 * user.decode(bytes); // { age: 36, name: "Ada" }
 * ```
 */
export function json<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name = "json"): Codec<T> {
  const validate = (value: unknown): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new EncodingError(name, `schema mismatch${where}: ${issue?.message ?? "invalid"}`, {
        cause: result.error,
      });
    }
    return result.data;
  };

  return {
    name,
    encode(value: T): Uint8Array {
      let text: string;
      try {
        text = stableStringify(value);
      } catch (err) {
        const reason = err instanceof Error ? `: ${err.message}` : "";
        throw new EncodingError(name, `value cannot be serialized as JSON${reason}`, { cause: err });
      }
      // Whatever is written must decode: check the value as it will be read back
      validate(JSON.parse(text));
      return utf8Encoder.encode(text);
    },
    decode(bytes: Uint8Array): T {
      let parsed: unknown;
      try {
        parsed = JSON.parse(utf8Decoder.decode(bytes));
      } catch (err) {
        throw new EncodingError(name, "stored bytes are not valid JSON", { cause: err });
      }
      return validate(parsed);
    },
  };
}

/**
 * Plain UTF-8 text without framing
 */
export const utf8: Codec<string> = {
  name: "utf8",
  encode(value: string): Uint8Array {
    return encodeUtf8("utf8", value);
  },
  decode(bytes: Uint8Array): string {
    try {
      return utf8Decoder.decode(bytes);
    } catch (err) {
      throw new EncodingError("utf8", "invalid UTF-8", { cause: err });
    }
  },
};

/**
 * Bytes stored as-is
 */
export const raw: Codec<Uint8Array> = {
  name: "raw",
  encode(value: Uint8Array): Uint8Array {
    return new Uint8Array(value);
  },
  decode(bytes: Uint8Array): Uint8Array {
    return new Uint8Array(bytes);
  },
};
