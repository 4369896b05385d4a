/**
 * Canonical JSON formatting
 *
 * Byte-stable output: leading keys in the order given, remaining keys in
 * code point order, LF line endings and exactly one trailing newline.
 * Arrays keep their order. The input is never mutated.
 */

import type { CanonicalOptions } from "../types.js";

/**
 * Canonicalize a JSON-serializable value
 * @throws Error if circular references detected
 */
export function canonicalize(input: unknown, options: CanonicalOptions): string {
  const seen = new WeakSet<object>();
  const leading = options.leadingKeys;

  const rank = (key: string): number => {
    const index = leading.indexOf(key);
    return index === -1 ? leading.length : index;
  };

  const sortKeys = (keys: string[]): string[] =>
    keys.slice().sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));

  const normalize = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      const normalized: Record<string, unknown> = {};
      for (const key of sortKeys(Object.keys(value))) {
        normalized[key] = normalize(Reflect.get(value, key));
      }
      return normalized;
    } finally {
      seen.delete(value);
    }
  };

  return `${JSON.stringify(normalize(input), null, options.indent)}\n`;
}

/**
 * Strip a leading UTF-8 byte order mark
 */
export function stripBom(raw: string): string {
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}
