/**
 * Snapshot codecs
 */

import type { CanonicalOptions, SnapshotCodec } from "./types.js";
import { canonicalize, stripBom } from "./format/canonical.js";

export const DEFAULT_CANONICAL_OPTIONS: CanonicalOptions = {
  indent: 2,
  leadingKeys: ["id"],
};

/**
 * Canonical JSON array codec.
 * Records are written with `id` first and remaining keys alphabetical,
 * so an empty snapshot is exactly "[]\n".
 */
export function jsonCodec(options: Partial<CanonicalOptions> = {}): SnapshotCodec {
  const resolved: CanonicalOptions = { ...DEFAULT_CANONICAL_OPTIONS, ...options };

  return {
    serialize(records) {
      return canonicalize(records, resolved);
    },

    deserialize(raw): unknown {
      return JSON.parse(stripBom(raw));
    },
  };
}
