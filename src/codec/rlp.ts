// Deterministic RLP encoding for headers, extrinsics and states.

import * as rlp from "rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import { compare } from "uint8arrays";
import { CodecError } from "../errors";
import { hexToBytes } from "../utils/bytes";
import type { Header } from "../core/types";

const byEncoding = (a: rlp.Input, b: rlp.Input) =>
  compare(rlp.encode(a), rlp.encode(b));

/**
 * Rewrites a value into an RLP input whose encoding does not depend on key
 * insertion order or on Map/Set iteration order.
 *
 * Strings are always taken as UTF-8: the rlp package would otherwise read a
 * `0x`-prefixed string as hex.
 */
export const canonicalize = (
  v: unknown,
  path: Set<object> = new Set(),
): rlp.Input => {
  if (v === null || v === undefined) return null;
  switch (typeof v) {
    case "bigint":
      if (v < 0n) throw new CodecError(`negative bigint ${v}`);
      return v;
    case "number":
      if (!Number.isSafeInteger(v) || v < 0)
        throw new CodecError(`not a non-negative safe integer: ${v}`);
      return v;
    case "boolean":
      return v ? 1 : 0;
    case "string":
      return utf8ToBytes(v);
    case "object":
      break;
    default:
      throw new CodecError(`cannot encode ${typeof v}`);
  }
  if (v instanceof Uint8Array) return v;
  if (path.has(v)) throw new CodecError("circular structure");
  path.add(v);
  try {
    if (Array.isArray(v)) return v.map((x: unknown) => canonicalize(x, path));
    if (v instanceof Map) {
      const entries: rlp.Input[] = [];
      for (const [k, x] of v) entries.push([canonicalize(k, path), canonicalize(x, path)]);
      return entries.sort(byEncoding);
    }
    if (v instanceof Set) {
      const members: rlp.Input[] = [];
      for (const x of v) members.push(canonicalize(x, path));
      return members.sort(byEncoding);
    }
    return Object.keys(v)
      .sort()
      .flatMap((k): rlp.Input[] => {
        const x: unknown = Reflect.get(v, k);
        return x === undefined ? [] : [[utf8ToBytes(k), canonicalize(x, path)]];
      });
  } finally {
    path.delete(v);
  }
};

export const encodeValue = (v: unknown): Uint8Array => rlp.encode(canonicalize(v));

/* ── header ── */
export const encodeHeader = (h: Header): Uint8Array =>
  rlp.encode([
    hexToBytes(h.parent),
    h.height,
    hexToBytes(h.extrinsicsRoot),
    hexToBytes(h.stateRoot),
    h.consensusDigest.nonce,
  ]);

/* ── extrinsics root preimage: leaf count bound to the Merkle root ── */
export const encodeRootPreimage = (count: number, merkleRoot: Uint8Array) =>
  rlp.encode([count, merkleRoot]);
