import { keccak_256 } from "@noble/hashes/sha3";
import { concat } from "uint8arrays";
import { encodeHeader, encodeRootPreimage, encodeValue } from "../codec/rlp";
import { asBlockHash, type BlockHash, type Hex } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import type { Header, StateMachine } from "./types";

export const GENESIS_PARENT: BlockHash = asBlockHash(`0x${"00".repeat(32)}`);

/* ── digest utility ──────────────────────────────────────── */
export const hashBytes = (bytes: Uint8Array): Hex => bytesToHex(keccak_256(bytes));
export const hashValue = (v: unknown): Hex => hashBytes(encodeValue(v));

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: readonly Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concat([left, right])));
  }
  return merkle(next);
};

/* ── block identity ──────────────────────────────────────── */
export const blockId = (h: Header): BlockHash =>
  asBlockHash(hashBytes(encodeHeader(h)));

/* ── body commitment ─────────────────────────────────────────
   The leaf count is hashed together with the Merkle root, otherwise
   [a, b, c] and [a, b, c, c] would share a root. */
export const extrinsicsRoot = (body: readonly unknown[]): Hex => {
  const leaves = body.map((x) => keccak_256(encodeValue(x)));
  return hashBytes(encodeRootPreimage(leaves.length, merkle(leaves)));
};

/* ── state commitment ────────────────────────────────────── */
export const stateRoot = <S, T, E>(machine: StateMachine<S, T, E>, state: S): Hex =>
  machine.encodeState ? hashBytes(machine.encodeState(state)) : hashValue(state);
