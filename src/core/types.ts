import type { BlockHash, Hex } from "../types/brands";
import type { Result } from "../types/result";

/* ── consensus digest ────────────────────────────────────── */
export type ConsensusDigest = { readonly nonce: bigint };

/* ── block structs ───────────────────────────────────────── */
export interface Header {
  readonly parent: BlockHash; // all-zero sentinel for genesis
  readonly height: bigint;
  readonly extrinsicsRoot: Hex; // commitment to the ordered body
  readonly stateRoot: Hex; // keccak256 of the post-state
  readonly consensusDigest: ConsensusDigest;
}

export type UnsealedHeader = Omit<Header, "consensusDigest">;

export interface Block<T> {
  readonly header: Header;
  readonly body: readonly T[];
}

/* ── state-transition capability ─────────────────────────── */
/**
 * Anything that can fold one extrinsic into a state. Implementations must be
 * pure: the same `(state, extrinsic)` always yields the same result, and the
 * input state is never mutated.
 *
 * `encodeState` replaces the canonical encoding when computing state roots.
 */
export interface StateMachine<S, T, E> {
  readonly name: string;
  transition(state: S, extrinsic: T): Result<S, E>;
  encodeState?(state: S): Uint8Array;
}

export type TransitionFailure<E> = { readonly index: number; readonly cause: E };

/* ── errors ──────────────────────────────────────────────── */
export type ConsensusError = {
  readonly kind: "DigestInvalid";
  readonly hash: BlockHash;
  readonly threshold: bigint;
};

export type AdmissionError<E = unknown> =
  | { readonly kind: "UnknownParent"; readonly parent: BlockHash }
  | { readonly kind: "BadHeight"; readonly expected: bigint; readonly actual: bigint }
  | { readonly kind: "BodyMismatch"; readonly expected: Hex; readonly actual: Hex }
  | { readonly kind: "InvalidConsensus"; readonly cause: ConsensusError }
  | ({ readonly kind: "InvalidTransition" } & TransitionFailure<E>)
  | { readonly kind: "StateRootMismatch"; readonly expected: Hex; readonly actual: Hex }
  | { readonly kind: "RuleViolation"; readonly rule: string }
  | { readonly kind: "MalformedHeader"; readonly field: keyof UnsealedHeader | "nonce" };

/* ── extra validity rules ────────────────────────────────────
   Checked after the state root, on top of proof-of-work. A chain that
   adopts a rule forks away from one that does not. */
export interface ChainRule<S> {
  readonly name: string;
  check(header: Header, postState: S): boolean;
}

/* ── consensus engine ────────────────────────────────────── */
export interface ConsensusEngine {
  readonly difficulty: number;
  verify(header: Header): Result<void, ConsensusError>;
}

/* ── chain tree views ────────────────────────────────────── */
export interface ChainEntry<T> {
  readonly id: BlockHash;
  readonly block: Block<T>;
  readonly parent: BlockHash | null; // null only for genesis
  readonly height: bigint;
}

export interface ForkChoiceRule {
  readonly name: string;
  blockWeight(id: BlockHash, header: Header, difficulty: number): bigint;
}

/** The read side of a chain tree that fork choice needs. */
export interface ChainView {
  readonly genesisId: BlockHash;
  readonly difficulty: number;
  leaves(): BlockHash[];
  cumulativeWeight(id: BlockHash, rule: ForkChoiceRule): bigint | undefined;
}
