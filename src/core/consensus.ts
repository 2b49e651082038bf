import { setImmediate as yieldToLoop } from "node:timers/promises";
import { MiningAbortedError } from "../errors";
import { err, ok, type Result } from "../types/result";
import { blockId } from "./hash";
import type {
  ConsensusDigest,
  ConsensusEngine,
  ConsensusError,
  Header,
  UnsealedHeader,
} from "./types";

export const MAX_DIFFICULTY = 255;

const assertDifficulty = (d: number) => {
  if (!Number.isInteger(d) || d < 0 || d > MAX_DIFFICULTY)
    throw new RangeError(`difficulty must be an integer in [0, ${MAX_DIFFICULTY}], got ${d}`);
};

/**
 * Largest accepted header hash for a difficulty of `d` leading zero bits.
 */
export const threshold = (d: number): bigint => {
  assertDifficulty(d);
  return (1n << BigInt(256 - d)) - 1n;
};

/** Expected hashes per valid header, i.e. 2^256 / (threshold + 1). */
export const workFor = (d: number): bigint => {
  assertDifficulty(d);
  return 1n << BigInt(d);
};

export const seal = (h: UnsealedHeader, digest: ConsensusDigest): Header => ({
  ...h,
  consensusDigest: digest,
});

export const checkDigest = (
  header: Header,
  difficulty: number,
): Result<void, ConsensusError> => {
  const limit = threshold(difficulty);
  const hash = blockId(header);
  return BigInt(hash) <= limit
    ? ok(undefined)
    : err<ConsensusError>({ kind: "DigestInvalid", hash, threshold: limit });
};

export const verify = (header: Header, difficulty: number): boolean =>
  checkDigest(header, difficulty).ok;

const hits = (header: UnsealedHeader, limit: bigint, nonce: bigint) =>
  BigInt(blockId(seal(header, { nonce }))) <= limit;

/* bounded search; undefined when no nonce in the window qualifies */
const search = (
  header: UnsealedHeader,
  limit: bigint,
  from: bigint,
  attempts: bigint,
): bigint | undefined => {
  for (let nonce = from; nonce < from + attempts; nonce++) {
    if (hits(header, limit, nonce)) return nonce;
  }
  return undefined;
};

/** Searches nonces upwards from 0 until the header meets the threshold. */
export const mine = (header: UnsealedHeader, difficulty: number): ConsensusDigest => {
  const limit = threshold(difficulty);
  for (let nonce = 0n; ; nonce++) {
    if (hits(header, limit, nonce)) return { nonce };
  }
};

export interface MineOptions {
  signal?: AbortSignal;
  startNonce?: bigint;
  batchSize?: number;
}

/* ── proof-of-work engine bound to one difficulty ────────── */
export class ProofOfWork implements ConsensusEngine {
  constructor(readonly difficulty: number) {
    assertDifficulty(difficulty);
  }

  threshold(): bigint {
    return threshold(this.difficulty);
  }

  work(): bigint {
    return workFor(this.difficulty);
  }

  verify(header: Header): Result<void, ConsensusError> {
    return checkDigest(header, this.difficulty);
  }

  isValid(header: Header): boolean {
    return this.verify(header).ok;
  }

  mineSync(
    header: UnsealedHeader,
    opts: { startNonce?: bigint; maxAttempts?: bigint } = {},
  ): ConsensusDigest | undefined {
    const from = opts.startNonce ?? 0n;
    const limit = this.threshold();
    if (opts.maxAttempts === undefined) {
      for (let nonce = from; ; nonce++) {
        if (hits(header, limit, nonce)) return { nonce };
      }
    }
    const found = search(header, limit, from, opts.maxAttempts);
    return found === undefined ? undefined : { nonce: found };
  }

  /**
   * Same search as {@link mineSync}, split into batches so the event loop
   * keeps turning. Aborting drops the search; nothing else is touched.
   */
  async mine(header: UnsealedHeader, opts: MineOptions = {}): Promise<ConsensusDigest> {
    const start = opts.startNonce ?? 0n;
    const batch = BigInt(opts.batchSize ?? 1000);
    if (batch < 1n) throw new RangeError("batchSize must be positive");
    const limit = this.threshold();
    for (let nonce = start; ; nonce += batch) {
      if (opts.signal?.aborted) throw new MiningAbortedError(nonce - start);
      const found = search(header, limit, nonce, batch);
      if (found !== undefined) return { nonce: found };
      await yieldToLoop();
    }
  }
}
