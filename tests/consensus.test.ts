import { describe, it, expect } from "vitest";
import {
  ProofOfWork,
  checkDigest,
  mine,
  seal,
  threshold,
  verify,
  workFor,
} from "../src/core/consensus";
import { GENESIS_PARENT, blockId, extrinsicsRoot, hashValue } from "../src/core/hash";
import type { UnsealedHeader } from "../src/core/types";
import { MiningAbortedError } from "../src/errors";
import { failingNonce } from "./helpers/block";

const header: UnsealedHeader = {
  parent: GENESIS_PARENT,
  height: 1n,
  extrinsicsRoot: extrinsicsRoot(["toggle"]),
  stateRoot: hashValue(true),
};

describe("difficulty arithmetic", () => {
  it("accepts every hash at difficulty 0", () => {
    expect(threshold(0)).toBe(2n ** 256n - 1n);
    expect(workFor(0)).toBe(1n);
  });

  it("halves the threshold and doubles the work per bit", () => {
    expect(threshold(8)).toBe(2n ** 248n - 1n);
    expect(threshold(9)).toBeLessThan(threshold(8));
    expect(workFor(8)).toBe(256n);
    expect(workFor(9)).toBe(512n);
  });

  it("rejects difficulties outside 0..255", () => {
    expect(() => threshold(256)).toThrow(RangeError);
    expect(() => workFor(-1)).toThrow(RangeError);
    expect(() => new ProofOfWork(1.5)).toThrow(RangeError);
  });
});

describe("mining", () => {
  it("finds a nonce the verifier accepts", () => {
    const digest = mine(header, 8);
    const sealed = seal(header, digest);
    expect(verify(sealed, 8)).toBe(true);
    expect(BigInt(blockId(sealed))).toBeLessThanOrEqual(threshold(8));
  });

  it("returns the smallest qualifying nonce", () => {
    const { nonce } = mine(header, 6);
    for (let n = 0n; n < nonce; n++) expect(verify(seal(header, { nonce: n }), 6)).toBe(false);
  });

  it("reports the offending hash for a bad digest", () => {
    const nonce = failingNonce(header, 8);
    const sealed = seal(header, { nonce });
    expect(checkDigest(sealed, 8)).toEqual({
      ok: false,
      error: { kind: "DigestInvalid", hash: blockId(sealed), threshold: threshold(8) },
    });
  });
});

describe("ProofOfWork", () => {
  const pow = new ProofOfWork(6);

  it("agrees with the free functions", () => {
    const digest = mine(header, 6);
    expect(pow.mineSync(header)).toEqual(digest);
    expect(pow.isValid(seal(header, digest))).toBe(true);
    expect(pow.threshold()).toBe(threshold(6));
    expect(pow.work()).toBe(64n);
  });

  it("gives up when the attempt window holds no solution", () => {
    const { nonce } = mine(header, 6);
    expect(pow.mineSync(header, { maxAttempts: nonce })).toBeUndefined();
    expect(pow.mineSync(header, { maxAttempts: nonce + 1n })).toEqual({ nonce });
  });

  it("mines in batches without changing the answer", async () => {
    await expect(pow.mine(header, { batchSize: 3 })).resolves.toEqual(mine(header, 6));
  });

  it("stops when aborted before starting", async () => {
    const ac = new AbortController();
    ac.abort();
    await expect(pow.mine(header, { signal: ac.signal })).rejects.toBeInstanceOf(MiningAbortedError);
  });

  it("stops a search that cannot finish", async () => {
    const hard = new ProofOfWork(255);
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 20);
    await expect(hard.mine(header, { signal: ac.signal, batchSize: 10 })).rejects.toThrow(
      /mining aborted after \d+ attempts/,
    );
  });

  it("rejects a non-positive batch size", async () => {
    await expect(pow.mine(header, { batchSize: 0 })).rejects.toThrow(RangeError);
  });
});
