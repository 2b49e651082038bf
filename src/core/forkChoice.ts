import type { BlockHash } from "../types/brands";
import { workFor } from "./consensus";
import type { ChainView, ForkChoiceRule } from "./types";

/* ── rules ───────────────────────────────────────────────── */

/** Cumulative proof-of-work: each block adds 2^difficulty. */
export const heaviestChain: ForkChoiceRule = {
  name: "heaviest-chain",
  blockWeight: (_id, _header, difficulty) => workFor(difficulty),
};

/**
 * Work the header actually carries: 2^256 / (id + 1). A block mined well
 * below the chain's threshold counts for more than one that just clears it.
 */
export const achievedWork: ForkChoiceRule = {
  name: "achieved-work",
  blockWeight: (id) => (1n << 256n) / (BigInt(id) + 1n),
};

export const longestChain: ForkChoiceRule = {
  name: "longest-chain",
  blockWeight: () => 1n,
};

export const mostEvenHashes: ForkChoiceRule = {
  name: "most-even-hashes",
  blockWeight: (id) => (BigInt(id) % 2n === 0n ? 1n : 0n),
};

/**
 * Picks the leaf with the greatest cumulative weight under `rule`. Equal
 * weights go to the lexicographically smaller block id, so the answer only
 * depends on which blocks are in the tree.
 */
export const bestHead = (
  view: ChainView,
  rule: ForkChoiceRule = heaviestChain,
): BlockHash => {
  let best: { id: BlockHash; weight: bigint } | undefined;
  for (const id of view.leaves()) {
    const weight = view.cumulativeWeight(id, rule);
    if (weight === undefined) continue;
    if (
      !best ||
      weight > best.weight ||
      (weight === best.weight && id < best.id)
    )
      best = { id, weight };
  }
  return best?.id ?? view.genesisId;
};
