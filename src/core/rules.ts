import type { ChainRule } from "./types";

export type Parity = "even" | "odd";

/**
 * From `forkHeight` on, the number `value` reads out of each post-state must
 * have the given parity. Two chains taking opposite parities split at
 * `forkHeight` and never accept each other's blocks again.
 */
export const stateParityFrom = <S>(
  forkHeight: bigint,
  parity: Parity,
  value: (state: S) => bigint,
): ChainRule<S> => ({
  name: `${parity}-state-from-${forkHeight}`,
  check: (header, state) =>
    header.height < forkHeight || (value(state) % 2n === 0n) === (parity === "even"),
});
