import { err, ok, type Result } from "../types/result";
import { blockId, stateRoot } from "./hash";
import type { AdmissionError, Block, ChainRule, ConsensusEngine, StateMachine } from "./types";
import { validateBlock } from "./validation";

export type SubChainFailure<E> = {
  /** Position in `blocks` of the first bad block; -1 when the anchor state itself is wrong. */
  readonly index: number;
  readonly error: AdmissionError<E>;
};

/**
 * Checks that `blocks` extend `anchor` one after another, without a chain
 * tree. `anchorState` must hash to the anchor's state root. Returns the state
 * after the last block. `rules` apply to every block in `blocks`, not to the
 * anchor.
 */
export const verifySubChain = <S, T, E>(
  machine: StateMachine<S, T, E>,
  engine: ConsensusEngine,
  anchor: Block<T>,
  anchorState: S,
  blocks: readonly Block<T>[],
  rules: readonly ChainRule<S>[] = [],
): Result<S, SubChainFailure<E>> => {
  const anchorRoot = stateRoot(machine, anchorState);
  if (anchorRoot !== anchor.header.stateRoot)
    return err<SubChainFailure<E>>({
      index: -1,
      error: { kind: "StateRootMismatch", expected: anchor.header.stateRoot, actual: anchorRoot },
    });

  let parent = { id: blockId(anchor.header), height: anchor.header.height, state: anchorState };
  for (const [index, block] of blocks.entries()) {
    const post = validateBlock(machine, engine, parent, block, rules);
    if (!post.ok) return err({ index, error: post.error });
    parent = { id: blockId(block.header), height: block.header.height, state: post.value };
  }
  return ok(parent.state);
};
