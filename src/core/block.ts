import { err, ok, type Result } from "../types/result";
import { seal } from "./consensus";
import { GENESIS_PARENT, blockId, extrinsicsRoot, stateRoot } from "./hash";
import type {
  Block,
  ConsensusDigest,
  Header,
  StateMachine,
  TransitionFailure,
  UnsealedHeader,
} from "./types";

/**
 * Folds `extrinsics` into `preState` in order. The first failing extrinsic
 * aborts the whole batch and its index is reported.
 */
export const executeExtrinsics = <S, T, E>(
  machine: StateMachine<S, T, E>,
  preState: S,
  extrinsics: readonly T[],
): Result<S, TransitionFailure<E>> => {
  let state = preState;
  for (const [index, x] of extrinsics.entries()) {
    const next = machine.transition(state, x);
    if (!next.ok) return err({ index, cause: next.error });
    state = next.value;
  }
  return ok(state);
};

/* By convention genesis has no extrinsics and is not mined. */
export const genesisBlock = <S, T, E>(
  machine: StateMachine<S, T, E>,
  genesisState: S,
): Block<T> => ({
  header: {
    parent: GENESIS_PARENT,
    height: 0n,
    extrinsicsRoot: extrinsicsRoot([]),
    stateRoot: stateRoot(machine, genesisState),
    consensusDigest: { nonce: 0n },
  },
  body: [],
});

export interface UnsealedBlock<S, T> {
  readonly header: UnsealedHeader;
  readonly body: readonly T[];
  readonly postState: S;
}

/**
 * Builds the child of `parent` carrying `extrinsics`, with both roots
 * computed. The header still needs a consensus digest.
 */
export const unsealedChild = <S, T, E>(
  machine: StateMachine<S, T, E>,
  parent: Header,
  preState: S,
  extrinsics: readonly T[],
): Result<UnsealedBlock<S, T>, TransitionFailure<E>> => {
  const post = executeExtrinsics(machine, preState, extrinsics);
  if (!post.ok) return post;
  return ok({
    header: {
      parent: blockId(parent),
      height: parent.height + 1n,
      extrinsicsRoot: extrinsicsRoot(extrinsics),
      stateRoot: stateRoot(machine, post.value),
    },
    body: extrinsics,
    postState: post.value,
  });
};

export const sealBlock = <S, T>(
  unsealed: UnsealedBlock<S, T>,
  digest: ConsensusDigest,
): Block<T> => ({ header: seal(unsealed.header, digest), body: unsealed.body });
