import { makeLogger, type ILogger } from "../logging";
import type { BlockHash } from "../types/brands";
import { err, type Result } from "../types/result";
import { sealBlock, unsealedChild } from "./block";
import type { ChainTree } from "./chainTree";
import { ProofOfWork } from "./consensus";
import type { AdmissionError } from "./types";

export interface ProduceOptions {
  /** Block to build on; defaults to the current best head. */
  parent?: BlockHash;
  signal?: AbortSignal;
}

/* ──────────── block author on top of a chain tree ──────────── */
export class BlockProducer<S, T, E> {
  private readonly pow: ProofOfWork;
  private readonly log: ILogger;
  private readonly batchSize: number;

  constructor(
    private readonly tree: ChainTree<S, T, E>,
    opts: { logger?: ILogger; batchSize?: number } = {},
  ) {
    this.pow = new ProofOfWork(tree.difficulty);
    this.log = opts.logger ?? makeLogger();
    this.batchSize = opts.batchSize ?? 1000;
  }

  /**
   * Executes `extrinsics` on the parent's state, mines the header and
   * submits the block. Rejects with MiningAbortedError if `signal` fires
   * while mining.
   */
  async produce(
    extrinsics: readonly T[],
    opts: ProduceOptions = {},
  ): Promise<Result<BlockHash, AdmissionError<E>>> {
    const parentId = opts.parent ?? this.tree.bestHead();
    const parent = this.tree.header(parentId);
    const preState = this.tree.stateAt(parentId);
    if (!parent || preState === undefined)
      return err<AdmissionError<E>>({ kind: "UnknownParent", parent: parentId });

    const child = unsealedChild(this.tree.machine, parent, preState, extrinsics);
    if (!child.ok)
      return err<AdmissionError<E>>({ kind: "InvalidTransition", ...child.error });

    const started = Date.now();
    const digest = await this.pow.mine(child.value.header, {
      signal: opts.signal,
      batchSize: this.batchSize,
    });
    const res = this.tree.insert(sealBlock(child.value, digest));
    if (res.ok)
      this.log.info(
        {
          id: res.value,
          height: child.value.header.height,
          nonce: digest.nonce.toString(),
          ms: Date.now() - started,
        },
        "mined block",
      );
    return res;
  }
}
