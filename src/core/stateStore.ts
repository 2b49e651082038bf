import type { BlockHash } from "../types/brands";

/**
 * Post-state of every admitted block, keyed by block id. Seeded with the
 * genesis state; only the chain tree writes to it.
 */
export class StateStore<S> {
  private readonly states = new Map<BlockHash, S>();

  constructor(genesisId: BlockHash, genesisState: S) {
    this.states.set(genesisId, genesisState);
  }

  get(id: BlockHash): S | undefined {
    return this.states.get(id);
  }

  has(id: BlockHash): boolean {
    return this.states.has(id);
  }

  get size(): number {
    return this.states.size;
  }

  /** @internal */
  record(id: BlockHash, state: S): void {
    this.states.set(id, state);
  }
}
