import { makeLogger, type ILogger } from "../logging";
import type { BlockHash } from "../types/brands";
import { err, ok, type Result } from "../types/result";
import { genesisBlock } from "./block";
import { ProofOfWork } from "./consensus";
import { bestHead, heaviestChain } from "./forkChoice";
import { blockId } from "./hash";
import { StateStore } from "./stateStore";
import type {
  AdmissionError,
  Block,
  ChainEntry,
  ChainRule,
  ChainView,
  ForkChoiceRule,
  Header,
  StateMachine,
} from "./types";
import {
  describeAdmissionError,
  malformedField,
  validateBlock,
  type ParentContext,
} from "./validation";

export interface ChainTreeOptions<S, T, E> {
  machine: StateMachine<S, T, E>;
  genesisState: S;
  difficulty: number;
  forkChoice?: ForkChoiceRule;
  /** Validity rules every non-genesis block must also pass. */
  rules?: readonly ChainRule<S>[];
  logger?: ILogger;
}

/**
 * Every known block, as an arena keyed by block id with parent back-references
 * and a derived children index. Genesis is admitted on construction.
 *
 * `insert` is the only mutation and runs to completion synchronously, so
 * readers never see a block without its state or the other way round.
 */
export class ChainTree<S, T, E> implements ChainView {
  readonly machine: StateMachine<S, T, E>;
  readonly difficulty: number;
  readonly genesisId: BlockHash;
  readonly forkChoice: ForkChoiceRule;
  readonly rules: readonly ChainRule<S>[];
  readonly stateStore: StateStore<S>;

  private readonly engine: ProofOfWork;
  private readonly log: ILogger;
  private readonly entries = new Map<BlockHash, ChainEntry<T>>();
  private readonly childIndex = new Map<BlockHash, BlockHash[]>();
  private readonly tips = new Set<BlockHash>();
  private readonly weights = new WeakMap<ForkChoiceRule, Map<BlockHash, bigint>>();
  private head: BlockHash;

  constructor(opts: ChainTreeOptions<S, T, E>) {
    this.machine = opts.machine;
    this.difficulty = opts.difficulty;
    this.engine = new ProofOfWork(opts.difficulty);
    this.forkChoice = opts.forkChoice ?? heaviestChain;
    this.rules = opts.rules ?? [];
    this.log = opts.logger ?? makeLogger();

    const genesis = genesisBlock(opts.machine, opts.genesisState);
    this.genesisId = blockId(genesis.header);
    this.entries.set(this.genesisId, {
      id: this.genesisId,
      block: genesis,
      parent: null,
      height: 0n,
    });
    this.tips.add(this.genesisId);
    this.stateStore = new StateStore(this.genesisId, opts.genesisState);
    this.head = this.genesisId;
  }

  get size(): number {
    return this.entries.size;
  }

  /* ── mutation ──────────────────────────────────────────── */

  insert(block: Block<T>): Result<BlockHash, AdmissionError<E>> {
    // a header that cannot be encoded has no id to log or store under
    const field = malformedField(block.header);
    if (field) {
      const error: AdmissionError<E> = { kind: "MalformedHeader", field };
      this.log.warn({ kind: error.kind, field }, `block rejected: ${describeAdmissionError(error)}`);
      return err(error);
    }

    const id = blockId(block.header);
    if (this.entries.has(id)) return ok(id);

    const post = validateBlock(
      this.machine,
      this.engine,
      this.parentContext(block.header.parent),
      block,
      this.rules,
    );
    if (!post.ok) {
      this.log.warn(
        { id, height: block.header.height, kind: post.error.kind },
        `block rejected: ${describeAdmissionError(post.error)}`,
      );
      return post;
    }

    this.commit(id, block, post.value);
    return ok(id);
  }

  private parentContext(id: BlockHash): ParentContext<S> | undefined {
    const entry = this.entries.get(id);
    const state = this.stateStore.get(id);
    if (!entry || state === undefined) return undefined;
    return { id, height: entry.height, state };
  }

  private commit(id: BlockHash, block: Block<T>, state: S): void {
    const parent = block.header.parent;
    this.entries.set(id, { id, block, parent, height: block.header.height });
    this.stateStore.record(id, state);
    this.childIndex.set(parent, [...(this.childIndex.get(parent) ?? []), id]);
    this.tips.delete(parent);
    this.tips.add(id);
    this.log.debug({ id, parent, height: block.header.height }, "block admitted");

    const head = this.bestHead();
    if (head !== this.head) {
      this.log.info(
        { from: this.head, to: head, height: this.height(head) },
        "canonical head switched",
      );
      this.head = head;
    }
  }

  /* ── queries ───────────────────────────────────────────── */

  has(id: BlockHash): boolean {
    return this.entries.has(id);
  }

  get(id: BlockHash): ChainEntry<T> | undefined {
    return this.entries.get(id);
  }

  header(id: BlockHash): Header | undefined {
    return this.entries.get(id)?.block.header;
  }

  height(id: BlockHash): bigint | undefined {
    return this.entries.get(id)?.height;
  }

  stateAt(id: BlockHash): S | undefined {
    return this.stateStore.get(id);
  }

  children(id: BlockHash): BlockHash[] {
    return [...(this.childIndex.get(id) ?? [])];
  }

  /** Blocks without children, sorted by id. */
  leaves(): BlockHash[] {
    return [...this.tips].sort();
  }

  /**
   * Headers from `id` back to genesis inclusive. Each iteration starts over
   * from `id`; an unknown id yields nothing.
   */
  ancestors(id: BlockHash): Iterable<Header> {
    const entries = this.entries;
    return {
      *[Symbol.iterator]() {
        let cur = entries.get(id);
        while (cur) {
          yield cur.block.header;
          cur = cur.parent === null ? undefined : entries.get(cur.parent);
        }
      },
    };
  }

  bestHead(rule: ForkChoiceRule = this.forkChoice): BlockHash {
    return bestHead(this, rule);
  }

  /** Headers from genesis up to the current best head. */
  canonicalChain(rule: ForkChoiceRule = this.forkChoice): Header[] {
    return [...this.ancestors(this.bestHead(rule))].reverse();
  }

  /**
   * Sum of `rule` weights from genesis (which weighs nothing) to `id`.
   * Memoized per rule; entries never change once admitted.
   */
  cumulativeWeight(
    id: BlockHash,
    rule: ForkChoiceRule = this.forkChoice,
  ): bigint | undefined {
    if (!this.entries.has(id)) return undefined;
    let memo = this.weights.get(rule);
    if (!memo) {
      memo = new Map();
      this.weights.set(rule, memo);
    }

    const pending: ChainEntry<T>[] = [];
    let base = 0n;
    let cur = this.entries.get(id);
    while (cur) {
      const known = memo.get(cur.id);
      if (known !== undefined) {
        base = known;
        break;
      }
      pending.push(cur);
      cur = cur.parent === null ? undefined : this.entries.get(cur.parent);
    }
    for (const e of pending.reverse()) {
      if (e.parent !== null)
        base += rule.blockWeight(e.id, e.block.header, this.difficulty);
      memo.set(e.id, base);
    }
    return base;
  }
}
