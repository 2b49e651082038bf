import { describe, it, expect, beforeEach } from "vitest";
import { ChainTree } from "../src/core/chainTree";
import { mine, seal } from "../src/core/consensus";
import { GENESIS_PARENT, blockId, extrinsicsRoot, hashValue, stateRoot } from "../src/core/hash";
import { genesisBlock } from "../src/core/block";
import type { UnsealedHeader } from "../src/core/types";
import { accountedCurrency, type User } from "../src/machines";
import { asBlockHash, type BlockHash } from "../src/types/brands";
import {
  DIFFICULTY,
  failingNonce,
  genesisBalances,
  mineChild,
  mkCurrencyTree,
  reseal,
  unsealed,
  type CurrencyBlock,
} from "./helpers/block";
import { captureLogger } from "./helpers/logger";
import { burn, mint, transfer } from "./helpers/tx";

type Tree = ReturnType<typeof mkCurrencyTree>;

describe("ChainTree", () => {
  let tree: Tree;
  let g: BlockHash;
  let a: CurrencyBlock;
  let b: CurrencyBlock;

  beforeEach(() => {
    tree = mkCurrencyTree();
    g = tree.genesisId;
    a = mineChild(tree, g, [mint("alice", 10n)]);
    b = mineChild(tree, g, [transfer("alice", "bob", 5n)]);
  });

  describe("genesis", () => {
    it("is admitted on construction", () => {
      expect(tree.size).toBe(1);
      expect(tree.leaves()).toEqual([g]);
      expect(tree.bestHead()).toBe(g);
      expect(tree.height(g)).toBe(0n);
      expect(tree.stateAt(g)).toEqual(genesisBalances());
      expect(tree.get(g)?.parent).toBeNull();
    });

    it("derives its id from the genesis state", () => {
      expect(g).toBe(blockId(genesisBlock(accountedCurrency, genesisBalances()).header));
      expect(tree.header(g)?.parent).toBe(GENESIS_PARENT);
    });

    it("accepts re-submission of genesis as a no-op", () => {
      expect(tree.insert(genesisBlock(accountedCurrency, genesisBalances()))).toEqual({
        ok: true,
        value: g,
      });
      expect(tree.size).toBe(1);
    });

    it("rejects a second block claiming the genesis slot", () => {
      const other = reseal(a, DIFFICULTY, { parent: GENESIS_PARENT, height: 0n });
      const res = tree.insert(other);
      expect(res).toEqual({ ok: false, error: { kind: "UnknownParent", parent: GENESIS_PARENT } });
    });
  });

  describe("forks", () => {
    it("tracks both siblings as leaves and breaks the tie by id", () => {
      const idA = blockId(a.header);
      const idB = blockId(b.header);
      expect(tree.insert(a)).toEqual({ ok: true, value: idA });
      expect(tree.insert(b)).toEqual({ ok: true, value: idB });

      expect(tree.leaves()).toEqual([idA, idB].sort());
      expect(tree.children(g)).toEqual([idA, idB]);
      expect(tree.bestHead()).toBe(idA < idB ? idA : idB);
    });

    it("switches the head to the longer branch", () => {
      tree.insert(a);
      tree.insert(b);
      const idA = blockId(a.header);
      const c = mineChild(tree, idA, [burn("bob", 1n)]);
      const idC = blockId(c.header);
      expect(tree.insert(c)).toEqual({ ok: true, value: idC });

      expect(tree.bestHead()).toBe(idC);
      expect(tree.leaves()).toEqual([blockId(b.header), idC].sort());
      expect(tree.canonicalChain().map(blockId)).toEqual([g, idA, idC]);
      expect(tree.canonicalChain().map((h) => h.height)).toEqual([0n, 1n, 2n]);
    });

    it("keeps the post-state of every block", () => {
      tree.insert(a);
      tree.insert(b);
      expect(tree.stateAt(blockId(a.header))).toEqual(
        new Map([
          ["alice", 110n],
          ["bob", 50n],
        ]),
      );
      expect(tree.stateAt(blockId(b.header))).toEqual(
        new Map([
          ["alice", 95n],
          ["bob", 55n],
        ]),
      );
      expect(tree.stateStore.size).toBe(tree.size);
    });

    it("treats a repeated insert as a no-op", () => {
      const first = tree.insert(a);
      const state = tree.stateAt(blockId(a.header));
      expect(tree.insert(a)).toEqual(first);
      expect(tree.size).toBe(2);
      expect(tree.stateAt(blockId(a.header))).toBe(state);
      expect(tree.children(g)).toEqual([blockId(a.header)]);
    });
  });

  describe("ancestors", () => {
    it("walks from a block back to genesis", () => {
      tree.insert(a);
      const c = mineChild(tree, blockId(a.header), [burn("alice", 1n)]);
      tree.insert(c);
      const walk = tree.ancestors(blockId(c.header));
      expect([...walk].map((h) => h.height)).toEqual([2n, 1n, 0n]);
      expect([...walk].map(blockId)).toEqual([blockId(c.header), blockId(a.header), g]);
    });

    it("yields nothing for an unknown id", () => {
      expect([...tree.ancestors(asBlockHash(hashValue("nowhere")))]).toEqual([]);
    });
  });

  describe("rejections", () => {
    const expectNotAdmitted = (block: CurrencyBlock) => {
      const id = blockId(block.header);
      expect(tree.has(id)).toBe(false);
      expect(tree.stateStore.has(id)).toBe(false);
      expect(tree.size).toBe(1);
      expect(tree.leaves()).toEqual([g]);
    };

    it("rejects headers that cannot be encoded before hashing them", () => {
      const negativeNonce = {
        header: { ...a.header, consensusDigest: { nonce: -1n } },
        body: a.body,
      };
      const negativeHeight = { header: { ...a.header, height: -1n }, body: a.body };
      const shortParent = { header: { ...a.header, parent: asBlockHash("0x12") }, body: a.body };

      expect(tree.insert(negativeNonce)).toEqual({
        ok: false,
        error: { kind: "MalformedHeader", field: "nonce" },
      });
      expect(tree.insert(negativeHeight)).toEqual({
        ok: false,
        error: { kind: "MalformedHeader", field: "height" },
      });
      expect(tree.insert(shortParent)).toEqual({
        ok: false,
        error: { kind: "MalformedHeader", field: "parent" },
      });
      expect(tree.size).toBe(1);
    });

    it("rejects an unknown parent", () => {
      const parent = asBlockHash(hashValue("nowhere"));
      const orphan = reseal(a, DIFFICULTY, { parent });
      expect(tree.insert(orphan)).toEqual({ ok: false, error: { kind: "UnknownParent", parent } });
      expectNotAdmitted(orphan);
    });

    it("rejects a height that does not follow the parent", () => {
      const bad = reseal(a, DIFFICULTY, { height: 5n });
      expect(tree.insert(bad)).toEqual({
        ok: false,
        error: { kind: "BadHeight", expected: 1n, actual: 5n },
      });
      expectNotAdmitted(bad);
    });

    it("rejects a body that does not match the header", () => {
      const body = [mint("alice", 11n)];
      const bad = { header: a.header, body };
      expect(tree.insert(bad)).toEqual({
        ok: false,
        error: {
          kind: "BodyMismatch",
          expected: a.header.extrinsicsRoot,
          actual: extrinsicsRoot(body),
        },
      });
      expectNotAdmitted(bad);
    });

    it("checks height before the body", () => {
      const bad = reseal(a, DIFFICULTY, { height: 3n }, [mint("bob", 1n)]);
      const res = tree.insert(bad);
      expect(res.ok ? undefined : res.error.kind).toBe("BadHeight");
    });

    it("rejects an unmined header", () => {
      const h = unsealed(a);
      const bad = { header: seal(h, { nonce: failingNonce(h, DIFFICULTY) }), body: a.body };
      const res = tree.insert(bad);
      expect(res.ok).toBe(false);
      if (res.ok) return;
      expect(res.error.kind).toBe("InvalidConsensus");
      if (res.error.kind !== "InvalidConsensus") return;
      expect(res.error.cause.hash).toBe(blockId(bad.header));
      expectNotAdmitted(bad);
    });

    it("reports which extrinsic failed", () => {
      const body = [mint("alice", 1n), transfer("charlie", "bob", 5n)];
      const h: UnsealedHeader = {
        parent: g,
        height: 1n,
        extrinsicsRoot: extrinsicsRoot(body),
        stateRoot: hashValue("unused"),
      };
      const bad = { header: seal(h, mine(h, DIFFICULTY)), body };
      expect(tree.insert(bad)).toEqual({
        ok: false,
        error: {
          kind: "InvalidTransition",
          index: 1,
          cause: { kind: "UnknownAccount", account: "charlie" },
        },
      });
      expectNotAdmitted(bad);
    });

    it("rejects a wrong state root", () => {
      const claimed = hashValue("nope");
      const bad = reseal(a, DIFFICULTY, { stateRoot: claimed });
      const computed = stateRoot(
        accountedCurrency,
        new Map<User, bigint>([
          ["alice", 110n],
          ["bob", 50n],
        ]),
      );
      expect(tree.insert(bad)).toEqual({
        ok: false,
        error: { kind: "StateRootMismatch", expected: claimed, actual: computed },
      });
      expect(computed).toBe(a.header.stateRoot);
      expectNotAdmitted(bad);
    });
  });

  describe("logging", () => {
    it("logs admissions, head switches and rejections", () => {
      const log = captureLogger();
      const t = new ChainTree({
        machine: accountedCurrency,
        genesisState: genesisBalances(),
        difficulty: DIFFICULTY,
        logger: log,
      });
      const idA = blockId(a.header);
      t.insert(a);
      t.insert(reseal(a, DIFFICULTY, { height: 7n }));

      expect(log.calls.map((c) => [c.level, c.msg])).toEqual([
        ["debug", "block admitted"],
        ["info", "canonical head switched"],
        ["warn", "block rejected: bad height: expected 1, got 7"],
      ]);
      expect(log.calls[1].obj).toEqual({ from: t.genesisId, to: idA, height: 1n });
      expect(log.calls[2].obj).toMatchObject({ height: 7n, kind: "BadHeight" });
    });
  });
});
