import type { BlockHash } from "../types/brands";
import { err, ok, type Result } from "../types/result";
import { executeExtrinsics } from "./block";
import { extrinsicsRoot, stateRoot } from "./hash";
import type {
  AdmissionError,
  Block,
  ChainRule,
  ConsensusEngine,
  Header,
  StateMachine,
} from "./types";

const reject = <E>(e: AdmissionError<E>): Result<never, AdmissionError<E>> => err(e);

const HASH = /^0x[0-9a-f]{64}$/;

/**
 * First header field that cannot be hashed canonically, if any. Headers
 * built elsewhere are only typed, not checked.
 */
export const malformedField = (
  header: Header,
): Extract<AdmissionError, { kind: "MalformedHeader" }>["field"] | undefined => {
  if (!HASH.test(header.parent)) return "parent";
  if (header.height < 0n) return "height";
  if (!HASH.test(header.extrinsicsRoot)) return "extrinsicsRoot";
  if (!HASH.test(header.stateRoot)) return "stateRoot";
  if (header.consensusDigest.nonce < 0n) return "nonce";
  return undefined;
};

export interface ParentContext<S> {
  readonly id: BlockHash;
  readonly height: bigint;
  readonly state: S;
}

/**
 * Runs the admission checks for `block` against its parent, short-circuiting
 * on the first failure, and returns the post-state on success.
 *
 * Order: header shape, parent link, height, body root, consensus digest,
 * execution, state root, then each extra rule in turn.
 */
export const validateBlock = <S, T, E>(
  machine: StateMachine<S, T, E>,
  engine: ConsensusEngine,
  parent: ParentContext<S> | undefined,
  block: Block<T>,
  rules: readonly ChainRule<S>[] = [],
): Result<S, AdmissionError<E>> => {
  const { header, body } = block;

  const field = malformedField(header);
  if (field) return reject<E>({ kind: "MalformedHeader", field });

  if (!parent || parent.id !== header.parent)
    return reject<E>({ kind: "UnknownParent", parent: header.parent });

  if (header.height !== parent.height + 1n)
    return reject<E>({ kind: "BadHeight", expected: parent.height + 1n, actual: header.height });

  const bodyRoot = extrinsicsRoot(body);
  if (bodyRoot !== header.extrinsicsRoot)
    return reject<E>({ kind: "BodyMismatch", expected: header.extrinsicsRoot, actual: bodyRoot });

  const digest = engine.verify(header);
  if (!digest.ok) return reject<E>({ kind: "InvalidConsensus", cause: digest.error });

  const post = executeExtrinsics(machine, parent.state, body);
  if (!post.ok) return reject<E>({ kind: "InvalidTransition", ...post.error });

  const postRoot = stateRoot(machine, post.value);
  if (postRoot !== header.stateRoot)
    return reject<E>({ kind: "StateRootMismatch", expected: header.stateRoot, actual: postRoot });

  const broken = rules.find((r) => !r.check(header, post.value));
  if (broken) return reject<E>({ kind: "RuleViolation", rule: broken.name });

  return ok(post.value);
};

const show = (v: unknown) =>
  v instanceof Error ? v.message : JSON.stringify(v, (_, x) => (typeof x === "bigint" ? x.toString() : x));

export const describeAdmissionError = (e: AdmissionError): string => {
  switch (e.kind) {
    case "UnknownParent":
      return `unknown parent ${e.parent}`;
    case "BadHeight":
      return `bad height: expected ${e.expected}, got ${e.actual}`;
    case "BodyMismatch":
      return `body does not match extrinsics root ${e.expected} (computed ${e.actual})`;
    case "InvalidConsensus":
      return `digest invalid: ${e.cause.hash} above threshold`;
    case "InvalidTransition":
      return `extrinsic ${e.index} failed: ${show(e.cause)}`;
    case "StateRootMismatch":
      return `state root mismatch: header ${e.expected}, computed ${e.actual}`;
    case "RuleViolation":
      return `violates rule ${e.rule}`;
    case "MalformedHeader":
      return `malformed header field ${e.field}`;
  }
};
