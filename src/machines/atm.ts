import { hashValue } from "../core/hash";
import type { StateMachine } from "../core/types";
import type { Hex } from "../types/brands";
import { ok } from "../types/result";

export type Key = "1" | "2" | "3" | "4" | "enter";

export type Auth =
  | { readonly stage: "waiting" }
  | { readonly stage: "authenticating"; readonly pinHash: Hex }
  | { readonly stage: "authenticated" };

export interface Atm {
  readonly cashInside: bigint;
  readonly auth: Auth;
  readonly keystrokes: readonly Key[];
}

export type AtmAction =
  | { readonly type: "swipeCard"; readonly pinHash: Hex }
  | { readonly type: "pressKey"; readonly key: Key };

/** What a card stores for the PIN typed as `keys`. */
export const pinHash = (keys: readonly Key[]): Hex => hashValue(keys);

export const newAtm = (cashInside: bigint): Atm => ({
  cashInside,
  auth: { stage: "waiting" },
  keystrokes: [],
});

const amountOf = (keys: readonly Key[]): bigint =>
  keys.reduce((acc, k) => (k === "enter" ? acc : acc * 10n + BigInt(k)), 0n);

const step = (s: Atm, action: AtmAction): Atm => {
  if (action.type === "swipeCard")
    return s.auth.stage === "waiting"
      ? { ...s, auth: { stage: "authenticating", pinHash: action.pinHash } }
      : s;

  const { key } = action;
  switch (s.auth.stage) {
    case "waiting":
      return s;
    case "authenticating":
      if (key !== "enter") return { ...s, keystrokes: [...s.keystrokes, key] };
      return {
        ...s,
        auth: pinHash(s.keystrokes) === s.auth.pinHash ? { stage: "authenticated" } : { stage: "waiting" },
        keystrokes: [],
      };
    case "authenticated": {
      if (key !== "enter") return { ...s, keystrokes: [...s.keystrokes, key] };
      const amount = amountOf(s.keystrokes);
      return {
        cashInside: amount <= s.cashInside ? s.cashInside - amount : s.cashInside,
        auth: { stage: "waiting" },
        keystrokes: [],
      };
    }
  }
};

/* Never fails: invalid input just leaves the machine where it was. */
export const atm: StateMachine<Atm, AtmAction, never> = {
  name: "atm",
  transition: (s, action) => ok(step(s, action)),
};
