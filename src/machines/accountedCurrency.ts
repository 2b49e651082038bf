import type { StateMachine } from "../core/types";
import { err, ok, type Result } from "../types/result";
import type { User } from "./users";

/**
 * Account balances. An account exists only while its balance is at least 1;
 * it is dropped from the map as soon as it reaches zero.
 */
export type Balances = ReadonlyMap<User, bigint>;

export type AccountingTx =
  | { readonly type: "mint"; readonly minter: User; readonly amount: bigint }
  | { readonly type: "burn"; readonly burner: User; readonly amount: bigint }
  | {
      readonly type: "transfer";
      readonly sender: User;
      readonly receiver: User;
      readonly amount: bigint;
    };

export type CurrencyError =
  | { readonly kind: "ZeroAmount" }
  | { readonly kind: "UnknownAccount"; readonly account: User }
  | {
      readonly kind: "InsufficientBalance";
      readonly account: User;
      readonly available: bigint;
      readonly requested: bigint;
    };

const fail = (e: CurrencyError): Result<never, CurrencyError> => err(e);

const withBalance = (s: Balances, user: User, amount: bigint): Balances => {
  const next = new Map(s);
  if (amount === 0n) next.delete(user);
  else next.set(user, amount);
  return next;
};

export const accountedCurrency: StateMachine<Balances, AccountingTx, CurrencyError> = {
  name: "accounted-currency",
  transition: (s, tx) => {
    if (tx.amount <= 0n) return fail({ kind: "ZeroAmount" });
    switch (tx.type) {
      case "mint":
        return ok(withBalance(s, tx.minter, (s.get(tx.minter) ?? 0n) + tx.amount));

      case "burn": {
        const balance = s.get(tx.burner);
        if (balance === undefined) return fail({ kind: "UnknownAccount", account: tx.burner });
        // burning more than the balance empties the account
        return ok(withBalance(s, tx.burner, balance > tx.amount ? balance - tx.amount : 0n));
      }

      case "transfer": {
        const balance = s.get(tx.sender);
        if (balance === undefined) return fail({ kind: "UnknownAccount", account: tx.sender });
        if (balance < tx.amount)
          return fail({
            kind: "InsufficientBalance",
            account: tx.sender,
            available: balance,
            requested: tx.amount,
          });
        if (tx.sender === tx.receiver) return ok(s);
        const debited = withBalance(s, tx.sender, balance - tx.amount);
        return ok(withBalance(debited, tx.receiver, (debited.get(tx.receiver) ?? 0n) + tx.amount));
      }
    }
  },
};
