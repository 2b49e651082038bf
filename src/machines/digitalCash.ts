import type { StateMachine } from "../core/types";
import { err, ok, type Result } from "../types/result";
import type { User } from "./users";

export interface Bill {
  readonly owner: User;
  readonly amount: bigint;
  readonly serial: bigint;
}

export interface CashState {
  readonly bills: readonly Bill[]; // sorted by serial
  readonly nextSerial: bigint;
}

export type CashTx =
  | { readonly type: "mint"; readonly minter: User; readonly amount: bigint }
  | {
      readonly type: "transfer";
      readonly spends: readonly Bill[];
      readonly receives: readonly Bill[];
    };

export type CashError =
  | { readonly kind: "EmptySpend" }
  | { readonly kind: "EmptyReceive" }
  | { readonly kind: "UnknownBill"; readonly serial: bigint }
  | { readonly kind: "DuplicateSpend"; readonly serial: bigint }
  | { readonly kind: "BadSerial"; readonly expected: bigint; readonly actual: bigint }
  | { readonly kind: "ZeroOutput" }
  | { readonly kind: "Overspend"; readonly spent: bigint; readonly received: bigint };

const fail = (e: CashError): Result<never, CashError> => err(e);

const bySerial = (a: Bill, b: Bill) => (a.serial < b.serial ? -1 : a.serial > b.serial ? 1 : 0);

const sameBill = (a: Bill, b: Bill) =>
  a.owner === b.owner && a.amount === b.amount && a.serial === b.serial;

export const emptyCash = (): CashState => ({ bills: [], nextSerial: 0n });

/**
 * Bill-based currency. A transfer consumes whole bills and issues new ones
 * with consecutive serials; whatever is spent but not received is destroyed.
 */
export const digitalCash: StateMachine<CashState, CashTx, CashError> = {
  name: "digital-cash",
  transition: (s, tx) => {
    if (tx.type === "mint") {
      if (tx.amount <= 0n) return fail({ kind: "ZeroOutput" });
      const bill: Bill = { owner: tx.minter, amount: tx.amount, serial: s.nextSerial };
      return ok({ bills: [...s.bills, bill].sort(bySerial), nextSerial: s.nextSerial + 1n });
    }

    if (tx.spends.length === 0) return fail({ kind: "EmptySpend" });
    if (tx.receives.length === 0) return fail({ kind: "EmptyReceive" });

    const unspent = new Map(s.bills.map((b) => [b.serial, b]));
    const spent = new Set<bigint>();
    let input = 0n;
    for (const bill of tx.spends) {
      if (spent.has(bill.serial)) return fail({ kind: "DuplicateSpend", serial: bill.serial });
      const held = unspent.get(bill.serial);
      if (!held || !sameBill(held, bill)) return fail({ kind: "UnknownBill", serial: bill.serial });
      spent.add(bill.serial);
      unspent.delete(bill.serial);
      input += bill.amount;
    }

    let serial = s.nextSerial;
    let output = 0n;
    for (const bill of tx.receives) {
      if (bill.serial !== serial)
        return fail({ kind: "BadSerial", expected: serial, actual: bill.serial });
      if (bill.amount <= 0n) return fail({ kind: "ZeroOutput" });
      output += bill.amount;
      serial += 1n;
    }
    if (output > input) return fail({ kind: "Overspend", spent: input, received: output });

    return ok({
      bills: [...unspent.values(), ...tx.receives].sort(bySerial),
      nextSerial: serial,
    });
  },
};
