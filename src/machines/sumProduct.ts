import type { StateMachine } from "../core/types";
import { err, ok } from "../types/result";
import { U64_MAX } from "./users";

/* Running sum and product of every extrinsic seen so far. */
export interface SumProduct {
  readonly sum: bigint;
  readonly product: bigint;
}

export type SumProductError = { readonly kind: "OutOfRange"; readonly value: bigint };

export const sumProduct: StateMachine<SumProduct, bigint, SumProductError> = {
  name: "sum-product",
  transition: (s, x) => {
    if (x < 0n) return err<SumProductError>({ kind: "OutOfRange", value: x });
    const sum = s.sum + x;
    if (sum > U64_MAX) return err<SumProductError>({ kind: "OutOfRange", value: sum });
    const product = s.product * x;
    if (product > U64_MAX) return err<SumProductError>({ kind: "OutOfRange", value: product });
    return ok({ sum, product });
  },
};
