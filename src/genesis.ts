import { readFileSync } from "node:fs";
import {
  array,
  boolean,
  check,
  integer,
  literal,
  maxValue,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  record,
  regex,
  safeParse,
  string,
  transform,
  union,
  variant,
  type InferOutput,
} from "valibot";
import { formatIssues, loadConfig, loggerFor, type Config } from "./config";
import { ChainTree } from "./core/chainTree";
import { MAX_DIFFICULTY } from "./core/consensus";
import type { ForkChoiceRule } from "./core/types";
import { GenesisError } from "./errors";
import type { ILogger } from "./logging";
import {
  USERS,
  U64_MAX,
  accountedCurrency,
  atm,
  digitalCash,
  lightSwitch,
  newAtm,
  sumProduct,
  twoSwitches,
  type AccountingTx,
  type Atm,
  type AtmAction,
  type Balances,
  type CashError,
  type CashState,
  type CashTx,
  type CurrencyError,
  type SumProduct,
  type SumProductError,
  type SwitchToggle,
  type Toggle,
  type TwoSwitches,
  type User,
} from "./machines";

/* ── shared field schemas ───────────────────────────────── */

// JSON has no bigint: accept decimal strings as well as safe integers
const u64 = pipe(
  union([
    pipe(string(), regex(/^\d+$/, "expected a decimal integer")),
    pipe(number(), integer(), minValue(0)),
  ]),
  transform((v) => BigInt(v)),
  check((v) => v <= U64_MAX, "exceeds u64"),
);

const difficulty = optional(pipe(number(), integer(), minValue(0), maxValue(MAX_DIFFICULTY)));
const user = picklist(USERS);

const toBalances = (r: Partial<Record<User, bigint>>): Balances =>
  new Map(
    USERS.flatMap((u): [User, bigint][] => {
      const b = r[u];
      return b === undefined || b === 0n ? [] : [[u, b]];
    }),
  );

const billSchema = object({ owner: user, amount: u64, serial: u64 });

/* ── per-machine genesis documents ──────────────────────── */

const genesisSchema = variant("machine", [
  object({ machine: literal("light-switch"), difficulty, state: boolean() }),
  object({
    machine: literal("two-switches"),
    difficulty,
    state: object({ first: boolean(), second: boolean() }),
  }),
  object({
    machine: literal("atm"),
    difficulty,
    state: pipe(
      object({ cashInside: u64 }),
      transform((s): Atm => newAtm(s.cashInside)),
    ),
  }),
  object({
    machine: literal("accounted-currency"),
    difficulty,
    state: pipe(record(user, u64), transform(toBalances)),
  }),
  object({
    machine: literal("digital-cash"),
    difficulty,
    state: pipe(
      object({ bills: array(billSchema), nextSerial: optional(u64) }),
      check(
        (s) => new Set(s.bills.map((b) => b.serial)).size === s.bills.length,
        "bill serials must be unique",
      ),
      transform((s): CashState => {
        const bills = [...s.bills].sort((a, b) => (a.serial < b.serial ? -1 : 1));
        const floor = bills.length === 0 ? 0n : bills[bills.length - 1].serial + 1n;
        return { bills, nextSerial: s.nextSerial ?? floor };
      }),
      check((s) => s.bills.every((b) => b.serial < s.nextSerial), "nextSerial must exceed every bill serial"),
    ),
  }),
  object({
    machine: literal("sum-product"),
    difficulty,
    state: object({ sum: u64, product: u64 }),
  }),
]);

export type GenesisConfig = InferOutput<typeof genesisSchema>;

export const parseGenesis = (input: unknown): GenesisConfig => {
  const res = safeParse(genesisSchema, input);
  if (!res.success) throw new GenesisError(formatIssues(res.issues));
  return res.output;
};

export const loadGenesisFile = (path: string | URL): GenesisConfig => {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    throw new GenesisError([`cannot read ${String(path)}: ${e instanceof Error ? e.message : String(e)}`]);
  }
  return parseGenesis(json);
};

/* ── chain construction ─────────────────────────────────── */

export type AnyChain =
  | { readonly machine: "light-switch"; readonly tree: ChainTree<boolean, Toggle, never> }
  | { readonly machine: "two-switches"; readonly tree: ChainTree<TwoSwitches, SwitchToggle, never> }
  | { readonly machine: "atm"; readonly tree: ChainTree<Atm, AtmAction, never> }
  | {
      readonly machine: "accounted-currency";
      readonly tree: ChainTree<Balances, AccountingTx, CurrencyError>;
    }
  | { readonly machine: "digital-cash"; readonly tree: ChainTree<CashState, CashTx, CashError> }
  | { readonly machine: "sum-product"; readonly tree: ChainTree<SumProduct, bigint, SumProductError> };

export interface ChainFromGenesisOptions {
  config?: Config;
  logger?: ILogger;
  forkChoice?: ForkChoiceRule;
}

/**
 * Builds a chain tree for the machine named in `genesis`. The genesis
 * document's difficulty wins over the configured one.
 */
export const chainFromGenesis = (
  genesis: GenesisConfig,
  opts: ChainFromGenesisOptions = {},
): AnyChain => {
  const config = opts.config ?? loadConfig();
  const base = {
    difficulty: genesis.difficulty ?? config.difficulty,
    logger: opts.logger ?? loggerFor(config),
    forkChoice: opts.forkChoice,
  };
  switch (genesis.machine) {
    case "light-switch":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: lightSwitch, genesisState: genesis.state }),
      };
    case "two-switches":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: twoSwitches, genesisState: genesis.state }),
      };
    case "atm":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: atm, genesisState: genesis.state }),
      };
    case "accounted-currency":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: accountedCurrency, genesisState: genesis.state }),
      };
    case "digital-cash":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: digitalCash, genesisState: genesis.state }),
      };
    case "sum-product":
      return {
        machine: genesis.machine,
        tree: new ChainTree({ ...base, machine: sumProduct, genesisState: genesis.state }),
      };
  }
};
