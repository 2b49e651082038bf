import type { StateMachine } from "../core/types";
import { ok } from "../types/result";

/* ──────────── single light switch ──────────── */
export type Toggle = "toggle";

export const lightSwitch: StateMachine<boolean, Toggle, never> = {
  name: "light-switch",
  transition: (on) => ok(!on),
};

/* ──────────── two coupled switches ────────────
   Turning the first switch off also turns the second one off. */
export interface TwoSwitches {
  readonly first: boolean;
  readonly second: boolean;
}

export type SwitchToggle = "toggleFirst" | "toggleSecond";

export const twoSwitches: StateMachine<TwoSwitches, SwitchToggle, never> = {
  name: "two-switches",
  transition: (s, t) => {
    switch (t) {
      case "toggleFirst":
        return ok(s.first ? { first: false, second: false } : { ...s, first: true });
      case "toggleSecond":
        return ok({ ...s, second: !s.second });
    }
  },
};
