import type { GameState, OutcomeCode } from "@brinksmanship/core";
import { CAPTURE_RATE, DD_BURN_RATE, SURPLUS_BASE, SURPLUS_STREAK_BONUS } from "./rules";

export type SurplusFields = Pick<
  GameState,
  "cooperationSurplus" | "surplusCapturedA" | "surplusCapturedB" | "cooperationStreak"
>;

export function surplusFields(state: GameState): SurplusFields {
  return {
    cooperationSurplus: state.cooperationSurplus,
    surplusCapturedA: state.surplusCapturedA,
    surplusCapturedB: state.surplusCapturedB,
    cooperationStreak: state.cooperationStreak,
  };
}

/**
 * Mutual cooperation grows the pool, faster on a streak. Exploitation lets
 * the competitor lock in part of it; mutual defection burns some. Outcomes
 * outside the matrix game leave it alone.
 */
export function updateSurplus(state: GameState, outcomeCode: OutcomeCode): SurplusFields {
  const current = surplusFields(state);
  const pool = current.cooperationSurplus;

  switch (outcomeCode) {
    case "CC":
      return {
        ...current,
        cooperationSurplus: pool + SURPLUS_BASE * (1 + SURPLUS_STREAK_BONUS * current.cooperationStreak),
        cooperationStreak: current.cooperationStreak + 1,
      };
    case "CD": {
      const captured = pool * CAPTURE_RATE;
      return {
        cooperationSurplus: pool - captured,
        surplusCapturedA: current.surplusCapturedA,
        surplusCapturedB: current.surplusCapturedB + captured,
        cooperationStreak: 0,
      };
    }
    case "DC": {
      const captured = pool * CAPTURE_RATE;
      return {
        cooperationSurplus: pool - captured,
        surplusCapturedA: current.surplusCapturedA + captured,
        surplusCapturedB: current.surplusCapturedB,
        cooperationStreak: 0,
      };
    }
    case "DD":
      return { ...current, cooperationSurplus: pool * (1 - DD_BURN_RATE), cooperationStreak: 0 };
    default:
      return current;
  }
}

/**
 * Hand the whole pool out, `shareA` (0-1) to A and the rest to B.
 */
export function distributeSurplus(state: GameState, shareA: number): SurplusFields {
  const pool = state.cooperationSurplus;
  return {
    cooperationSurplus: 0,
    surplusCapturedA: state.surplusCapturedA + pool * shareA,
    surplusCapturedB: state.surplusCapturedB + pool * (1 - shareA),
    cooperationStreak: state.cooperationStreak,
  };
}
