import { clamp, type GameState, type SeededRng } from "@brinksmanship/core";
import { sharedSigma } from "./state";
import { VP_CEILING, VP_FLOOR } from "./rules";

export interface VpSplit {
  readonly vpA: number;
  readonly vpB: number;
}

/** Position share of the combined total, 50/50 when both are zero. */
export function expectedVp(state: GameState): VpSplit {
  const total = state.playerA.position + state.playerB.position;
  const evA = total === 0 ? 50 : (state.playerA.position / total) * 100;
  return { vpA: evA, vpB: 100 - evA };
}

/**
 * One shared Gaussian draw moves both players in opposite directions; each
 * side is clamped to [5, 95] and the pair renormalised to sum to 100.
 */
export function resolveBaseVp(state: GameState, rng: SeededRng): VpSplit {
  const ev = expectedVp(state);
  const noise = rng.nextGaussian(0, sharedSigma(state));
  const a = clamp(ev.vpA + noise, VP_FLOOR, VP_CEILING);
  const b = clamp(ev.vpB - noise, VP_FLOOR, VP_CEILING);
  const total = a + b;
  return { vpA: (a * 100) / total, vpB: (b * 100) / total };
}

/**
 * Base split plus each player's captured surplus. The only place totals can
 * exceed 100; the uncaptured pool is discarded.
 */
export function finalResolution(state: GameState, rng: SeededRng): VpSplit {
  const base = resolveBaseVp(state, rng);
  return {
    vpA: base.vpA + state.surplusCapturedA,
    vpB: base.vpB + state.surplusCapturedB,
  };
}
