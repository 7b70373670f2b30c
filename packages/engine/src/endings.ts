import type { EndingType, GameEnding, GameState, SeededRng } from "@brinksmanship/core";
import { resolveBaseVp } from "./variance";
import {
  CRISIS_MIN_TURN,
  CRISIS_PROBABILITY_PER_RISK,
  CRISIS_RISK_THRESHOLD,
  STAT_MAX,
} from "./rules";

const VP_SUM_TOLERANCE = 0.01;
export const MUTUAL_DESTRUCTION_VP = 20;

/**
 * Validated, frozen ending. VP must lie in [0, 100] and sum to 100, except
 * for mutual destruction which is always 20 each.
 */
export function createGameEnding(ending: GameEnding): GameEnding {
  const { endingType, vpA, vpB, surplusA, surplusB } = ending;
  if (!(vpA >= 0 && vpA <= 100 && vpB >= 0 && vpB <= 100)) {
    throw new RangeError(`VP must be in [0, 100], got A=${vpA}, B=${vpB}`);
  }
  if (endingType === "mutual_destruction") {
    if (vpA !== MUTUAL_DESTRUCTION_VP || vpB !== MUTUAL_DESTRUCTION_VP) {
      throw new RangeError(`Mutual destruction awards ${MUTUAL_DESTRUCTION_VP} VP each, got A=${vpA}, B=${vpB}`);
    }
  } else if (Math.abs(vpA + vpB - 100) > VP_SUM_TOLERANCE) {
    throw new RangeError(`VP must sum to 100, got ${vpA + vpB}`);
  }
  if (!(surplusA >= 0 && surplusB >= 0)) {
    throw new RangeError(`Surplus must be non-negative, got A=${surplusA}, B=${surplusB}`);
  }
  if (!Number.isInteger(ending.turn) || ending.turn < 1) {
    throw new RangeError(`Ending turn must be a positive integer, got ${ending.turn}`);
  }
  return Object.freeze({ ...ending });
}

function defeat(
  state: GameState,
  endingType: EndingType,
  vpA: number,
  vpB: number,
  description: string
): GameEnding {
  // The survivor keeps what they locked in; the loser forfeits theirs.
  return createGameEnding({
    endingType,
    vpA,
    vpB,
    turn: state.turn,
    description,
    surplusA: vpA > vpB ? state.surplusCapturedA : 0,
    surplusB: vpB > vpA ? state.surplusCapturedB : 0,
  });
}

/**
 * Checked in a fixed order, A before B, so simultaneous collapses
 * always resolve against A.
 */
export function checkDeterministicEndings(state: GameState): GameEnding | null {
  if (state.riskLevel >= STAT_MAX) {
    return createGameEnding({
      endingType: "mutual_destruction",
      vpA: MUTUAL_DESTRUCTION_VP,
      vpB: MUTUAL_DESTRUCTION_VP,
      turn: state.turn,
      description: "Risk reached critical level. Mutual destruction.",
      surplusA: 0,
      surplusB: 0,
    });
  }
  if (state.playerA.position <= 0) {
    return defeat(state, "position_collapse_a", 10, 90, "Player A's position collapsed. Total defeat.");
  }
  if (state.playerB.position <= 0) {
    return defeat(state, "position_collapse_b", 90, 10, "Player B's position collapsed. Total defeat.");
  }
  if (state.playerA.resources <= 0) {
    return defeat(state, "resource_exhaustion_a", 15, 85, "Player A exhausted all resources. Defeat.");
  }
  if (state.playerB.resources <= 0) {
    return defeat(state, "resource_exhaustion_b", 85, 15, "Player B exhausted all resources. Defeat.");
  }
  return null;
}

/** (risk - 7) x 0.08 from turn 10 on; zero otherwise. */
export function crisisTerminationProbability(state: GameState): number {
  if (state.turn < CRISIS_MIN_TURN || state.riskLevel <= CRISIS_RISK_THRESHOLD) return 0;
  return (state.riskLevel - CRISIS_RISK_THRESHOLD) * CRISIS_PROBABILITY_PER_RISK;
}

function resolvedEnding(
  state: GameState,
  rng: SeededRng,
  endingType: EndingType,
  turn: number,
  description: string
): GameEnding {
  const base = resolveBaseVp(state, rng);
  return createGameEnding({
    endingType,
    vpA: base.vpA,
    vpB: base.vpB,
    turn,
    description,
    surplusA: state.surplusCapturedA,
    surplusB: state.surplusCapturedB,
  });
}

/** Draws from `rng` only when the state is eligible. */
export function checkCrisisTermination(state: GameState, rng: SeededRng): GameEnding | null {
  const probability = crisisTerminationProbability(state);
  if (probability === 0 || rng.nextFloat() >= probability) return null;
  return resolvedEnding(
    state,
    rng,
    "crisis_termination",
    state.turn,
    `Crisis spiraled out of control at Risk ${state.riskLevel.toFixed(1)}.`
  );
}

/** Runs after the turn counter has moved on, so the ending turn is turn - 1. */
export function checkNaturalEnding(state: GameState, rng: SeededRng): GameEnding | null {
  if (state.turn <= state.maxTurns) return null;
  return resolvedEnding(state, rng, "natural_ending", state.turn - 1, "The crisis reached its natural conclusion.");
}
