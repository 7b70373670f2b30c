import {
  clamp,
  type ActionResult,
  type ActionType,
  type GameState,
  type InformationState,
  type PlayerSide,
  type PlayerState,
} from "@brinksmanship/core";
import { createInformationState, withObservation } from "./information";
import { updateSurplus } from "./surplus";
import {
  ACT_MULTIPLIERS,
  BASE_SIGMA,
  INITIAL_COOPERATION,
  INITIAL_POSITION,
  INITIAL_RESOURCES,
  INITIAL_RISK,
  INITIAL_STABILITY,
  MAX_MAX_TURNS,
  MIN_MAX_TURNS,
  SIGMA_PER_RISK,
  STABILITY_DECAY,
  STABILITY_DRIFT,
  STABILITY_MIN,
  STABILITY_NO_SWITCH_BONUS,
  STABILITY_ONE_SWITCH_PENALTY,
  STABILITY_TWO_SWITCH_PENALTY,
  STAT_MAX,
  STAT_MIN,
} from "./rules";

export type Act = 1 | 2 | 3;

export interface GameStateInit {
  positionA?: number;
  positionB?: number;
  resourcesA?: number;
  resourcesB?: number;
  previousTypeA?: ActionType | null;
  previousTypeB?: ActionType | null;
  informationA?: InformationState;
  informationB?: InformationState;
  cooperationScore?: number;
  stability?: number;
  riskLevel?: number;
  turn?: number;
  maxTurns?: number;
  cooperationSurplus?: number;
  surplusCapturedA?: number;
  surplusCapturedB?: number;
  cooperationStreak?: number;
}

function requireInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
}

function requireFinite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${name} must be a finite number, got ${value}`);
  }
  return value;
}

function stat(name: string, value: number, min = STAT_MIN): number {
  return clamp(requireFinite(name, value), min, STAT_MAX);
}

export function freezePlayer(player: PlayerState): PlayerState {
  return Object.freeze({
    position: player.position,
    resources: player.resources,
    previousActionType: player.previousActionType,
    information: Object.freeze({
      position: Object.freeze({ ...player.information.position }),
      resources: Object.freeze({ ...player.information.resources }),
    }),
  });
}

/** Deep-freeze a state built elsewhere (e.g. parsed from JSON). */
export function freezeState(state: GameState): GameState {
  return Object.freeze({
    ...state,
    playerA: freezePlayer(state.playerA),
    playerB: freezePlayer(state.playerB),
  });
}

/**
 * Build a state from defaults and overrides. Bounded stats saturate;
 * counters and turn limits must already be valid integers.
 */
export function createGameState(init: GameStateInit = {}): GameState {
  return freezeState({
    playerA: {
      position: stat("positionA", init.positionA ?? INITIAL_POSITION),
      resources: stat("resourcesA", init.resourcesA ?? INITIAL_RESOURCES),
      previousActionType: init.previousTypeA ?? null,
      information: init.informationA ?? createInformationState(),
    },
    playerB: {
      position: stat("positionB", init.positionB ?? INITIAL_POSITION),
      resources: stat("resourcesB", init.resourcesB ?? INITIAL_RESOURCES),
      previousActionType: init.previousTypeB ?? null,
      information: init.informationB ?? createInformationState(),
    },
    cooperationScore: stat("cooperationScore", init.cooperationScore ?? INITIAL_COOPERATION),
    stability: stat("stability", init.stability ?? INITIAL_STABILITY, STABILITY_MIN),
    riskLevel: stat("riskLevel", init.riskLevel ?? INITIAL_RISK),
    turn: requireInteger("turn", init.turn ?? 1, 1),
    maxTurns: requireInteger("maxTurns", init.maxTurns ?? MIN_MAX_TURNS, MIN_MAX_TURNS, MAX_MAX_TURNS),
    cooperationSurplus: Math.max(0, requireFinite("cooperationSurplus", init.cooperationSurplus ?? 0)),
    surplusCapturedA: Math.max(0, requireFinite("surplusCapturedA", init.surplusCapturedA ?? 0)),
    surplusCapturedB: Math.max(0, requireFinite("surplusCapturedB", init.surplusCapturedB ?? 0)),
    cooperationStreak: requireInteger("cooperationStreak", init.cooperationStreak ?? 0, 0),
  });
}

/**
 * Rebuild a state supplied from outside (a saved game, a test fixture)
 * through createGameState, so stats saturate and counters are checked.
 */
export function restoreGameState(state: GameState): GameState {
  return createGameState({
    positionA: state.playerA.position,
    positionB: state.playerB.position,
    resourcesA: state.playerA.resources,
    resourcesB: state.playerB.resources,
    previousTypeA: state.playerA.previousActionType,
    previousTypeB: state.playerB.previousActionType,
    informationA: state.playerA.information,
    informationB: state.playerB.information,
    cooperationScore: state.cooperationScore,
    stability: state.stability,
    riskLevel: state.riskLevel,
    turn: state.turn,
    maxTurns: state.maxTurns,
    cooperationSurplus: state.cooperationSurplus,
    surplusCapturedA: state.surplusCapturedA,
    surplusCapturedB: state.surplusCapturedB,
    cooperationStreak: state.cooperationStreak,
  });
}

export function getPlayer(state: GameState, side: PlayerSide): PlayerState {
  return side === "A" ? state.playerA : state.playerB;
}

export function opponentOf(side: PlayerSide): PlayerSide {
  return side === "A" ? "B" : "A";
}

export function getAct(turn: number): Act {
  if (turn <= 4) return 1;
  if (turn <= 8) return 2;
  return 3;
}

export function actMultiplier(turn: number): number {
  return ACT_MULTIPLIERS[getAct(turn)];
}

export function baseSigma(riskLevel: number): number {
  return BASE_SIGMA + riskLevel * SIGMA_PER_RISK;
}

export function chaosFactor(cooperationScore: number): number {
  return 1.2 - cooperationScore / 50;
}

export function instabilityFactor(stability: number): number {
  return 1 + (10 - stability) / 20;
}

/** Standard deviation of the final-resolution noise, roughly 5.6 to 45.2. */
export function sharedSigma(state: GameState): number {
  return (
    baseSigma(state.riskLevel) *
    chaosFactor(state.cooperationScore) *
    instabilityFactor(state.stability) *
    actMultiplier(state.turn)
  );
}

export function isMutualCooperation(result: ActionResult): boolean {
  return result.actionA === "cooperative" && result.actionB === "cooperative";
}

export function isMutualDefection(result: ActionResult): boolean {
  return result.actionA === "competitive" && result.actionB === "competitive";
}

export function updateCooperationScore(state: GameState, result: ActionResult): number {
  let delta = 0;
  if (isMutualCooperation(result)) delta = 1;
  else if (isMutualDefection(result)) delta = -1;
  return clamp(state.cooperationScore + delta, STAT_MIN, STAT_MAX);
}

/** A player with no previous classification cannot switch. */
export function countSwitches(state: GameState, result: ActionResult): 0 | 1 | 2 {
  const switchedA = state.playerA.previousActionType !== null && state.playerA.previousActionType !== result.actionA;
  const switchedB = state.playerB.previousActionType !== null && state.playerB.previousActionType !== result.actionB;
  if (switchedA && switchedB) return 2;
  return switchedA || switchedB ? 1 : 0;
}

export function updateStability(state: GameState, result: ActionResult): number {
  const decayed = state.stability * STABILITY_DECAY + STABILITY_DRIFT;
  const adjustment = {
    0: STABILITY_NO_SWITCH_BONUS,
    1: -STABILITY_ONE_SWITCH_PENALTY,
    2: -STABILITY_TWO_SWITCH_PENALTY,
  }[countSwitches(state, result)];
  return clamp(decayed + adjustment, STABILITY_MIN, STAT_MAX);
}

function applyIntel(info: InformationState, result: ActionResult, observer: PlayerSide): InformationState {
  return result.intel
    .filter((update) => update.observer === observer)
    .reduce((acc, update) => withObservation(acc, update.subject, update.value, update.observedTurn), info);
}

/**
 * Produce the next state from a resolution result. Position and risk deltas
 * scale with the act; resource costs do not. The input is never touched.
 */
export function applyActionResult(state: GameState, result: ActionResult): GameState {
  const mult = actMultiplier(state.turn);
  return freezeState({
    playerA: {
      position: clamp(state.playerA.position + result.positionDeltaA * mult, STAT_MIN, STAT_MAX),
      resources: clamp(state.playerA.resources - result.resourceCostA, STAT_MIN, STAT_MAX),
      previousActionType: result.actionA,
      information: applyIntel(state.playerA.information, result, "A"),
    },
    playerB: {
      position: clamp(state.playerB.position + result.positionDeltaB * mult, STAT_MIN, STAT_MAX),
      resources: clamp(state.playerB.resources - result.resourceCostB, STAT_MIN, STAT_MAX),
      previousActionType: result.actionB,
      information: applyIntel(state.playerB.information, result, "B"),
    },
    cooperationScore: updateCooperationScore(state, result),
    stability: updateStability(state, result),
    riskLevel: clamp(state.riskLevel + result.riskDelta * mult, STAT_MIN, STAT_MAX),
    turn: state.turn + 1,
    maxTurns: state.maxTurns,
    ...updateSurplus(state, result.outcomeCode),
  });
}
