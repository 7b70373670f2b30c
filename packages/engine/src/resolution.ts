import {
  clamp,
  type Action,
  type ActionResult,
  type GameState,
  type IntelUpdate,
  type MatrixOutcomeCode,
  type OutcomeCode,
  type PayoffMatrix,
  type PlayerSide,
  type TurnConfiguration,
} from "@brinksmanship/core";
import { buildDefaultMatrix, cellFor } from "@brinksmanship/matrices";
import { getPlayer, opponentOf } from "./state";
import type { VpSplit } from "./variance";
import {
  CHEAT_POSITION_PENALTY,
  CHEAT_RISK_INCREASE,
  FAILED_SETTLEMENT_RISK,
  INSPECTION_COST,
  RECONNAISSANCE_COST,
  SETTLEMENT_COOPERATION_WEIGHT,
  SETTLEMENT_OFFER_MAX,
  SETTLEMENT_OFFER_MIN,
  SETTLEMENT_OFFER_SPREAD,
  VP_CEILING,
  VP_FLOOR,
} from "./rules";

type Sided<T> = { readonly A: T; readonly B: T };

function sided<T>(side: PlayerSide, value: T, other: T): Sided<T> {
  return side === "A" ? { A: value, B: other } : { A: other, B: value };
}

function outcomeCode(actionA: Action, actionB: Action): MatrixOutcomeCode {
  const a = actionA.actionType === "cooperative" ? "C" : "D";
  const b = actionB.actionType === "cooperative" ? "C" : "D";
  return `${a}${b}`;
}

export function defaultNarrative(code: MatrixOutcomeCode, matrix: PayoffMatrix): string {
  const [rowC, rowD] = matrix.rowLabels;
  const [colC, colD] = matrix.colLabels;
  switch (code) {
    case "CC":
      return `Both sides chose cooperation. ${rowC} met ${colC}.`;
    case "CD":
      return `Player A cooperated while Player B competed. ${rowC} against ${colD}.`;
    case "DC":
      return `Player A competed while Player B cooperated. ${rowD} against ${colC}.`;
    case "DD":
      return `Both sides chose competition. ${rowD} met ${colD}.`;
  }
}

/**
 * Standard turn: classifications pick the cell, the turn's narrative map
 * (or a default from the labels) describes it. Action costs stack on top
 * of the cell's own resource costs.
 */
export function resolveMatrix(
  actionA: Action,
  actionB: Action,
  config: TurnConfiguration,
  matrix: PayoffMatrix
): ActionResult {
  const code = outcomeCode(actionA, actionB);
  const { deltas } = matrix[cellFor(actionA.actionType === "cooperative", actionB.actionType === "cooperative")];
  const narrative = config.outcomeNarratives[code] ?? defaultNarrative(code, matrix);
  return {
    actionA: actionA.actionType,
    actionB: actionB.actionType,
    positionDeltaA: deltas.posA,
    positionDeltaB: deltas.posB,
    resourceCostA: deltas.resCostA + actionA.resourceCost,
    resourceCostB: deltas.resCostB + actionB.resourceCost,
    riskDelta: deltas.riskDelta,
    outcomeCode: code,
    narrative,
    intel: [],
    probeDetectedBy: null,
  };
}

export type InitiatorChoice = "Probe" | "Mask";
export type ResponderChoice = "Vigilant" | "Project";

export interface ReconnaissanceOutcome {
  readonly riskDelta: number;
  readonly initiatorLearns: boolean;
  readonly responderLearns: boolean;
  readonly detected: boolean;
}

const RECON_MATRIX = buildDefaultMatrix("reconnaissance");

/**
 * The information game as a table: Probe/Mask for the initiator against
 * Vigilant/Project for the responder. Risk comes from the reconnaissance
 * matrix's fixed deltas.
 */
export function reconnaissanceOutcome(
  initiator: InitiatorChoice,
  responder: ResponderChoice
): ReconnaissanceOutcome {
  const probing = initiator === "Probe";
  const vigilant = responder === "Vigilant";
  return {
    riskDelta: RECON_MATRIX[cellFor(probing, vigilant)].deltas.riskDelta,
    detected: probing && vigilant,
    initiatorLearns: probing && !vigilant,
    responderLearns: !probing && !vigilant,
  };
}

function initiatorOf(actionA: Action, category: Action["category"]): PlayerSide {
  return actionA.category === category ? "A" : "B";
}

/**
 * Whoever submitted the reconnaissance action probes (A when both did);
 * the other side's classification decides Vigilant or Project.
 */
export function resolveReconnaissance(state: GameState, actionA: Action, actionB: Action): ActionResult {
  const initiator = initiatorOf(actionA, "reconnaissance");
  const responder = opponentOf(initiator);
  const responderAction = responder === "A" ? actionA : actionB;
  const responderChoice: ResponderChoice = responderAction.actionType === "cooperative" ? "Vigilant" : "Project";
  const outcome = reconnaissanceOutcome("Probe", responderChoice);

  const intel: IntelUpdate[] = [];
  let narrative: string;
  if (outcome.initiatorLearns) {
    const value = getPlayer(state, responder).position;
    intel.push({ observer: initiator, subject: "position", value, observedTurn: state.turn });
    narrative = `Player ${initiator}'s reconnaissance succeeded. Player ${responder}'s position is ${value.toFixed(1)}.`;
  } else if (outcome.responderLearns) {
    const value = getPlayer(state, initiator).position;
    intel.push({ observer: responder, subject: "position", value, observedTurn: state.turn });
    narrative = `Player ${initiator}'s position was exposed to Player ${responder}.`;
  } else if (outcome.detected) {
    narrative = `Player ${initiator}'s reconnaissance was detected. Risk increases.`;
  } else {
    narrative = "Neither side learned anything.";
  }

  const cost = sided(initiator, RECONNAISSANCE_COST, 0);
  return {
    actionA: actionA.actionType,
    actionB: actionB.actionType,
    positionDeltaA: 0,
    positionDeltaB: 0,
    resourceCostA: cost.A,
    resourceCostB: cost.B,
    riskDelta: outcome.riskDelta,
    outcomeCode: "RECON",
    narrative,
    intel,
    probeDetectedBy: outcome.detected ? responder : null,
  };
}

/**
 * The inspector always inspects; the target complies if cooperative and
 * cheats if competitive. Either way the inspector sees the target's
 * resources. A caught cheat loses position and raises risk.
 */
export function resolveInspection(state: GameState, actionA: Action, actionB: Action): ActionResult {
  const inspector = initiatorOf(actionA, "inspection");
  const target = opponentOf(inspector);
  const targetAction = target === "A" ? actionA : actionB;
  const cheated = targetAction.actionType === "competitive";
  const resources = getPlayer(state, target).resources;

  const cost = sided(inspector, INSPECTION_COST, 0);
  const penalty = sided(target, cheated ? -CHEAT_POSITION_PENALTY : 0, 0);
  return {
    actionA: actionA.actionType,
    actionB: actionB.actionType,
    positionDeltaA: penalty.A,
    positionDeltaB: penalty.B,
    resourceCostA: cost.A,
    resourceCostB: cost.B,
    riskDelta: cheated ? CHEAT_RISK_INCREASE : 0,
    outcomeCode: "INSPECT",
    narrative: cheated
      ? `Inspection caught Player ${target} cheating. Resources: ${resources.toFixed(1)}. Position lost and risk rises.`
      : `Inspection verified Player ${target}'s compliance. Resources: ${resources.toFixed(1)}.`,
    intel: [{ observer: inspector, subject: "resources", value: resources, observedTurn: state.turn }],
    probeDetectedBy: null,
  };
}

/** VP split of an agreed settlement: position share plus a cooperation bonus. */
export function settlementVp(state: GameState): VpSplit {
  const total = state.playerA.position + state.playerB.position;
  const share = total > 0 ? (state.playerA.position / total) * 100 : 50;
  const vpA = clamp(share + (state.cooperationScore - 5) * SETTLEMENT_COOPERATION_WEIGHT, VP_FLOOR, VP_CEILING);
  return { vpA, vpB: 100 - vpA };
}

/**
 * Fraction (0-1) of the surplus pool that goes to A. Each side's ask
 * defaults to an even split; the result meets both asks halfway.
 */
export function negotiatedSurplusShareA(actionA: Action, actionB: Action): number {
  const askA = actionA.surplusShare ?? 50;
  const askB = actionB.surplusShare ?? 50;
  return (askA + (100 - askB)) / 200;
}

export type SettlementResolution =
  | { readonly agreed: true; readonly result: ActionResult; readonly split: VpSplit; readonly surplusShareA: number }
  | { readonly agreed: false; readonly result: ActionResult };

const NO_EFFECT = { positionDeltaA: 0, positionDeltaB: 0, resourceCostA: 0, resourceCostB: 0, intel: [], probeDetectedBy: null };

/** A proposal nobody took up: risk rises and the turn goes on. */
export function failedSettlement(actionA: Action, actionB: Action, config: TurnConfiguration): ActionResult {
  return {
    ...NO_EFFECT,
    actionA: actionA.actionType,
    actionB: actionB.actionType,
    riskDelta: FAILED_SETTLEMENT_RISK,
    outcomeCode: "SETTLE_FAIL",
    narrative: config.settlementFailedNarrative,
  };
}

export function resolveSettlement(
  state: GameState,
  actionA: Action,
  actionB: Action,
  config: TurnConfiguration
): SettlementResolution {
  if (actionA.category === "settlement" && actionB.category === "settlement") {
    return {
      agreed: true,
      split: settlementVp(state),
      surplusShareA: negotiatedSurplusShareA(actionA, actionB),
      result: {
        ...NO_EFFECT,
        actionA: "cooperative",
        actionB: "cooperative",
        riskDelta: 0,
        outcomeCode: "SETTLE",
        narrative: "Both parties have agreed to a settlement.",
      },
    };
  }
  return { agreed: false, result: failedSettlement(actionA, actionB, config) };
}

export interface SettlementConstraints {
  readonly minVp: number;
  readonly maxVp: number;
  readonly suggestedVp: number;
}

/** Range a side may reasonably ask for when proposing a settlement. */
export function settlementConstraints(state: GameState, side: PlayerSide): SettlementConstraints {
  const own = getPlayer(state, side).position;
  const opponent = getPlayer(state, opponentOf(side)).position;
  const raw = Math.trunc(50 + (own - opponent) * 5 + (state.cooperationScore - 5) * SETTLEMENT_COOPERATION_WEIGHT);
  const suggestedVp = clamp(raw, SETTLEMENT_OFFER_MIN, SETTLEMENT_OFFER_MAX);
  return {
    minVp: Math.max(SETTLEMENT_OFFER_MIN, suggestedVp - SETTLEMENT_OFFER_SPREAD),
    maxVp: Math.min(SETTLEMENT_OFFER_MAX, suggestedVp + SETTLEMENT_OFFER_SPREAD),
    suggestedVp,
  };
}

const MATRIX_OUTCOMES: readonly OutcomeCode[] = ["CC", "CD", "DC", "DD"];
const SIDES: readonly PlayerSide[] = ["A", "B"];

/**
 * A signal rides along with whatever resolved the turn: the opponent learns
 * the signaller's exact position. Matrix outcomes already charged the
 * action's cost with the cell; other outcomes are charged here.
 */
export function applySignals(state: GameState, actionA: Action, actionB: Action, result: ActionResult): ActionResult {
  const charged = MATRIX_OUTCOMES.includes(result.outcomeCode);
  let next = result;
  for (const side of SIDES) {
    const action = side === "A" ? actionA : actionB;
    if (action.category !== "signaling") continue;
    const position = getPlayer(state, side).position;
    const cost = sided(side, charged ? 0 : action.resourceCost, 0);
    next = {
      ...next,
      resourceCostA: next.resourceCostA + cost.A,
      resourceCostB: next.resourceCostB + cost.B,
      intel: [...next.intel, { observer: opponentOf(side), subject: "position", value: position, observedTurn: state.turn }],
      narrative: `${next.narrative} Player ${side} signalled strength: Position ${position.toFixed(1)}.`,
    };
  }
  return next;
}
