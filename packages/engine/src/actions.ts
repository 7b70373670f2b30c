import type { Action, ActionCategory, ActionType } from "@brinksmanship/core";
import { checkOfferRange } from "./negotiation";
import type { SettlementConstraints } from "./resolution";
import {
  INSPECTION_COST,
  RECONNAISSANCE_COST,
  SETTLEMENT_AFTER_TURN,
  SETTLEMENT_MIN_STABILITY,
  SIGNAL_COST_MEDIUM,
  SIGNAL_COST_STRONG,
  SIGNAL_COST_WEAK,
  SIGNAL_MEDIUM_POSITION,
  SIGNAL_STRONG_POSITION,
} from "./rules";

function defineAction(
  name: string,
  actionType: ActionType,
  description: string,
  category: ActionCategory = "standard",
  resourceCost = 0
): Action {
  return Object.freeze({ name, actionType, resourceCost, description, category });
}

// Cooperative
export const DEESCALATE = defineAction(
  "De-escalate",
  "cooperative",
  "Reduce tensions through measured withdrawal or conciliatory gestures."
);
export const HOLD_MAINTAIN = defineAction(
  "Hold / Maintain",
  "cooperative",
  "Maintain current position without escalation or de-escalation."
);
export const BACK_CHANNEL = defineAction(
  "Back Channel",
  "cooperative",
  "Open informal, deniable communication to explore options."
);
export const CONCEDE = defineAction(
  "Concede",
  "cooperative",
  "Accept a disadvantageous position to reduce overall risk."
);
export const WITHDRAW = defineAction("Withdraw", "cooperative", "Pull back from a contested position or claim.");

// Competitive
export const ESCALATE = defineAction("Escalate", "competitive", "Increase pressure and commitment to the current position.");
export const AGGRESSIVE_PRESSURE = defineAction(
  "Aggressive Pressure",
  "competitive",
  "Apply direct pressure through threats or demonstrations."
);
export const ISSUE_ULTIMATUM = defineAction(
  "Issue Ultimatum",
  "competitive",
  "Demand specific concessions with an implicit or explicit deadline."
);
export const SHOW_OF_FORCE = defineAction(
  "Show of Force",
  "competitive",
  "Demonstrate capability and resolve through visible action."
);
export const DEMAND = defineAction("Demand", "competitive", "Make explicit demands for opponent concessions.");
export const ADVANCE = defineAction("Advance", "competitive", "Push forward into contested space.");

// Special: each replaces the matrix game for the turn
export const PROPOSE_SETTLEMENT = defineAction(
  "Propose Settlement",
  "cooperative",
  `Offer to negotiate an end to the crisis. Available after Turn ${SETTLEMENT_AFTER_TURN} unless Stability <= ${SETTLEMENT_MIN_STABILITY}.`,
  "settlement"
);
export const INITIATE_RECONNAISSANCE = defineAction(
  "Initiate Reconnaissance",
  "cooperative",
  `Try to learn the opponent's exact Position. Costs ${RECONNAISSANCE_COST} Resources.`,
  "reconnaissance",
  RECONNAISSANCE_COST
);
export const INITIATE_INSPECTION = defineAction(
  "Initiate Inspection",
  "cooperative",
  `Try to learn the opponent's exact Resources. Costs ${INSPECTION_COST} Resources.`,
  "inspection",
  INSPECTION_COST
);

export const COOPERATIVE_ACTIONS: readonly Action[] = [DEESCALATE, HOLD_MAINTAIN, BACK_CHANNEL, CONCEDE, WITHDRAW];
export const COMPETITIVE_ACTIONS: readonly Action[] = [
  ESCALATE,
  AGGRESSIVE_PRESSURE,
  ISSUE_ULTIMATUM,
  SHOW_OF_FORCE,
  DEMAND,
  ADVANCE,
];
export const SPECIAL_ACTIONS: readonly Action[] = [PROPOSE_SETTLEMENT, INITIATE_RECONNAISSANCE, INITIATE_INSPECTION];
export const ACTION_CATALOGUE: readonly Action[] = [...COOPERATIVE_ACTIONS, ...COMPETITIVE_ACTIONS, ...SPECIAL_ACTIONS];

export function findAction(name: string): Action | undefined {
  return ACTION_CATALOGUE.find((action) => action.name.toLowerCase() === name.toLowerCase());
}

/**
 * A settlement proposal asking for `surplusShare` percent of the pool and,
 * optionally, `offeredVp` of the final split for the proposer.
 */
export function proposeSettlement(surplusShare: number, offeredVp?: number): Action {
  return Object.freeze({ ...PROPOSE_SETTLEMENT, surplusShare, ...(offeredVp === undefined ? {} : { offeredVp }) });
}

export function signalCost(position: number): number {
  if (position >= SIGNAL_STRONG_POSITION) return SIGNAL_COST_STRONG;
  if (position >= SIGNAL_MEDIUM_POSITION) return SIGNAL_COST_MEDIUM;
  return SIGNAL_COST_WEAK;
}

/** Priced for the signaller's current position. */
export function signalStrength(position: number): Action {
  const cost = signalCost(position);
  return defineAction(
    "Signal Strength",
    "cooperative",
    `Credibly reveal your Position to the opponent. Costs ${cost} Resources and plays as a cooperative move.`,
    "signaling",
    cost
  );
}

export type RiskTier = "low" | "medium" | "high";

export function getRiskTier(riskLevel: number): RiskTier {
  const tier = Math.trunc(riskLevel);
  if (tier <= 3) return "low";
  if (tier <= 6) return "medium";
  return "high";
}

const STANDARD_MENUS: Readonly<Record<RiskTier, readonly Action[]>> = {
  low: [DEESCALATE, HOLD_MAINTAIN, BACK_CHANNEL, WITHDRAW, ESCALATE, AGGRESSIVE_PRESSURE],
  medium: [DEESCALATE, HOLD_MAINTAIN, BACK_CHANNEL, ESCALATE, AGGRESSIVE_PRESSURE, SHOW_OF_FORCE],
  high: [HOLD_MAINTAIN, CONCEDE, ESCALATE, AGGRESSIVE_PRESSURE, ISSUE_ULTIMATUM, SHOW_OF_FORCE],
};

export function canProposeSettlement(turn: number, stability: number): boolean {
  return turn > SETTLEMENT_AFTER_TURN && stability > SETTLEMENT_MIN_STABILITY;
}

export interface MenuContext {
  readonly riskLevel: number;
  readonly turn: number;
  readonly stability: number;
  readonly resources: number;
  readonly position: number;
  /** Whether the turn's configuration allows settlement at all */
  readonly settlementAllowed: boolean;
  /** VP range this side may offer in a settlement */
  readonly settlementRange: SettlementConstraints;
}

export interface ActionMenu {
  readonly standardActions: readonly Action[];
  readonly specialActions: readonly Action[];
  readonly riskTier: RiskTier;
  readonly turn: number;
  readonly canProposeSettlement: boolean;
}

export function getActionMenu(ctx: MenuContext): ActionMenu {
  const tier = getRiskTier(ctx.riskLevel);
  const settlement = ctx.settlementAllowed && canProposeSettlement(ctx.turn, ctx.stability);
  const specialActions: Action[] = [];
  if (settlement) specialActions.push(PROPOSE_SETTLEMENT);
  for (const action of [INITIATE_RECONNAISSANCE, INITIATE_INSPECTION, signalStrength(ctx.position)]) {
    if (ctx.resources >= action.resourceCost) specialActions.push(action);
  }
  return {
    standardActions: STANDARD_MENUS[tier],
    specialActions,
    riskTier: tier,
    turn: ctx.turn,
    canProposeSettlement: settlement,
  };
}

export function allActions(menu: ActionMenu): Action[] {
  return [...menu.standardActions, ...menu.specialActions];
}

/**
 * Why `action` can't be taken right now, or null if it can. Checks the
 * action's own shape, affordability, signal pricing and settlement terms.
 */
export function validateActionAvailability(action: Action, ctx: MenuContext): string | null {
  if (!Number.isFinite(action.resourceCost) || action.resourceCost < 0) {
    return `Invalid resource cost: ${action.resourceCost}`;
  }
  if (ctx.resources < action.resourceCost) {
    return `Insufficient resources. Need ${action.resourceCost}, have ${ctx.resources}`;
  }
  if (action.category === "settlement") {
    if (!ctx.settlementAllowed) {
      return "Settlement not available this turn";
    }
    if (ctx.turn <= SETTLEMENT_AFTER_TURN) {
      return `Settlement not available until after Turn ${SETTLEMENT_AFTER_TURN}`;
    }
    if (ctx.stability <= SETTLEMENT_MIN_STABILITY) {
      return `Settlement not available when Stability <= ${SETTLEMENT_MIN_STABILITY} (current: ${ctx.stability})`;
    }
    const share = action.surplusShare;
    if (share !== undefined && !(share >= 0 && share <= 100)) {
      return `Surplus share must be between 0 and 100, got ${share}`;
    }
    if (action.offeredVp !== undefined) {
      return checkOfferRange(action.offeredVp, ctx.settlementRange);
    }
  }
  if (action.category === "signaling") {
    const cost = signalCost(ctx.position);
    if (action.resourceCost !== cost) {
      return `Signal Strength costs ${cost} Resources at Position ${ctx.position.toFixed(1)}`;
    }
  }
  return null;
}
