import { SeededRng, type Action, type ActionType, type PlayerSide } from "@brinksmanship/core";
import type { ActionMenu } from "@brinksmanship/engine";

export interface PolicyContext {
  side: PlayerSide;
  turn: number;
  menu: ActionMenu;
  /** The opponent's classification last turn, null on the first */
  opponentLastType: ActionType | null;
}

export interface Policy {
  readonly name: PolicyName;
  chooseAction(ctx: PolicyContext): Action;
}

export const POLICY_NAMES = ["cooperate", "compete", "random", "tit-for-tat"] as const;
export type PolicyName = (typeof POLICY_NAMES)[number];

export function isPolicyName(name: string): name is PolicyName {
  return POLICY_NAMES.some((known) => known === name);
}

function firstOfType(menu: ActionMenu, actionType: ActionType): Action {
  const action = menu.standardActions.find((a) => a.actionType === actionType);
  if (!action) {
    throw new Error(`No ${actionType} action on the ${menu.riskTier}-risk menu`);
  }
  return action;
}

class FixedPolicy implements Policy {
  constructor(
    readonly name: PolicyName,
    private readonly actionType: ActionType
  ) {}

  chooseAction(ctx: PolicyContext): Action {
    return firstOfType(ctx.menu, this.actionType);
  }
}

/** Uniform over everything on the menu, special actions included. */
class RandomPolicy implements Policy {
  readonly name = "random";
  private readonly rng: SeededRng;

  constructor(seed: string) {
    this.rng = new SeededRng(seed);
  }

  chooseAction(ctx: PolicyContext): Action {
    return this.rng.pick([...ctx.menu.standardActions, ...ctx.menu.specialActions]);
  }
}

/** Opens cooperatively, then mirrors the opponent's last classification. */
class TitForTatPolicy implements Policy {
  readonly name = "tit-for-tat";

  chooseAction(ctx: PolicyContext): Action {
    return firstOfType(ctx.menu, ctx.opponentLastType ?? "cooperative");
  }
}

/** `seed` only matters for the random policy. */
export function createPolicy(name: PolicyName, seed: string): Policy {
  switch (name) {
    case "cooperate":
      return new FixedPolicy(name, "cooperative");
    case "compete":
      return new FixedPolicy(name, "competitive");
    case "random":
      return new RandomPolicy(seed);
    case "tit-for-tat":
      return new TitForTatPolicy();
  }
}
