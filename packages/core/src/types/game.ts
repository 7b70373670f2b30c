export type PlayerSide = "A" | "B";

/** Classification of an action: maps to C or D in the matrix game. */
export type ActionType = "cooperative" | "competitive";

/**
 * Settlement, reconnaissance and inspection replace the matrix game for the
 * turn. A signal plays as a cooperative move and also reveals the
 * signaller's position.
 */
export type ActionCategory =
  | "standard"
  | "settlement"
  | "reconnaissance"
  | "inspection"
  | "signaling";

export interface Action {
  readonly name: string;
  readonly actionType: ActionType;
  readonly resourceCost: number;
  readonly description: string;
  readonly category: ActionCategory;
  /**
   * Percentage (0-100) of the cooperation surplus a settlement proposer asks for.
   * Ignored outside the settlement category.
   */
  readonly surplusShare?: number;
  /**
   * VP the proposer asks for in a settlement offer. When set, a mutual
   * proposal opens a negotiation instead of settling on positions.
   */
  readonly offeredVp?: number;
}

/**
 * An observation of one opponent value. "unknown" is never a number so a
 * default can't be mistaken for something that was actually observed.
 */
export type Intel =
  | { readonly kind: "unknown" }
  | { readonly kind: "known"; readonly value: number; readonly observedTurn: number };

/** What one player knows about the other. */
export interface InformationState {
  readonly position: Intel;
  readonly resources: Intel;
}

export interface PlayerState {
  /** Relative power, 0-10 */
  readonly position: number;
  /** Reserves, 0-10 */
  readonly resources: number;
  /** Last turn's classification; null before the first resolved turn */
  readonly previousActionType: ActionType | null;
  readonly information: InformationState;
}

export interface GameState {
  readonly playerA: PlayerState;
  readonly playerB: PlayerState;
  readonly cooperationScore: number;
  readonly stability: number;
  readonly riskLevel: number;
  readonly turn: number;
  /** Hidden from players. */
  readonly maxTurns: number;
  /** Shared pool created by mutual cooperation; lost if never captured. */
  readonly cooperationSurplus: number;
  readonly surplusCapturedA: number;
  readonly surplusCapturedB: number;
  /** Consecutive mutual-cooperation outcomes */
  readonly cooperationStreak: number;
}

export type MatrixOutcomeCode = "CC" | "CD" | "DC" | "DD";

export type OutcomeCode =
  | MatrixOutcomeCode
  | "RECON"
  | "INSPECT"
  | "SETTLE"
  | "SETTLE_FAIL";

export type IntelSubject = "position" | "resources";

/** An exact observation one player makes of the other during resolution. */
export interface IntelUpdate {
  readonly observer: PlayerSide;
  readonly subject: IntelSubject;
  readonly value: number;
  readonly observedTurn: number;
}

/** Everything a resolution mode produces for the state-update step. */
export interface ActionResult {
  readonly actionA: ActionType;
  readonly actionB: ActionType;
  readonly positionDeltaA: number;
  readonly positionDeltaB: number;
  readonly resourceCostA: number;
  readonly resourceCostB: number;
  readonly riskDelta: number;
  readonly outcomeCode: OutcomeCode;
  readonly narrative: string;
  readonly intel: readonly IntelUpdate[];
  /** The side that caught an opponent's reconnaissance probe this turn. */
  readonly probeDetectedBy: PlayerSide | null;
}

export type EndingType =
  | "mutual_destruction"
  | "position_collapse_a"
  | "position_collapse_b"
  | "resource_exhaustion_a"
  | "resource_exhaustion_b"
  | "crisis_termination"
  | "natural_ending"
  | "settlement";

export interface GameEnding {
  readonly endingType: EndingType;
  /** Base split. Sums to 100 except for mutual destruction (20 each). */
  readonly vpA: number;
  readonly vpB: number;
  readonly turn: number;
  readonly description: string;
  /** Captured surplus credited on top of the base split. */
  readonly surplusA: number;
  readonly surplusB: number;
}

export type TurnPhase =
  | "briefing"
  | "decision"
  | "resolution"
  | "negotiation"
  | "state_update"
  | "check_deterministic"
  | "check_crisis"
  | "check_natural"
  | "advance"
  | "game_over";
