export type MatrixType =
  // Dominant strategy
  | "prisoners_dilemma"
  | "deadlock"
  | "harmony"
  // Anti-coordination
  | "chicken"
  | "volunteers_dilemma"
  | "war_of_attrition"
  // Coordination
  | "pure_coordination"
  | "stag_hunt"
  | "battle_of_sexes"
  | "leader"
  // Zero-sum and information
  | "matching_pennies"
  | "inspection_game"
  | "reconnaissance"
  // Same structure as the prisoner's dilemma
  | "security_dilemma";

export type MatrixCategory =
  | "dominant_strategy"
  | "anti_coordination"
  | "coordination"
  | "zero_sum_information";

/**
 * Position, resource and risk changes for one outcome cell, before act scaling.
 * Only constructed through createStateDeltas, which enforces the bounds.
 */
export interface StateDeltas {
  readonly posA: number;
  readonly posB: number;
  readonly resCostA: number;
  readonly resCostB: number;
  readonly riskDelta: number;
}

export interface OutcomePayoffs {
  readonly payoffA: number;
  readonly payoffB: number;
  readonly deltas: StateDeltas;
}

/** Row choice then column choice: c = first strategy, d = second. */
export type OutcomeCell = "cc" | "cd" | "dc" | "dd";

export interface PayoffMatrix {
  readonly matrixType: MatrixType;
  readonly cc: OutcomePayoffs;
  readonly cd: OutcomePayoffs;
  readonly dc: OutcomePayoffs;
  readonly dd: OutcomePayoffs;
  readonly rowLabels: readonly [string, string];
  readonly colLabels: readonly [string, string];
}

/**
 * Everything a constructor may read. Each constructor uses a subset; the
 * rest are ignored. Weights control how payoffs turn into state deltas.
 */
export interface MatrixParameters {
  readonly scale: number;
  readonly positionWeight: number;
  readonly resourceWeight: number;
  readonly riskWeight: number;

  // Prisoner's dilemma family
  readonly temptation: number;
  readonly reward: number;
  readonly punishment: number;
  readonly sucker: number;

  // Chicken
  readonly swervePayoff: number;
  readonly crashPayoff: number;

  // Coordination
  readonly coordinationBonus: number;
  readonly miscoordinationPenalty: number;
  readonly preferenceA: number;
  readonly preferenceB: number;

  // Stag hunt
  readonly stagPayoff: number;
  readonly hareTemptation: number;
  readonly hareSafe: number;
  readonly stagFail: number;

  // Volunteer's dilemma
  readonly volunteerCost: number;
  readonly freeRideBonus: number;
  readonly disasterPenalty: number;

  // Inspection
  readonly inspectionCost: number;
  readonly cheatGain: number;
  readonly caughtPenalty: number;
  readonly lossIfExploited: number;
}
