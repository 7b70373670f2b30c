/** Numeric rules of the game. Kept in one place so balance changes are local. */

export const STAT_MIN = 0;
export const STAT_MAX = 10;
export const STABILITY_MIN = 1;

export const INITIAL_POSITION = 5;
export const INITIAL_RESOURCES = 5;
export const INITIAL_COOPERATION = 5;
export const INITIAL_STABILITY = 5;
export const INITIAL_RISK = 2;

export const MIN_MAX_TURNS = 12;
export const MAX_MAX_TURNS = 16;

export const ACT_MULTIPLIERS = { 1: 0.7, 2: 1.0, 3: 1.3 } as const;

// Stability: decay toward neutral, then reward consistency
export const STABILITY_DECAY = 0.8;
export const STABILITY_DRIFT = 1.0;
export const STABILITY_NO_SWITCH_BONUS = 1.5;
export const STABILITY_ONE_SWITCH_PENALTY = 3.5;
export const STABILITY_TWO_SWITCH_PENALTY = 5.5;

// Variance
export const BASE_SIGMA = 8;
export const SIGMA_PER_RISK = 1.2;
export const VP_FLOOR = 5;
export const VP_CEILING = 95;

// Information games
export const RECONNAISSANCE_COST = 0.5;
export const INSPECTION_COST = 0.3;
export const CHEAT_POSITION_PENALTY = 0.5;
export const CHEAT_RISK_INCREASE = 1.0;
export const INTEL_DECAY_PER_TURN = 0.8;
export const INTEL_MAX_RADIUS = 5.0;

// Costly signalling: weaker positions pay more to prove themselves
export const SIGNAL_STRONG_POSITION = 7;
export const SIGNAL_MEDIUM_POSITION = 4;
export const SIGNAL_COST_STRONG = 0.3;
export const SIGNAL_COST_MEDIUM = 0.7;
export const SIGNAL_COST_WEAK = 1.2;

// Settlement
export const SETTLEMENT_AFTER_TURN = 4;
export const SETTLEMENT_MIN_STABILITY = 2;
export const FAILED_SETTLEMENT_RISK = 1.0;
export const SETTLEMENT_COOPERATION_WEIGHT = 2;
export const SETTLEMENT_OFFER_MIN = 20;
export const SETTLEMENT_OFFER_MAX = 80;
export const SETTLEMENT_OFFER_SPREAD = 10;

// Crisis termination
export const CRISIS_MIN_TURN = 10;
export const CRISIS_RISK_THRESHOLD = 7;
export const CRISIS_PROBABILITY_PER_RISK = 0.08;

// Cooperation surplus
export const SURPLUS_BASE = 2.0;
export const SURPLUS_STREAK_BONUS = 0.1;
export const CAPTURE_RATE = 0.4;
export const DD_BURN_RATE = 0.2;
