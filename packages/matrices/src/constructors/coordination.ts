import { ConstraintError } from "@brinksmanship/core";
import { requireStrictOrder } from "../parameters";
import { payoffCell } from "../deltas";
import { defineConstructor } from "./types";

/** Any match beats any mismatch. Equilibria at (A, A) and (B, B). */
export const PureCoordination = defineConstructor({
  matrixType: "pure_coordination",
  name: "Pure Coordination",
  category: "coordination",
  defaults: { coordinationBonus: 1.0, miscoordinationPenalty: 0.0 },
  rowLabels: ["A", "B"],
  colLabels: ["A", "B"],
  checkOrdering: (p) =>
    requireStrictOrder("pure_coordination", "Pure Coordination", "Match > Mismatch", [
      ["Match", p.coordinationBonus],
      ["Mismatch", p.miscoordinationPenalty],
    ]),
  cells: (p) => {
    const match = p.coordinationBonus;
    const mismatch = p.miscoordinationPenalty;
    return {
      cc: payoffCell(p, match, match, -0.3),
      cd: payoffCell(p, mismatch, mismatch, 0.3),
      dc: payoffCell(p, mismatch, mismatch, 0.3),
      dd: payoffCell(p, match, match, -0.3),
    };
  },
});

/**
 * Stag > hare temptation > hare safe > stag fail. Mutual stag is
 * payoff-dominant, mutual hare risk-dominant.
 */
export const StagHunt = defineConstructor({
  matrixType: "stag_hunt",
  name: "Stag Hunt",
  category: "coordination",
  defaults: { stagPayoff: 2.0, hareTemptation: 1.5, hareSafe: 1.0, stagFail: 0.0 },
  rowLabels: ["Stag", "Hare"],
  colLabels: ["Stag", "Hare"],
  checkOrdering: (p) =>
    requireStrictOrder("stag_hunt", "Stag Hunt", "R > T > P > S", [
      ["R", p.stagPayoff],
      ["T", p.hareTemptation],
      ["P", p.hareSafe],
      ["S", p.stagFail],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.stagPayoff, p.stagPayoff, -0.5),
    cd: payoffCell(p, p.stagFail, p.hareTemptation, 0.3),
    dc: payoffCell(p, p.hareTemptation, p.stagFail, 0.3),
    dd: payoffCell(p, p.hareSafe, p.hareSafe, 0.0),
  }),
});

/** Both want to coordinate; the row prefers (A, A) and the column (B, B). */
export const BattleOfSexes = defineConstructor({
  matrixType: "battle_of_sexes",
  name: "Battle of the Sexes",
  category: "coordination",
  defaults: {
    coordinationBonus: 1.0,
    miscoordinationPenalty: 0.0,
    preferenceA: 1.5,
    preferenceB: 1.3,
  },
  rowLabels: ["Opera", "Football"],
  colLabels: ["Opera", "Football"],
  checkOrdering: (p) => {
    requireStrictOrder("battle_of_sexes", "Battle of the Sexes", "Coord > Miscoord", [
      ["Coord", p.coordinationBonus],
      ["Miscoord", p.miscoordinationPenalty],
    ]);
    if (!(p.preferenceA > 1 && p.preferenceB > 1)) {
      throw new ConstraintError(
        "battle_of_sexes",
        `Battle of the Sexes requires preference multipliers > 1.0, got preferenceA=${p.preferenceA}, preferenceB=${p.preferenceB}`,
        { preferenceA: p.preferenceA, preferenceB: p.preferenceB }
      );
    }
  },
  cells: (p) => {
    const coord = p.coordinationBonus;
    const miss = p.miscoordinationPenalty;
    return {
      cc: payoffCell(p, coord * p.preferenceA, coord, -0.3),
      cd: payoffCell(p, miss, miss, 0.5),
      dc: payoffCell(p, miss, miss, 0.5),
      dd: payoffCell(p, coord, coord * p.preferenceB, -0.3),
    };
  },
});

/**
 * One side should lead and the other follow. Reads temptation as G (lead),
 * reward as H (follow), sucker as B (both follow), punishment as C (clash).
 */
export const Leader = defineConstructor({
  matrixType: "leader",
  name: "Leader",
  category: "coordination",
  defaults: { temptation: 2.0, reward: 1.5, sucker: 0.5, punishment: 0.0 },
  rowLabels: ["Follow", "Lead"],
  colLabels: ["Follow", "Lead"],
  checkOrdering: (p) =>
    requireStrictOrder("leader", "Leader", "G > H > B > C", [
      ["G", p.temptation],
      ["H", p.reward],
      ["B", p.sucker],
      ["C", p.punishment],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.sucker, p.sucker, 0.3),
    cd: payoffCell(p, p.reward, p.temptation, -0.3),
    dc: payoffCell(p, p.temptation, p.reward, -0.3),
    dd: payoffCell(p, p.punishment, p.punishment, 1.0),
  }),
});
