import { requireStrictOrder } from "../parameters";
import { fixedCell, payoffCell } from "../deltas";
import { defineConstructor } from "./types";

const NO_ORDERING = (): void => undefined;

/** Row wants to match, column to mismatch. Only a mixed equilibrium. */
export const MatchingPennies = defineConstructor({
  matrixType: "matching_pennies",
  name: "Matching Pennies",
  category: "zero_sum_information",
  defaults: { scale: 1.0 },
  rowLabels: ["Heads", "Tails"],
  colLabels: ["Heads", "Tails"],
  checkOrdering: NO_ORDERING,
  cells: (p) => {
    const win = p.scale;
    const lose = -p.scale;
    return {
      cc: payoffCell(p, win, lose, 0.0),
      cd: payoffCell(p, lose, win, 0.0),
      dc: payoffCell(p, lose, win, 0.0),
      dd: payoffCell(p, win, lose, 0.0),
    };
  },
});

/**
 * Inspector (row) against a possible cheater (column). Catching a cheat
 * recovers half the penalty.
 */
export const InspectionGame = defineConstructor({
  matrixType: "inspection_game",
  name: "Inspection Game",
  category: "zero_sum_information",
  defaults: { inspectionCost: 0.3, cheatGain: 0.5, caughtPenalty: 1.0, lossIfExploited: 0.7 },
  rowLabels: ["Inspect", "Trust"],
  colLabels: ["Comply", "Cheat"],
  checkOrdering: (p) => {
    requireStrictOrder("inspection_game", "Inspection Game", "Loss > Cost", [
      ["Loss", p.lossIfExploited],
      ["Cost", p.inspectionCost],
    ]);
    requireStrictOrder("inspection_game", "Inspection Game", "Penalty > Gain > 0", [
      ["Penalty", p.caughtPenalty],
      ["Gain", p.cheatGain],
      ["Zero", 0],
    ]);
  },
  cells: (p) => {
    const cost = p.inspectionCost;
    const caughtBonus = p.caughtPenalty * 0.5;
    return {
      cc: payoffCell(p, -cost, 0, 0.0),
      cd: payoffCell(p, caughtBonus - cost, -p.caughtPenalty, 1.0),
      dc: payoffCell(p, 0, 0, 0.0),
      dd: payoffCell(p, -p.lossIfExploited, p.cheatGain, 0.5),
    };
  },
});

/**
 * Initiator (row) probes or masks; responder (column) stays vigilant or
 * projects. Deltas are fixed: only a detected probe moves anything.
 */
export const Reconnaissance = defineConstructor({
  matrixType: "reconnaissance",
  name: "Reconnaissance",
  category: "zero_sum_information",
  defaults: { scale: 1.0 },
  rowLabels: ["Probe", "Mask"],
  colLabels: ["Vigilant", "Project"],
  checkOrdering: NO_ORDERING,
  cells: (p) => {
    const still = { posA: 0, posB: 0, resCostA: 0, resCostB: 0, riskDelta: 0 };
    return {
      cc: fixedCell(-p.scale, p.scale, { ...still, riskDelta: 0.5 }),
      cd: fixedCell(p.scale, -p.scale, still),
      dc: fixedCell(0, 0, still),
      dd: fixedCell(-p.scale, p.scale, still),
    };
  },
});
