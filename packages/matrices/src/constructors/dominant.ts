import { requireStrictOrder } from "../parameters";
import { payoffCell } from "../deltas";
import { defineConstructor } from "./types";

const PD_FAMILY_DEFAULTS = { temptation: 1.5, reward: 1.0, punishment: 0.3, sucker: 0.0 };

/** T > R > P > S. Unique equilibrium at mutual defection. */
export const PrisonersDilemma = defineConstructor({
  matrixType: "prisoners_dilemma",
  name: "Prisoner's Dilemma",
  category: "dominant_strategy",
  defaults: PD_FAMILY_DEFAULTS,
  rowLabels: ["Cooperate", "Defect"],
  colLabels: ["Cooperate", "Defect"],
  checkOrdering: (p) =>
    requireStrictOrder("prisoners_dilemma", "Prisoner's Dilemma", "T > R > P > S", [
      ["T", p.temptation],
      ["R", p.reward],
      ["P", p.punishment],
      ["S", p.sucker],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.reward, p.reward, -0.5),
    cd: payoffCell(p, p.sucker, p.temptation, 0.5),
    dc: payoffCell(p, p.temptation, p.sucker, 0.5),
    dd: payoffCell(p, p.punishment, p.punishment, 1.0),
  }),
});

/**
 * Prisoner's dilemma structure read as an arms race: arming for defence
 * looks like preparing to attack.
 */
export const SecurityDilemma = defineConstructor({
  matrixType: "security_dilemma",
  name: "Security Dilemma",
  category: "dominant_strategy",
  defaults: PD_FAMILY_DEFAULTS,
  rowLabels: ["Disarm", "Arm"],
  colLabels: ["Disarm", "Arm"],
  checkOrdering: (p) =>
    requireStrictOrder("security_dilemma", "Security Dilemma", "T > R > P > S", [
      ["T", p.temptation],
      ["R", p.reward],
      ["P", p.punishment],
      ["S", p.sucker],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.reward, p.reward, -0.5),
    cd: payoffCell(p, p.sucker, p.temptation, 0.5),
    dc: payoffCell(p, p.temptation, p.sucker, 0.5),
    dd: payoffCell(p, p.punishment, p.punishment, 1.0),
  }),
});

/** T > P > R > S. Mutual defection is preferred, not merely dominant. */
export const Deadlock = defineConstructor({
  matrixType: "deadlock",
  name: "Deadlock",
  category: "dominant_strategy",
  defaults: { temptation: 1.5, punishment: 1.0, reward: 0.5, sucker: 0.0 },
  rowLabels: ["Cooperate", "Defect"],
  colLabels: ["Cooperate", "Defect"],
  checkOrdering: (p) =>
    requireStrictOrder("deadlock", "Deadlock", "T > P > R > S", [
      ["T", p.temptation],
      ["P", p.punishment],
      ["R", p.reward],
      ["S", p.sucker],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.reward, p.reward, 0.0),
    cd: payoffCell(p, p.sucker, p.temptation, 0.5),
    dc: payoffCell(p, p.temptation, p.sucker, 0.5),
    dd: payoffCell(p, p.punishment, p.punishment, 0.5),
  }),
});

/** R > T > S > P. Cooperation dominates. */
export const Harmony = defineConstructor({
  matrixType: "harmony",
  name: "Harmony",
  category: "dominant_strategy",
  defaults: { reward: 1.5, temptation: 1.0, sucker: 0.5, punishment: 0.0 },
  rowLabels: ["Cooperate", "Defect"],
  colLabels: ["Cooperate", "Defect"],
  checkOrdering: (p) =>
    requireStrictOrder("harmony", "Harmony", "R > T > S > P", [
      ["R", p.reward],
      ["T", p.temptation],
      ["S", p.sucker],
      ["P", p.punishment],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.reward, p.reward, -0.5),
    cd: payoffCell(p, p.sucker, p.temptation, 0.0),
    dc: payoffCell(p, p.temptation, p.sucker, 0.0),
    dd: payoffCell(p, p.punishment, p.punishment, 0.5),
  }),
});
