import { ConstraintError } from "@brinksmanship/core";
import { formatValues, requireStrictOrder } from "../parameters";
import { payoffCell } from "../deltas";
import { defineConstructor } from "./types";

/** T > R > swerve > crash. Two pure equilibria where exactly one side backs down. */
export const Chicken = defineConstructor({
  matrixType: "chicken",
  name: "Chicken",
  category: "anti_coordination",
  defaults: { temptation: 1.5, reward: 1.0, swervePayoff: 0.5, crashPayoff: -1.0 },
  rowLabels: ["Dove", "Hawk"],
  colLabels: ["Dove", "Hawk"],
  checkOrdering: (p) =>
    requireStrictOrder("chicken", "Chicken", "T > R > Swerve > Crash", [
      ["T", p.temptation],
      ["R", p.reward],
      ["Swerve", p.swervePayoff],
      ["Crash", p.crashPayoff],
    ]),
  cells: (p) => ({
    cc: payoffCell(p, p.reward, p.reward, -0.5),
    cd: payoffCell(p, p.swervePayoff, p.temptation, 0.5),
    dc: payoffCell(p, p.temptation, p.swervePayoff, 0.5),
    dd: payoffCell(p, p.crashPayoff, p.crashPayoff, 2.0),
  }),
});

/** Someone has to pay to avert disaster; each would rather it was the other. */
export const VolunteersDilemma = defineConstructor({
  matrixType: "volunteers_dilemma",
  name: "Volunteer's Dilemma",
  category: "anti_coordination",
  defaults: { reward: 1.0, volunteerCost: 0.3, freeRideBonus: 0.5, disasterPenalty: 1.0 },
  rowLabels: ["Volunteer", "Abstain"],
  colLabels: ["Volunteer", "Abstain"],
  checkOrdering: (p) =>
    requireStrictOrder("volunteers_dilemma", "Volunteer's Dilemma", "F > W > D", [
      ["F", p.reward + p.freeRideBonus],
      ["W", p.reward - p.volunteerCost],
      ["D", -p.disasterPenalty],
    ]),
  cells: (p) => {
    const work = p.reward - p.volunteerCost;
    const freeRide = p.reward + p.freeRideBonus;
    const disaster = -p.disasterPenalty;
    return {
      cc: payoffCell(p, work, work, -0.5),
      cd: payoffCell(p, work, freeRide, 0.0),
      dc: payoffCell(p, freeRide, work, 0.0),
      dd: payoffCell(p, disaster, disaster, 1.5),
    };
  },
});

/** Whoever outlasts the other wins; continuing together is costly. */
export const WarOfAttrition = defineConstructor({
  matrixType: "war_of_attrition",
  name: "War of Attrition",
  category: "anti_coordination",
  defaults: { temptation: 1.5, reward: 1.0, punishment: 0.3, sucker: 0.0 },
  rowLabels: ["Continue", "Quit"],
  colLabels: ["Continue", "Quit"],
  checkOrdering: (p) => {
    const values = [
      ["T", p.temptation],
      ["R", p.reward],
      ["P", p.punishment],
      ["S", p.sucker],
    ] as const;
    if (!(p.temptation > p.reward && p.reward > p.punishment && p.temptation > p.sucker)) {
      throw new ConstraintError(
        "war_of_attrition",
        `War of Attrition requires T > R > P and T > S, got ${formatValues(values)}`,
        Object.fromEntries(values)
      );
    }
  },
  cells: (p) => ({
    cc: payoffCell(p, p.punishment, p.punishment, 1.0),
    cd: payoffCell(p, p.temptation, p.sucker, 0.0),
    dc: payoffCell(p, p.sucker, p.temptation, 0.0),
    dd: payoffCell(p, p.reward, p.reward, -0.5),
  }),
});
