import { strict as assert } from "assert";
import { approxEqual, type ActionResult, type ActionType, type MatrixOutcomeCode } from "@brinksmanship/core";
import {
  applyActionResult,
  countSwitches,
  createGameState,
  getAct,
  sharedSigma,
  updateCooperationScore,
  updateStability,
} from "./state";
import { estimateIntel, knownIntel, UNKNOWN_INTEL, withObservation, createInformationState } from "./information";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(approxEqual(actual, expected, tolerance), `expected ${expected}, got ${actual}`);
}

function matrixResult(actionA: ActionType, actionB: ActionType, overrides: Partial<ActionResult> = {}): ActionResult {
  const code: MatrixOutcomeCode = `${actionA === "cooperative" ? "C" : "D"}${actionB === "cooperative" ? "C" : "D"}`;
  return {
    actionA,
    actionB,
    positionDeltaA: 0,
    positionDeltaB: 0,
    resourceCostA: 0,
    resourceCostB: 0,
    riskDelta: 0,
    outcomeCode: code,
    narrative: "",
    intel: [],
    probeDetectedBy: null,
    ...overrides,
  };
}

describe("createGameState", () => {
  it("starts from the standard opening values", () => {
    const state = createGameState();
    assert.equal(state.playerA.position, 5);
    assert.equal(state.playerB.resources, 5);
    assert.equal(state.cooperationScore, 5);
    assert.equal(state.stability, 5);
    assert.equal(state.riskLevel, 2);
    assert.equal(state.turn, 1);
    assert.equal(state.maxTurns, 12);
    assert.equal(state.cooperationSurplus, 0);
    assert.deepEqual(state.playerA.information.position, { kind: "unknown" });
    assert.equal(state.playerA.previousActionType, null);
  });

  it("clamps bounded stats instead of rejecting them", () => {
    const state = createGameState({ positionA: 14, riskLevel: -3, stability: 0 });
    assert.equal(state.playerA.position, 10);
    assert.equal(state.riskLevel, 0);
    assert.equal(state.stability, 1);
  });

  it("rejects a max turn count outside 12-16", () => {
    assert.throws(() => createGameState({ maxTurns: 17 }), RangeError);
    assert.throws(() => createGameState({ maxTurns: 12.5 }), RangeError);
  });

  it("returns a frozen snapshot", () => {
    const state = createGameState();
    assert.ok(Object.isFrozen(state));
    assert.ok(Object.isFrozen(state.playerA));
    assert.ok(Object.isFrozen(state.playerA.information));
  });
});

describe("acts and variance", () => {
  it("maps turns onto three acts", () => {
    assert.deepEqual([1, 4, 5, 8, 9, 16].map(getAct), [1, 1, 2, 2, 3, 3]);
  });

  it("gives the narrowest sigma for a calm, cooperative opening", () => {
    const calm = createGameState({ riskLevel: 0, cooperationScore: 10, stability: 10, turn: 1 });
    near(sharedSigma(calm), 5.6);
  });

  it("gives the widest sigma at maximum risk in the third act", () => {
    const chaotic = createGameState({ riskLevel: 10, cooperationScore: 0, stability: 1, turn: 9 });
    near(sharedSigma(chaotic), 45.24);
  });
});

describe("cooperation and stability", () => {
  const base = createGameState({ previousTypeA: "cooperative", previousTypeB: "cooperative" });

  it("moves cooperation by outcome", () => {
    assert.equal(updateCooperationScore(base, matrixResult("cooperative", "cooperative")), 6);
    assert.equal(updateCooperationScore(base, matrixResult("competitive", "competitive")), 4);
    assert.equal(updateCooperationScore(base, matrixResult("cooperative", "competitive")), 5);
  });

  it("rewards consistency and punishes switches", () => {
    near(updateStability(base, matrixResult("cooperative", "cooperative")), 6.5);
    near(updateStability(base, matrixResult("competitive", "cooperative")), 1.5);
    near(updateStability(base, matrixResult("competitive", "competitive")), 1.0);
  });

  it("does not count a first move as a switch", () => {
    assert.equal(countSwitches(createGameState(), matrixResult("competitive", "cooperative")), 0);
  });
});

describe("applyActionResult", () => {
  it("scales position and risk by the act but not resource costs", () => {
    const state = createGameState({ turn: 9 });
    const next = applyActionResult(
      state,
      matrixResult("competitive", "cooperative", {
        positionDeltaA: 1,
        positionDeltaB: -1,
        resourceCostA: 0.5,
        riskDelta: 1,
      })
    );
    near(next.playerA.position, 6.3);
    near(next.playerB.position, 3.7);
    near(next.playerA.resources, 4.5);
    near(next.riskLevel, 3.3);
    assert.equal(next.turn, 10);
    assert.equal(next.playerA.previousActionType, "competitive");
  });

  it("leaves the previous state untouched", () => {
    const state = createGameState();
    applyActionResult(state, matrixResult("cooperative", "cooperative", { riskDelta: 1 }));
    assert.equal(state.riskLevel, 2);
    assert.equal(state.turn, 1);
  });

  it("hands intelligence only to its observer", () => {
    const next = applyActionResult(
      createGameState(),
      matrixResult("cooperative", "competitive", {
        intel: [{ observer: "B", subject: "resources", value: 4.2, observedTurn: 1 }],
      })
    );
    assert.deepEqual(next.playerB.information.resources, { kind: "known", value: 4.2, observedTurn: 1 });
    assert.deepEqual(next.playerA.information.resources, { kind: "unknown" });
  });
});

describe("information", () => {
  it("centres unknown values at the midpoint with the widest radius", () => {
    assert.deepEqual(estimateIntel(UNKNOWN_INTEL, 7), { center: 5, radius: 5 });
  });

  it("widens an observation as it ages", () => {
    const estimate = estimateIntel(knownIntel(3.5, 3), 5);
    assert.equal(estimate.center, 3.5);
    near(estimate.radius, 1.6);
    assert.equal(estimateIntel(knownIntel(3.5, 3), 3).radius, 0);
    assert.equal(estimateIntel(knownIntel(3.5, 1), 12).radius, 5);
  });

  it("replaces only the observed field", () => {
    const info = withObservation(createInformationState(), "position", 6, 2);
    assert.deepEqual(info.position, { kind: "known", value: 6, observedTurn: 2 });
    assert.deepEqual(info.resources, { kind: "unknown" });
  });
});
