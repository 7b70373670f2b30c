import { strict as assert } from "assert";
import { approxEqual } from "@brinksmanship/core";
import { buildDefaultMatrix } from "@brinksmanship/matrices";
import {
  BACK_CHANNEL,
  DEESCALATE,
  ESCALATE,
  INITIATE_INSPECTION,
  INITIATE_RECONNAISSANCE,
  proposeSettlement,
  signalStrength,
} from "./actions";
import {
  applySignals,
  negotiatedSurplusShareA,
  reconnaissanceOutcome,
  resolveInspection,
  resolveMatrix,
  resolveReconnaissance,
  resolveSettlement,
  settlementConstraints,
  settlementVp,
} from "./resolution";
import { defaultTurnConfiguration } from "./scenario";
import { createGameState } from "./state";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(approxEqual(actual, expected, tolerance), `expected ${expected}, got ${actual}`);
}

describe("resolveMatrix", () => {
  const pd = buildDefaultMatrix("prisoners_dilemma");
  const config = defaultTurnConfiguration(5);

  it("reads the cell picked by both classifications", () => {
    const result = resolveMatrix(DEESCALATE, ESCALATE, config, pd);
    assert.equal(result.outcomeCode, "CD");
    near(result.positionDeltaA, -0.45);
    near(result.positionDeltaB, 0.45);
    near(result.riskDelta, 0.5);
    assert.equal(result.narrative, "Player A cooperated while Player B competed. Cooperate against Defect.");
  });

  it("prefers the turn's own narrative", () => {
    const narrated = { ...config, outcomeNarratives: { DD: "Both fleets surge forward." } };
    assert.equal(resolveMatrix(ESCALATE, ESCALATE, narrated, pd).narrative, "Both fleets surge forward.");
    assert.equal(
      resolveMatrix(BACK_CHANNEL, DEESCALATE, narrated, pd).narrative,
      "Both sides chose cooperation. Cooperate met Cooperate."
    );
  });

  it("adds chicken's crash costs to both players", () => {
    const chicken = buildDefaultMatrix("chicken");
    const result = resolveMatrix(ESCALATE, ESCALATE, defaultTurnConfiguration(9), chicken);
    near(result.resourceCostA, 0.2);
    near(result.resourceCostB, 0.2);
    near(result.riskDelta, 2);
  });
});

describe("reconnaissance", () => {
  it("resolves the full probe table", () => {
    assert.deepEqual(reconnaissanceOutcome("Probe", "Vigilant"), {
      riskDelta: 0.5,
      detected: true,
      initiatorLearns: false,
      responderLearns: false,
    });
    assert.equal(reconnaissanceOutcome("Probe", "Project").initiatorLearns, true);
    assert.deepEqual(reconnaissanceOutcome("Mask", "Vigilant"), {
      riskDelta: 0,
      detected: false,
      initiatorLearns: false,
      responderLearns: false,
    });
    assert.equal(reconnaissanceOutcome("Mask", "Project").responderLearns, true);
  });

  it("reveals the position of a responder who projects", () => {
    const state = createGameState({ positionB: 6.5, turn: 3 });
    const result = resolveReconnaissance(state, INITIATE_RECONNAISSANCE, ESCALATE);
    assert.equal(result.outcomeCode, "RECON");
    assert.deepEqual(result.intel, [{ observer: "A", subject: "position", value: 6.5, observedTurn: 3 }]);
    assert.equal(result.resourceCostA, 0.5);
    assert.equal(result.resourceCostB, 0);
    assert.equal(result.riskDelta, 0);
    assert.equal(result.narrative, "Player A's reconnaissance succeeded. Player B's position is 6.5.");
  });

  it("lets a vigilant responder catch the probe", () => {
    const result = resolveReconnaissance(createGameState(), DEESCALATE, INITIATE_RECONNAISSANCE);
    assert.equal(result.probeDetectedBy, "A");
    assert.equal(result.riskDelta, 0.5);
    assert.equal(result.resourceCostB, 0.5);
    assert.deepEqual(result.intel, []);
    assert.equal(result.narrative, "Player B's reconnaissance was detected. Risk increases.");
  });
});

describe("inspection", () => {
  it("verifies a complying target", () => {
    const state = createGameState({ resourcesB: 3.25 });
    const result = resolveInspection(state, INITIATE_INSPECTION, DEESCALATE);
    assert.equal(result.outcomeCode, "INSPECT");
    assert.deepEqual(result.intel, [{ observer: "A", subject: "resources", value: 3.25, observedTurn: 1 }]);
    assert.equal(result.positionDeltaB, 0);
    assert.equal(result.riskDelta, 0);
    assert.equal(result.resourceCostA, 0.3);
  });

  it("penalises a cheating target", () => {
    const result = resolveInspection(createGameState(), ESCALATE, INITIATE_INSPECTION);
    assert.equal(result.positionDeltaA, -0.5);
    assert.equal(result.riskDelta, 1);
    assert.equal(result.resourceCostB, 0.3);
    assert.equal(result.intel[0].observer, "B");
  });
});

describe("settlement", () => {
  it("splits VP by position with a cooperation bonus", () => {
    near(settlementVp(createGameState({ positionA: 6, positionB: 4 })).vpA, 60);
    near(settlementVp(createGameState({ positionA: 0, positionB: 0, cooperationScore: 10 })).vpA, 60);
    assert.deepEqual(settlementVp(createGameState({ positionA: 9, positionB: 1, cooperationScore: 10 })), {
      vpA: 95,
      vpB: 5,
    });
  });

  it("meets both surplus asks halfway", () => {
    near(negotiatedSurplusShareA(proposeSettlement(60), proposeSettlement(30)), 0.65);
    near(negotiatedSurplusShareA(proposeSettlement(50), proposeSettlement(50)), 0.5);
  });

  it("agrees only when both sides propose", () => {
    const state = createGameState({ turn: 6 });
    const config = defaultTurnConfiguration(6);
    const agreed = resolveSettlement(state, proposeSettlement(50), proposeSettlement(50), config);
    assert.equal(agreed.agreed, true);
    assert.equal(agreed.result.outcomeCode, "SETTLE");

    const failed = resolveSettlement(state, proposeSettlement(50), ESCALATE, config);
    assert.equal(failed.agreed, false);
    assert.equal(failed.result.outcomeCode, "SETTLE_FAIL");
    assert.equal(failed.result.riskDelta, 1);
    assert.equal(failed.result.actionB, "competitive");
    assert.equal(failed.result.narrative, "Negotiations failed. The crisis continues.");
  });

  it("suggests an offer range from position and cooperation", () => {
    const state = createGameState({ positionA: 7, positionB: 5, cooperationScore: 6 });
    assert.deepEqual(settlementConstraints(state, "A"), { minVp: 52, maxVp: 72, suggestedVp: 62 });
    assert.deepEqual(settlementConstraints(state, "B"), { minVp: 32, maxVp: 52, suggestedVp: 42 });
    const dominant = createGameState({ positionA: 10, positionB: 0, cooperationScore: 10 });
    assert.deepEqual(settlementConstraints(dominant, "A"), { minVp: 70, maxVp: 80, suggestedVp: 80 });
  });
});

describe("applySignals", () => {
  it("leaves a turn without signals untouched", () => {
    const state = createGameState();
    const result = resolveMatrix(DEESCALATE, ESCALATE, defaultTurnConfiguration(5), buildDefaultMatrix("prisoners_dilemma"));
    assert.equal(applySignals(state, DEESCALATE, ESCALATE, result), result);
  });

  it("charges a signal that rides on an inspection and shows the signaller's position", () => {
    const state = createGameState({ positionB: 8 });
    const signal = signalStrength(8);
    const result = applySignals(state, INITIATE_INSPECTION, signal, resolveInspection(state, INITIATE_INSPECTION, signal));
    assert.equal(result.outcomeCode, "INSPECT");
    assert.equal(result.resourceCostA, 0.3);
    assert.equal(result.resourceCostB, 0.3);
    assert.deepEqual(result.intel, [
      { observer: "A", subject: "resources", value: 5, observedTurn: 1 },
      { observer: "A", subject: "position", value: 8, observedTurn: 1 },
    ]);
    assert.equal(
      result.narrative,
      "Inspection verified Player B's compliance. Resources: 5.0. Player B signalled strength: Position 8.0."
    );
  });
});
