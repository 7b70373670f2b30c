import { strict as assert } from "assert";
import { approxEqual, SeededRng } from "@brinksmanship/core";
import {
  checkCrisisTermination,
  checkDeterministicEndings,
  checkNaturalEnding,
  createGameEnding,
  crisisTerminationProbability,
} from "./endings";
import { expectedVp, finalResolution, resolveBaseVp } from "./variance";
import { createGameState } from "./state";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(approxEqual(actual, expected, tolerance), `expected ${expected}, got ${actual}`);
}

describe("deterministic endings", () => {
  it("destroys both sides at maximum risk", () => {
    const ending = checkDeterministicEndings(
      createGameState({ riskLevel: 10, surplusCapturedA: 4, surplusCapturedB: 4 })
    );
    assert.deepEqual(ending, {
      endingType: "mutual_destruction",
      vpA: 20,
      vpB: 20,
      turn: 1,
      description: "Risk reached critical level. Mutual destruction.",
      surplusA: 0,
      surplusB: 0,
    });
  });

  it("checks player A before player B", () => {
    const ending = checkDeterministicEndings(createGameState({ positionA: 0, positionB: 0 }));
    assert.equal(ending?.endingType, "position_collapse_a");
    assert.equal(ending?.vpA, 10);
    assert.equal(ending?.vpB, 90);
  });

  it("lets the survivor keep captured surplus", () => {
    const ending = checkDeterministicEndings(
      createGameState({ resourcesB: 0, surplusCapturedA: 3, surplusCapturedB: 4 })
    );
    assert.equal(ending?.endingType, "resource_exhaustion_b");
    assert.equal(ending?.vpA, 85);
    assert.equal(ending?.surplusA, 3);
    assert.equal(ending?.surplusB, 0);
  });

  it("returns null while the crisis continues", () => {
    assert.equal(checkDeterministicEndings(createGameState()), null);
  });
});

describe("crisis termination", () => {
  it("is impossible before turn 10 or at risk 7", () => {
    assert.equal(crisisTerminationProbability(createGameState({ turn: 9, riskLevel: 10 })), 0);
    assert.equal(crisisTerminationProbability(createGameState({ turn: 14, riskLevel: 7 })), 0);

    const rng = new SeededRng("calm");
    for (let i = 0; i < 1000; i++) {
      assert.equal(checkCrisisTermination(createGameState({ turn: 12, riskLevel: 7 }), rng), null);
      assert.equal(checkCrisisTermination(createGameState({ turn: 9, riskLevel: 9.5 }), rng), null);
    }
  });

  it("triggers about 8% of the time at risk 8 on turn 10", () => {
    const state = createGameState({ turn: 10, riskLevel: 8 });
    near(crisisTerminationProbability(state), 0.08);

    const rng = new SeededRng("crisis-rate");
    const trials = 10_000;
    let triggered = 0;
    for (let i = 0; i < trials; i++) {
      if (checkCrisisTermination(state, rng)) triggered++;
    }
    near(triggered / trials, 0.08, 0.012);
  });

  it("describes the risk that ended the game", () => {
    const state = createGameState({ turn: 12, riskLevel: 10 });
    const rng = new SeededRng("spiral");
    let ending = checkCrisisTermination(state, rng);
    while (!ending) ending = checkCrisisTermination(state, rng);
    assert.equal(ending.endingType, "crisis_termination");
    assert.equal(ending.description, "Crisis spiraled out of control at Risk 10.0.");
    assert.equal(ending.turn, 12);
    near(ending.vpA + ending.vpB, 100);
  });
});

describe("natural ending", () => {
  it("waits until the last turn has been played", () => {
    const rng = new SeededRng("natural");
    assert.equal(checkNaturalEnding(createGameState({ turn: 12, maxTurns: 12 }), rng), null);
    const ending = checkNaturalEnding(createGameState({ turn: 13, maxTurns: 12 }), rng);
    assert.equal(ending?.endingType, "natural_ending");
    assert.equal(ending?.turn, 12);
    assert.equal(ending?.description, "The crisis reached its natural conclusion.");
  });
});

describe("createGameEnding", () => {
  const base = {
    endingType: "natural_ending" as const,
    vpA: 55,
    vpB: 45,
    turn: 12,
    description: "",
    surplusA: 0,
    surplusB: 0,
  };

  it("accepts a split that sums to 100", () => {
    assert.ok(Object.isFrozen(createGameEnding(base)));
  });

  it("rejects splits that do not", () => {
    assert.throws(() => createGameEnding({ ...base, vpB: 35 }), /VP must sum to 100, got 90/);
    assert.throws(() => createGameEnding({ ...base, endingType: "mutual_destruction" }), RangeError);
    assert.throws(() => createGameEnding({ ...base, vpA: 120, vpB: -20 }), /VP must be in \[0, 100\]/);
  });
});

describe("variance", () => {
  it("expects a position-weighted split", () => {
    const split = expectedVp(createGameState({ positionA: 6, positionB: 4 }));
    near(split.vpA, 60);
    near(split.vpB, 40);
    assert.deepEqual(expectedVp(createGameState({ positionA: 0, positionB: 0 })), { vpA: 50, vpB: 50 });
  });

  it("always sums the base split to 100 within bounds", () => {
    const state = createGameState({ positionA: 9, positionB: 1, riskLevel: 10, cooperationScore: 0, turn: 12 });
    const rng = new SeededRng("bounds");
    for (let i = 0; i < 500; i++) {
      const { vpA, vpB } = resolveBaseVp(state, rng);
      near(vpA + vpB, 100);
      assert.ok(vpA >= 5 && vpA <= 95, `vpA out of range: ${vpA}`);
    }
  });

  it("reproduces the same result from the same seed", () => {
    const state = createGameState({ positionA: 7, positionB: 3, riskLevel: 6, turn: 11 });
    assert.deepEqual(finalResolution(state, new SeededRng(42)), finalResolution(state, new SeededRng(42)));
  });

  it("adds captured surplus on top of the base split", () => {
    const state = createGameState({
      positionA: 6,
      positionB: 4,
      surplusCapturedA: 10,
      surplusCapturedB: 5,
      riskLevel: 0,
      cooperationScore: 10,
      stability: 10,
      turn: 1,
    });
    const rng = new SeededRng("surplus");
    const draws = 2000;
    let totalA = 0;
    let totalB = 0;
    for (let i = 0; i < draws; i++) {
      const { vpA, vpB } = finalResolution(state, rng);
      totalA += vpA;
      totalB += vpB;
    }
    near(totalA / draws, 70, 0.5);
    near(totalB / draws, 45, 0.5);
  });
});
