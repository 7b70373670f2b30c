import { strict as assert } from "assert";
import { approxEqual } from "@brinksmanship/core";
import { distributeSurplus, updateSurplus } from "./surplus";
import { createGameState } from "./state";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(approxEqual(actual, expected, tolerance), `expected ${expected}, got ${actual}`);
}

describe("cooperation surplus", () => {
  it("grows faster on a cooperation streak", () => {
    const fresh = updateSurplus(createGameState(), "CC");
    near(fresh.cooperationSurplus, 2);
    assert.equal(fresh.cooperationStreak, 1);

    const streak = updateSurplus(createGameState({ cooperationSurplus: 2, cooperationStreak: 2 }), "CC");
    near(streak.cooperationSurplus, 4.4);
    assert.equal(streak.cooperationStreak, 3);
  });

  it("lets the exploiter capture part of the pool", () => {
    const state = createGameState({ cooperationSurplus: 10, cooperationStreak: 4, surplusCapturedB: 1 });
    const next = updateSurplus(state, "CD");
    near(next.cooperationSurplus, 6);
    near(next.surplusCapturedB, 5);
    assert.equal(next.surplusCapturedA, 0);
    assert.equal(next.cooperationStreak, 0);
    near(updateSurplus(state, "DC").surplusCapturedA, 4);
  });

  it("burns a fifth of the pool on mutual defection", () => {
    const next = updateSurplus(createGameState({ cooperationSurplus: 10, cooperationStreak: 3 }), "DD");
    near(next.cooperationSurplus, 8);
    assert.equal(next.cooperationStreak, 0);
  });

  it("ignores outcomes outside the matrix game", () => {
    const state = createGameState({ cooperationSurplus: 10, cooperationStreak: 3 });
    for (const code of ["RECON", "INSPECT", "SETTLE_FAIL"] as const) {
      assert.deepEqual(updateSurplus(state, code), {
        cooperationSurplus: 10,
        surplusCapturedA: 0,
        surplusCapturedB: 0,
        cooperationStreak: 3,
      });
    }
  });

  it("distributes the whole pool by share", () => {
    const next = distributeSurplus(createGameState({ cooperationSurplus: 10, surplusCapturedA: 1 }), 0.65);
    assert.equal(next.cooperationSurplus, 0);
    near(next.surplusCapturedA, 7.5);
    near(next.surplusCapturedB, 3.5);
  });
});
