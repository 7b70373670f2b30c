import { strict as assert } from "assert";
import {
  ConstraintError,
  DeltaRangeError,
  UnknownMatrixTypeError,
  type OutcomeCell,
  type PayoffMatrix,
} from "@brinksmanship/core";
import {
  MATRIX_TYPES,
  buildDefaultMatrix,
  buildMatrix,
  cellFor,
  defaultParamsFor,
  listMatrixTypes,
  resolveMatrixType,
  validateMatrixParameters,
} from "./registry";
import { createStateDeltas, makeDeltas } from "./deltas";
import { DEFAULT_MATRIX_PARAMETERS, mergeParameters } from "./parameters";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${expected}, got ${actual}`
  );
}

/** Pure-strategy Nash equilibria as cell keys, row strategy first. */
function pureEquilibria(m: PayoffMatrix): OutcomeCell[] {
  const result: OutcomeCell[] = [];
  for (const row of [true, false]) {
    for (const col of [true, false]) {
      const here = m[cellFor(row, col)];
      const rowAlt = m[cellFor(!row, col)];
      const colAlt = m[cellFor(row, !col)];
      if (here.payoffA >= rowAlt.payoffA && here.payoffB >= colAlt.payoffB) {
        result.push(cellFor(row, col));
      }
    }
  }
  return result;
}

describe("matrix constructors", () => {
  it("builds every type from its default parameters", () => {
    for (const matrixType of MATRIX_TYPES) {
      const params = defaultParamsFor(matrixType);
      assert.doesNotThrow(() => validateMatrixParameters(matrixType, params));
      const matrix = buildMatrix(matrixType, params);
      assert.equal(matrix.matrixType, matrixType);
      assert.ok(Object.isFrozen(matrix));
    }
  });

  it("converts prisoner's dilemma payoffs into deltas", () => {
    const m = buildDefaultMatrix("prisoners_dilemma");
    assert.equal(m.cc.payoffA, 1.0);
    assert.equal(m.cd.payoffA, 0.0);
    assert.equal(m.cd.payoffB, 1.5);
    near(m.cc.deltas.posA, 0);
    near(m.cc.deltas.riskDelta, -0.5);
    near(m.cd.deltas.posA, -0.45);
    near(m.cd.deltas.posB, 0.45);
    near(m.cd.deltas.riskDelta, 0.5);
    near(m.dd.deltas.riskDelta, 1.0);
    assert.deepEqual(m.rowLabels, ["Cooperate", "Defect"]);
  });

  it("charges resources for negative payoffs", () => {
    const m = buildDefaultMatrix("chicken");
    near(m.dd.deltas.resCostA, 0.2);
    near(m.dd.deltas.resCostB, 0.2);
    near(m.dd.deltas.riskDelta, 2.0);
    assert.deepEqual(m.colLabels, ["Dove", "Hawk"]);
  });

  it("clamps position swings at large scales", () => {
    const params = mergeParameters(defaultParamsFor("prisoners_dilemma"), { scale: 10 });
    const m = buildMatrix("prisoners_dilemma", params);
    assert.equal(m.cd.deltas.posA, -1.5);
    assert.equal(m.cd.deltas.posB, 1.5);
  });

  it("gives each game its characteristic equilibria", () => {
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("prisoners_dilemma")), ["dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("security_dilemma")), ["dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("deadlock")), ["dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("harmony")), ["cc"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("chicken")), ["cd", "dc"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("volunteers_dilemma")), ["cd", "dc"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("stag_hunt")), ["cc", "dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("pure_coordination")), ["cc", "dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("battle_of_sexes")), ["cc", "dd"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("leader")), ["cd", "dc"]);
    assert.deepEqual(pureEquilibria(buildDefaultMatrix("matching_pennies")), []);
  });

  it("keeps reconnaissance deltas fixed", () => {
    const m = buildDefaultMatrix("reconnaissance");
    assert.equal(m.cc.deltas.riskDelta, 0.5);
    assert.equal(m.cd.deltas.riskDelta, 0);
    assert.deepEqual(m.rowLabels, ["Probe", "Mask"]);
    assert.deepEqual(m.colLabels, ["Vigilant", "Project"]);
  });
});

describe("ordinal constraints", () => {
  it("names the offending values", () => {
    const params = mergeParameters(defaultParamsFor("prisoners_dilemma"), { temptation: 0.9 });
    assert.throws(
      () => buildMatrix("prisoners_dilemma", params),
      (err: unknown) =>
        err instanceof ConstraintError &&
        err.message === "Prisoner's Dilemma requires T > R > P > S, got T=0.9, R=1, P=0.3, S=0" &&
        err.values.T === 0.9
    );
  });

  it("rejects ties", () => {
    const params = mergeParameters(defaultParamsFor("stag_hunt"), { hareTemptation: 2.0 });
    assert.throws(() => buildMatrix("stag_hunt", params), ConstraintError);
  });

  it("rejects battle of the sexes without a preference", () => {
    const params = mergeParameters(defaultParamsFor("battle_of_sexes"), { preferenceB: 1.0 });
    assert.throws(() => validateMatrixParameters("battle_of_sexes", params), ConstraintError);
  });

  it("requires war of attrition temptation above sucker", () => {
    const params = mergeParameters(defaultParamsFor("war_of_attrition"), { sucker: 2.0 });
    assert.throws(() => buildMatrix("war_of_attrition", params), /T > R > P and T > S/);
  });

  it("requires inspection losses above the inspection cost", () => {
    const params = mergeParameters(defaultParamsFor("inspection_game"), { lossIfExploited: 0.2 });
    assert.throws(() => buildMatrix("inspection_game", params), /Loss > Cost/);
  });

  it("enforces the shared weight contract", () => {
    const params = mergeParameters(DEFAULT_MATRIX_PARAMETERS, { riskWeight: 0.3 });
    assert.throws(() => buildMatrix("matching_pennies", params), /Weights must sum to 1.0/);
    const negative = mergeParameters(DEFAULT_MATRIX_PARAMETERS, {
      positionWeight: 1.2,
      resourceWeight: -0.2,
      riskWeight: 0,
    });
    assert.throws(() => buildMatrix("harmony", negative), /resourceWeight must be non-negative/);
  });

  it("rejects a non-positive scale", () => {
    const params = mergeParameters(DEFAULT_MATRIX_PARAMETERS, { scale: 0 });
    assert.throws(() => buildMatrix("reconnaissance", params), /scale must be positive/);
  });
});

describe("state deltas", () => {
  const zero = { posA: 0, posB: 0, resCostA: 0, resCostB: 0, riskDelta: 0 };

  it("rejects each out-of-range field", () => {
    assert.throws(() => createStateDeltas({ ...zero, posA: 1.6 }), DeltaRangeError);
    assert.throws(() => createStateDeltas({ ...zero, resCostB: -0.1 }), DeltaRangeError);
    assert.throws(() => createStateDeltas({ ...zero, riskDelta: 2.5 }), DeltaRangeError);
    assert.throws(() => createStateDeltas({ ...zero, posA: 0.4, posB: 0.4 }), /near-zero-sum/);
  });

  it("accepts the bounds themselves", () => {
    const deltas = createStateDeltas({ posA: 1.5, posB: -1.5, resCostA: 1, resCostB: 0, riskDelta: -1 });
    assert.equal(deltas.posA, 1.5);
    assert.ok(Object.isFrozen(deltas));
  });

  it("scales cell risk by the risk weight", () => {
    const params = mergeParameters(DEFAULT_MATRIX_PARAMETERS, {
      positionWeight: 0.5,
      resourceWeight: 0.1,
      riskWeight: 0.4,
    });
    near(makeDeltas(params, 1, 1, 0.5).riskDelta, 1.0);
    near(makeDeltas(params, 1, 1, 2.0).riskDelta, 2.0);
  });
});

describe("resolveMatrixType", () => {
  it("accepts canonical tags and aliases in any case", () => {
    assert.equal(resolveMatrixType("chicken"), "chicken");
    assert.equal(resolveMatrixType("PD"), "prisoners_dilemma");
    assert.equal(resolveMatrixType("Battle-Of-Sexes"), "battle_of_sexes");
    assert.equal(resolveMatrixType("trust game"), "stag_hunt");
    assert.equal(resolveMatrixType("Recon"), "reconnaissance");
    assert.equal(resolveMatrixType("inspect"), "inspection_game");
  });

  it("lists valid tags and aliases when nothing matches", () => {
    assert.throws(
      () => resolveMatrixType("poker"),
      (err: unknown) =>
        err instanceof UnknownMatrixTypeError &&
        err.validTypes.length === 14 &&
        err.validAliases.includes("trust_game")
    );
  });

  it("does not resolve inherited object keys", () => {
    assert.throws(() => resolveMatrixType("constructor"), UnknownMatrixTypeError);
  });
});

describe("listMatrixTypes", () => {
  it("describes the whole catalogue", () => {
    const types = listMatrixTypes();
    assert.equal(types.length, 14);
    const stag = types.find((t) => t.matrixType === "stag_hunt");
    assert.equal(stag?.category, "coordination");
    assert.deepEqual(stag?.aliases, ["stag", "trust", "trust_game"]);
    assert.equal(types.filter((t) => t.category === "dominant_strategy").length, 4);
  });
});
