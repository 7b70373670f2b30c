import {
  DeltaRangeError,
  clamp,
  type MatrixParameters,
  type OutcomePayoffs,
  type StateDeltas,
} from "@brinksmanship/core";

export const POSITION_DELTA_LIMIT = 1.5;
export const RESOURCE_COST_LIMIT = 1.0;
export const RISK_DELTA_MIN = -1.0;
export const RISK_DELTA_MAX = 2.0;
export const POSITION_SUM_LIMIT = 0.5;

function requireRange(field: string, value: number, min: number, max: number): void {
  if (!(value >= min && value <= max)) {
    throw new DeltaRangeError(field, value, `${field} must be in [${min}, ${max}], got ${value}`);
  }
}

/** The only way to obtain StateDeltas. Out-of-range values throw. */
export function createStateDeltas(values: StateDeltas): StateDeltas {
  requireRange("posA", values.posA, -POSITION_DELTA_LIMIT, POSITION_DELTA_LIMIT);
  requireRange("posB", values.posB, -POSITION_DELTA_LIMIT, POSITION_DELTA_LIMIT);
  requireRange("resCostA", values.resCostA, 0, RESOURCE_COST_LIMIT);
  requireRange("resCostB", values.resCostB, 0, RESOURCE_COST_LIMIT);
  requireRange("riskDelta", values.riskDelta, RISK_DELTA_MIN, RISK_DELTA_MAX);
  const sum = Math.abs(values.posA + values.posB);
  if (sum > POSITION_SUM_LIMIT) {
    throw new DeltaRangeError(
      "posA+posB",
      sum,
      `Position changes must be near-zero-sum: |${values.posA} + ${values.posB}| = ${sum} > ${POSITION_SUM_LIMIT}`
    );
  }
  return Object.freeze({
    posA: values.posA,
    posB: values.posB,
    resCostA: values.resCostA,
    resCostB: values.resCostB,
    riskDelta: values.riskDelta,
  });
}

/**
 * Turn a cell's raw payoffs into state deltas. Position moves with the
 * payoff gap, negative payoffs cost resources, and the constructor's fixed
 * cell risk is scaled by the risk weight.
 */
export function makeDeltas(
  params: MatrixParameters,
  payoffA: number,
  payoffB: number,
  cellRisk: number
): StateDeltas {
  const normA = payoffA * params.scale;
  const normB = payoffB * params.scale;

  const posDiff = (normA - normB) * params.positionWeight * 0.5;

  return createStateDeltas({
    posA: clamp(posDiff, -POSITION_DELTA_LIMIT, POSITION_DELTA_LIMIT),
    posB: clamp(-posDiff, -POSITION_DELTA_LIMIT, POSITION_DELTA_LIMIT),
    resCostA: clamp(-Math.min(0, normA) * params.resourceWeight, 0, RESOURCE_COST_LIMIT),
    resCostB: clamp(-Math.min(0, normB) * params.resourceWeight, 0, RESOURCE_COST_LIMIT),
    riskDelta: clamp(cellRisk * params.riskWeight * 5, RISK_DELTA_MIN, RISK_DELTA_MAX),
  });
}

export function payoffCell(
  params: MatrixParameters,
  payoffA: number,
  payoffB: number,
  cellRisk: number
): OutcomePayoffs {
  return Object.freeze({ payoffA, payoffB, deltas: makeDeltas(params, payoffA, payoffB, cellRisk) });
}

/** A cell whose deltas are fixed rather than derived from payoffs. */
export function fixedCell(payoffA: number, payoffB: number, deltas: StateDeltas): OutcomePayoffs {
  return Object.freeze({ payoffA, payoffB, deltas: createStateDeltas(deltas) });
}
