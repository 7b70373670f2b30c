import { ConstraintError, type MatrixParameters, type MatrixType } from "@brinksmanship/core";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

/** Values every constructor falls back to. They satisfy the PD-family ordering. */
export const DEFAULT_MATRIX_PARAMETERS: MatrixParameters = Object.freeze({
  scale: 1.0,
  positionWeight: 0.6,
  resourceWeight: 0.2,
  riskWeight: 0.2,
  temptation: 1.5,
  reward: 1.0,
  punishment: 0.3,
  sucker: 0.0,
  swervePayoff: 0.5,
  crashPayoff: -1.0,
  coordinationBonus: 1.0,
  miscoordinationPenalty: 0.0,
  preferenceA: 1.2,
  preferenceB: 1.2,
  stagPayoff: 2.0,
  hareTemptation: 1.5,
  hareSafe: 1.0,
  stagFail: 0.0,
  volunteerCost: 0.3,
  freeRideBonus: 0.5,
  disasterPenalty: 1.0,
  inspectionCost: 0.3,
  cheatGain: 0.5,
  caughtPenalty: 1.0,
  lossIfExploited: 0.7,
});

const PARAMETER_KEYS = Object.keys(DEFAULT_MATRIX_PARAMETERS);

export function isParameterKey(key: string): key is keyof MatrixParameters {
  return PARAMETER_KEYS.includes(key);
}

/** Overlay partial parameters on a base set. Undefined entries are skipped. */
export function mergeParameters(
  base: MatrixParameters,
  overrides: Partial<MatrixParameters> = {}
): MatrixParameters {
  const merged: MatrixParameters = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && isParameterKey(key)) {
      Object.assign(merged, { [key]: value });
    }
  }
  return Object.freeze(merged);
}

/**
 * Contract shared by every game type: finite values, positive scale,
 * non-negative weights summing to one.
 */
export function validateSharedParameters(
  matrixType: MatrixType,
  params: MatrixParameters
): void {
  for (const [key, value] of Object.entries(params)) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConstraintError(matrixType, `${key} must be a finite number, got ${String(value)}`, {});
    }
  }
  if (!(params.scale > 0)) {
    throw new ConstraintError(matrixType, `scale must be positive, got ${params.scale}`, {
      scale: params.scale,
    });
  }
  const weights = {
    positionWeight: params.positionWeight,
    resourceWeight: params.resourceWeight,
    riskWeight: params.riskWeight,
  };
  for (const [key, value] of Object.entries(weights)) {
    if (value < 0) {
      throw new ConstraintError(matrixType, `${key} must be non-negative, got ${value}`, weights);
    }
  }
  const total = weights.positionWeight + weights.resourceWeight + weights.riskWeight;
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConstraintError(
      matrixType,
      `Weights must sum to 1.0, got ${total} ` +
        `(${weights.positionWeight} + ${weights.resourceWeight} + ${weights.riskWeight})`,
      weights
    );
  }
}

/**
 * Throw unless the named values are in strictly decreasing order.
 * `relation` is only used for the message, e.g. "T > R > P > S".
 */
export function requireStrictOrder(
  matrixType: MatrixType,
  gameName: string,
  relation: string,
  values: ReadonlyArray<readonly [string, number]>
): void {
  for (let i = 1; i < values.length; i++) {
    if (!(values[i - 1][1] > values[i][1])) {
      throw new ConstraintError(
        matrixType,
        `${gameName} requires ${relation}, got ${formatValues(values)}`,
        Object.fromEntries(values)
      );
    }
  }
}

export function formatValues(values: ReadonlyArray<readonly [string, number]>): string {
  return values.map(([label, value]) => `${label}=${value}`).join(", ");
}
