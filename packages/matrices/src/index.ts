export * from "./registry";
export {
  DEFAULT_MATRIX_PARAMETERS,
  isParameterKey,
  WEIGHT_SUM_TOLERANCE,
  mergeParameters,
  validateSharedParameters,
} from "./parameters";
export {
  createStateDeltas,
  makeDeltas,
  POSITION_DELTA_LIMIT,
  RESOURCE_COST_LIMIT,
  RISK_DELTA_MIN,
  RISK_DELTA_MAX,
  POSITION_SUM_LIMIT,
} from "./deltas";
export type { MatrixConstructor } from "./constructors/types";
