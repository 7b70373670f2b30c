import type {
  MatrixCategory,
  MatrixParameters,
  MatrixType,
  OutcomeCell,
  OutcomePayoffs,
  PayoffMatrix,
} from "@brinksmanship/core";
import { validateSharedParameters } from "../parameters";

/**
 * A (validate, build) pair for one game type. build always validates first,
 * so a matrix that exists has the ordering its type guarantees.
 */
export interface MatrixConstructor {
  readonly matrixType: MatrixType;
  readonly name: string;
  readonly category: MatrixCategory;
  /** Overrides applied on top of DEFAULT_MATRIX_PARAMETERS by defaultParamsFor */
  readonly defaults: Partial<MatrixParameters>;
  readonly rowLabels: readonly [string, string];
  readonly colLabels: readonly [string, string];
  validate(params: MatrixParameters): void;
  build(params: MatrixParameters): PayoffMatrix;
}

export interface ConstructorDefinition {
  matrixType: MatrixType;
  name: string;
  category: MatrixCategory;
  defaults: Partial<MatrixParameters>;
  rowLabels: readonly [string, string];
  colLabels: readonly [string, string];
  checkOrdering(params: MatrixParameters): void;
  cells(params: MatrixParameters): Record<OutcomeCell, OutcomePayoffs>;
}

export function defineConstructor(def: ConstructorDefinition): MatrixConstructor {
  const validate = (params: MatrixParameters): void => {
    validateSharedParameters(def.matrixType, params);
    def.checkOrdering(params);
  };

  return Object.freeze({
    matrixType: def.matrixType,
    name: def.name,
    category: def.category,
    defaults: Object.freeze({ ...def.defaults }),
    rowLabels: def.rowLabels,
    colLabels: def.colLabels,
    validate,
    build(params: MatrixParameters): PayoffMatrix {
      validate(params);
      const { cc, cd, dc, dd } = def.cells(params);
      return Object.freeze({
        matrixType: def.matrixType,
        cc,
        cd,
        dc,
        dd,
        rowLabels: def.rowLabels,
        colLabels: def.colLabels,
      });
    },
  });
}
