import {
  UnknownMatrixTypeError,
  type MatrixCategory,
  type MatrixParameters,
  type MatrixType,
  type OutcomeCell,
  type PayoffMatrix,
} from "@brinksmanship/core";
import type { MatrixConstructor } from "./constructors/types";
import { Deadlock, Harmony, PrisonersDilemma, SecurityDilemma } from "./constructors/dominant";
import { Chicken, VolunteersDilemma, WarOfAttrition } from "./constructors/antiCoordination";
import { BattleOfSexes, Leader, PureCoordination, StagHunt } from "./constructors/coordination";
import { InspectionGame, MatchingPennies, Reconnaissance } from "./constructors/zeroSum";
import { DEFAULT_MATRIX_PARAMETERS, mergeParameters } from "./parameters";

/** Closed: adding a MatrixType without a constructor fails to compile. */
export const MATRIX_CONSTRUCTORS: { readonly [K in MatrixType]: MatrixConstructor } = Object.freeze({
  prisoners_dilemma: PrisonersDilemma,
  deadlock: Deadlock,
  harmony: Harmony,
  chicken: Chicken,
  volunteers_dilemma: VolunteersDilemma,
  war_of_attrition: WarOfAttrition,
  pure_coordination: PureCoordination,
  stag_hunt: StagHunt,
  battle_of_sexes: BattleOfSexes,
  leader: Leader,
  matching_pennies: MatchingPennies,
  inspection_game: InspectionGame,
  reconnaissance: Reconnaissance,
  security_dilemma: SecurityDilemma,
});

export const MATRIX_TYPES: readonly MatrixType[] = Object.freeze([
  "prisoners_dilemma",
  "deadlock",
  "harmony",
  "chicken",
  "volunteers_dilemma",
  "war_of_attrition",
  "pure_coordination",
  "stag_hunt",
  "battle_of_sexes",
  "leader",
  "matching_pennies",
  "inspection_game",
  "reconnaissance",
  "security_dilemma",
] as const);

export const MATRIX_TYPE_ALIASES: Readonly<Record<string, MatrixType>> = Object.freeze({
  inspection: "inspection_game",
  inspect: "inspection_game",
  recon: "reconnaissance",
  pd: "prisoners_dilemma",
  prisoner_dilemma: "prisoners_dilemma",
  bos: "battle_of_sexes",
  battle: "battle_of_sexes",
  stag: "stag_hunt",
  coord: "pure_coordination",
  coordination: "pure_coordination",
  trust: "stag_hunt",
  trust_game: "stag_hunt",
  security: "security_dilemma",
});

export function isMatrixType(tag: string): tag is MatrixType {
  return Object.prototype.hasOwnProperty.call(MATRIX_CONSTRUCTORS, tag);
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/[- ]/g, "_");
}

/**
 * Resolve a canonical tag or alias. Case, hyphens and spaces are ignored.
 */
export function resolveMatrixType(tag: string): MatrixType {
  const normalized = normalizeTag(tag);
  if (isMatrixType(normalized)) return normalized;
  const alias = Object.prototype.hasOwnProperty.call(MATRIX_TYPE_ALIASES, normalized)
    ? MATRIX_TYPE_ALIASES[normalized]
    : undefined;
  if (alias) return alias;
  throw new UnknownMatrixTypeError(tag, MATRIX_TYPES, Object.keys(MATRIX_TYPE_ALIASES));
}

export function buildMatrix(matrixType: MatrixType, params: MatrixParameters): PayoffMatrix {
  return MATRIX_CONSTRUCTORS[matrixType].build(params);
}

export function validateMatrixParameters(matrixType: MatrixType, params: MatrixParameters): void {
  MATRIX_CONSTRUCTORS[matrixType].validate(params);
}

/** Parameters known to satisfy the type's ordering. */
export function defaultParamsFor(matrixType: MatrixType): MatrixParameters {
  return mergeParameters(DEFAULT_MATRIX_PARAMETERS, MATRIX_CONSTRUCTORS[matrixType].defaults);
}

export function buildDefaultMatrix(matrixType: MatrixType): PayoffMatrix {
  return buildMatrix(matrixType, defaultParamsFor(matrixType));
}

export interface MatrixTypeInfo {
  readonly matrixType: MatrixType;
  readonly name: string;
  readonly category: MatrixCategory;
  readonly aliases: readonly string[];
}

export function listMatrixTypes(): MatrixTypeInfo[] {
  const aliasEntries = Object.entries(MATRIX_TYPE_ALIASES);
  return MATRIX_TYPES.map((matrixType) => ({
    matrixType,
    name: MATRIX_CONSTRUCTORS[matrixType].name,
    category: MATRIX_CONSTRUCTORS[matrixType].category,
    aliases: aliasEntries.filter(([, target]) => target === matrixType).map(([alias]) => alias),
  }));
}

/** First strategy (cooperative) is c, second is d. */
export function cellFor(rowCooperates: boolean, colCooperates: boolean): OutcomeCell {
  if (rowCooperates) return colCooperates ? "cc" : "cd";
  return colCooperates ? "dc" : "dd";
}
