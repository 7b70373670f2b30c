import { readFile } from "fs/promises";
import { Ajv2020 } from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import {
  ScenarioError,
  type MatrixParameters,
  type MatrixType,
  type PayoffMatrix,
  type Scenario,
  type ScenarioInput,
  type ScenarioTurnInput,
  type TurnConfiguration,
} from "@brinksmanship/core";
import {
  buildMatrix,
  defaultParamsFor,
  isParameterKey,
  mergeParameters,
  resolveMatrixType,
} from "@brinksmanship/matrices";
import scenarioSchemaJson from "../schemas/scenario.schema.json";
import { getAct, type Act } from "./state";

const scenarioSchema: SchemaObject = scenarioSchemaJson;

const ajv = new Ajv2020({ allErrors: true });
const validateScenarioInput = ajv.compile<ScenarioInput>(scenarioSchema);

const DEFAULT_MATRIX_BY_ACT: Readonly<Record<Act, MatrixType>> = {
  1: "stag_hunt",
  2: "prisoners_dilemma",
  3: "chicken",
};

export const DEFAULT_SETTLEMENT_FAILED_NARRATIVE = "Negotiations failed. The crisis continues.";

export function turnKey(turn: number): string {
  return `turn_${turn}`;
}

/** Configuration used for any turn a scenario does not define. */
export function defaultTurnConfiguration(turn: number): TurnConfiguration {
  const act = getAct(turn);
  const matrixType = DEFAULT_MATRIX_BY_ACT[act];
  return Object.freeze({
    turn,
    act,
    narrativeBriefing: `Turn ${turn} - The situation develops...`,
    matrixType,
    matrixParams: defaultParamsFor(matrixType),
    outcomeNarratives: {},
    branches: {},
    defaultNext: null,
    settlementAvailable: true,
    settlementFailedNarrative: DEFAULT_SETTLEMENT_FAILED_NARRATIVE,
  });
}

function parseParameters(
  label: string,
  matrixType: MatrixType,
  raw: Partial<MatrixParameters> | undefined
): MatrixParameters {
  for (const key of Object.keys(raw ?? {})) {
    if (!isParameterKey(key)) {
      throw new ScenarioError(`${label}: unknown matrix parameter '${key}'`);
    }
  }
  return mergeParameters(defaultParamsFor(matrixType), raw);
}

function parseTurn(label: string, turn: number, input: ScenarioTurnInput): TurnConfiguration {
  const matrixType = resolveMatrixType(input.matrixType);
  return Object.freeze({
    turn,
    act: getAct(turn),
    narrativeBriefing: input.narrativeBriefing ?? `Turn ${turn} - The situation develops...`,
    matrixType,
    matrixParams: parseParameters(label, matrixType, input.matrixParameters),
    outcomeNarratives: Object.freeze({ ...input.outcomeNarratives }),
    branches: Object.freeze({ ...input.branches }),
    defaultNext: input.defaultNext ?? null,
    settlementAvailable: input.settlementAvailable ?? true,
    settlementFailedNarrative: input.settlementFailedNarrative ?? DEFAULT_SETTLEMENT_FAILED_NARRATIVE,
  });
}

function checkTargets(label: string, config: TurnConfiguration, keys: ReadonlySet<string>): string[] {
  const errors: string[] = [];
  for (const [outcome, target] of Object.entries(config.branches)) {
    if (target !== undefined && !keys.has(target)) {
      errors.push(`${label} ${outcome} branch target '${target}' not found`);
    }
  }
  if (config.defaultNext !== null && !keys.has(config.defaultNext)) {
    errors.push(`${label} defaultNext '${config.defaultNext}' not found`);
  }
  return errors;
}

/**
 * Validate raw scenario JSON and build every matrix it names. Schema and
 * reference problems raise ScenarioError; bad tags and parameters raise the
 * matrix registry's own errors.
 */
export function parseScenario(raw: unknown): Scenario {
  if (!validateScenarioInput(raw)) {
    const details = ajv.errorsText(validateScenarioInput.errors, { separator: "\n" });
    throw new ScenarioError(`Scenario failed schema validation:\n${details}`);
  }

  const turns: Record<string, TurnConfiguration> = {};
  const labels: Record<string, string> = {};

  raw.turns.forEach((input, index) => {
    const expected = index + 1;
    if (input.turn !== undefined && input.turn !== expected) {
      throw new ScenarioError(
        `Turn sequence mismatch: expected turn ${expected} at index ${index}, got turn ${input.turn}`
      );
    }
    const key = turnKey(expected);
    labels[key] = `Turn ${expected}`;
    turns[key] = parseTurn(labels[key], expected, input);
  });

  for (const [id, input] of Object.entries(raw.branches ?? {})) {
    if (Object.prototype.hasOwnProperty.call(turns, id)) {
      throw new ScenarioError(`Branch '${id}' collides with a main-sequence turn`);
    }
    if (input.turn === undefined) {
      throw new ScenarioError(`Branch '${id}' must declare its turn number`);
    }
    labels[id] = `Branch '${id}'`;
    turns[id] = parseTurn(labels[id], input.turn, input);
  }

  const keys = new Set(Object.keys(turns));
  const errors = Object.entries(turns).flatMap(([key, config]) => checkTargets(labels[key], config, keys));
  if (errors.length > 0) {
    throw new ScenarioError(`Invalid branch targets:\n  ${errors.join("\n  ")}`);
  }

  const matrices: Record<string, PayoffMatrix> = {};
  for (const [key, config] of Object.entries(turns)) {
    matrices[key] = buildMatrix(config.matrixType, config.matrixParams);
  }

  return Object.freeze({
    id: raw.id,
    name: raw.name,
    maxTurns: raw.maxTurns ?? null,
    firstTurnKey: turnKey(1),
    turns: Object.freeze(turns),
    matrices: Object.freeze(matrices),
  });
}

export async function loadScenarioFromFile(path: string): Promise<Scenario> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ScenarioError(`Invalid JSON in ${path}: ${message}`);
  }
  return parseScenario(raw);
}
