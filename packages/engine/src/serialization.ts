import { Ajv2020 } from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import { canonicalEncode, SerializationError, type GameEnding, type GameState } from "@brinksmanship/core";
import gameStateSchemaJson from "../schemas/game-state.schema.json";
import gameEndingSchemaJson from "../schemas/game-ending.schema.json";
import { freezeState } from "./state";
import { createGameEnding } from "./endings";

const gameStateSchema: SchemaObject = gameStateSchemaJson;
const gameEndingSchema: SchemaObject = gameEndingSchemaJson;

const ajv = new Ajv2020({ allErrors: true });
const validateGameState = ajv.compile<GameState>(gameStateSchema);
const validateGameEnding = ajv.compile<GameEnding>(gameEndingSchema);

function parseJson(kind: string, json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SerializationError(`Malformed ${kind} JSON: ${message}`);
  }
}

export function serializeState(state: GameState): string {
  return canonicalEncode(state);
}

export function deserializeState(json: string): GameState {
  const raw = parseJson("game state", json);
  if (!validateGameState(raw)) {
    throw new SerializationError(
      `Invalid game state:\n${ajv.errorsText(validateGameState.errors, { separator: "\n" })}`
    );
  }
  return freezeState(raw);
}

export function serializeEnding(ending: GameEnding): string {
  return canonicalEncode(ending);
}

/** Field checks come from the schema; VP sums are re-checked by createGameEnding. */
export function deserializeEnding(json: string): GameEnding {
  const raw = parseJson("game ending", json);
  if (!validateGameEnding(raw)) {
    throw new SerializationError(
      `Invalid game ending:\n${ajv.errorsText(validateGameEnding.errors, { separator: "\n" })}`
    );
  }
  try {
    return createGameEnding(raw);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new SerializationError(`Invalid game ending: ${err.message}`);
    }
    throw err;
  }
}
