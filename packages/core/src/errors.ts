export class BrinksmanshipError extends Error {
  override name = "BrinksmanshipError";
}

/** Matrix parameters that break the game type's ordinal requirement. */
export class ConstraintError extends BrinksmanshipError {
  override name = "ConstraintError";

  constructor(
    readonly matrixType: string,
    message: string,
    readonly values: Readonly<Record<string, number>>
  ) {
    super(message);
  }
}

export class UnknownMatrixTypeError extends BrinksmanshipError {
  override name = "UnknownMatrixTypeError";

  constructor(
    readonly tag: string,
    readonly validTypes: readonly string[],
    readonly validAliases: readonly string[]
  ) {
    super(
      `Unknown matrix type '${tag}'. ` +
        `Valid types: ${validTypes.join(", ")}. ` +
        `Valid aliases: ${validAliases.join(", ")}`
    );
  }
}

/** A StateDeltas value outside its documented bounds. Never clamped. */
export class DeltaRangeError extends BrinksmanshipError {
  override name = "DeltaRangeError";

  constructor(
    readonly field: string,
    readonly value: number,
    message: string
  ) {
    super(message);
  }
}

export class ScenarioError extends BrinksmanshipError {
  override name = "ScenarioError";
}

export class SerializationError extends BrinksmanshipError {
  override name = "SerializationError";
}
