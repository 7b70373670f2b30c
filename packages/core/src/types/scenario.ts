import type { MatrixOutcomeCode, OutcomeCode } from "./game";
import type { MatrixParameters, MatrixType, PayoffMatrix } from "./matrix";

/**
 * Per-turn configuration supplied by a scenario. The engine consumes it but
 * never owns or edits it.
 */
export interface TurnConfiguration {
  readonly turn: number;
  readonly act: 1 | 2 | 3;
  readonly narrativeBriefing: string;
  readonly matrixType: MatrixType;
  readonly matrixParams: MatrixParameters;
  readonly outcomeNarratives: Partial<Record<MatrixOutcomeCode, string>>;
  /** Next turn key by outcome code */
  readonly branches: Partial<Record<OutcomeCode, string>>;
  readonly defaultNext: string | null;
  readonly settlementAvailable: boolean;
  readonly settlementFailedNarrative: string;
}

/** Raw per-turn record as authored in scenario JSON. */
export interface ScenarioTurnInput {
  turn?: number;
  narrativeBriefing?: string;
  matrixType: string;
  matrixParameters?: Partial<MatrixParameters>;
  outcomeNarratives?: Partial<Record<MatrixOutcomeCode, string>>;
  branches?: Partial<Record<OutcomeCode, string>>;
  defaultNext?: string;
  settlementAvailable?: boolean;
  settlementFailedNarrative?: string;
}

export interface ScenarioInput {
  id: string;
  name: string;
  maxTurns?: number;
  turns: ScenarioTurnInput[];
  branches?: Record<string, ScenarioTurnInput>;
}

/** A scenario after validation, with every matrix already built once. */
export interface Scenario {
  readonly id: string;
  readonly name: string;
  readonly maxTurns: number | null;
  readonly firstTurnKey: string;
  readonly turns: Readonly<Record<string, TurnConfiguration>>;
  /** Built matrix for each key of `turns` */
  readonly matrices: Readonly<Record<string, PayoffMatrix>>;
}
