import type { ActionType, OutcomeCode } from "./game";

/** One resolved turn, linked to the previous record by its hash. */
export interface TurnRecord {
  readonly sequence: number;
  readonly turn: number;
  readonly turnKey: string;
  readonly actionA: string;
  readonly actionB: string;
  readonly actionTypeA: ActionType;
  readonly actionTypeB: ActionType;
  readonly outcomeCode: OutcomeCode;
  readonly narrative: string;
  readonly stateHash: string;
  readonly prevHash: string;
}

export interface GameTranscript {
  readonly gameId: string;
  readonly entries: readonly TurnRecord[];
  readonly rootHash: string;
}
