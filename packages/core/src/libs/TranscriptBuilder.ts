import type { GameTranscript, TurnRecord } from "../types/transcript";
import { hashState, chainHash } from "./Crypto";

export type TurnRecordInput = Omit<TurnRecord, "sequence" | "stateHash" | "prevHash">;

/**
 * Builds the hash-chained record of a game as turns resolve. No wall-clock
 * data goes in, so two runs from the same seed produce the same root hash.
 */
export class TranscriptBuilder {
  private readonly entries: TurnRecord[] = [];
  private currentHash: string;

  constructor(
    private readonly gameId: string,
    initialState: unknown
  ) {
    this.currentHash = hashState(initialState);
  }

  addEntry(input: TurnRecordInput, newState: unknown): TurnRecord {
    const entry: TurnRecord = {
      ...input,
      sequence: this.entries.length,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
    };
    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);
    return entry;
  }

  getTranscript(): GameTranscript {
    return {
      gameId: this.gameId,
      entries: [...this.entries],
      rootHash: this.currentHash,
    };
  }

  getCurrentHash(): string {
    return this.currentHash;
  }
}
