export { GameEngine } from "./GameEngine";
export type { GameEngineOptions, HistoryEntry, PlayerErrors, TurnResult } from "./GameEngine";
export * from "./actions";
export * from "./state";
export * from "./information";
export * from "./surplus";
export * from "./variance";
export * from "./endings";
export * from "./resolution";
export * from "./negotiation";
export * from "./scenario";
export * from "./serialization";
export * as rules from "./rules";
export { default as log } from "./logger";
