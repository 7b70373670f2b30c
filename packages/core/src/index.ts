export * from "./types/game";
export * from "./types/matrix";
export * from "./types/scenario";
export * from "./types/transcript";
export * from "./errors";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { clamp, approxEqual } from "./libs/math";
export { SeededRng } from "./libs/SeededRng";
export { TranscriptBuilder } from "./libs/TranscriptBuilder";
export type { TurnRecordInput } from "./libs/TranscriptBuilder";
