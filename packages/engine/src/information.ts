import type { InformationState, Intel, IntelSubject } from "@brinksmanship/core";
import { INTEL_DECAY_PER_TURN, INTEL_MAX_RADIUS, STAT_MAX, STAT_MIN } from "./rules";

export const UNKNOWN_INTEL: Intel = Object.freeze({ kind: "unknown" });

export function knownIntel(value: number, observedTurn: number): Intel {
  return Object.freeze({ kind: "known", value, observedTurn });
}

export function createInformationState(): InformationState {
  return Object.freeze({ position: UNKNOWN_INTEL, resources: UNKNOWN_INTEL });
}

export interface IntelEstimate {
  readonly center: number;
  readonly radius: number;
}

/**
 * Best guess of an opponent value. Unknown values sit at the midpoint with
 * the widest radius; an observation widens by 0.8 per elapsed turn up to 5.
 */
export function estimateIntel(intel: Intel, currentTurn: number): IntelEstimate {
  switch (intel.kind) {
    case "unknown":
      return { center: (STAT_MIN + STAT_MAX) / 2, radius: INTEL_MAX_RADIUS };
    case "known":
      return {
        center: intel.value,
        radius: Math.min(Math.max(0, currentTurn - intel.observedTurn) * INTEL_DECAY_PER_TURN, INTEL_MAX_RADIUS),
      };
  }
}

export function withObservation(
  info: InformationState,
  subject: IntelSubject,
  value: number,
  observedTurn: number
): InformationState {
  return Object.freeze({ ...info, [subject]: knownIntel(value, observedTurn) });
}
