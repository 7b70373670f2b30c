import type { GameState, PlayerSide } from "@brinksmanship/core";
import { opponentOf } from "./state";
import { settlementConstraints, type SettlementConstraints } from "./resolution";
import type { VpSplit } from "./variance";

/** A standing settlement offer. The proposer takes `offeredVp`, the recipient the rest. */
export interface SettlementOffer {
  readonly proposer: PlayerSide;
  readonly recipient: PlayerSide;
  readonly offeredVp: number;
  /** A counteroffer can only be accepted or rejected. */
  readonly isCounter: boolean;
}

export type SettlementResponse =
  | { readonly kind: "accept" }
  | { readonly kind: "counter"; readonly counterVp: number }
  | { readonly kind: "reject" };

export type NegotiationStep =
  | { readonly kind: "accepted"; readonly split: VpSplit }
  | { readonly kind: "countered"; readonly offer: SettlementOffer }
  | { readonly kind: "rejected" }
  | { readonly kind: "invalid"; readonly error: string };

export interface SettlementRoles {
  readonly proposer: PlayerSide;
  readonly recipient: PlayerSide;
}

/** When both sides propose, the stronger position makes the offer. Ties go to A. */
export function settlementRoles(state: GameState): SettlementRoles {
  const proposer: PlayerSide = state.playerB.position > state.playerA.position ? "B" : "A";
  return { proposer, recipient: opponentOf(proposer) };
}

export function checkOfferRange(offeredVp: number, range: SettlementConstraints): string | null {
  if (!Number.isInteger(offeredVp)) {
    return `Offer must be a whole number of VP, got ${offeredVp}`;
  }
  if (offeredVp < range.minVp) return `Offer too low. Minimum: ${range.minVp} VP`;
  if (offeredVp > range.maxVp) return `Offer too high. Maximum: ${range.maxVp} VP`;
  return null;
}

export function offerSplit(offer: SettlementOffer): VpSplit {
  const rest = 100 - offer.offeredVp;
  return offer.proposer === "A" ? { vpA: offer.offeredVp, vpB: rest } : { vpA: rest, vpB: offer.offeredVp };
}

export function describeOffer(offer: SettlementOffer): string {
  const { vpA, vpB } = offerSplit(offer);
  const verb = offer.isCounter ? "counters with" : "offers";
  return `Player ${offer.proposer} ${verb} a settlement: Player A ${vpA} VP, Player B ${vpB} VP.`;
}

/**
 * Apply one response to the standing offer. Only the recipient may answer;
 * a counter swaps the roles and must sit inside the counterer's own range.
 */
export function respondToOffer(
  state: GameState,
  offer: SettlementOffer,
  side: PlayerSide,
  response: SettlementResponse
): NegotiationStep {
  if (side !== offer.recipient) {
    return { kind: "invalid", error: `Only Player ${offer.recipient} can respond to this offer` };
  }
  switch (response.kind) {
    case "accept":
      return { kind: "accepted", split: offerSplit(offer) };
    case "reject":
      return { kind: "rejected" };
    case "counter": {
      if (offer.isCounter) {
        return { kind: "invalid", error: "Only one counteroffer is allowed" };
      }
      const error = checkOfferRange(response.counterVp, settlementConstraints(state, side));
      if (error !== null) return { kind: "invalid", error };
      return {
        kind: "countered",
        offer: { proposer: side, recipient: offer.proposer, offeredVp: response.counterVp, isCounter: true },
      };
    }
  }
}
